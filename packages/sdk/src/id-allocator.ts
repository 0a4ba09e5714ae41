/**
 * Per-model object id allocation on top of the store's atomic increment
 */

import { counterKey } from "./keys.js";
import { CorruptRecordError } from "./errors.js";
import type { ModelId, StoreHandle } from "./types.js";

export class IdAllocator {
  #store: StoreHandle;

  constructor(store: StoreHandle) {
    this.#store = store;
  }

  /**
   * Allocate the next id for a model. Strictly increasing across all callers;
   * ids burnt by aborted creates are never handed out again.
   */
  async next(model: string): Promise<ModelId> {
    const key = counterKey(model);
    const id = await this.#store.incr(key);
    if (!Number.isSafeInteger(id) || id < 1) {
      throw new CorruptRecordError(key, `counter returned ${id}`);
    }
    return id;
  }
}
