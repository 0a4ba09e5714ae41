/**
 * Store handle wrapper for failure and ordering tests
 */

import type { StoreHandle } from "@modelkv/sdk";

export type Primitive = "incr" | "get" | "set" | "del" | "setIfAbsent" | "deleteIfEquals";

export interface PrimitiveCall {
  op: Primitive;
  key: string;
}

interface PlannedFault {
  op: Primitive;
  remaining: number;
  error: Error;
}

/**
 * Delegates to an inner handle, records every call, and rejects planned calls
 *
 * @example
 * ```typescript
 * const faulty = new FaultyStore(new MemoryStore());
 * faulty.failOn("set"); // the next record write rejects
 * ```
 */
export class FaultyStore implements StoreHandle {
  readonly calls: PrimitiveCall[] = [];
  #inner: StoreHandle;
  #faults: PlannedFault[] = [];

  constructor(inner: StoreHandle) {
    this.#inner = inner;
  }

  /**
   * Reject the `nth` upcoming call of a primitive (1 = the next one)
   */
  failOn(op: Primitive, nth = 1, error: Error = new Error(`injected ${op} failure`)): this {
    this.#faults.push({ op, remaining: nth, error });
    return this;
  }

  /**
   * Primitive names called so far, in order
   */
  ops(): Primitive[] {
    return this.calls.map((call) => call.op);
  }

  reset(): void {
    this.calls.length = 0;
    this.#faults = [];
  }

  incr(key: string): Promise<number> {
    return this.#run("incr", key, () => this.#inner.incr(key));
  }

  get(key: string): Promise<string | null> {
    return this.#run("get", key, () => this.#inner.get(key));
  }

  set(key: string, value: string): Promise<void> {
    return this.#run("set", key, () => this.#inner.set(key, value));
  }

  del(key: string): Promise<boolean> {
    return this.#run("del", key, () => this.#inner.del(key));
  }

  setIfAbsent(key: string, value: string): Promise<boolean> {
    return this.#run("setIfAbsent", key, () => this.#inner.setIfAbsent(key, value));
  }

  deleteIfEquals(key: string, expected: string): Promise<boolean> {
    return this.#run("deleteIfEquals", key, () => this.#inner.deleteIfEquals(key, expected));
  }

  async #run<T>(op: Primitive, key: string, fn: () => Promise<T>): Promise<T> {
    this.calls.push({ op, key });

    for (const fault of this.#faults) {
      if (fault.op !== op) continue;
      fault.remaining--;
      if (fault.remaining === 0) {
        this.#faults = this.#faults.filter((f) => f !== fault);
        throw fault.error;
      }
    }

    return fn();
  }
}
