/**
 * Metrics tracking for model operations
 */

export type OperationName = "create" | "update" | "get" | "find" | "delete";

export interface ModelMetrics {
  creates: number;
  updates: number;
  deletes: number;
  conflicts: number;
  anomalies: number;
  lookupHits: number;
  lookupMisses: number;
  durationsMs: Record<OperationName, number[]>;
}

const WINDOW = 100;

class MetricsCollector {
  #metrics = new Map<string, ModelMetrics>();

  /**
   * Get or create metrics for a model
   */
  #getMetrics(model: string): ModelMetrics {
    let metrics = this.#metrics.get(model);
    if (!metrics) {
      metrics = {
        creates: 0,
        updates: 0,
        deletes: 0,
        conflicts: 0,
        anomalies: 0,
        lookupHits: 0,
        lookupMisses: 0,
        durationsMs: { create: [], update: [], get: [], find: [], delete: [] },
      };
      this.#metrics.set(model, metrics);
    }
    return metrics;
  }

  recordCreate(model: string): void {
    this.#getMetrics(model).creates++;
  }

  recordUpdate(model: string): void {
    this.#getMetrics(model).updates++;
  }

  recordDelete(model: string): void {
    this.#getMetrics(model).deletes++;
  }

  recordConflict(model: string): void {
    this.#getMetrics(model).conflicts++;
  }

  recordAnomaly(model: string): void {
    this.#getMetrics(model).anomalies++;
  }

  /**
   * Record the outcome of a fetch (by id or by unique value)
   */
  recordLookup(model: string, hit: boolean): void {
    const metrics = this.#getMetrics(model);
    if (hit) {
      metrics.lookupHits++;
    } else {
      metrics.lookupMisses++;
    }
  }

  /**
   * Record operation duration
   */
  recordDuration(model: string, operation: OperationName, ms: number): void {
    const samples = this.#getMetrics(model).durationsMs[operation];
    samples.push(ms);

    // Keep only the last samples to avoid unbounded memory growth
    if (samples.length > WINDOW) {
      samples.shift();
    }
  }

  /**
   * Copy of the metrics for a model, or undefined if nothing was recorded
   */
  snapshot(model: string): ModelMetrics | undefined {
    const metrics = this.#metrics.get(model);
    if (!metrics) return undefined;
    return {
      ...metrics,
      durationsMs: {
        create: [...metrics.durationsMs.create],
        update: [...metrics.durationsMs.update],
        get: [...metrics.durationsMs.get],
        find: [...metrics.durationsMs.find],
        delete: [...metrics.durationsMs.delete],
      },
    };
  }

  /**
   * Reset metrics for one model, or for all models
   */
  reset(model?: string): void {
    if (model) {
      this.#metrics.delete(model);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
