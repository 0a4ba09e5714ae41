import { describe, it, expect, beforeEach } from "vitest";
import { metrics } from "./metrics.js";

describe("metrics", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should return undefined for models with nothing recorded", () => {
    expect(metrics.snapshot("User")).toBeUndefined();
  });

  it("should count operations per model", () => {
    metrics.recordCreate("User");
    metrics.recordCreate("User");
    metrics.recordUpdate("User");
    metrics.recordConflict("User");
    metrics.recordLookup("User", true);
    metrics.recordLookup("User", false);
    metrics.recordDelete("Post");

    expect(metrics.snapshot("User")).toMatchObject({
      creates: 2,
      updates: 1,
      deletes: 0,
      conflicts: 1,
      anomalies: 0,
      lookupHits: 1,
      lookupMisses: 1,
    });
    expect(metrics.snapshot("Post")?.deletes).toBe(1);
  });

  it("should keep only the most recent durations", () => {
    for (let i = 1; i <= 105; i++) {
      metrics.recordDuration("User", "get", i);
    }

    const samples = metrics.snapshot("User")?.durationsMs.get ?? [];
    expect(samples).toHaveLength(100);
    expect(samples[0]).toBe(6);
    expect(samples[99]).toBe(105);
  });

  it("should hand out copies", () => {
    metrics.recordDuration("User", "find", 1);

    metrics.snapshot("User")?.durationsMs.find.push(99);

    expect(metrics.snapshot("User")?.durationsMs.find).toEqual([1]);
  });

  it("should reset a single model", () => {
    metrics.recordCreate("User");
    metrics.recordCreate("Post");

    metrics.reset("User");

    expect(metrics.snapshot("User")).toBeUndefined();
    expect(metrics.snapshot("Post")?.creates).toBe(1);
  });
});
