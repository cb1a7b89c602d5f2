import { describe, it, expect, beforeEach } from "vitest";
import { metrics } from "./metrics.js";

describe("metrics", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should count reads, hits and batches per collection", () => {
    metrics.recordRead("users", true, 5);
    metrics.recordRead("users", false, 1);
    metrics.recordBatch("users", 3, 1, 2);
    metrics.recordScan("users/by_value", 4);

    expect(metrics.snapshot("users")).toEqual({
      reads: 2,
      hits: 1,
      writes: 3,
      deletes: 1,
      batches: 1,
      scans: 0,
      p95ReadMs: 5,
      p95WriteMs: 2,
      p95ScanMs: 0,
    });
    expect(metrics.collections()).toEqual(["users", "users/by_value"]);
  });

  it("should take the 95th percentile of recorded samples", () => {
    expect(metrics.getP95([])).toBe(0);
    expect(metrics.getP95(Array.from({ length: 100 }, (_, i) => 100 - i))).toBe(95);
  });

  it("should keep only the most recent samples", () => {
    for (let i = 0; i <= 100; i++) {
      metrics.recordScan("events", i);
    }
    const raw = metrics.getMetrics("events");
    expect(raw?.scans).toBe(101);
    expect(raw?.scanTimeMs).toHaveLength(100);
    expect(raw?.scanTimeMs[0]).toBe(1);
  });

  it("should reset one collection or all", () => {
    metrics.recordScan("a", 1);
    metrics.recordScan("b", 1);
    metrics.reset("a");
    expect(metrics.collections()).toEqual(["b"]);
    metrics.reset();
    expect(metrics.getMetrics("b")).toBeUndefined();
  });
});
