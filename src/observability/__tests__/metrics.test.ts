import { describe, expect, it } from "vitest";
import { MetricsRegistry, summarize } from "../metrics";

describe("MetricsRegistry", () => {
  it("reports every known counter, zero when untouched", () => {
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("artifacts_recovered");
    metrics.incrementCounter("bytes_recovered", 512);
    metrics.incrementCounter("bytes_recovered", 100);

    const counters = metrics.getCounters();
    expect(counters.artifacts_recovered).toBe(1);
    expect(counters.bytes_recovered).toBe(612);
    expect(counters.links_unresolved).toBe(0);
    expect(Object.keys(counters)).toHaveLength(10);
  });

  it("times with the injected clock", () => {
    let now = 1_000;
    const metrics = new MetricsRegistry(() => now);

    const stop = metrics.startTimer("artifact_fetch_ms");
    now += 40;
    expect(stop()).toBe(40);

    expect(metrics.getTimerSummaries().artifact_fetch_ms).toEqual({
      count: 1,
      totalMs: 40,
      min: 40,
      max: 40,
      avg: 40,
      p95: 40,
    });
    expect(metrics.getTimerSummaries().rewrite_page_ms.count).toBe(0);
  });
});

describe("summarize", () => {
  it("uses the nearest-rank 95th percentile", () => {
    const values = Array.from({ length: 20 }, (_, index) => 20 - index);

    expect(summarize(values)).toEqual({ count: 20, totalMs: 210, min: 1, max: 20, avg: 10.5, p95: 19 });
  });
});
