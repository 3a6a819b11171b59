import { METRIC_COUNTERS, METRIC_TIMERS, MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  totalMs: number;
  min: number;
  max: number;
  avg: number;
  p95: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = this.now();
    return () => {
      const durationMs = this.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  getCounters(): Record<string, number> {
    return Object.fromEntries(METRIC_COUNTERS.map((name) => [name, this.getCounter(name)]));
  }

  getTimerSummaries(): Record<string, TimerSummary> {
    return Object.fromEntries(METRIC_TIMERS.map((name) => [name, summarize(this.timers.get(name) ?? [])]));
  }

  printSummary(runId?: string): void {
    console.log(
      JSON.stringify(
        {
          ts: new Date().toISOString(),
          level: "info",
          msg: "metrics_summary",
          ...(runId ? { runId } : {}),
          counters: this.getCounters(),
          timers: this.getTimerSummaries(),
        },
        null,
        2,
      ),
    );
  }
}

export function summarize(values: readonly number[]): TimerSummary {
  if (values.length === 0) {
    return { count: 0, totalMs: 0, min: 0, max: 0, avg: 0, p95: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const totalMs = sorted.reduce((sum, value) => sum + value, 0);
  // Nearest-rank percentile.
  const rank = Math.ceil(0.95 * sorted.length) - 1;

  return {
    count: sorted.length,
    totalMs,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: Number((totalMs / sorted.length).toFixed(2)),
    p95: sorted[rank],
  };
}
