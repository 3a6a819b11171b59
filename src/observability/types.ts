export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  url?: string;
  canonicalKey?: string;
  localPath?: string;
  attempt?: number;
  [key: string]: unknown;
}

export const METRIC_COUNTERS = [
  "index_pages_fetched",
  "candidates_discovered",
  "selections_made",
  "artifacts_recovered",
  "artifacts_skipped",
  "artifacts_failed",
  "bytes_recovered",
  "pages_rewritten",
  "links_rewritten",
  "links_unresolved",
] as const;

export const METRIC_TIMERS = ["index_page_ms", "artifact_fetch_ms", "rewrite_page_ms"] as const;

export type MetricCounterName = (typeof METRIC_COUNTERS)[number];

export type MetricTimerName = (typeof METRIC_TIMERS)[number];
