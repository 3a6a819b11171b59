import { compareStrings } from "../core/compare";
import { DiscoveryPageFailure, errorMessage } from "../core/errors";
import { backoffDelayMs, Pacer } from "../core/pacing";
import { Logger, MetricsRegistry } from "../observability";
import { CaptureCandidate, DiscoveryStatus } from "../types";
import { CaptureIndexClient, IndexPage, IndexQuery } from "./indexClient";

export interface DiscoveryDependencies {
  client: CaptureIndexClient;
  pacer: Pacer;
  logger: Logger;
  metrics: MetricsRegistry;
  maxPageRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export interface DiscoverySummary {
  pagesFetched: number;
  candidatesYielded: number;
}

function candidateIdentity(candidate: CaptureCandidate): string {
  return `${candidate.originalUrl}\u0000${candidate.timestamp}\u0000${candidate.digest}`;
}

export function compareCandidateOrder(a: CaptureCandidate, b: CaptureCandidate): number {
  return (
    compareStrings(a.originalUrl, b.originalUrl) ||
    compareStrings(a.timestamp, b.timestamp) ||
    compareStrings(a.digest, b.digest)
  );
}

async function fetchPageWithRetry(
  deps: DiscoveryDependencies,
  query: IndexQuery,
  resumeKey: string | undefined,
  progress: DiscoverySummary,
): Promise<IndexPage> {
  const maxAttempts = deps.maxPageRetries + 1;
  for (let attempt = 1; ; attempt += 1) {
    await deps.pacer.wait();
    const stopTimer = deps.metrics.startTimer("index_page_ms");
    try {
      const page = await deps.client.fetchPage(query, resumeKey);
      deps.metrics.incrementCounter("index_pages_fetched", 1);
      deps.logger.info("discovery_page_ok", {
        page: progress.pagesFetched + 1,
        rows: page.candidates.length,
        hasMore: Boolean(page.resumeKey),
        durationMs: stopTimer(),
        attempt,
      });
      return page;
    } catch (error) {
      const message = errorMessage(error);
      deps.logger.warn("discovery_page_error", {
        page: progress.pagesFetched + 1,
        attempt,
        durationMs: stopTimer(),
        error: message,
      });
      if (attempt >= maxAttempts) {
        throw new DiscoveryPageFailure(`capture index page ${progress.pagesFetched + 1} failed after ${attempt} attempts: ${message}`, {
          pagesFetched: progress.pagesFetched,
          candidatesYielded: progress.candidatesYielded,
          attempts: attempt,
        });
      }
      await deps.pacer.sleep(backoffDelayMs(attempt, deps.retryBaseDelayMs, deps.retryMaxDelayMs));
    }
  }
}

/**
 * Lazily walks every page of the capture index for `query.domain`, following
 * resume keys until the index stops returning one. Repeated
 * (url, timestamp, digest) rows are dropped. The walk can only restart from the
 * first page; a page that keeps failing ends it with `DiscoveryPageFailure`.
 */
export async function* discover(
  query: IndexQuery,
  deps: DiscoveryDependencies,
): AsyncGenerator<CaptureCandidate, DiscoverySummary, undefined> {
  const seen = new Set<string>();
  const seenResumeKeys = new Set<string>();
  const progress: DiscoverySummary = { pagesFetched: 0, candidatesYielded: 0 };
  let resumeKey: string | undefined;

  while (true) {
    const page = await fetchPageWithRetry(deps, query, resumeKey, progress);
    progress.pagesFetched += 1;

    for (const candidate of page.candidates) {
      const identity = candidateIdentity(candidate);
      if (seen.has(identity)) {
        continue;
      }
      seen.add(identity);
      progress.candidatesYielded += 1;
      yield candidate;
    }

    if (!page.resumeKey) {
      return { ...progress };
    }
    if (seenResumeKeys.has(page.resumeKey)) {
      throw new DiscoveryPageFailure(`capture index repeated resume key after page ${progress.pagesFetched}`, {
        pagesFetched: progress.pagesFetched,
        candidatesYielded: progress.candidatesYielded,
        attempts: 1,
      });
    }
    seenResumeKeys.add(page.resumeKey);
    resumeKey = page.resumeKey;
  }
}

/** Union of two candidate sets, deduplicated and in canonical order. */
export function mergeCandidates(a: readonly CaptureCandidate[], b: readonly CaptureCandidate[]): CaptureCandidate[] {
  const merged = new Map<string, CaptureCandidate>();
  for (const candidate of [...a, ...b]) {
    merged.set(candidateIdentity(candidate), candidate);
  }
  return [...merged.values()].sort(compareCandidateOrder);
}

export interface DiscoveryResult {
  candidates: CaptureCandidate[];
  status: DiscoveryStatus;
}

/**
 * Drains `discover` into a sorted candidate list. A page failure is not
 * rethrown: the candidates gathered so far are kept and the status says the
 * domain was only partially discovered.
 */
export async function collectDiscovery(
  query: IndexQuery,
  deps: DiscoveryDependencies,
  now: () => Date = () => new Date(),
): Promise<DiscoveryResult> {
  const candidates: CaptureCandidate[] = [];
  const iterator = discover(query, deps);
  let complete = true;
  let pagesFetched = 0;
  let failure: string | undefined;

  try {
    while (true) {
      const next = await iterator.next();
      if (next.done) {
        pagesFetched = next.value.pagesFetched;
        break;
      }
      candidates.push(next.value);
    }
  } catch (error) {
    if (!(error instanceof DiscoveryPageFailure)) {
      throw error;
    }
    complete = false;
    pagesFetched = error.pagesFetched;
    failure = error.message;
    deps.logger.warn("discovery_partial", {
      domain: query.domain,
      pagesFetched,
      candidateCount: candidates.length,
      error: failure,
    });
  }

  deps.metrics.incrementCounter("candidates_discovered", candidates.length);
  candidates.sort(compareCandidateOrder);

  return {
    candidates,
    status: {
      domain: query.domain,
      fromTimestamp: query.fromTimestamp,
      toTimestamp: query.toTimestamp,
      complete,
      pagesFetched,
      candidateCount: candidates.length,
      ...(failure !== undefined ? { error: failure } : {}),
      finishedAt: now().toISOString(),
    },
  };
}
