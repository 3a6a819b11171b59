import type { ReadableStream } from "node:stream/web";
import { fileSize, sha256File, writeStreamAtomic } from "../core/atomicWrite";
import { errorMessage, ResponseBodyError } from "../core/errors";
import { FetchFn, isRetriableStatus, withTimeout } from "../core/fetch";
import { backoffDelayMs, Pacer } from "../core/pacing";
import { buildReplayUrl, HostPolicy } from "../core/urls";
import { Logger, MetricsRegistry } from "../observability";
import { StateStore } from "../store";
import { CanonicalSelection, ProvenanceRecord, ProvenanceStatus } from "../types";
import { absoluteArtifactPath, localPathFor, LocalPathPlan } from "./localPath";

export interface RecoverContext {
  siteDir: string;
  hostPolicy: HostPolicy;
  preserveQuery: boolean;
  replayBaseUrl: string;
  userAgent: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  fetchFn: FetchFn;
  pacer: Pacer;
  store: StateStore;
  logger: Logger;
  metrics: MetricsRegistry;
  now?: () => Date;
  /** Paths planned over the whole selection set; without it each URL maps on its own. */
  localPaths?: LocalPathPlan;
}

type AttemptOutcome =
  | { kind: "stored"; sha256: string; bytes: number }
  | { kind: "http_status"; statusCode: number }
  | { kind: "write_failed"; error: string };

async function* readBody(body: ReadableStream<Uint8Array> | null): AsyncGenerator<Uint8Array> {
  if (!body) {
    return;
  }
  const reader = body.getReader();
  try {
    while (true) {
      const chunk = await reader.read().catch((error: unknown) => {
        throw new ResponseBodyError(error);
      });
      if (chunk.done) {
        return;
      }
      yield chunk.value;
    }
  } finally {
    reader.releaseLock();
  }
}

async function fetchAttempt(sourceUrl: string, targetPath: string, ctx: RecoverContext): Promise<AttemptOutcome> {
  return withTimeout<AttemptOutcome>(ctx.timeoutMs, async (signal) => {
    const response = await ctx.fetchFn(sourceUrl, {
      method: "GET",
      headers: {
        "user-agent": ctx.userAgent,
        accept: "*/*",
      },
      signal,
      redirect: "follow",
    });

    if (response.status !== 200) {
      return { kind: "http_status", statusCode: response.status };
    }

    try {
      const written = await writeStreamAtomic(targetPath, readBody(response.body));
      return { kind: "stored", ...written };
    } catch (error) {
      if (error instanceof ResponseBodyError) {
        throw error;
      }
      return { kind: "write_failed", error: errorMessage(error) };
    }
  });
}

/**
 * Recovers one selected capture into the mirror and appends exactly one
 * provenance record describing the outcome. Never throws for fetch or write
 * failures; those become `fetch_failed_<code>` or `fetch_error` records. Only
 * network errors and transient statuses are retried; a local write failure
 * ends the attempts at once.
 */
export async function recoverSelection(selection: CanonicalSelection, ctx: RecoverContext): Promise<ProvenanceRecord> {
  const now = ctx.now ?? (() => new Date());
  const sourceUrl = buildReplayUrl(ctx.replayBaseUrl, selection.timestamp, selection.originalUrl);
  const localPath = ctx.localPaths
    ? ctx.localPaths.pathFor(selection)
    : localPathFor(selection.originalUrl, ctx.hostPolicy, ctx.preserveQuery);
  const fields = { url: selection.originalUrl, canonicalKey: selection.canonicalKey, localPath };

  const finish = async (
    status: ProvenanceStatus,
    sha256: string,
    attempts: number,
    error?: string,
  ): Promise<ProvenanceRecord> => {
    const record: ProvenanceRecord = {
      originalUrl: selection.originalUrl,
      timestamp: selection.timestamp,
      sourceUrl,
      localPath: localPath ?? selection.canonicalKey,
      sha256,
      status,
      recoveredAt: now().toISOString(),
      attempts,
      ...(error !== undefined ? { error } : {}),
    };
    await ctx.store.appendProvenance(record);
    if (status === "recovered") {
      ctx.metrics.incrementCounter("artifacts_recovered", 1);
    } else if (status === "skipped_existing") {
      ctx.metrics.incrementCounter("artifacts_skipped", 1);
    } else {
      ctx.metrics.incrementCounter("artifacts_failed", 1);
    }
    return record;
  };

  if (localPath === undefined) {
    ctx.logger.warn("recover_unmappable_url", fields);
    return finish("fetch_error", "", 0, "original URL cannot be mapped to a local path");
  }

  const targetPath = absoluteArtifactPath(ctx.siteDir, localPath);
  const existingSize = await fileSize(targetPath);
  if (existingSize !== undefined && existingSize > 0) {
    const sha256 = await sha256File(targetPath);
    ctx.logger.debug("recover_skipped_existing", fields);
    return finish("skipped_existing", sha256, 0);
  }

  const maxAttempts = ctx.maxRetries + 1;
  for (let attempt = 1; ; attempt += 1) {
    await ctx.pacer.wait();
    const stopTimer = ctx.metrics.startTimer("artifact_fetch_ms");
    const isLastAttempt = attempt >= maxAttempts;

    let outcome: AttemptOutcome | undefined;
    let failure: string | undefined;
    try {
      outcome = await fetchAttempt(sourceUrl, targetPath, ctx);
    } catch (error) {
      failure = errorMessage(error);
    }
    const durationMs = stopTimer();

    if (outcome === undefined) {
      ctx.logger.warn("recover_error", { ...fields, attempt, durationMs, error: failure });
      if (isLastAttempt) {
        return finish("fetch_error", "", attempt, failure);
      }
    } else if (outcome.kind === "stored") {
      ctx.logger.info("recover_ok", { ...fields, attempt, durationMs, bytes: outcome.bytes });
      ctx.metrics.incrementCounter("bytes_recovered", outcome.bytes);
      return finish("recovered", outcome.sha256, attempt);
    } else if (outcome.kind === "write_failed") {
      ctx.logger.warn("recover_write_failed", { ...fields, attempt, durationMs, error: outcome.error });
      return finish("fetch_error", "", attempt, outcome.error);
    } else if (!isRetriableStatus(outcome.statusCode) || isLastAttempt) {
      ctx.logger.warn("recover_failed_http", { ...fields, attempt, durationMs, statusCode: outcome.statusCode });
      return finish(`fetch_failed_${outcome.statusCode}`, "", attempt, `HTTP ${outcome.statusCode}`);
    } else {
      ctx.logger.warn("recover_retry_http", { ...fields, attempt, durationMs, statusCode: outcome.statusCode });
    }

    await ctx.pacer.sleep(backoffDelayMs(attempt, ctx.retryBaseDelayMs, ctx.retryMaxDelayMs));
  }
}
