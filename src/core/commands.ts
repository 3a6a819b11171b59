import {
  AppConfig,
  cutoffTimestamp,
  endOfDayTimestamp,
  getOutputPaths,
  loadOnlyMissingUrls,
  startOfDayTimestamp,
  startOfNextDayTimestamp,
} from "../config";
import { collectDiscovery, HttpCaptureIndexClient, IndexQuery, mergeCandidates } from "../discovery";
import { Logger, MetricsRegistry } from "../observability";
import { RecoverContext, runRecoverStage, RecoverStageSummary } from "../recover";
import { buildReport, CoverageReport, writeReports } from "../report";
import { RewritePolicy } from "../rewrite";
import { selectCanonical, SelectionPolicy, selectWorkSet } from "../select";
import { StateStore } from "../store";
import { DiscoveryStatus } from "../types";
import { errorMessage } from "./errors";
import { FetchFn } from "./fetch";
import { Clock, Pacer } from "./pacing";
import { createHostPolicy, HostPolicy } from "./urls";

export const EXIT_CODES = {
  completed: 0,
  halted: 1,
  partialDiscovery: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: StateStore;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn: FetchFn;
  clock: Clock;
  /** Shared by every network call of the command. */
  pacer: Pacer;
}

export interface DiscoverOutcome {
  status: DiscoveryStatus;
  candidateCount: number;
  selectionCount: number;
  unselectedCount: number;
}

function hostPolicyFor(config: AppConfig): HostPolicy {
  return createHostPolicy(config.canonicalHost, config.equivalentHosts, config.domain);
}

function selectionPolicyFor(config: AppConfig): SelectionPolicy {
  return {
    windowStart: startOfDayTimestamp(config.fromDate, "fromDate"),
    windowEnd: startOfNextDayTimestamp(config.toDate, "toDate"),
    modernCutoffExclusive: cutoffTimestamp(config.modernCutoffDate),
    hostPolicy: hostPolicyFor(config),
    preserveQuery: config.preserveQuery,
    replayBaseUrl: config.replayBaseUrl,
  };
}

function rewritePolicyFor(config: AppConfig): RewritePolicy {
  const selection = selectionPolicyFor(config);
  return {
    hostPolicy: selection.hostPolicy,
    preserveQuery: selection.preserveQuery,
    windowStart: selection.windowStart,
    windowEnd: selection.windowEnd,
    modernCutoffExclusive: selection.modernCutoffExclusive,
  };
}

/**
 * Walks the capture index and re-runs selection over everything known. A
 * partial walk is merged into the candidates already on file, never shrinking them.
 */
export async function runDiscover(ctx: CommandContext): Promise<DiscoverOutcome> {
  const { config } = ctx;
  const query: IndexQuery = {
    domain: config.domain,
    fromTimestamp: startOfDayTimestamp(config.fromDate, "fromDate"),
    toTimestamp: endOfDayTimestamp(config.toDate, "toDate"),
    pageSize: config.discoveryPageSize,
  };
  ctx.logger.info("discover_start", { domain: query.domain, from: query.fromTimestamp, to: query.toTimestamp });

  const client = new HttpCaptureIndexClient({
    endpoint: config.cdxEndpoint,
    userAgent: config.userAgent,
    timeoutMs: config.requestTimeoutMs,
    fetchFn: ctx.fetchFn,
  });
  const result = await collectDiscovery(
    query,
    {
      client,
      pacer: ctx.pacer,
      logger: ctx.logger,
      metrics: ctx.metrics,
      maxPageRetries: config.discoveryMaxPageRetries,
      retryBaseDelayMs: config.retryBaseDelayMs,
      retryMaxDelayMs: config.retryMaxDelayMs,
    },
    () => new Date(ctx.clock.now()),
  );

  const candidates = result.status.complete
    ? result.candidates
    : mergeCandidates(await ctx.store.readCandidates(), result.candidates);
  await ctx.store.replaceCandidates(candidates);
  await ctx.store.writeDiscoveryStatus(result.status);

  const selection = selectCanonical(candidates, selectionPolicyFor(config));
  await ctx.store.replaceSelectionState({ selections: selection.selections, unselected: selection.unselected });
  ctx.metrics.incrementCounter("selections_made", selection.selections.length);

  const outcome: DiscoverOutcome = {
    status: result.status,
    candidateCount: candidates.length,
    selectionCount: selection.selections.length,
    unselectedCount: selection.unselected.length,
  };
  ctx.logger.info("discover_complete", {
    complete: result.status.complete,
    pagesFetched: result.status.pagesFetched,
    candidateCount: outcome.candidateCount,
    selectionCount: outcome.selectionCount,
    unselectedCount: outcome.unselectedCount,
    unparseable: selection.unparseable,
  });
  return outcome;
}

export async function runRecover(ctx: CommandContext): Promise<RecoverStageSummary> {
  const { config } = ctx;
  const state = await ctx.store.readSelectionState();
  const hostPolicy = hostPolicyFor(config);
  const onlyMissingUrls = loadOnlyMissingUrls(config.onlyMissingFrom);
  const workSet = selectWorkSet(state.selections, {
    maxSelections: config.maxSelections,
    onlyMissingUrls,
    hostPolicy,
    preserveQuery: config.preserveQuery,
  });
  ctx.logger.info("recover_start", {
    selections: state.selections.length,
    workSet: workSet.length,
    onlyMissing: onlyMissingUrls.size,
    maxSelections: config.maxSelections,
  });

  const recoverContext: RecoverContext = {
    siteDir: getOutputPaths(config).siteDir,
    hostPolicy,
    preserveQuery: config.preserveQuery,
    replayBaseUrl: config.replayBaseUrl,
    userAgent: config.userAgent,
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
    retryBaseDelayMs: config.retryBaseDelayMs,
    retryMaxDelayMs: config.retryMaxDelayMs,
    fetchFn: ctx.fetchFn,
    pacer: ctx.pacer,
    store: ctx.store,
    logger: ctx.logger,
    metrics: ctx.metrics,
    now: () => new Date(ctx.clock.now()),
  };

  const summary = await runRecoverStage(
    {
      selections: state.selections,
      unselected: state.unselected,
      workSet,
      rewritePolicy: rewritePolicyFor(config),
    },
    recoverContext,
  );
  ctx.logger.info("recover_complete", { ...summary });
  return summary;
}

export async function runReport(ctx: CommandContext): Promise<CoverageReport> {
  const { config } = ctx;
  const [state, provenance, unresolved, discoveryStatus] = await Promise.all([
    ctx.store.readSelectionState(),
    ctx.store.readProvenance(),
    ctx.store.readUnresolved(),
    ctx.store.readDiscoveryStatus(),
  ]);

  const report = buildReport({
    selections: state.selections,
    unselected: state.unselected,
    provenance,
    unresolved,
    discoveryStatus,
    window: { fromDate: config.fromDate, toDate: config.toDate, modernCutoffDate: config.modernCutoffDate },
  });
  const files = await writeReports(getOutputPaths(config), report);
  ctx.logger.info("report_complete", { ...report.summary, gaps: report.gaps.length, files });
  return report;
}

/**
 * Discover, recover, report. The report is written even when an earlier stage
 * halts; the halting error is rethrown afterwards.
 */
export async function runPipeline(ctx: CommandContext): Promise<ExitCode> {
  ctx.logger.info("pipeline_start", { domain: ctx.config.domain });
  let failure: unknown;
  let discoveryComplete = true;

  try {
    const discovery = await runDiscover(ctx);
    discoveryComplete = discovery.status.complete;
    await runRecover(ctx);
  } catch (error) {
    failure = error;
    ctx.logger.error("pipeline_stage_failed", { error: errorMessage(error) });
  }

  try {
    await runReport(ctx);
  } catch (error) {
    if (failure === undefined) {
      throw error;
    }
    ctx.logger.error("pipeline_report_failed", { error: errorMessage(error) });
  }

  if (failure !== undefined) {
    throw failure;
  }
  ctx.logger.info("pipeline_complete", { discoveryComplete });
  return discoveryComplete ? EXIT_CODES.completed : EXIT_CODES.partialDiscovery;
}
