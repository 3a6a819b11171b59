import { CanonicalKeyIndex, dedupeUnresolved, rewritePage, RewritePageContext, RewritePolicy } from "../rewrite";
import { mimeTypeRank } from "../select/selector";
import { CanonicalSelection, isRecoveredStatus, ProvenanceRecord, UnresolvedLink, UnselectedKey } from "../types";
import { LocalPathPlan } from "./localPath";
import { RecoverContext, recoverSelection } from "./recoverer";

export interface RecoverStageInput {
  /** Every canonical selection; the rewriter maps links against all of them. */
  selections: readonly CanonicalSelection[];
  unselected: readonly UnselectedKey[];
  /** The selections this run may fetch, already ordered and capped. */
  workSet: readonly CanonicalSelection[];
  rewritePolicy: RewritePolicy;
}

export interface RecoverStageSummary {
  attempted: number;
  recovered: number;
  skipped: number;
  failed: number;
  pagesRewritten: number;
  linksRewritten: number;
  unresolved: number;
}

function isHtmlSelection(selection: CanonicalSelection): boolean {
  return mimeTypeRank(selection.mimeType) === 0;
}

/**
 * Fetches the work set in order, rewriting each HTML page right after it lands.
 * Assets a page needs that are still scheduled in this run are fetched before
 * the page is written. Every HTML artifact on disk is then swept once more so
 * the unresolved-link register reflects the whole mirror. Local paths are
 * planned over every selection, not just the work set.
 */
export async function runRecoverStage(input: RecoverStageInput, stageContext: RecoverContext): Promise<RecoverStageSummary> {
  const localPaths = LocalPathPlan.build(input.selections, stageContext.hostPolicy, stageContext.preserveQuery);
  const ctx: RecoverContext = { ...stageContext, localPaths };
  const index = await CanonicalKeyIndex.build(input.selections, input.unselected, ctx.siteDir, localPaths);
  const fetched = new Map<string, string>();
  for (const record of await ctx.store.readProvenance()) {
    if (record.status === "recovered") {
      fetched.set(record.originalUrl, record.sha256);
    }
  }
  const workKeys = new Map(input.workSet.map((selection) => [selection.canonicalKey, selection]));
  const handled = new Set<string>();
  const rewritten = new Set<string>();
  const unresolved: UnresolvedLink[] = [];
  const summary: RecoverStageSummary = {
    attempted: 0,
    recovered: 0,
    skipped: 0,
    failed: 0,
    pagesRewritten: 0,
    linksRewritten: 0,
    unresolved: 0,
  };

  const ensure = async (selection: CanonicalSelection): Promise<ProvenanceRecord | undefined> => {
    if (handled.has(selection.canonicalKey)) {
      return undefined;
    }
    handled.add(selection.canonicalKey);
    summary.attempted += 1;

    const record = await recoverSelection(selection, ctx);
    if (record.status === "recovered") {
      fetched.set(record.originalUrl, record.sha256);
      summary.recovered += 1;
    } else if (record.status === "skipped_existing") {
      summary.skipped += 1;
    } else {
      summary.failed += 1;
    }
    if (isRecoveredStatus(record.status)) {
      index.markAvailable(selection.canonicalKey);
    }
    return record;
  };

  const rewriteContext: RewritePageContext = {
    siteDir: ctx.siteDir,
    policy: input.rewritePolicy,
    lookup: index,
    logger: ctx.logger,
    metrics: ctx.metrics,
    ensureAsset: async (canonicalKey: string): Promise<void> => {
      const asset = workKeys.get(canonicalKey);
      if (asset) {
        await ensure(asset);
      }
    },
    fetchedSha256: (selection) => fetched.get(selection.originalUrl),
  };

  const rewriteOnce = async (selection: CanonicalSelection): Promise<void> => {
    const entry = index.get(selection.canonicalKey);
    if (rewritten.has(selection.canonicalKey) || !entry || entry.state !== "available" || entry.localPath === undefined) {
      return;
    }
    rewritten.add(selection.canonicalKey);
    const result = await rewritePage(selection, entry.localPath, rewriteContext);
    unresolved.push(...result.unresolved);
    summary.linksRewritten += result.rewrittenCount;
    if (result.changed) {
      summary.pagesRewritten += 1;
    }
  };

  for (const selection of input.workSet) {
    await ensure(selection);
    if (isHtmlSelection(selection)) {
      await rewriteOnce(selection);
    }
  }

  for (const selection of index.availableSelections()) {
    if (isHtmlSelection(selection)) {
      await rewriteOnce(selection);
    }
  }

  const register = dedupeUnresolved(unresolved);
  await ctx.store.replaceUnresolved(register);
  summary.unresolved = register.length;
  return summary;
}
