import crypto from "node:crypto";
import fs from "node:fs";
import { writeFileAtomic } from "../core/atomicWrite";
import { compareStrings } from "../core/compare";
import { absoluteArtifactPath } from "../recover/localPath";
import { Logger, MetricsRegistry } from "../observability";
import { CanonicalSelection, UnresolvedLink } from "../types";
import { rewriteHtml, RewritePolicy, RewriteResult } from "./htmlRewriter";
import { KeyLookup } from "./keyIndex";

export interface RewritePageContext {
  siteDir: string;
  policy: RewritePolicy;
  lookup: KeyLookup;
  logger: Logger;
  metrics: MetricsRegistry;
  /** Called for each scheduled asset the page references, before the page is written. */
  ensureAsset?: (canonicalKey: string) => Promise<void>;
  /** SHA-256 of the bytes last fetched from the archive for a selection. */
  fetchedSha256?: (selection: CanonicalSelection) => string | undefined;
}

/**
 * Rewrites one HTML artifact in place. The file is read and written as latin1:
 * bytes outside the rewritten attributes come back out unchanged. A page whose
 * bytes still match its last fetch has only original references in it.
 */
export async function rewritePage(selection: CanonicalSelection, localPath: string, ctx: RewritePageContext): Promise<RewriteResult> {
  const filePath = absoluteArtifactPath(ctx.siteDir, localPath);
  const stopTimer = ctx.metrics.startTimer("rewrite_page_ms");
  const bytes = await fs.promises.readFile(filePath);
  const fetchedSha256 = ctx.fetchedSha256?.(selection);
  const originalMarkup =
    fetchedSha256 !== undefined && crypto.createHash("sha256").update(bytes).digest("hex") === fetchedSha256;
  const result = rewriteHtml(
    bytes.toString("latin1"),
    { pageUrl: selection.originalUrl, pageLocalPath: localPath, originalMarkup },
    ctx.policy,
    ctx.lookup,
  );

  if (ctx.ensureAsset) {
    for (const key of result.assetKeys) {
      await ctx.ensureAsset(key);
    }
  }

  if (result.changed) {
    await writeFileAtomic(filePath, Buffer.from(result.html, "latin1"));
    ctx.metrics.incrementCounter("pages_rewritten", 1);
  }

  ctx.metrics.incrementCounter("links_rewritten", result.rewrittenCount);
  ctx.metrics.incrementCounter("links_unresolved", result.unresolved.length);
  ctx.logger.debug("rewrite_page", {
    url: selection.originalUrl,
    localPath,
    rewritten: result.rewrittenCount,
    unresolved: result.unresolved.length,
    assets: result.assetKeys.length,
    changed: result.changed,
    originalMarkup,
    durationMs: stopTimer(),
  });
  return result;
}

export function compareUnresolved(a: UnresolvedLink, b: UnresolvedLink): number {
  return (
    compareStrings(a.referencingArtifact, b.referencingArtifact) ||
    compareStrings(a.rawTarget, b.rawTarget) ||
    compareStrings(a.resolvedKind, b.resolvedKind)
  );
}

export function dedupeUnresolved(links: Iterable<UnresolvedLink>): UnresolvedLink[] {
  const unique = new Map<string, UnresolvedLink>();
  for (const link of links) {
    unique.set(`${link.referencingArtifact}\u0000${link.rawTarget}\u0000${link.resolvedKind}`, link);
  }
  return [...unique.values()].sort(compareUnresolved);
}
