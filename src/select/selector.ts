import { compareStrings } from "../core/compare";
import { buildReplayUrl, canonicalKeyFor, HostPolicy } from "../core/urls";
import { CanonicalSelection, CaptureCandidate, UnselectedKey } from "../types";

export interface SelectionPolicy {
  /** Inclusive lower bound, 14-digit timestamp. */
  windowStart: string;
  /** Exclusive upper bound. */
  windowEnd: string;
  /** Hard exclusion applied regardless of `windowEnd`. */
  modernCutoffExclusive: string;
  hostPolicy: HostPolicy;
  preserveQuery: boolean;
  replayBaseUrl: string;
}

export type MimeRank = 0 | 1 | 2;

export function mimeTypeRank(mimeType: string): MimeRank {
  const normalized = mimeType.trim().toLowerCase().split(";")[0];
  if (normalized === "text/html" || normalized === "application/xhtml+xml") {
    return 0;
  }
  if (normalized.startsWith("image/")) {
    return 1;
  }
  return 2;
}

export function passesFilter(candidate: CaptureCandidate, policy: SelectionPolicy): boolean {
  return (
    candidate.statusCode === 200 &&
    candidate.timestamp >= policy.windowStart &&
    candidate.timestamp < policy.windowEnd &&
    candidate.timestamp < policy.modernCutoffExclusive
  );
}

/** The ranking tuple, in comparison order. */
export interface CandidateRank {
  passes: boolean;
  mimeRank: MimeRank;
  timestamp: string;
  sourceUrl: string;
}

export function rankCandidate(candidate: CaptureCandidate, policy: SelectionPolicy): CandidateRank {
  return {
    passes: passesFilter(candidate, policy),
    mimeRank: mimeTypeRank(candidate.mimeType),
    timestamp: candidate.timestamp,
    sourceUrl: buildReplayUrl(policy.replayBaseUrl, candidate.timestamp, candidate.originalUrl),
  };
}

/**
 * Total order over ranks; the best candidate sorts first. Filter survivors
 * beat everything else, then HTML over images over other types, then the
 * latest capture, then the smallest source URL.
 */
export function compareRanks(a: CandidateRank, b: CandidateRank): number {
  if (a.passes !== b.passes) {
    return a.passes ? -1 : 1;
  }
  if (a.mimeRank !== b.mimeRank) {
    return a.mimeRank - b.mimeRank;
  }
  if (a.timestamp !== b.timestamp) {
    return compareStrings(b.timestamp, a.timestamp);
  }
  return compareStrings(a.sourceUrl, b.sourceUrl);
}

export interface SelectionOutcome {
  selections: CanonicalSelection[];
  unselected: UnselectedKey[];
  /** Candidates whose original URL could not be parsed as http(s). */
  unparseable: number;
}

interface KeyGroup {
  canonicalKey: string;
  ranked: Array<{ candidate: CaptureCandidate; rank: CandidateRank }>;
}

/**
 * Picks at most one capture per canonical key. Host aliases are folded before
 * filtering, so captures under every alias compete for the same key. Output is
 * sorted by key and does not depend on input order.
 */
export function selectCanonical(candidates: readonly CaptureCandidate[], policy: SelectionPolicy): SelectionOutcome {
  const groups = new Map<string, KeyGroup>();
  let unparseable = 0;

  for (const candidate of candidates) {
    const canonicalKey = canonicalKeyFor(candidate.originalUrl, policy.hostPolicy, policy.preserveQuery);
    if (canonicalKey === undefined) {
      unparseable += 1;
      continue;
    }
    const group = groups.get(canonicalKey) ?? { canonicalKey, ranked: [] };
    group.ranked.push({ candidate, rank: rankCandidate(candidate, policy) });
    groups.set(canonicalKey, group);
  }

  const selections: CanonicalSelection[] = [];
  const unselected: UnselectedKey[] = [];
  const keys = [...groups.keys()].sort(compareStrings);

  for (const key of keys) {
    const group = groups.get(key);
    if (!group) {
      continue;
    }
    const best = group.ranked.reduce((current, next) => (compareRanks(next.rank, current.rank) < 0 ? next : current));
    if (best.rank.passes) {
      selections.push({
        canonicalKey: key,
        originalUrl: best.candidate.originalUrl,
        timestamp: best.candidate.timestamp,
        statusCode: best.candidate.statusCode,
        mimeType: best.candidate.mimeType,
      });
      continue;
    }

    const originalUrl = group.ranked.map((entry) => entry.candidate.originalUrl).sort(compareStrings)[0];
    unselected.push({
      canonicalKey: key,
      originalUrl,
      candidateCount: group.ranked.length,
      reason: "no_capture_in_window",
    });
  }

  return { selections, unselected, unparseable };
}

/** Pages before images before other assets, then by key. */
export function recoveryOrder(selections: readonly CanonicalSelection[]): CanonicalSelection[] {
  return [...selections].sort(
    (a, b) => mimeTypeRank(a.mimeType) - mimeTypeRank(b.mimeType) || compareStrings(a.canonicalKey, b.canonicalKey),
  );
}

export interface WorkSetOptions {
  maxSelections: number;
  onlyMissingUrls: ReadonlySet<string>;
  hostPolicy: HostPolicy;
  preserveQuery: boolean;
}

/**
 * Narrows the recovery work set: first to the keys named in a gap file (if
 * any), then to the first `maxSelections` in recovery order (0 = no cap).
 */
export function selectWorkSet(selections: readonly CanonicalSelection[], options: WorkSetOptions): CanonicalSelection[] {
  let ordered = recoveryOrder(selections);

  if (options.onlyMissingUrls.size > 0) {
    const wanted = new Set<string>();
    for (const url of options.onlyMissingUrls) {
      const key = canonicalKeyFor(url, options.hostPolicy, options.preserveQuery);
      if (key !== undefined) {
        wanted.add(key);
      }
    }
    ordered = ordered.filter((selection) => wanted.has(selection.canonicalKey));
  }

  if (options.maxSelections > 0) {
    ordered = ordered.slice(0, options.maxSelections);
  }
  return ordered;
}
