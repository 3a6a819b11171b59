import { compareStrings } from "../core/compare";
import { isRetriableStatus } from "../core/fetch";
import { foldLatest } from "../store/jsonlLog";
import {
  CanonicalSelection,
  DiscoveryStatus,
  GapEntry,
  isRecoveredStatus,
  ProvenanceRecord,
  ProvenanceStatus,
  SuggestedAction,
  UnresolvedLink,
  UnselectedKey,
} from "../types";

export interface ReportWindow {
  fromDate: string;
  toDate: string;
  modernCutoffDate: string;
}

export interface ReportInput {
  selections: readonly CanonicalSelection[];
  unselected: readonly UnselectedKey[];
  provenance: readonly ProvenanceRecord[];
  unresolved: readonly UnresolvedLink[];
  discoveryStatus?: DiscoveryStatus;
  window: ReportWindow;
}

export interface CoverageSummary {
  totalSelected: number;
  recoveredCount: number;
  missingCount: number;
  coveragePercentage: number;
  unselectedCount: number;
  unresolvedCount: number;
}

export interface ManifestRow {
  originalUrl: string;
  timestamp: string;
  sourceUrl: string;
  sha256: string;
  localPath: string;
}

export interface CoverageReport {
  summary: CoverageSummary;
  gaps: GapEntry[];
  manifest: ManifestRow[];
  notes: string[];
  discoveryStatus?: DiscoveryStatus;
}

export const NO_PROVENANCE_REASON = "no_provenance_record";

export function coveragePercentage(recovered: number, total: number): number {
  if (total === 0) {
    return 0;
  }
  return Math.round((recovered / total) * 10_000) / 100;
}

function failedStatusCode(status: ProvenanceStatus): number | undefined {
  const match = /^fetch_failed_(\d+)$/.exec(status);
  return match ? Number.parseInt(match[1], 10) : undefined;
}

export function suggestedActionFor(status: ProvenanceStatus | undefined): SuggestedAction {
  if (status === undefined || status === "fetch_error") {
    return "retry_fetch";
  }
  const code = failedStatusCode(status);
  return code !== undefined && isRetriableStatus(code) ? "retry_fetch" : "broaden_discovery";
}

function windowNotes(window: ReportWindow, discoveryStatus: DiscoveryStatus | undefined): string[] {
  const cutoff = window.modernCutoffDate
    ? `captures on or after ${window.modernCutoffDate} are excluded`
    : "no modern cutoff configured";
  const notes = [`${window.fromDate} to ${window.toDate}: requested capture window (${cutoff}).`];

  if (!discoveryStatus) {
    notes.push("No discovery status recorded; coverage is relative to the stored selections only.");
  } else if (!discoveryStatus.complete) {
    notes.push(
      `Discovery was partial: ${discoveryStatus.pagesFetched} index pages and ${discoveryStatus.candidateCount} captures before the failure (${discoveryStatus.error ?? "unknown error"}).`,
    );
  }
  notes.push("Older captures can be queried in targeted gap-focused reruns.");
  return notes;
}

/**
 * Derives coverage, gaps and the provenance manifest from durable state.
 * The latest ledger record per original URL decides its status.
 */
export function buildReport(input: ReportInput): CoverageReport {
  const latest = foldLatest(input.provenance, (record) => record.originalUrl);
  const lastRecovered = new Map<string, ProvenanceRecord>();
  const lastSkipped = new Map<string, ProvenanceRecord>();
  for (const record of input.provenance) {
    if (record.status === "recovered") {
      lastRecovered.set(record.originalUrl, record);
    } else if (record.status === "skipped_existing") {
      lastSkipped.set(record.originalUrl, record);
    }
  }

  const selections = [...input.selections].sort((a, b) => compareStrings(a.canonicalKey, b.canonicalKey));
  const gaps: GapEntry[] = [];
  const manifest: ManifestRow[] = [];
  let recoveredCount = 0;

  for (const selection of selections) {
    const record = latest.get(selection.originalUrl);
    if (record && isRecoveredStatus(record.status)) {
      recoveredCount += 1;
      const source = lastRecovered.get(selection.originalUrl) ?? lastSkipped.get(selection.originalUrl) ?? record;
      manifest.push({
        originalUrl: source.originalUrl,
        timestamp: source.timestamp,
        sourceUrl: source.sourceUrl,
        sha256: source.sha256,
        localPath: source.localPath,
      });
      continue;
    }

    gaps.push({
      kind: "selection",
      originalUrl: selection.originalUrl,
      canonicalKey: selection.canonicalKey,
      reason: record?.status ?? NO_PROVENANCE_REASON,
      suggestedAction: suggestedActionFor(record?.status),
    });
  }

  for (const key of [...input.unselected].sort((a, b) => compareStrings(a.canonicalKey, b.canonicalKey))) {
    gaps.push({
      kind: "unselected_key",
      originalUrl: key.originalUrl,
      canonicalKey: key.canonicalKey,
      reason: key.reason,
      suggestedAction: "broaden_discovery",
    });
  }

  const missingTargets = new Set<string>();
  for (const link of input.unresolved) {
    if (link.resolvedKind === "missing_canonical") {
      missingTargets.add(link.targetUrl ?? link.rawTarget);
    }
  }
  for (const target of [...missingTargets].sort(compareStrings)) {
    gaps.push({
      kind: "unresolved_link",
      originalUrl: target,
      reason: "missing_canonical",
      suggestedAction: "broaden_discovery",
    });
  }

  return {
    summary: {
      totalSelected: selections.length,
      recoveredCount,
      missingCount: selections.length - recoveredCount,
      coveragePercentage: coveragePercentage(recoveredCount, selections.length),
      unselectedCount: input.unselected.length,
      unresolvedCount: input.unresolved.length,
    },
    gaps,
    manifest,
    notes: windowNotes(input.window, input.discoveryStatus),
    ...(input.discoveryStatus ? { discoveryStatus: input.discoveryStatus } : {}),
  };
}
