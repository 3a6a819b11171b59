export interface CaptureCandidate {
  originalUrl: string;
  timestamp: string;
  statusCode: number;
  mimeType: string;
  digest: string;
}

export interface CanonicalSelection {
  canonicalKey: string;
  originalUrl: string;
  timestamp: string;
  statusCode: number;
  mimeType: string;
}

export interface UnselectedKey {
  canonicalKey: string;
  originalUrl: string;
  candidateCount: number;
  reason: "no_capture_in_window";
}

export type FetchFailedStatus = `fetch_failed_${number}`;

export type ProvenanceStatus = "recovered" | "skipped_existing" | FetchFailedStatus | "fetch_error";

export interface ProvenanceRecord {
  originalUrl: string;
  timestamp: string;
  sourceUrl: string;
  localPath: string;
  sha256: string;
  status: ProvenanceStatus;
  recoveredAt: string;
  attempts: number;
  error?: string;
}

export type UnresolvedKind = "missing_canonical" | "out_of_window" | "external_excluded";

export interface UnresolvedLink {
  referencingArtifact: string;
  rawTarget: string;
  resolvedKind: UnresolvedKind;
  /** Absolute original URL the reference points at, archive wrapper removed. */
  targetUrl?: string;
}

export interface DiscoveryStatus {
  domain: string;
  fromTimestamp: string;
  toTimestamp: string;
  complete: boolean;
  pagesFetched: number;
  candidateCount: number;
  error?: string;
  finishedAt: string;
}

export type SuggestedAction = "retry_fetch" | "broaden_discovery";

export interface GapEntry {
  kind: "selection" | "unselected_key" | "unresolved_link";
  originalUrl: string;
  canonicalKey?: string;
  reason: string;
  suggestedAction: SuggestedAction;
}

export function isRecoveredStatus(status: ProvenanceStatus): boolean {
  return status === "recovered" || status === "skipped_existing";
}
