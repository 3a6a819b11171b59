import {
  CanonicalSelection,
  CaptureCandidate,
  DiscoveryStatus,
  ProvenanceRecord,
  ProvenanceStatus,
  UnresolvedKind,
  UnresolvedLink,
  UnselectedKey,
} from "./models";

const TIMESTAMP_PATTERN = /^\d{14}$/;
const FETCH_FAILED_PATTERN = /^fetch_failed_\d+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isTimestamp(value: unknown): value is string {
  return typeof value === "string" && TIMESTAMP_PATTERN.test(value);
}

export function isProvenanceStatus(value: unknown): value is ProvenanceStatus {
  return (
    value === "recovered" ||
    value === "skipped_existing" ||
    value === "fetch_error" ||
    (typeof value === "string" && FETCH_FAILED_PATTERN.test(value))
  );
}

function isUnresolvedKind(value: unknown): value is UnresolvedKind {
  return value === "missing_canonical" || value === "out_of_window" || value === "external_excluded";
}

export function isCaptureCandidate(value: unknown): value is CaptureCandidate {
  if (!isRecord(value)) {
    return false;
  }
  return (
    isString(value.originalUrl) &&
    isTimestamp(value.timestamp) &&
    Number.isInteger(value.statusCode) &&
    typeof value.mimeType === "string" &&
    typeof value.digest === "string"
  );
}

export function isCanonicalSelection(value: unknown): value is CanonicalSelection {
  if (!isRecord(value)) {
    return false;
  }
  return (
    isString(value.canonicalKey) &&
    isString(value.originalUrl) &&
    isTimestamp(value.timestamp) &&
    Number.isInteger(value.statusCode) &&
    typeof value.mimeType === "string"
  );
}

export function isUnselectedKey(value: unknown): value is UnselectedKey {
  if (!isRecord(value)) {
    return false;
  }
  return (
    isString(value.canonicalKey) &&
    isString(value.originalUrl) &&
    Number.isInteger(value.candidateCount) &&
    value.reason === "no_capture_in_window"
  );
}

export function isProvenanceRecord(value: unknown): value is ProvenanceRecord {
  if (!isRecord(value)) {
    return false;
  }
  return (
    isString(value.originalUrl) &&
    isTimestamp(value.timestamp) &&
    isString(value.sourceUrl) &&
    isString(value.localPath) &&
    typeof value.sha256 === "string" &&
    isProvenanceStatus(value.status) &&
    isString(value.recoveredAt) &&
    Number.isInteger(value.attempts) &&
    (value.error === undefined || typeof value.error === "string")
  );
}

export function isUnresolvedLink(value: unknown): value is UnresolvedLink {
  if (!isRecord(value)) {
    return false;
  }
  return (
    isString(value.referencingArtifact) &&
    isString(value.rawTarget) &&
    isUnresolvedKind(value.resolvedKind) &&
    (value.targetUrl === undefined || isString(value.targetUrl))
  );
}

export function isDiscoveryStatus(value: unknown): value is DiscoveryStatus {
  if (!isRecord(value)) {
    return false;
  }
  return (
    isString(value.domain) &&
    isTimestamp(value.fromTimestamp) &&
    isTimestamp(value.toTimestamp) &&
    typeof value.complete === "boolean" &&
    Number.isInteger(value.pagesFetched) &&
    Number.isInteger(value.candidateCount) &&
    (value.error === undefined || typeof value.error === "string") &&
    isString(value.finishedAt)
  );
}
