import {
  CanonicalSelection,
  CaptureCandidate,
  DiscoveryStatus,
  ProvenanceRecord,
  UnresolvedLink,
  UnselectedKey,
} from "../types";

export interface SelectionState {
  selections: CanonicalSelection[];
  unselected: UnselectedKey[];
}

/**
 * Durable state shared between pipeline stages. Each stage writes only its own
 * records; everything else is read-only to it.
 */
export interface StateStore {
  readCandidates(): Promise<CaptureCandidate[]>;
  replaceCandidates(candidates: readonly CaptureCandidate[]): Promise<void>;
  readDiscoveryStatus(): Promise<DiscoveryStatus | undefined>;
  writeDiscoveryStatus(status: DiscoveryStatus): Promise<void>;
  readSelectionState(): Promise<SelectionState>;
  replaceSelectionState(state: SelectionState): Promise<void>;
  appendProvenance(record: ProvenanceRecord): Promise<void>;
  readProvenance(): Promise<ProvenanceRecord[]>;
  replaceUnresolved(links: readonly UnresolvedLink[]): Promise<void>;
  readUnresolved(): Promise<UnresolvedLink[]>;
}
