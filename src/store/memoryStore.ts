import {
  CanonicalSelection,
  CaptureCandidate,
  DiscoveryStatus,
  ProvenanceRecord,
  UnresolvedLink,
  UnselectedKey,
} from "../types";
import { SelectionState, StateStore } from "./types";

/** Keeps every state set in memory; used where no state directory is wanted. */
export class InMemoryStateStore implements StateStore {
  private candidates: CaptureCandidate[] = [];
  private discoveryStatus: DiscoveryStatus | undefined;
  private selections: CanonicalSelection[] = [];
  private unselected: UnselectedKey[] = [];
  private readonly provenance: ProvenanceRecord[] = [];
  private unresolved: UnresolvedLink[] = [];

  async readCandidates(): Promise<CaptureCandidate[]> {
    return [...this.candidates];
  }

  async replaceCandidates(candidates: readonly CaptureCandidate[]): Promise<void> {
    this.candidates = [...candidates];
  }

  async readDiscoveryStatus(): Promise<DiscoveryStatus | undefined> {
    return this.discoveryStatus ? { ...this.discoveryStatus } : undefined;
  }

  async writeDiscoveryStatus(status: DiscoveryStatus): Promise<void> {
    this.discoveryStatus = { ...status };
  }

  async readSelectionState(): Promise<SelectionState> {
    return { selections: [...this.selections], unselected: [...this.unselected] };
  }

  async replaceSelectionState(state: SelectionState): Promise<void> {
    this.selections = [...state.selections];
    this.unselected = [...state.unselected];
  }

  async appendProvenance(record: ProvenanceRecord): Promise<void> {
    this.provenance.push({ ...record });
  }

  async readProvenance(): Promise<ProvenanceRecord[]> {
    return [...this.provenance];
  }

  async replaceUnresolved(links: readonly UnresolvedLink[]): Promise<void> {
    this.unresolved = [...links];
  }

  async readUnresolved(): Promise<UnresolvedLink[]> {
    return [...this.unresolved];
  }
}
