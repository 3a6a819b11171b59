import fs from "node:fs";
import path from "node:path";
import { writeFileAtomic } from "../core/atomicWrite";
import { StateFileCorruptError } from "../core/errors";
import {
  CanonicalSelection,
  CaptureCandidate,
  DiscoveryStatus,
  isCanonicalSelection,
  isCaptureCandidate,
  isDiscoveryStatus,
  isProvenanceRecord,
  isUnresolvedLink,
  isUnselectedKey,
  ProvenanceRecord,
  UnresolvedLink,
  UnselectedKey,
} from "../types";
import { JsonlLog } from "./jsonlLog";
import { SelectionState, StateStore } from "./types";

export const STATE_FILES = {
  candidates: "discovered_captures.jsonl",
  discoveryStatus: "discovery_status.json",
  selections: "canonical_selections.jsonl",
  unselected: "unselected_keys.jsonl",
  provenance: "provenance.jsonl",
  unresolved: "unresolved_links.jsonl",
} as const;

export class JsonlStateStore implements StateStore {
  private readonly stateDir: string;
  private readonly candidates: JsonlLog<CaptureCandidate>;
  private readonly selections: JsonlLog<CanonicalSelection>;
  private readonly unselected: JsonlLog<UnselectedKey>;
  private readonly provenance: JsonlLog<ProvenanceRecord>;
  private readonly unresolved: JsonlLog<UnresolvedLink>;

  constructor(stateDir: string) {
    this.stateDir = path.resolve(stateDir);
    this.candidates = new JsonlLog(this.file("candidates"), isCaptureCandidate);
    this.selections = new JsonlLog(this.file("selections"), isCanonicalSelection);
    this.unselected = new JsonlLog(this.file("unselected"), isUnselectedKey);
    this.provenance = new JsonlLog(this.file("provenance"), isProvenanceRecord);
    this.unresolved = new JsonlLog(this.file("unresolved"), isUnresolvedLink);
  }

  readCandidates(): Promise<CaptureCandidate[]> {
    return this.candidates.readAll();
  }

  replaceCandidates(candidates: readonly CaptureCandidate[]): Promise<void> {
    return this.candidates.replaceAll(candidates);
  }

  async readDiscoveryStatus(): Promise<DiscoveryStatus | undefined> {
    const filePath = this.file("discoveryStatus");
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return undefined;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StateFileCorruptError(filePath, 1, error instanceof Error ? error.message : String(error));
    }
    if (!isDiscoveryStatus(parsed)) {
      throw new StateFileCorruptError(filePath, 1, "record does not match the expected schema");
    }
    return parsed;
  }

  async writeDiscoveryStatus(status: DiscoveryStatus): Promise<void> {
    await writeFileAtomic(this.file("discoveryStatus"), `${JSON.stringify(status, null, 2)}\n`);
  }

  async readSelectionState(): Promise<SelectionState> {
    return {
      selections: await this.selections.readAll(),
      unselected: await this.unselected.readAll(),
    };
  }

  async replaceSelectionState(state: SelectionState): Promise<void> {
    await this.selections.replaceAll(state.selections);
    await this.unselected.replaceAll(state.unselected);
  }

  appendProvenance(record: ProvenanceRecord): Promise<void> {
    return this.provenance.append([record]);
  }

  readProvenance(): Promise<ProvenanceRecord[]> {
    return this.provenance.readAll();
  }

  replaceUnresolved(links: readonly UnresolvedLink[]): Promise<void> {
    return this.unresolved.replaceAll(links);
  }

  readUnresolved(): Promise<UnresolvedLink[]> {
    return this.unresolved.readAll();
  }

  private file(name: keyof typeof STATE_FILES): string {
    return path.join(this.stateDir, STATE_FILES[name]);
  }
}
