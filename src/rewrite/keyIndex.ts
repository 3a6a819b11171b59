import { fileSize } from "../core/atomicWrite";
import { absoluteArtifactPath, LocalPathPlan } from "../recover/localPath";
import { CanonicalSelection, UnselectedKey } from "../types";

/**
 * - `available`: the artifact is on disk.
 * - `scheduled`: selected but not on disk yet.
 * - `out_of_window`: the key had captures, none selectable.
 */
export type KeyState = "available" | "scheduled" | "out_of_window";

export interface KeyIndexEntry {
  canonicalKey: string;
  state: KeyState;
  localPath?: string;
  selection?: CanonicalSelection;
}

export interface KeyLookup {
  get(canonicalKey: string): KeyIndexEntry | undefined;
  /** Entry of the selected key stored at `localPath`, on disk or not. */
  getByPath(localPath: string): KeyIndexEntry | undefined;
}

/** Canonical key to local artifact, as known to the rewriter. */
export class CanonicalKeyIndex implements KeyLookup {
  private readonly entries = new Map<string, KeyIndexEntry>();
  private readonly byPath = new Map<string, KeyIndexEntry>();

  get(canonicalKey: string): KeyIndexEntry | undefined {
    return this.entries.get(canonicalKey);
  }

  getByPath(localPath: string): KeyIndexEntry | undefined {
    return this.byPath.get(localPath);
  }

  set(entry: KeyIndexEntry): void {
    this.entries.set(entry.canonicalKey, entry);
    if (entry.state !== "out_of_window" && entry.localPath !== undefined) {
      this.byPath.set(entry.localPath, entry);
    }
  }

  markAvailable(canonicalKey: string): void {
    const entry = this.entries.get(canonicalKey);
    if (entry && entry.state === "scheduled") {
      this.set({ ...entry, state: "available" });
    }
  }

  /** Selections whose artifact is on disk, in key order of insertion. */
  availableSelections(): CanonicalSelection[] {
    const selections: CanonicalSelection[] = [];
    for (const entry of this.entries.values()) {
      if (entry.state === "available" && entry.selection) {
        selections.push(entry.selection);
      }
    }
    return selections;
  }

  get size(): number {
    return this.entries.size;
  }

  static async build(
    selections: readonly CanonicalSelection[],
    unselected: readonly UnselectedKey[],
    siteDir: string,
    localPaths: LocalPathPlan,
  ): Promise<CanonicalKeyIndex> {
    const index = new CanonicalKeyIndex();

    for (const key of unselected) {
      index.set({ canonicalKey: key.canonicalKey, state: "out_of_window" });
    }

    for (const selection of selections) {
      const localPath = localPaths.pathFor(selection);
      if (localPath === undefined) {
        continue;
      }
      const size = await fileSize(absoluteArtifactPath(siteDir, localPath));
      index.set({
        canonicalKey: selection.canonicalKey,
        state: size !== undefined && size > 0 ? "available" : "scheduled",
        localPath,
        selection,
      });
    }

    return index;
  }
}
