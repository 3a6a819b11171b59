import fs from "node:fs";
import path from "node:path";
import { writeFileAtomic } from "../core/atomicWrite";
import { StateFileCorruptError } from "../core/errors";

export type RecordGuard<T> = (value: unknown) => value is T;

/**
 * A line-delimited JSON file holding records of one type.
 *
 * `append` adds lines and never rewrites earlier ones; `replaceAll` swaps the
 * whole file atomically. A final line without its newline is the trace of an
 * interrupted append: readers skip it and the next append trims it away.
 * Any other line that fails to parse or validate is corruption.
 */
export class JsonlLog<T> {
  readonly filePath: string;
  private readonly guard: RecordGuard<T>;
  private tailChecked = false;

  constructor(filePath: string, guard: RecordGuard<T>) {
    this.filePath = filePath;
    this.guard = guard;
  }

  async append(records: readonly T[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    if (!this.tailChecked) {
      await this.trimTornTail();
      this.tailChecked = true;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(this.filePath, content, "utf-8");
  }

  async replaceAll(records: readonly T[]): Promise<void> {
    const content = records.map((record) => `${JSON.stringify(record)}\n`).join("");
    await writeFileAtomic(this.filePath, content);
    this.tailChecked = true;
  }

  async readAll(): Promise<T[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }

    const lines = content.split("\n");
    // The segment after the last newline is either empty or a torn append.
    lines.pop();

    const records: T[] = [];
    lines.forEach((line, index) => {
      if (line.trim().length === 0) {
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        throw new StateFileCorruptError(this.filePath, index + 1, error instanceof Error ? error.message : String(error));
      }
      if (!this.guard(parsed)) {
        throw new StateFileCorruptError(this.filePath, index + 1, "record does not match the expected schema");
      }
      records.push(parsed);
    });
    return records;
  }

  private async trimTornTail(): Promise<void> {
    let content: Buffer;
    try {
      content = await fs.promises.readFile(this.filePath);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return;
      }
      throw error;
    }

    if (content.length === 0 || content[content.length - 1] === 0x0a) {
      return;
    }
    const keep = content.lastIndexOf(0x0a) + 1;
    await fs.promises.truncate(this.filePath, keep);
  }
}

/** Last record per key, in first-seen key order. */
export function foldLatest<T>(records: Iterable<T>, keyOf: (record: T) => string): Map<string, T> {
  const latest = new Map<string, T>();
  for (const record of records) {
    latest.set(keyOf(record), record);
  }
  return latest;
}
