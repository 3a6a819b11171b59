import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export interface AtomicWriteResult {
  sha256: string;
  bytes: number;
}

function tempPathFor(targetPath: string): string {
  const suffix = crypto.randomBytes(6).toString("hex");
  return path.join(path.dirname(targetPath), `.${path.basename(targetPath)}.${suffix}.part`);
}

/**
 * Streams chunks into a temp file beside `targetPath`, hashing as it goes,
 * then renames it into place. Readers only ever see the old file or the
 * complete new one; on failure the temp file is removed and the error rethrown.
 */
export async function writeStreamAtomic(
  targetPath: string,
  chunks: AsyncIterable<Uint8Array>,
): Promise<AtomicWriteResult> {
  await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });
  const tempPath = tempPathFor(targetPath);
  const hash = crypto.createHash("sha256");
  let bytes = 0;

  const handle = await fs.promises.open(tempPath, "w");
  try {
    try {
      for await (const chunk of chunks) {
        hash.update(chunk);
        bytes += chunk.byteLength;
        await handle.write(chunk);
      }
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.promises.rename(tempPath, targetPath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }

  return { sha256: hash.digest("hex"), bytes };
}

export async function writeFileAtomic(targetPath: string, data: string | Uint8Array): Promise<AtomicWriteResult> {
  const payload = typeof data === "string" ? Buffer.from(data, "utf-8") : data;
  async function* single(): AsyncGenerator<Uint8Array> {
    yield payload;
  }
  return writeStreamAtomic(targetPath, single());
}

export async function sha256File(filePath: string): Promise<string> {
  const hash = crypto.createHash("sha256");
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

/** Size of a regular file, or undefined when nothing usable is there. */
export async function fileSize(filePath: string): Promise<number | undefined> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.isFile() ? stats.size : undefined;
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return undefined;
    }
    throw error;
  }
}
