import fs from "node:fs";
import path from "node:path";
import { IndexNotFoundError } from "../errors.js";
import type { BuiltIndex } from "../graph/builder.js";
import { decodeIndex, encodeIndex, type LoadedIndex } from "./format.js";

export const INDEX_DIR = ".tclgraph";
export const INDEX_FILE = "index.bin";

export function resolveIndexPath(rootDir: string): string {
  return path.join(path.resolve(rootDir), INDEX_DIR, INDEX_FILE);
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Writes the whole index to `indexPath`, replacing any previous file. The
 * bytes go to a temporary file first and are renamed into place, so a failed
 * write leaves the old index (or nothing) behind.
 */
export function writeIndex(
  index: BuiltIndex,
  indexPath: string,
): { path: string; sizeBytes: number } {
  const buf = encodeIndex({
    calls: index.calls,
    callers: index.callers,
    declarations: index.declarations.all(),
    filesParsed: index.stats.filesParsed,
  });

  fs.mkdirSync(path.dirname(indexPath), { recursive: true });
  const tempPath = `${indexPath}.${process.pid}.tmp`;
  try {
    fs.writeFileSync(tempPath, buf);
    fs.renameSync(tempPath, indexPath);
  } catch (err) {
    fs.rmSync(tempPath, { force: true });
    throw err;
  }
  return { path: indexPath, sizeBytes: buf.length };
}

export function readIndex(indexPath: string): LoadedIndex {
  let buf: Buffer;
  try {
    buf = fs.readFileSync(indexPath);
  } catch (err) {
    if (isNodeError(err) && err.code === "ENOENT") {
      throw new IndexNotFoundError(indexPath);
    }
    throw err;
  }
  return decodeIndex(buf, indexPath);
}

/** Removes the index file. Returns false when there was nothing to remove. */
export function deleteIndex(indexPath: string): boolean {
  if (!fs.existsSync(indexPath)) return false;
  fs.rmSync(indexPath, { force: true });
  return true;
}
