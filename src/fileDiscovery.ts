import fs, { type Dirent } from "node:fs";
import path from "node:path";
import micromatch from "micromatch";

export const TCL_EXTENSION = ".tcl";

export type DiscoveryOptions = {
  /** Paths are reported relative to this directory. */
  repoRoot: string;
  /** Directory to search, absolute or relative to `repoRoot`. */
  dir: string;
  ignore?: string[];
  /** Called for subdirectories that cannot be listed; they are skipped. */
  onUnreadable?: (dirPath: string, err: unknown) => void;
};

const MM_OPTS = { dot: true } as const;
const SKIP_DIRS = new Set([".git", ".tclgraph", "node_modules"]);

export function isTclFile(filePath: string): boolean {
  return path.extname(filePath) === TCL_EXTENSION;
}

export function toPosixPath(inputPath: string): string {
  return inputPath.split(path.sep).join("/");
}

/**
 * Recursively lists `.tcl` files under `dir`, sorted so repeated builds see
 * them in the same order.
 */
export function discoverTclFiles(opts: DiscoveryOptions): string[] {
  const { repoRoot, ignore = [] } = opts;
  const root = path.resolve(repoRoot);
  const start = path.resolve(root, opts.dir);

  let files = walkDirectory(start, opts.onUnreadable)
    .filter(isTclFile)
    .map((full) => toPosixPath(path.relative(root, full)));

  if (ignore.length > 0) {
    files = files.filter(
      (f) => !ignore.some((p) => micromatch.isMatch(f, p, MM_OPTS)),
    );
  }

  return files.sort();
}

function walkDirectory(
  dir: string,
  onUnreadable: DiscoveryOptions["onUnreadable"],
): string[] {
  const results: string[] = [];

  let entries: Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    onUnreadable?.(dir, err);
    return results;
  }

  for (const ent of entries) {
    if (SKIP_DIRS.has(ent.name)) continue;

    const full = path.join(dir, ent.name);
    if (ent.isDirectory()) {
      results.push(...walkDirectory(full, onUnreadable));
    } else if (ent.isFile() || ent.isSymbolicLink()) {
      results.push(full);
    }
  }

  return results;
}
