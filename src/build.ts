import fs, { type Stats } from "node:fs";
import path from "node:path";
import { BuildAbortedError, TclSyntaxError } from "./errors.js";
import {
  discoverTclFiles,
  isTclFile,
  toPosixPath,
} from "./fileDiscovery.js";
import { CallGraphBuilder } from "./graph/builder.js";
import { scanSource } from "./scanner.js";
import { resolveIndexPath, writeIndex } from "./store/index-file.js";
import type { BuildStats, FileFailure } from "./types.js";

export type BuildProgress =
  | { type: "skipped-input"; input: string; reason: string }
  | { type: "file-failed"; path: string; message: string }
  | { type: "files-discovered"; count: number };

export type BuildOptions = {
  /** Directory holding `.tclgraph/`; relative inputs resolve against it. */
  root: string;
  inputs: string[];
  ignore?: string[];
  /**
   * Asked whether to skip an input that cannot be read. Resolving to false
   * aborts the build before anything is written.
   */
  confirm: (question: string) => Promise<boolean>;
  onProgress?: (event: BuildProgress) => void;
};

export type BuildResult = {
  indexPath: string;
  sizeBytes: number;
  stats: BuildStats;
  failures: FileFailure[];
  /** Root-relative paths of every file that was scanned or attempted. */
  files: string[];
};

export const SKIP_QUESTION = "Do you want to continue and skip this file?";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function skipOrAbort(
  opts: BuildOptions,
  input: string,
  reason: string,
): Promise<void> {
  opts.onProgress?.({ type: "skipped-input", input, reason });
  if (!(await opts.confirm(SKIP_QUESTION))) {
    throw new BuildAbortedError(`Build aborted at "${input}": ${reason}`);
  }
}

async function collectFiles(opts: BuildOptions): Promise<string[]> {
  const root = path.resolve(opts.root);
  const files = new Set<string>();

  for (const input of opts.inputs) {
    const full = path.resolve(root, input);

    let stat: Stats;
    try {
      stat = fs.statSync(full);
    } catch (err) {
      // a missing "notes.txt" is not worth a prompt
      if (path.extname(full) !== "" && !isTclFile(full)) continue;
      await skipOrAbort(
        opts,
        input,
        `Cannot read file type: ${errorMessage(err)}`,
      );
      continue;
    }

    if (stat.isDirectory()) {
      const found = discoverTclFiles({
        repoRoot: root,
        dir: full,
        ignore: opts.ignore,
        onUnreadable: (dirPath, err) =>
          opts.onProgress?.({
            type: "skipped-input",
            input: toPosixPath(path.relative(root, dirPath)),
            reason: errorMessage(err),
          }),
      });
      for (const file of found) files.add(file);
      continue;
    }

    if (!isTclFile(full)) continue;

    if (!stat.isFile()) {
      await skipOrAbort(
        opts,
        input,
        `File "${input}" isn't a regular file or a directory.`,
      );
      continue;
    }

    files.add(toPosixPath(path.relative(root, full)));
  }

  const sorted = [...files].sort();
  opts.onProgress?.({ type: "files-discovered", count: sorted.length });
  return sorted;
}

/**
 * Scans every TCL file reachable from `inputs` and writes the index. A file
 * that fails to read or lex is reported and left out; the build goes on.
 */
export async function buildIndex(opts: BuildOptions): Promise<BuildResult> {
  const root = path.resolve(opts.root);
  const files = await collectFiles(opts);
  const builder = new CallGraphBuilder();
  const failures: FileFailure[] = [];

  for (const file of files) {
    try {
      const buf = fs.readFileSync(path.join(root, file));
      if (buf.includes(0)) {
        throw new Error("binary content");
      }
      builder.addFile(scanSource(buf.toString("utf8"), file));
    } catch (err) {
      const message =
        err instanceof TclSyntaxError ? err.message : `${file}: ${errorMessage(err)}`;
      failures.push({ path: file, message });
      builder.recordFailure();
      opts.onProgress?.({ type: "file-failed", path: file, message });
    }
  }

  const index = builder.snapshot();
  const written = writeIndex(index, resolveIndexPath(root));
  return {
    indexPath: written.path,
    sizeBytes: written.sizeBytes,
    stats: index.stats,
    failures,
    files,
  };
}
