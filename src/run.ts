import type { Readable, Writable } from "node:stream";
import { buildIndex, type BuildProgress } from "./build.js";
import { confirm as promptConfirm, runInteractive } from "./interactive.js";
import { assertMaxDepth, type LineWriter } from "./query/call-sequence.js";
import {
  queryProcedure,
  renderQueryResult,
  type QueryResult,
} from "./query/query.js";
import { createReporter, formatBytes, timed, type Reporter } from "./report.js";
import {
  deleteIndex,
  readIndex,
  resolveIndexPath,
} from "./store/index-file.js";
import type { OutputFormat } from "./types.js";

export type RunOptions = {
  dir: string;
  build?: string[];
  query?: string[];
  deps: boolean;
  maxDepth: number;
  deleteIndex: boolean;
  ignore?: string[];
  yes: boolean;
  quiet: boolean;
  output: OutputFormat;
};

export type RunIO = {
  /** Results (stdout). */
  write: LineWriter;
  /** Progress and notices (stderr). */
  notify: LineWriter;
  confirm: (question: string) => Promise<boolean>;
  /** Interactive input and prompt streams; default to stdin and stdout. */
  input?: Readable;
  promptOutput?: Writable;
};

export const defaultIO: RunIO = {
  write: (line) => console.log(line),
  notify: (line) => console.error(line),
  confirm: (question) => promptConfirm(question),
};

export type RunOutcome = "deleted" | "built" | "queried" | "interactive";

function describeProgress(event: BuildProgress): string {
  switch (event.type) {
    case "skipped-input":
      return `Cannot use "${event.input}": ${event.reason}`;
    case "file-failed":
      return `Skipping ${event.path}: ${event.message}`;
    case "files-discovered":
      return `Found ${event.count} TCL file(s)`;
  }
}

async function runBuild(
  opts: RunOptions,
  inputs: string[],
  io: RunIO,
  reporter: Reporter,
): Promise<void> {
  reporter.info("Parsing tcl files...");
  const result = await timed(reporter, "Built index", () =>
    buildIndex({
      root: opts.dir,
      inputs,
      ignore: opts.ignore,
      confirm: opts.yes ? async () => true : io.confirm,
      onProgress: (event) => {
        if (event.type === "files-discovered") {
          reporter.info(describeProgress(event));
        } else {
          reporter.warn(describeProgress(event));
        }
      },
    }),
  );

  reporter.info(`Number of TCL files parsed: ${result.stats.filesParsed}`);
  if (result.stats.filesFailed > 0) {
    reporter.warn(
      `${result.stats.filesFailed} file(s) could not be parsed and were skipped`,
    );
  }
  reporter.info(
    `Wrote ${result.indexPath} (${formatBytes(result.sizeBytes)}, ` +
      `${result.stats.procedures} procedures, ${result.stats.edges} calls)`,
  );
}

/**
 * Runs one invocation. `--delete-index` wins over everything else; `-b`
 * builds and ignores queries; `-f` queries; with neither the index is
 * queried interactively.
 */
export async function runTclGraph(
  opts: RunOptions,
  io: RunIO = defaultIO,
): Promise<RunOutcome> {
  const reporter = createReporter({ quiet: opts.quiet, write: io.notify });
  const indexPath = resolveIndexPath(opts.dir);

  if (opts.deleteIndex) {
    deleteIndex(indexPath);
    reporter.info("Deleted index file.");
    return "deleted";
  }

  assertMaxDepth(opts.maxDepth);

  if (opts.build && opts.build.length > 0) {
    await runBuild(opts, opts.build, io, reporter);
    return "built";
  }

  reporter.info("Reading index...");
  const index = await timed(reporter, "Read index", () => readIndex(indexPath));

  if (opts.query && opts.query.length > 0) {
    const mode = opts.deps ? "deps" : "calls";
    const results: QueryResult[] = opts.query.map((name) =>
      queryProcedure(index, name, mode, opts.maxDepth),
    );

    if (opts.output === "json") {
      io.write(JSON.stringify(results, null, 2));
      return "queried";
    }

    for (const result of results) {
      const { lines, notices } = renderQueryResult(result);
      notices.forEach((notice) => io.notify(notice));
      lines.forEach((line) => io.write(line));
    }
    return "queried";
  }

  await runInteractive(index, {
    input: io.input,
    output: io.promptOutput,
    maxDepth: opts.maxDepth,
    write: io.write,
    notify: io.notify,
  });
  return "interactive";
}
