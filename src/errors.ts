/**
 * Error hierarchy for tclgraph.
 *
 * The CLI prints `message` for any of these and exits non-zero; the build
 * pipeline catches `TclSyntaxError` per file and keeps going.
 */

export abstract class TclGraphError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Bad command-line input, such as a non-positive max depth. */
export class UsageError extends TclGraphError {
  readonly code = "ERR_USAGE";
}

/** Unterminated brace, bracket or quote in one source file. */
export class TclSyntaxError extends TclGraphError {
  readonly code = "ERR_TCL_SYNTAX";
  readonly reason: string;
  readonly line: number;
  path: string | null;

  constructor(reason: string, line: number, path: string | null = null) {
    super(formatSyntaxMessage(reason, line, path));
    this.line = line;
    this.path = path;
    this.reason = reason;
  }

  /** Attaches the file path once the scanner knows which file failed. */
  withPath(path: string): TclSyntaxError {
    this.path = path;
    this.message = formatSyntaxMessage(this.reason, this.line, path);
    return this;
  }
}

function formatSyntaxMessage(
  reason: string,
  line: number,
  path: string | null,
): string {
  return path ? `${path}:${line}: ${reason}` : `line ${line}: ${reason}`;
}

/** The operator declined to continue past an unusable build input. */
export class BuildAbortedError extends TclGraphError {
  readonly code = "ERR_BUILD_ABORTED";
}

export class IndexNotFoundError extends TclGraphError {
  readonly code = "ERR_INDEX_NOT_FOUND";
  readonly indexPath: string;

  constructor(indexPath: string) {
    super(
      `No index found at ${indexPath}. Build one first with "tclgraph -b <path...>".`,
    );
    this.indexPath = indexPath;
  }
}

/** The artifact exists but cannot be decoded. */
export class IndexFormatError extends TclGraphError {
  readonly code = "ERR_INDEX_FORMAT";
  readonly indexPath: string;

  constructor(indexPath: string, detail: string) {
    super(`Index file ${indexPath} is corrupt (${detail}). Rebuild it with "tclgraph -b <path...>".`);
    this.indexPath = indexPath;
  }
}
