export { tokenize, innerRange } from "./lexer.js";
export {
  RESERVED_COMMANDS,
  isReservedCommand,
  isCommandName,
  argumentRoles,
} from "./commands.js";
export type { ArgumentRole } from "./commands.js";
export { scanSource, fileScopeName } from "./scanner.js";

// Graph, index file and queries
export {
  CallGraphBuilder,
  MapDeclarationTable,
  MapProcedureGraph,
} from "./graph/builder.js";
export type { BuiltIndex } from "./graph/builder.js";
export {
  INDEX_FORMAT_VERSION,
  decodeIndex,
  encodeIndex,
} from "./store/format.js";
export type { IndexContents, LoadedIndex } from "./store/format.js";
export {
  INDEX_DIR,
  INDEX_FILE,
  deleteIndex,
  readIndex,
  resolveIndexPath,
  writeIndex,
} from "./store/index-file.js";
export {
  DEFAULT_MAX_DEPTH,
  buildCallTree,
  printCallSequence,
  renderCallTree,
} from "./query/call-sequence.js";
export type { CallTreeNode, LineWriter } from "./query/call-sequence.js";
export { printDependencies, renderDependencies } from "./query/dependencies.js";
export { queryProcedure, renderQueryResult } from "./query/query.js";
export type { QueryMode, QueryResult } from "./query/query.js";

export { buildIndex } from "./build.js";
export type { BuildOptions, BuildProgress, BuildResult } from "./build.js";
export { discoverTclFiles } from "./fileDiscovery.js";
export { parseInteractiveLine, runInteractive } from "./interactive.js";
export { runTclGraph } from "./run.js";
export type { RunIO, RunOptions, RunOutcome } from "./run.js";

export {
  BuildAbortedError,
  IndexFormatError,
  IndexNotFoundError,
  TclGraphError,
  TclSyntaxError,
  UsageError,
} from "./errors.js";

export type {
  BuildStats,
  CallEdge,
  CallIndex,
  DeclarationTable,
  FileFailure,
  OutputFormat,
  ProcedureDeclaration,
  ProcedureGraph,
  ProcedureName,
  ScanResult,
  SourceRange,
  Token,
  TokenKind,
} from "./types.js";
