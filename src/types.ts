export type TokenKind =
  | "word"
  | "brace"
  | "bracket"
  | "quoted"
  | "comment"
  | "separator";

/** Half-open range of source offsets, plus the line `start` sits on. */
export type SourceRange = {
  start: number;
  end: number;
  line: number;
};

export type Token = {
  kind: TokenKind;
  text: string;
  start: number;
  end: number;
  line: number;
  /** Inner ranges of the top-level `[...]` groups inside this token. */
  substitutions: SourceRange[];
};

export type ProcedureName = string;

export type ProcedureDeclaration = {
  name: ProcedureName;
  path: string;
  line: number;
};

export type CallEdge = {
  caller: ProcedureName;
  callee: ProcedureName;
  line: number;
};

export type ScanResult = {
  path: string;
  declarations: ProcedureDeclaration[];
  edges: CallEdge[];
};

/**
 * Lookup from a procedure name to an ordered list of names. Lists keep
 * insertion order and duplicates; a name with nothing recorded has no entry.
 */
export interface ProcedureGraph {
  readonly size: number;
  has(name: ProcedureName): boolean;
  get(name: ProcedureName): readonly ProcedureName[] | undefined;
  names(): Iterable<ProcedureName>;
}

export interface DeclarationTable {
  get(name: ProcedureName): readonly ProcedureDeclaration[] | undefined;
}

export type BuildStats = {
  filesParsed: number;
  filesFailed: number;
  procedures: number;
  edges: number;
};

/** What the query engine needs: both graphs plus where things are declared. */
export type CallIndex = {
  calls: ProcedureGraph;
  callers: ProcedureGraph;
  declarations: DeclarationTable;
};

export type FileFailure = {
  path: string;
  message: string;
};

export type OutputFormat = "text" | "json";
