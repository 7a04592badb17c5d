import type {
  CallIndex,
  ProcedureDeclaration,
  ProcedureName,
} from "../types.js";
import {
  assertMaxDepth,
  buildCallTree,
  renderCallTree,
  type CallTreeNode,
} from "./call-sequence.js";
import { renderDependencies } from "./dependencies.js";

export type QueryMode = "calls" | "deps";

export type QueryResult =
  | { name: ProcedureName; mode: "calls"; found: true; tree: CallTreeNode }
  | {
      name: ProcedureName;
      mode: "deps";
      found: true;
      callers: readonly ProcedureName[];
    }
  | {
      name: ProcedureName;
      mode: QueryMode;
      found: false;
      declarations: readonly ProcedureDeclaration[];
      notices: string[];
    };

function formatLocation(declaration: ProcedureDeclaration): string {
  return `${declaration.path}:${declaration.line}`;
}

function missingResult(
  index: CallIndex,
  name: ProcedureName,
  mode: QueryMode,
): QueryResult {
  const declarations = index.declarations.get(name) ?? [];
  const notices =
    mode === "calls"
      ? [`There's no info available for procedure "${name}"`]
      : [`There's no dependency info available for procedure "${name}"`];
  const outcome =
    mode === "calls" ? "makes no recorded calls" : "has no recorded callers";
  for (const declaration of declarations) {
    notices.push(
      `"${name}" is declared at ${formatLocation(declaration)} but ${outcome}`,
    );
  }
  return { name, mode, found: false, declarations, notices };
}

/**
 * Looks up one procedure. A name the index knows nothing about is an
 * ordinary outcome (`found: false`), not an error; declarations still tell
 * "declared but never called" apart from "never seen".
 */
export function queryProcedure(
  index: CallIndex,
  name: ProcedureName,
  mode: QueryMode,
  maxDepth: number,
): QueryResult {
  if (mode === "calls") {
    assertMaxDepth(maxDepth);
    if (!index.calls.has(name)) return missingResult(index, name, mode);
    return { name, mode, found: true, tree: buildCallTree(index.calls, name, maxDepth) };
  }

  const callers = index.callers.get(name);
  if (!callers || callers.length === 0) return missingResult(index, name, mode);
  return { name, mode, found: true, callers };
}

/** Text form of a result: `lines` for stdout, `notices` for stderr. */
export function renderQueryResult(result: QueryResult): {
  lines: string[];
  notices: string[];
} {
  if (!result.found) return { lines: [], notices: result.notices };
  if (result.mode === "calls") {
    return { lines: renderCallTree(result.tree), notices: [] };
  }
  return { lines: renderDependencies(result.callers), notices: [] };
}
