import { UsageError } from "../errors.js";
import type { ProcedureGraph, ProcedureName } from "../types.js";

export type CallTreeNode = {
  name: ProcedureName;
  children: CallTreeNode[];
  /** No calls were recorded for this procedure. */
  unknown?: boolean;
  /** Callees exist but lie beyond the depth limit. */
  truncated?: boolean;
};

export type LineWriter = (line: string) => void;

export const DEFAULT_MAX_DEPTH = 5;

const PLACEHOLDER = "...";

export function assertMaxDepth(maxDepth: number): void {
  if (!Number.isInteger(maxDepth) || maxDepth <= 0) {
    throw new UsageError(
      `Max depth must be a positive integer, got ${String(maxDepth)}.`,
    );
  }
}

function buildNode(
  calls: ProcedureGraph,
  name: ProcedureName,
  depth: number,
): CallTreeNode {
  const callees = calls.get(name);
  if (!callees || callees.length === 0) {
    return { name, children: [], unknown: true };
  }

  // a direct self-call would repeat this node until the depth runs out
  const next = callees.filter((callee) => callee !== name);
  if (depth <= 1) {
    return next.length > 0
      ? { name, children: [], truncated: true }
      : { name, children: [] };
  }
  return {
    name,
    children: next.map((callee) => buildNode(calls, callee, depth - 1)),
  };
}

/**
 * Depth-first call tree rooted at `name`. `maxDepth` counts levels: 1 gives
 * the root alone, 2 adds its direct callees, and so on. Indirect cycles are
 * only bounded by the depth.
 */
export function buildCallTree(
  calls: ProcedureGraph,
  name: ProcedureName,
  maxDepth: number,
): CallTreeNode {
  assertMaxDepth(maxDepth);
  return buildNode(calls, name, maxDepth);
}

/** Renders a call tree as nested `-> name` / `<- name` lines. */
export function renderCallTree(root: CallTreeNode): string[] {
  const lines: string[] = [];

  const walk = (node: CallTreeNode, indent: number) => {
    const pad = " ".repeat(indent);
    lines.push(`${pad}-> ${node.name}`);
    if (node.unknown) {
      lines.push(`${pad}  -> ${PLACEHOLDER}`);
      lines.push(`${pad}  <- ${PLACEHOLDER}`);
    }
    for (const child of node.children) {
      walk(child, indent + 2);
    }
    lines.push(`${pad}<- ${node.name}`);
  };

  walk(root, 0);
  return lines;
}

export function printCallSequence(
  calls: ProcedureGraph,
  name: ProcedureName,
  maxDepth: number,
  write: LineWriter = console.log,
): void {
  for (const line of renderCallTree(buildCallTree(calls, name, maxDepth))) {
    write(line);
  }
}
