import type { ProcedureGraph, ProcedureName } from "../types.js";
import type { LineWriter } from "./call-sequence.js";

/** `1. caller` lines, numbers right-aligned to the widest one. */
export function renderDependencies(callers: readonly ProcedureName[]): string[] {
  const width = String(callers.length).length;
  return callers.map(
    (caller, i) => `${String(i + 1).padStart(width)}. ${caller}`,
  );
}

/** Returns false, printing nothing, when `name` has no recorded callers. */
export function printDependencies(
  callers: ProcedureGraph,
  name: ProcedureName,
  write: LineWriter = console.log,
): boolean {
  const list = callers.get(name);
  if (!list || list.length === 0) return false;
  for (const line of renderDependencies(list)) {
    write(line);
  }
  return true;
}
