import type {
  BuildStats,
  CallIndex,
  DeclarationTable,
  ProcedureDeclaration,
  ProcedureGraph,
  ProcedureName,
  ScanResult,
} from "../types.js";

/** Owning, growable graph used while an index is being built. */
export class MapProcedureGraph implements ProcedureGraph {
  private readonly lists = new Map<ProcedureName, ProcedureName[]>();

  get size(): number {
    return this.lists.size;
  }

  has(name: ProcedureName): boolean {
    return this.lists.has(name);
  }

  get(name: ProcedureName): readonly ProcedureName[] | undefined {
    return this.lists.get(name);
  }

  names(): Iterable<ProcedureName> {
    return this.lists.keys();
  }

  append(name: ProcedureName, value: ProcedureName): void {
    const list = this.lists.get(name);
    if (list) {
      list.push(value);
    } else {
      this.lists.set(name, [value]);
    }
  }

  /** Edge count: the sum of every list's length. */
  countEntries(): number {
    let total = 0;
    for (const list of this.lists.values()) total += list.length;
    return total;
  }
}

export class MapDeclarationTable implements DeclarationTable {
  private readonly byName = new Map<ProcedureName, ProcedureDeclaration[]>();

  get size(): number {
    return this.byName.size;
  }

  get(name: ProcedureName): readonly ProcedureDeclaration[] | undefined {
    return this.byName.get(name);
  }

  add(declaration: ProcedureDeclaration): void {
    const list = this.byName.get(declaration.name);
    if (list) {
      list.push(declaration);
    } else {
      this.byName.set(declaration.name, [declaration]);
    }
  }

  all(): ProcedureDeclaration[] {
    return [...this.byName.values()].flat();
  }
}

export type BuiltIndex = CallIndex & {
  calls: MapProcedureGraph;
  callers: MapProcedureGraph;
  declarations: MapDeclarationTable;
  stats: BuildStats;
};

/**
 * Merges per-file scan results into one forward graph (calls) and its
 * transpose (callers).
 *
 * A procedure declared in several files is not deduplicated: the later
 * file's edges are appended after the earlier ones, so redefinitions stay
 * visible in call sequences.
 */
export class CallGraphBuilder {
  private readonly calls = new MapProcedureGraph();
  private readonly callers = new MapProcedureGraph();
  private readonly declarations = new MapDeclarationTable();
  private readonly stats: BuildStats = {
    filesParsed: 0,
    filesFailed: 0,
    procedures: 0,
    edges: 0,
  };

  addFile(scan: ScanResult): void {
    for (const declaration of scan.declarations) {
      this.declarations.add(declaration);
    }
    for (const edge of scan.edges) {
      this.calls.append(edge.caller, edge.callee);
      this.callers.append(edge.callee, edge.caller);
    }
    this.stats.filesParsed++;
    this.stats.procedures += scan.declarations.length;
    this.stats.edges += scan.edges.length;
  }

  recordFailure(): void {
    this.stats.filesFailed++;
  }

  snapshot(): BuiltIndex {
    return {
      calls: this.calls,
      callers: this.callers,
      declarations: this.declarations,
      stats: { ...this.stats },
    };
  }
}
