/**
 * Binary layout of the persisted call index.
 *
 * Header (68 bytes, little endian):
 *   magic "TCLG" | version u16 | reserved u16 |
 *   strings, forward keys, forward edges, reverse keys, reverse edges,
 *   declarations, files parsed (u32 each) | sha256 of the body (32 bytes)
 *
 * Body, all u32 unless noted:
 *   string offsets [strings + 1]
 *   forward keys [K] | forward edge starts [K + 1] | forward edges [E]
 *   reverse keys [K] | reverse edge starts [K + 1] | reverse edges [E]
 *   declarations [3 * D] as (name id, path id, line)
 *   string bytes (UTF-8, sorted, no separators)
 *
 * Strings are sorted by their UTF-8 bytes and keys by string id, so a name
 * is found with two binary searches and nothing is decoded up front.
 */
import crypto from "node:crypto";
import { IndexFormatError } from "../errors.js";
import type {
  CallIndex,
  DeclarationTable,
  ProcedureDeclaration,
  ProcedureGraph,
  ProcedureName,
} from "../types.js";

export const INDEX_MAGIC = "TCLG";
export const INDEX_FORMAT_VERSION = 1;

const COUNT_FIELDS = 7;
const CHECKSUM_BYTES = 32;
const COUNTS_AT = 8;
const CHECKSUM_AT = COUNTS_AT + COUNT_FIELDS * 4;
export const HEADER_BYTES = CHECKSUM_AT + CHECKSUM_BYTES;

export type IndexContents = {
  calls: ProcedureGraph;
  callers: ProcedureGraph;
  declarations: readonly ProcedureDeclaration[];
  filesParsed: number;
};

export type LoadedIndex = CallIndex & {
  filesParsed: number;
  procedureCount: number;
};

type Counts = {
  strings: number;
  forwardKeys: number;
  forwardEdges: number;
  reverseKeys: number;
  reverseEdges: number;
  declarations: number;
  filesParsed: number;
};

type GraphSection = {
  keys: number[];
  starts: number[];
  edges: number[];
};

class StringIds {
  private readonly ids = new Map<string, number>();
  private readonly values: string[];
  readonly encoded: Buffer[];

  constructor(values: Iterable<string>) {
    const entries = [...new Set(values)].map(
      (value): [string, Buffer] => [value, Buffer.from(value, "utf-8")],
    );
    entries.sort((a, b) => Buffer.compare(a[1], b[1]));
    this.encoded = entries.map(([, bytes]) => bytes);
    this.values = entries.map(([value]) => value);
    entries.forEach(([value], id) => this.ids.set(value, id));
  }

  valueAt(id: number): string {
    return this.values[id];
  }

  idOf(value: string): number {
    const id = this.ids.get(value);
    if (id === undefined) {
      throw new Error(`String "${value}" missing from the index string table.`);
    }
    return id;
  }
}

function* graphStrings(graph: ProcedureGraph): Generator<string> {
  for (const name of graph.names()) {
    yield name;
    yield* graph.get(name) ?? [];
  }
}

function* contentStrings(contents: IndexContents): Generator<string> {
  yield* graphStrings(contents.calls);
  yield* graphStrings(contents.callers);
  for (const declaration of contents.declarations) {
    yield declaration.name;
    yield declaration.path;
  }
}

function encodeGraph(graph: ProcedureGraph, strings: StringIds): GraphSection {
  const keys = [...graph.names()]
    .map((name) => strings.idOf(name))
    .sort((a, b) => a - b);
  const starts: number[] = [0];
  const edges: number[] = [];
  for (const key of keys) {
    for (const target of graph.get(strings.valueAt(key)) ?? []) {
      edges.push(strings.idOf(target));
    }
    starts.push(edges.length);
  }
  return { keys, starts, edges };
}

/** Serializes an index. Equal contents always produce identical bytes. */
export function encodeIndex(contents: IndexContents): Buffer {
  const strings = new StringIds(contentStrings(contents));
  const forward = encodeGraph(contents.calls, strings);
  const reverse = encodeGraph(contents.callers, strings);

  const stringOffsets: number[] = [0];
  let stringBytes = 0;
  for (const bytes of strings.encoded) {
    stringBytes += bytes.length;
    stringOffsets.push(stringBytes);
  }

  const words: number[] = [
    ...stringOffsets,
    ...forward.keys,
    ...forward.starts,
    ...forward.edges,
    ...reverse.keys,
    ...reverse.starts,
    ...reverse.edges,
  ];
  for (const declaration of contents.declarations) {
    words.push(
      strings.idOf(declaration.name),
      strings.idOf(declaration.path),
      declaration.line,
    );
  }

  const body = Buffer.alloc(words.length * 4 + stringBytes);
  words.forEach((word, i) => body.writeUInt32LE(word, i * 4));
  let cursor = words.length * 4;
  for (const bytes of strings.encoded) {
    bytes.copy(body, cursor);
    cursor += bytes.length;
  }

  const header = Buffer.alloc(HEADER_BYTES);
  header.write(INDEX_MAGIC, 0, "latin1");
  header.writeUInt16LE(INDEX_FORMAT_VERSION, 4);
  const counts = [
    strings.encoded.length,
    forward.keys.length,
    forward.edges.length,
    reverse.keys.length,
    reverse.edges.length,
    contents.declarations.length,
    contents.filesParsed,
  ];
  counts.forEach((count, i) => header.writeUInt32LE(count, COUNTS_AT + i * 4));
  crypto.createHash("sha256").update(body).digest().copy(header, CHECKSUM_AT);

  return Buffer.concat([header, body]);
}

/** Offset-based view of the string table inside the loaded buffer. */
class StringTable {
  private readonly decoded: Array<string | undefined>;

  constructor(
    private readonly buf: Buffer,
    private readonly offsetsAt: number,
    readonly count: number,
    private readonly bytesAt: number,
  ) {
    this.decoded = new Array<string | undefined>(count);
  }

  private bounds(id: number): [number, number] {
    const start = this.buf.readUInt32LE(this.offsetsAt + id * 4);
    const end = this.buf.readUInt32LE(this.offsetsAt + (id + 1) * 4);
    return [this.bytesAt + start, this.bytesAt + end];
  }

  decode(id: number): string {
    const cached = this.decoded[id];
    if (cached !== undefined) return cached;
    const [start, end] = this.bounds(id);
    const value = this.buf.toString("utf-8", start, end);
    this.decoded[id] = value;
    return value;
  }

  /** Id of `value`, or -1 when the table does not contain it. */
  find(value: string): number {
    const needle = Buffer.from(value, "utf-8");
    let lo = 0;
    let hi = this.count - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const [start, end] = this.bounds(mid);
      const cmp = this.buf.compare(needle, 0, needle.length, start, end);
      if (cmp === 0) return mid;
      if (cmp < 0) lo = mid + 1;
      else hi = mid - 1;
    }
    return -1;
  }
}

/** Read-only graph backed by the key, start and edge arrays of one section. */
class FlatProcedureGraph implements ProcedureGraph {
  private readonly lists = new Map<number, readonly ProcedureName[]>();

  constructor(
    private readonly buf: Buffer,
    private readonly strings: StringTable,
    private readonly keysAt: number,
    readonly size: number,
    private readonly startsAt: number,
    private readonly edgesAt: number,
  ) {}

  private keyAt(slot: number): number {
    return this.buf.readUInt32LE(this.keysAt + slot * 4);
  }

  private findSlot(name: ProcedureName): number {
    const id = this.strings.find(name);
    if (id < 0) return -1;
    let lo = 0;
    let hi = this.size - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const key = this.keyAt(mid);
      if (key === id) return mid;
      if (key < id) lo = mid + 1;
      else hi = mid - 1;
    }
    return -1;
  }

  has(name: ProcedureName): boolean {
    return this.findSlot(name) >= 0;
  }

  get(name: ProcedureName): readonly ProcedureName[] | undefined {
    const slot = this.findSlot(name);
    if (slot < 0) return undefined;
    const cached = this.lists.get(slot);
    if (cached) return cached;

    const from = this.buf.readUInt32LE(this.startsAt + slot * 4);
    const to = this.buf.readUInt32LE(this.startsAt + (slot + 1) * 4);
    const list: ProcedureName[] = [];
    for (let i = from; i < to; i++) {
      list.push(this.strings.decode(this.buf.readUInt32LE(this.edgesAt + i * 4)));
    }
    const frozen = Object.freeze(list);
    this.lists.set(slot, frozen);
    return frozen;
  }

  *names(): Iterable<ProcedureName> {
    for (let slot = 0; slot < this.size; slot++) {
      yield this.strings.decode(this.keyAt(slot));
    }
  }
}

class FlatDeclarationTable implements DeclarationTable {
  private byName: Map<ProcedureName, ProcedureDeclaration[]> | null = null;

  constructor(
    private readonly buf: Buffer,
    private readonly strings: StringTable,
    private readonly at: number,
    private readonly count: number,
  ) {}

  private load(): Map<ProcedureName, ProcedureDeclaration[]> {
    if (this.byName) return this.byName;
    const byName = new Map<ProcedureName, ProcedureDeclaration[]>();
    for (let i = 0; i < this.count; i++) {
      const base = this.at + i * 12;
      const declaration: ProcedureDeclaration = {
        name: this.strings.decode(this.buf.readUInt32LE(base)),
        path: this.strings.decode(this.buf.readUInt32LE(base + 4)),
        line: this.buf.readUInt32LE(base + 8),
      };
      const list = byName.get(declaration.name);
      if (list) list.push(declaration);
      else byName.set(declaration.name, [declaration]);
    }
    this.byName = byName;
    return byName;
  }

  get(name: ProcedureName): readonly ProcedureDeclaration[] | undefined {
    return this.load().get(name);
  }
}

function readCounts(buf: Buffer): Counts {
  const at = (i: number) => buf.readUInt32LE(COUNTS_AT + i * 4);
  return {
    strings: at(0),
    forwardKeys: at(1),
    forwardEdges: at(2),
    reverseKeys: at(3),
    reverseEdges: at(4),
    declarations: at(5),
    filesParsed: at(6),
  };
}

/**
 * Builds a read-only view over an encoded index. The buffer is kept as is;
 * names and edge lists are decoded on first use.
 *
 * Throws IndexFormatError for anything that is not a complete index of the
 * current format version.
 */
export function decodeIndex(buf: Buffer, indexPath: string): LoadedIndex {
  const fail = (detail: string): never => {
    throw new IndexFormatError(indexPath, detail);
  };

  if (buf.length < HEADER_BYTES) fail("file is truncated");
  if (buf.toString("latin1", 0, 4) !== INDEX_MAGIC) fail("not a tclgraph index");
  const version = buf.readUInt16LE(4);
  if (version !== INDEX_FORMAT_VERSION) {
    fail(`format version ${version}, expected ${INDEX_FORMAT_VERSION}`);
  }

  const counts = readCounts(buf);
  const offsetsAt = HEADER_BYTES;
  const forwardKeysAt = offsetsAt + (counts.strings + 1) * 4;
  const forwardStartsAt = forwardKeysAt + counts.forwardKeys * 4;
  const forwardEdgesAt = forwardStartsAt + (counts.forwardKeys + 1) * 4;
  const reverseKeysAt = forwardEdgesAt + counts.forwardEdges * 4;
  const reverseStartsAt = reverseKeysAt + counts.reverseKeys * 4;
  const reverseEdgesAt = reverseStartsAt + (counts.reverseKeys + 1) * 4;
  const declarationsAt = reverseEdgesAt + counts.reverseEdges * 4;
  const stringBytesAt = declarationsAt + counts.declarations * 12;

  if (buf.length < stringBytesAt) fail("file is truncated");
  const stringBytes = buf.readUInt32LE(offsetsAt + counts.strings * 4);
  if (buf.length !== stringBytesAt + stringBytes) fail("unexpected file size");

  const expected = buf.subarray(CHECKSUM_AT, CHECKSUM_AT + CHECKSUM_BYTES);
  const actual = crypto
    .createHash("sha256")
    .update(buf.subarray(HEADER_BYTES))
    .digest();
  if (!actual.equals(expected)) fail("checksum mismatch");

  const strings = new StringTable(buf, offsetsAt, counts.strings, stringBytesAt);
  const calls = new FlatProcedureGraph(
    buf,
    strings,
    forwardKeysAt,
    counts.forwardKeys,
    forwardStartsAt,
    forwardEdgesAt,
  );
  const callers = new FlatProcedureGraph(
    buf,
    strings,
    reverseKeysAt,
    counts.reverseKeys,
    reverseStartsAt,
    reverseEdgesAt,
  );

  return {
    calls,
    callers,
    declarations: new FlatDeclarationTable(
      buf,
      strings,
      declarationsAt,
      counts.declarations,
    ),
    filesParsed: counts.filesParsed,
    procedureCount: counts.declarations,
  };
}
