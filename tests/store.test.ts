import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { IndexFormatError, IndexNotFoundError } from "../src/errors.js";
import { CallGraphBuilder, type BuiltIndex } from "../src/graph/builder.js";
import { scanSource } from "../src/scanner.js";
import { decodeIndex, encodeIndex } from "../src/store/format.js";
import {
  deleteIndex,
  readIndex,
  resolveIndexPath,
  writeIndex,
} from "../src/store/index-file.js";

function buildFrom(files: Record<string, string>): BuiltIndex {
  const builder = new CallGraphBuilder();
  for (const [file, source] of Object.entries(files)) {
    builder.addFile(scanSource(source, file));
  }
  return builder.snapshot();
}

function encode(index: BuiltIndex): Buffer {
  return encodeIndex({
    calls: index.calls,
    callers: index.callers,
    declarations: index.declarations.all(),
    filesParsed: index.stats.filesParsed,
  });
}

const SAMPLE = {
  "x.tcl": "proc a {} { b; b; c }\nproc b {} { c }\n",
  "y.tcl": "proc g_größe {} { z_ünï }\n",
};

describe("index encoding", () => {
  it("round-trips graphs with order and duplicates", () => {
    const loaded = decodeIndex(encode(buildFrom(SAMPLE)), "idx");

    expect(loaded.calls.get("a")).toEqual(["b", "b", "c"]);
    expect(loaded.calls.get("b")).toEqual(["c"]);
    expect(loaded.callers.get("c")).toEqual(["a", "b"]);
    expect(loaded.callers.get("b")).toEqual(["a", "a"]);
    expect(loaded.calls.get("g_größe")).toEqual(["z_ünï"]);
    expect(loaded.callers.get("z_ünï")).toEqual(["g_größe"]);
    expect([...loaded.calls.names()]).toEqual(["a", "b", "g_größe"]);
    expect(loaded.calls.size).toBe(3);
    expect(loaded.filesParsed).toBe(2);
    expect(loaded.procedureCount).toBe(3);
  });

  it("answers lookups for unknown names", () => {
    const loaded = decodeIndex(encode(buildFrom(SAMPLE)), "idx");
    expect(loaded.calls.has("zzz")).toBe(false);
    expect(loaded.calls.get("zzz")).toBeUndefined();
    // known string, but not a key of the call graph
    expect(loaded.calls.get("c")).toBeUndefined();
    expect(loaded.declarations.get("c")).toBeUndefined();
  });

  it("keeps declarations", () => {
    const loaded = decodeIndex(encode(buildFrom(SAMPLE)), "idx");
    expect(loaded.declarations.get("b")).toEqual([
      { name: "b", path: "x.tcl", line: 2 },
    ]);
    expect(loaded.declarations.get("g_größe")).toEqual([
      { name: "g_größe", path: "y.tcl", line: 1 },
    ]);
  });

  it("encodes equal graphs to identical bytes", () => {
    expect(encode(buildFrom(SAMPLE)).equals(encode(buildFrom(SAMPLE)))).toBe(
      true,
    );
  });

  it("encodes an empty index", () => {
    const loaded = decodeIndex(encode(buildFrom({})), "idx");
    expect(loaded.calls.size).toBe(0);
    expect(loaded.calls.get("a")).toBeUndefined();
    expect(loaded.filesParsed).toBe(0);
  });

  it("rejects damaged files", () => {
    const good = encode(buildFrom(SAMPLE));

    const badMagic = Buffer.from(good);
    badMagic.write("XXXX", 0, "latin1");
    expect(() => decodeIndex(badMagic, "idx")).toThrow(
      'Index file idx is corrupt (not a tclgraph index). Rebuild it with "tclgraph -b <path...>".',
    );

    const badVersion = Buffer.from(good);
    badVersion.writeUInt16LE(2, 4);
    expect(() => decodeIndex(badVersion, "idx")).toThrow(
      "(format version 2, expected 1)",
    );

    const flipped = Buffer.from(good);
    flipped[flipped.length - 1] ^= 0xff;
    expect(() => decodeIndex(flipped, "idx")).toThrow("(checksum mismatch)");

    expect(() => decodeIndex(good.subarray(0, 10), "idx")).toThrow(
      IndexFormatError,
    );
    expect(() => decodeIndex(good.subarray(0, good.length - 1), "idx")).toThrow(
      "(unexpected file size)",
    );
  });
});

describe("index file", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tclgraph-store-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes the index under .tclgraph and reads it back", () => {
    const indexPath = resolveIndexPath(dir);
    expect(indexPath).toBe(path.join(dir, ".tclgraph", "index.bin"));

    const written = writeIndex(buildFrom(SAMPLE), indexPath);
    expect(written.path).toBe(indexPath);
    expect(written.sizeBytes).toBe(fs.statSync(indexPath).size);
    expect(fs.readdirSync(path.join(dir, ".tclgraph"))).toEqual(["index.bin"]);

    expect(readIndex(indexPath).calls.get("a")).toEqual(["b", "b", "c"]);
  });

  it("replaces an existing index", () => {
    const indexPath = resolveIndexPath(dir);
    writeIndex(buildFrom(SAMPLE), indexPath);
    writeIndex(buildFrom({ "z.tcl": "proc a {} { only }" }), indexPath);
    expect(readIndex(indexPath).calls.get("a")).toEqual(["only"]);
  });

  it("reports a missing index", () => {
    expect(() => readIndex(resolveIndexPath(dir))).toThrow(IndexNotFoundError);
  });

  it("deletes the index once", () => {
    const indexPath = resolveIndexPath(dir);
    writeIndex(buildFrom(SAMPLE), indexPath);
    expect(deleteIndex(indexPath)).toBe(true);
    expect(deleteIndex(indexPath)).toBe(false);
    expect(fs.existsSync(indexPath)).toBe(false);
  });
});
