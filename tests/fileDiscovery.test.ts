import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { discoverTclFiles, isTclFile } from "../src/fileDiscovery.js";

function createTclProject(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "tclgraph-discovery-"));
  const files: Record<string, string> = {
    "b.tcl": "proc b {} {}\n",
    "a/z.tcl": "proc z {} {}\n",
    "a/readme.md": "# notes\n",
    "gen/out.tcl": "proc out {} {}\n",
    "node_modules/pkg/x.tcl": "proc x {} {}\n",
    ".tclgraph/stale.tcl": "proc stale {} {}\n",
  };
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(dir, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }
  return dir;
}

describe("discoverTclFiles", () => {
  it("lists .tcl files recursively in sorted order", () => {
    const dir = createTclProject();

    expect(discoverTclFiles({ repoRoot: dir, dir: "." })).toEqual([
      "a/z.tcl",
      "b.tcl",
      "gen/out.tcl",
    ]);

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("applies ignore patterns", () => {
    const dir = createTclProject();

    expect(
      discoverTclFiles({ repoRoot: dir, dir: ".", ignore: ["gen/**"] }),
    ).toEqual(["a/z.tcl", "b.tcl"]);

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reports paths relative to the root when searching a subdirectory", () => {
    const dir = createTclProject();

    expect(discoverTclFiles({ repoRoot: dir, dir: "a" })).toEqual(["a/z.tcl"]);
    expect(
      discoverTclFiles({ repoRoot: dir, dir: path.join(dir, "gen") }),
    ).toEqual(["gen/out.tcl"]);

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reports directories it cannot list", () => {
    const dir = createTclProject();
    const unreadable: string[] = [];

    expect(
      discoverTclFiles({
        repoRoot: dir,
        dir: "missing",
        onUnreadable: (dirPath) => unreadable.push(dirPath),
      }),
    ).toEqual([]);
    expect(unreadable).toEqual([path.join(dir, "missing")]);

    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe("isTclFile", () => {
  it("matches the .tcl extension exactly", () => {
    expect(isTclFile("lib/x.tcl")).toBe(true);
    expect(isTclFile("lib/x.TCL")).toBe(false);
    expect(isTclFile("lib/x.tcl.bak")).toBe(false);
  });
});
