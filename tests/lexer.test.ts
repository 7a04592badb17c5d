import { describe, it, expect } from "vitest";
import { TclSyntaxError } from "../src/errors.js";
import { innerRange, tokenize } from "../src/lexer.js";

function shapes(source: string): Array<[string, string]> {
  return [...tokenize(source)].map((t) => [t.kind, t.text]);
}

function lexError(source: string): TclSyntaxError {
  try {
    [...tokenize(source)];
  } catch (err) {
    if (err instanceof TclSyntaxError) return err;
    throw err;
  }
  throw new Error("expected a syntax error");
}

describe("tokenize", () => {
  it("splits words, brace groups and quoted strings", () => {
    expect(shapes('set x {a b}\nputs "hi [foo]"')).toEqual([
      ["word", "set"],
      ["word", "x"],
      ["brace", "{a b}"],
      ["separator", "\n"],
      ["word", "puts"],
      ["quoted", '"hi [foo]"'],
    ]);
  });

  it("records command substitutions inside quoted words", () => {
    const tokens = [...tokenize('set x {a b}\nputs "hi [foo]"')];
    const quoted = tokens[5];
    expect(quoted.line).toBe(2);
    expect(quoted.substitutions).toEqual([{ start: 22, end: 25, line: 2 }]);
  });

  it("treats # as a comment only where a command starts", () => {
    expect(shapes("# note\nfoo # not a comment\n")).toEqual([
      ["comment", "# note"],
      ["separator", "\n"],
      ["word", "foo"],
      ["word", "#"],
      ["word", "not"],
      ["word", "a"],
      ["word", "comment"],
      ["separator", "\n"],
    ]);
    expect(shapes("a; # c")).toEqual([
      ["word", "a"],
      ["separator", ";"],
      ["comment", "# c"],
    ]);
  });

  it("continues a comment across backslash-newline", () => {
    expect(shapes("# one \\\n two\nnext")).toEqual([
      ["comment", "# one \\\n two"],
      ["separator", "\n"],
      ["word", "next"],
    ]);
  });

  it("joins lines ending in a backslash", () => {
    const tokens = [...tokenize("foo a \\\n  b")];
    expect(tokens.map((t) => t.text)).toEqual(["foo", "a", "b"]);
    expect(tokens[2].line).toBe(2);
  });

  it("marks a word made of one command substitution as a bracket", () => {
    expect(shapes("set y [bar 1]")).toEqual([
      ["word", "set"],
      ["word", "y"],
      ["bracket", "[bar 1]"],
    ]);
    expect(shapes("x[bar] [a][b]")).toEqual([
      ["word", "x[bar]"],
      ["word", "[a][b]"],
    ]);
  });

  it("counts nested braces and skips escaped ones", () => {
    expect(shapes("{a {b} c} {a \\} b}")).toEqual([
      ["brace", "{a {b} c}"],
      ["brace", "{a \\} b}"],
    ]);
  });

  it("keeps brackets inside nested command substitutions together", () => {
    expect(shapes("set v [list [a] {]} \"]\"]")).toEqual([
      ["word", "set"],
      ["word", "v"],
      ["bracket", '[list [a] {]} "]"]'],
    ]);
  });

  it("lexes a sub-range with absolute offsets and lines", () => {
    const source = "proc a {} {\n  b\n}";
    const body = [...tokenize(source)][3];
    expect(body.kind).toBe("brace");
    expect(innerRange(body)).toEqual({ start: 11, end: 16, line: 1 });

    const inner = [...tokenize(source, innerRange(body))];
    expect(inner.map((t) => [t.kind, t.start, t.line])).toEqual([
      ["separator", 11, 1],
      ["word", 14, 2],
      ["separator", 15, 2],
    ]);
  });

  it("reports unterminated groups at the line they open", () => {
    const brace = lexError("proc a {} {\n  b\n");
    expect(brace.reason).toBe("missing close-brace");
    expect(brace.line).toBe(1);
    expect(brace.message).toBe("line 1: missing close-brace");

    expect(lexError('\nputs "abc\n').message).toBe(
      "line 2: missing close-quote",
    );
    expect(lexError("set x [foo\n\nbar").message).toBe(
      "line 1: missing close-bracket",
    );
  });
});
