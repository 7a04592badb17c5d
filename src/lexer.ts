import { TclSyntaxError } from "./errors.js";
import type { SourceRange, Token, TokenKind } from "./types.js";

const INLINE_SPACE = new Set([" ", "\t", "\r", "\f", "\v"]);

function isWordBreak(ch: string): boolean {
  return INLINE_SPACE.has(ch) || ch === "\n" || ch === ";";
}

/**
 * Walks one range of TCL source. Offsets are absolute into `source`, so a
 * cursor over a brace body reports the same positions and lines as the
 * enclosing file.
 */
class LexCursor {
  pos: number;
  line: number;

  constructor(
    readonly source: string,
    readonly end: number,
    start: number,
    line: number,
  ) {
    this.pos = start;
    this.line = line;
  }

  peek(offset = 0): string {
    const at = this.pos + offset;
    return at < this.end ? this.source[at] : "";
  }

  /** Steps over a backslash and the character it escapes. */
  skipEscape(): void {
    if (this.peek(1) === "\n") this.line++;
    this.pos = Math.min(this.pos + 2, this.end);
  }

  skipBrace(): void {
    const openLine = this.line;
    let depth = 0;
    while (this.pos < this.end) {
      const ch = this.source[this.pos];
      if (ch === "\\") {
        this.skipEscape();
        continue;
      }
      if (ch === "{") {
        depth++;
      } else if (ch === "}") {
        depth--;
        if (depth === 0) {
          this.pos++;
          return;
        }
      } else if (ch === "\n") {
        this.line++;
      }
      this.pos++;
    }
    throw new TclSyntaxError("missing close-brace", openLine);
  }

  /** Consumes `[...]` and returns the range between the brackets. */
  skipBracket(): SourceRange {
    const openLine = this.line;
    const innerStart = this.pos + 1;
    let wordStart = true;
    this.pos++;
    while (this.pos < this.end) {
      const ch = this.source[this.pos];
      if (ch === "]") {
        const inner = { start: innerStart, end: this.pos, line: openLine };
        this.pos++;
        return inner;
      }
      if (ch === "\\") {
        wordStart = this.peek(1) === "\n";
        this.skipEscape();
        continue;
      }
      if (ch === "[") {
        this.skipBracket();
        wordStart = false;
        continue;
      }
      if (wordStart && ch === "{") {
        this.skipBrace();
        wordStart = false;
        continue;
      }
      if (wordStart && ch === "\"") {
        this.skipQuoted([]);
        wordStart = false;
        continue;
      }
      if (isWordBreak(ch)) {
        if (ch === "\n") this.line++;
        wordStart = true;
      } else {
        wordStart = false;
      }
      this.pos++;
    }
    throw new TclSyntaxError("missing close-bracket", openLine);
  }

  skipQuoted(substitutions: SourceRange[]): void {
    const openLine = this.line;
    this.pos++;
    while (this.pos < this.end) {
      const ch = this.source[this.pos];
      if (ch === "\\") {
        this.skipEscape();
        continue;
      }
      if (ch === "\"") {
        this.pos++;
        return;
      }
      if (ch === "[") {
        substitutions.push(this.skipBracket());
        continue;
      }
      if (ch === "\n") this.line++;
      this.pos++;
    }
    throw new TclSyntaxError("missing close-quote", openLine);
  }

  skipBareWord(substitutions: SourceRange[]): void {
    while (this.pos < this.end) {
      const ch = this.source[this.pos];
      if (isWordBreak(ch)) return;
      if (ch === "\\") {
        // backslash-newline is a line continuation, so it ends the word
        if (this.peek(1) === "\n") return;
        this.skipEscape();
        continue;
      }
      if (ch === "[") {
        substitutions.push(this.skipBracket());
        continue;
      }
      this.pos++;
    }
  }

  skipComment(): void {
    while (this.pos < this.end) {
      const ch = this.source[this.pos];
      if (ch === "\\") {
        this.skipEscape();
        continue;
      }
      if (ch === "\n") return;
      this.pos++;
    }
  }
}

function makeToken(
  cursor: LexCursor,
  kind: TokenKind,
  start: number,
  line: number,
  substitutions: SourceRange[],
): Token {
  return {
    kind,
    text: cursor.source.slice(start, cursor.pos),
    start,
    end: cursor.pos,
    line,
    substitutions,
  };
}

/**
 * Lazily splits TCL source into tokens. Pass `range` to lex only part of
 * `source`, such as the inside of a brace-quoted procedure body.
 *
 * Throws TclSyntaxError when a brace, bracket or quote is still open at the
 * end of the range.
 */
export function* tokenize(
  source: string,
  range?: SourceRange,
): Generator<Token, void, undefined> {
  const cursor = new LexCursor(
    source,
    range?.end ?? source.length,
    range?.start ?? 0,
    range?.line ?? 1,
  );
  let commandStart = true;

  while (cursor.pos < cursor.end) {
    const ch = cursor.source[cursor.pos];
    const start = cursor.pos;
    const line = cursor.line;

    if (INLINE_SPACE.has(ch)) {
      cursor.pos++;
      continue;
    }

    if (ch === "\\" && cursor.peek(1) === "\n") {
      cursor.skipEscape();
      continue;
    }

    if (ch === "\n" || ch === ";") {
      cursor.pos++;
      yield makeToken(cursor, "separator", start, line, []);
      if (ch === "\n") cursor.line++;
      commandStart = true;
      continue;
    }

    if (ch === "#" && commandStart) {
      cursor.skipComment();
      yield makeToken(cursor, "comment", start, line, []);
      continue;
    }

    commandStart = false;

    if (ch === "{") {
      cursor.skipBrace();
      yield makeToken(cursor, "brace", start, line, []);
      continue;
    }

    const substitutions: SourceRange[] = [];

    if (ch === "\"") {
      cursor.skipQuoted(substitutions);
      yield makeToken(cursor, "quoted", start, line, substitutions);
      continue;
    }

    cursor.skipBareWord(substitutions);
    const wholeBracket =
      ch === "[" &&
      substitutions.length === 1 &&
      substitutions[0].end + 1 === cursor.pos;
    yield makeToken(
      cursor,
      wholeBracket ? "bracket" : "word",
      start,
      line,
      substitutions,
    );
  }
}

/** The range inside a token's delimiters (the token itself for bare words). */
export function innerRange(token: Token): SourceRange {
  if (token.kind === "brace" || token.kind === "quoted") {
    return { start: token.start + 1, end: token.end - 1, line: token.line };
  }
  return { start: token.start, end: token.end, line: token.line };
}
