import { TclSyntaxError } from "./errors.js";
import { innerRange, tokenize } from "./lexer.js";
import {
  argumentRoles,
  bareValue,
  isCommandName,
  isReservedCommand,
  type ArgumentRole,
} from "./commands.js";
import type {
  CallEdge,
  ProcedureDeclaration,
  ScanResult,
  SourceRange,
  Token,
} from "./types.js";

/** Caller name for calls made outside any `proc` in `path`. */
export function fileScopeName(path: string): string {
  return `<${path}>`;
}

/**
 * Literal value of a word that names something: bare words and quoted
 * strings without substitutions, or the inside of a brace group.
 */
function literalValue(token: Token): string | undefined {
  if (token.kind === "brace") return token.text.slice(1, -1);
  if (token.substitutions.length > 0 || /[$\\]/.test(token.text)) {
    return undefined;
  }
  if (token.kind === "word") return token.text;
  if (token.kind === "quoted") return token.text.slice(1, -1);
  return undefined;
}

class ProcedureScanner {
  readonly declarations: ProcedureDeclaration[] = [];
  readonly edges: CallEdge[] = [];

  constructor(
    private readonly source: string,
    private readonly path: string,
  ) {}

  scanScript(range: SourceRange | undefined, scope: string): void {
    let words: Token[] = [];
    for (const token of tokenize(this.source, range)) {
      if (token.kind === "comment") continue;
      if (token.kind === "separator") {
        if (words.length > 0) this.scanCommand(words, scope);
        words = [];
        continue;
      }
      words.push(token);
    }
    if (words.length > 0) this.scanCommand(words, scope);
  }

  private scanCommand(words: Token[], scope: string): void {
    const [head, ...args] = words;
    this.scanSubstitutions(head, scope);

    const name = bareValue(head);
    if (name === "proc") {
      this.scanProc(args, scope);
      return;
    }

    if (name !== undefined && isCommandName(name) && !isReservedCommand(name)) {
      this.edges.push({ caller: scope, callee: name, line: head.line });
    }

    const roles = name === undefined ? [] : argumentRoles(name, args);
    args.forEach((arg, i) => {
      this.scanArgument(arg, roles[i] ?? "literal", scope);
    });
  }

  private scanProc(args: Token[], scope: string): void {
    if (args.length !== 3) {
      for (const arg of args) this.scanArgument(arg, "literal", scope);
      return;
    }
    const [nameWord, , body] = args;
    const name = literalValue(nameWord);
    // computed procedure names cannot be attributed
    if (name === undefined || name.length === 0) return;

    this.declarations.push({ name, path: this.path, line: nameWord.line });
    this.scanArgument(body, "script", name);
  }

  private scanArgument(token: Token, role: ArgumentRole, scope: string): void {
    switch (role) {
      case "script":
        this.scanScript(innerRange(token), scope);
        return;
      case "expr":
        if (token.kind === "brace") {
          this.scanExpression(innerRange(token), scope);
        } else {
          this.scanSubstitutions(token, scope);
        }
        return;
      case "cases":
        if (token.kind === "brace" || token.kind === "quoted") {
          this.scanCases(innerRange(token), scope);
        } else {
          this.scanSubstitutions(token, scope);
        }
        return;
      case "literal":
        this.scanSubstitutions(token, scope);
        return;
    }
  }

  private scanSubstitutions(token: Token, scope: string): void {
    for (const range of token.substitutions) {
      this.scanScript(range, scope);
    }
  }

  private scanExpression(range: SourceRange, scope: string): void {
    for (const token of tokenize(this.source, range)) {
      this.scanSubstitutions(token, scope);
    }
  }

  private scanCases(range: SourceRange, scope: string): void {
    const items: Token[] = [];
    for (const token of tokenize(this.source, range)) {
      if (token.kind !== "separator" && token.kind !== "comment") {
        items.push(token);
      }
    }
    for (let i = 1; i < items.length; i += 2) {
      this.scanArgument(items[i], "script", scope);
    }
  }
}

/**
 * Extracts procedure declarations and call edges from one TCL file.
 *
 * Edges come out in source order, depth-first: a command's own call first,
 * then calls found in its arguments. Self-calls are kept.
 */
export function scanSource(source: string, path: string): ScanResult {
  const scanner = new ProcedureScanner(source, path);
  try {
    scanner.scanScript(undefined, fileScopeName(path));
  } catch (err) {
    if (err instanceof TclSyntaxError) throw err.withPath(path);
    throw err;
  }
  return {
    path,
    declarations: scanner.declarations,
    edges: scanner.edges,
  };
}
