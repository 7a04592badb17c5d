import fs from "node:fs";
import type { Token } from "./types.js";

/**
 * How the scanner treats one argument of a reserved command:
 * - script: scanned as a nested script (bodies of if/while/foreach, ...)
 * - expr: only `[...]` substitutions inside it are scanned
 * - cases: a braced `switch` pattern/body list
 * - literal: brace words skipped, substitutions in other words scanned
 */
export type ArgumentRole = "script" | "expr" | "cases" | "literal";

type RoleRule = (args: readonly Token[]) => ArgumentRole[];

const RESERVED_COMMANDS_FILE = new URL(
  "../data/reserved-commands.json",
  import.meta.url,
);

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function loadReservedCommands(): ReadonlySet<string> {
  const parsed: unknown = JSON.parse(
    fs.readFileSync(RESERVED_COMMANDS_FILE, "utf-8"),
  );
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error("reserved-commands.json must contain an object.");
  }
  const names = new Set<string>();
  for (const key of ["keywords", "builtins"]) {
    const list: unknown = Reflect.get(parsed, key);
    if (!isStringArray(list)) {
      throw new Error(`reserved-commands.json: "${key}" must be a list of names.`);
    }
    for (const name of list) names.add(name);
  }
  return names;
}

export const RESERVED_COMMANDS = loadReservedCommands();

export function isReservedCommand(name: string): boolean {
  return RESERVED_COMMANDS.has(name);
}

const COMMAND_NAME_RE = /^[A-Za-z_:.][^\s$[\]\\{}";]*$/;

/** True for bare words that can name a procedure in command position. */
export function isCommandName(word: string): boolean {
  return COMMAND_NAME_RE.test(word);
}

/** The text of a bare word with no substitutions, otherwise undefined. */
export function bareValue(token: Token | undefined): string | undefined {
  if (!token || token.kind !== "word" || token.substitutions.length > 0) {
    return undefined;
  }
  return token.text;
}

function literalRoles(count: number): ArgumentRole[] {
  return new Array<ArgumentRole>(count).fill("literal");
}

function positional(...pattern: ArgumentRole[]): RoleRule {
  return (args) => args.map((_, i) => pattern[i] ?? "literal");
}

const allLiteral: RoleRule = (args) => literalRoles(args.length);

const lastIsScript: RoleRule = (args) => {
  const result = literalRoles(args.length);
  if (result.length > 0) result[result.length - 1] = "script";
  return result;
};

function whenFirstIs(subcommands: string[], rule: RoleRule): RoleRule {
  return (args) => {
    const first = bareValue(args[0]);
    return first !== undefined && subcommands.includes(first)
      ? rule(args)
      : allLiteral(args);
  };
}

const ifRoles: RoleRule = (args) => {
  const result: ArgumentRole[] = [];
  let expectCondition = true;
  for (const arg of args) {
    const word = bareValue(arg);
    if (expectCondition) {
      result.push("expr");
      expectCondition = false;
    } else if (word === "then" || word === "else") {
      result.push("literal");
    } else if (word === "elseif") {
      result.push("literal");
      expectCondition = true;
    } else {
      result.push("script");
    }
  }
  return result;
};

const tryRoles: RoleRule = (args) => {
  const result = literalRoles(args.length);
  const markScript = (index: number) => {
    if (index < result.length) result[index] = "script";
  };
  markScript(0);
  let i = 1;
  while (i < args.length) {
    const word = bareValue(args[i]);
    if (word === "on" || word === "trap") {
      markScript(i + 3);
      i += 4;
    } else if (word === "finally") {
      markScript(i + 1);
      i += 2;
    } else {
      i++;
    }
  }
  return result;
};

const SWITCH_FLAGS = new Set(["-exact", "-glob", "-regexp", "-nocase"]);
const SWITCH_VALUE_FLAGS = new Set(["-matchvar", "-indexvar"]);

const switchRoles: RoleRule = (args) => {
  let i = 0;
  while (i < args.length) {
    const word = bareValue(args[i]);
    if (word === "--") {
      i++;
      break;
    }
    if (word !== undefined && SWITCH_FLAGS.has(word)) {
      i++;
    } else if (word !== undefined && SWITCH_VALUE_FLAGS.has(word)) {
      i += 2;
    } else {
      break;
    }
  }
  const result = literalRoles(args.length);
  const firstClause = i + 1;
  if (args.length - firstClause === 1) {
    result[firstClause] = "cases";
    return result;
  }
  for (let body = firstClause + 1; body < args.length; body += 2) {
    result[body] = "script";
  }
  return result;
};

const ROLE_RULES: Record<string, RoleRule> = {
  if: ifRoles,
  while: positional("expr", "script"),
  for: positional("script", "expr", "script", "script"),
  foreach: lastIsScript,
  lmap: lastIsScript,
  catch: positional("script"),
  try: tryRoles,
  switch: switchRoles,
  expr: (args) => args.map((): ArgumentRole => "expr"),
  eval: (args) => args.map((): ArgumentRole => "script"),
  uplevel: lastIsScript,
  time: positional("script"),
  after: (args) => {
    const first = bareValue(args[0]);
    if (args.length < 2 || first === "cancel" || first === "info") {
      return allLiteral(args);
    }
    return lastIsScript(args);
  },
  namespace: whenFirstIs(["eval"], lastIsScript),
  dict: whenFirstIs(["for", "map", "update", "with"], lastIsScript),
};

/**
 * Roles for the arguments of `command`. Commands without a rule, including
 * every user procedure, get literal arguments.
 */
export function argumentRoles(
  command: string,
  args: readonly Token[],
): ArgumentRole[] {
  const rule = Object.hasOwn(ROLE_RULES, command) ? ROLE_RULES[command] : allLiteral;
  return rule(args);
}
