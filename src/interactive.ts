import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { LineWriter } from "./query/call-sequence.js";
import {
  queryProcedure,
  renderQueryResult,
  type QueryMode,
} from "./query/query.js";
import type { CallIndex, ProcedureName } from "./types.js";

export const INTERACTIVE_PROMPT =
  "Enter a procedure name (add -d at the end to print the dependencies): ";

export type InteractiveRequest = {
  name: ProcedureName;
  mode: QueryMode;
};

/**
 * `name` asks for the call sequence, `name -d` for the callers. Blank
 * lines yield null.
 */
export function parseInteractiveLine(line: string): InteractiveRequest | null {
  const words = line.trim().split(/\s+/);
  const name = words[0];
  if (!name) return null;
  const mode: QueryMode = words.length === 2 && words[1] === "-d" ? "deps" : "calls";
  return { name, mode };
}

export type InteractiveOptions = {
  input?: Readable;
  /** Where the prompt is written. */
  output?: Writable;
  maxDepth: number;
  write?: LineWriter;
  notify?: LineWriter;
};

/** Answers queries line by line until the input ends. */
export async function runInteractive(
  index: CallIndex,
  opts: InteractiveOptions,
): Promise<number> {
  const write = opts.write ?? console.log;
  const notify = opts.notify ?? console.error;
  const rl = createInterface({
    input: opts.input ?? process.stdin,
    output: opts.output ?? process.stdout,
    terminal: false,
  });

  let answered = 0;
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });
  rl.setPrompt(INTERACTIVE_PROMPT);
  rl.prompt();
  try {
    for await (const line of rl) {
      const request = parseInteractiveLine(line);
      if (request) {
        const result = queryProcedure(
          index,
          request.name,
          request.mode,
          opts.maxDepth,
        );
        const { lines, notices } = renderQueryResult(result);
        notices.forEach((notice) => notify(notice));
        lines.forEach((text) => write(text));
        answered++;
      }
      if (!closed) rl.prompt();
    }
  } finally {
    rl.close();
  }
  return answered;
}

export type ConfirmOptions = {
  input?: Readable;
  output?: Writable;
};

/** Yes/no prompt; anything but "y" or "yes" counts as no. */
export function confirm(
  question: string,
  opts: ConfirmOptions = {},
): Promise<boolean> {
  const rl = createInterface({
    input: opts.input ?? process.stdin,
    output: opts.output ?? process.stderr,
  });

  return new Promise((resolve) => {
    let answered = false;
    rl.question(`${question} [y/N] `, (answer) => {
      answered = true;
      const normalized = answer.toLowerCase().trim();
      resolve(normalized === "y" || normalized === "yes");
      rl.close();
    });
    // input ended with no answer
    rl.once("close", () => {
      if (!answered) resolve(false);
    });
  });
}
