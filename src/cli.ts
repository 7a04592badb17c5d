#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { assertMaxDepth, DEFAULT_MAX_DEPTH } from "./query/call-sequence.js";
import { runTclGraph } from "./run.js";

const cli = yargs(hideBin(process.argv))
  .scriptName("tclgraph")
  .usage("$0 [options]")
  .example("$0 -b src lib/util.tcl", "Build the index from a directory and a file")
  .example("$0 -f main --max-depth 3", "Print what main calls, three levels deep")
  .example("$0 -f helper -d", "List the procedures that call helper")
  .example("$0", "Query the index interactively")
  .option("build", {
    alias: "b",
    type: "string",
    array: true,
    describe: "Build the index from TCL files and directories",
  })
  .option("query", {
    alias: "f",
    type: "string",
    array: true,
    describe: "Print the call sequence of each procedure",
  })
  .option("deps", {
    alias: "d",
    type: "boolean",
    default: false,
    describe: "With --query, list callers instead",
  })
  .option("max-depth", {
    type: "number",
    default: DEFAULT_MAX_DEPTH,
    describe: "Levels of the call sequence to print",
  })
  .option("delete-index", {
    type: "boolean",
    default: false,
    describe: "Delete the index file and exit",
  })
  .option("dir", {
    alias: "C",
    type: "string",
    describe: "Directory holding the index; build paths resolve against it",
    default: process.cwd(),
  })
  .option("ignore", {
    type: "string",
    array: true,
    describe: "Ignore patterns for directory inputs (can be repeated)",
  })
  .option("yes", {
    alias: "y",
    type: "boolean",
    default: false,
    describe: "Skip unreadable build inputs without asking",
  })
  .option("quiet", {
    alias: "q",
    type: "boolean",
    default: false,
    describe: "Only print results and warnings",
  })
  .option("output", {
    alias: "o",
    type: "string",
    choices: ["text", "json"] as const,
    default: "text",
    describe: "Output format for --query",
  })
  .check((argv) => {
    // --delete-index ignores every other flag
    if (!argv["delete-index"]) assertMaxDepth(argv["max-depth"]);
    return true;
  })
  .strict()
  .help()
  .version();

async function main() {
  const argv = await cli.parse();
  await runTclGraph({
    dir: argv.dir,
    build: argv.build,
    query: argv.query,
    deps: argv.deps,
    maxDepth: argv["max-depth"],
    deleteIndex: argv["delete-index"],
    ignore: argv.ignore,
    yes: argv.yes,
    quiet: argv.quiet,
    output: argv.output === "json" ? "json" : "text",
  });
}

main().catch((err) => {
  console.error(err?.message ?? String(err));
  process.exit(1);
});
