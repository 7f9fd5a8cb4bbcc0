#!/usr/bin/env node
// src/cli.ts
import { Command } from "commander";

import { abacusToPartition, partitionToAbacus } from "./lr/abacus.js";
import {
  parseCountOption,
  runCheckTool,
  runSolveTool,
  runToPuzzleTool,
  runToTableauTool,
} from "./lr/convertTool.js";

const program = new Command();

program
  .name("lrpuzzle")
  .description("Knutson-Tao puzzles and Littlewood-Richardson tableaux")
  .version("0.1.0");

program
  .command("solve")
  .description("List every puzzle with the given north-west and north-east boundary words")
  .argument("<northWest>", "North-west word over 0/1, bottom to top")
  .argument("<northEast>", "North-east word over 0/1, top to bottom")
  .option("--tableaux", "Print the tableau of each puzzle instead of its JSON", false)
  .option("--limit <count>", "Stop after this many puzzles")
  .option("-o, --output <path>", "Write to a file (default: stdout)")
  .action(
    async (
      northWest: string,
      northEast: string,
      opts: { tableaux: boolean; limit?: string; output?: string },
    ) => {
      const params: { tableaux: boolean; limit?: number; output?: string } = {
        tableaux: opts.tableaux,
      };
      if (opts.limit !== undefined) params.limit = parseCountOption(opts.limit, "limit");
      if (opts.output !== undefined) params.output = opts.output;
      await runSolveTool(northWest, northEast, params);
    },
  );

program
  .command("to-tableau")
  .description("Read the Littlewood-Richardson tableau off a puzzle JSON file")
  .argument("<input>", "Path to puzzle JSON")
  .option("--json", "Write a tableau JSON document instead of the bracket form", false)
  .option("-o, --output <path>", "Write to a file (default: stdout)")
  .action(async (input: string, opts: { json: boolean; output?: string }) => {
    await runToTableauTool(input, opts);
  });

program
  .command("to-puzzle")
  .description("Build the puzzle of a Littlewood-Richardson tableau")
  .argument("<tableau>", "Path to tableau JSON, or rows such as '[[_,1],[2]]'")
  .option("--size <n>", "Puzzle size (default: the smallest that fits)")
  .option("-o, --output <path>", "Write puzzle JSON to a file (default: stdout)")
  .action(async (tableau: string, opts: { size?: string; output?: string }) => {
    const params: { size?: number; output?: string } = {};
    if (opts.size !== undefined) params.size = parseCountOption(opts.size, "size");
    if (opts.output !== undefined) params.output = opts.output;
    await runToPuzzleTool(tableau, params);
  });

program
  .command("abacus")
  .description("Print the partition encoded by a 0/1 word")
  .argument("<bits>", "Word over 0/1")
  .action((bits: string) => {
    process.stdout.write(JSON.stringify(abacusToPartition(bits)) + "\n");
  });

program
  .command("partition")
  .description("Print the 0/1 word encoding a partition")
  .argument("<parts...>", "Parts of the partition")
  .option("--min-size <n>", "Pad the word with 0s to this length", "0")
  .action((parts: string[], opts: { minSize: string }) => {
    const values = parts.map((p) => parseCountOption(p, "part"));
    const minSize = parseCountOption(opts.minSize, "min-size");
    process.stdout.write(partitionToAbacus(values, minSize) + "\n");
  });

program
  .command("check")
  .description("Convert every puzzle with the given boundary to its tableau and back")
  .argument("<northWest>", "North-west word over 0/1")
  .argument("<northEast>", "North-east word over 0/1")
  .action((northWest: string, northEast: string) => {
    runCheckTool(northWest, northEast);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});
