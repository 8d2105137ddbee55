import { Command, CommanderError } from "commander";

import {
  SortKitError,
  binarySearch,
  createHeap,
  sequentialSearch,
  sort,
  type Orderable,
  type SortConfig,
} from "../core/index.js";
import { problemFor } from "./problem.js";
import { parseGap, parsePivot, parseValues } from "./validation.js";

const NAME = "sortkit";
const VERSION = "0.1.0";
const DEFAULT_METHOD = "merge";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  env: Record<string, string | undefined>;
}

interface SortCommandOptions {
  method: string;
  descending?: boolean;
  index?: boolean;
  gap?: string;
  pivot?: string;
  json?: boolean;
}

interface SearchCommandOptions {
  binary?: boolean;
  sorted?: boolean;
  descending?: boolean;
  json?: boolean;
}

interface HeapCommandOptions {
  mode: string;
  json?: boolean;
}

/**
 * Runs the CLI against `argv` (arguments only, without node and script).
 * Returns the process exit code: 0 on success, 1 on a library error and
 * commander's own code for usage errors, help and version.
 */
export function runCli(argv: readonly string[], io: Partial<CliIo> = {}): number {
  const out = io.out ?? ((line: string) => console.log(line));
  const err = io.err ?? ((line: string) => console.error(line));
  const env = io.env ?? process.env;

  let exitCode = 0;

  // Library errors become a problem document (--json) or one stderr line.
  const guard = (json: boolean | undefined, fn: () => void): void => {
    try {
      fn();
    } catch (e) {
      if (!(e instanceof SortKitError)) throw e;
      const p = problemFor(e);
      if (json) out(JSON.stringify(p));
      else err(`error [${p.code}]: ${p.detail}`);
      exitCode = 1;
    }
  };

  const program = new Command(NAME)
    .description("Classic sorting and searching over lists of numbers or strings")
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (s) => out(s.trimEnd()),
      writeErr: (s) => err(s.trimEnd()),
    });

  // sortkit sort <values...>
  program
    .command("sort")
    .description("Sort values (use -- before negative numbers)")
    .argument("<values...>", "values to sort")
    .option("-m, --method <name>", "bubble, short-bubble, selection, insertion, shell, quick, merge, heap", env.SORTKIT_METHOD ?? DEFAULT_METHOD)
    .option("-d, --descending", "sort in descending order")
    .option("-i, --index", "also print the index array")
    .option("--gap <n>", "first gap for shell sort")
    .option("--pivot <strategy>", "quick sort pivot: first, middle, last, median-of-three or 0..1")
    .option("--json", "print JSON")
    .action((values: string[], opts: SortCommandOptions) =>
      guard(opts.json, () => {
        const config: SortConfig = { ascending: !opts.descending, buildIndex: opts.index ?? false };
        if (opts.gap !== undefined) config.gap = parseGap(opts.gap);
        if (opts.pivot !== undefined) config.pivot = parsePivot(opts.pivot);

        const result = sort(opts.method, parseValues(values), config);
        if (opts.json) {
          out(JSON.stringify(result));
          return;
        }
        out(`sorted: ${result.sorted.join(" ")}`);
        if (result.index) out(`index: ${result.index.join(" ")}`);
      }),
    );

  // sortkit search <target> <values...>
  program
    .command("search")
    .description("Find the position of a value")
    .argument("<target>", "value to look for")
    .argument("<values...>", "values to search")
    .option("-b, --binary", "binary search (values must be sorted ascending)")
    .option("-s, --sorted", "values are sorted; stop a sequential scan early")
    .option("-d, --descending", "with --sorted, values are sorted descending")
    .option("--json", "print JSON")
    .action((target: string, values: string[], opts: SearchCommandOptions) =>
      guard(opts.json, () => {
        const [needle, ...items] = parseValues([target, ...values]);
        const index = opts.binary
          ? binarySearch(items, needle)
          : sequentialSearch(items, needle, { sorted: opts.sorted, ascending: !opts.descending });

        if (opts.json) out(JSON.stringify({ index: index ?? null }));
        else out(index === undefined ? "not found" : `index: ${index}`);
      }),
    );

  // sortkit heap <values...>
  program
    .command("heap")
    .description("Build a binary heap and drain it root first")
    .argument("<values...>", "values to insert")
    .option("--mode <mode>", "min or max", "min")
    .option("--json", "print JSON")
    .action((values: string[], opts: HeapCommandOptions) =>
      guard(opts.json, () => {
        const heap = createHeap<Orderable>(opts.mode, parseValues(values));
        const root = heap.peekRoot();
        const order = heap.drain();

        if (opts.json) out(JSON.stringify({ mode: heap.mode, root, order }));
        else {
          out(`root: ${root}`);
          out(`order: ${order.join(" ")}`);
        }
      }),
    );

  try {
    program.parse(argv, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    throw e;
  }
  return exitCode;
}
