/**
 * Help command implementation.
 *
 * @module
 */

import type { Operation } from "effection";

const MAIN_HELP = `
Variant Benchmark CLI

Usage: bench <command> [options]

Commands:
  run       Measure every target in every environment build
  list      List variant builds, targets and variation strategies
  compare   Compare two reports
  help      Show this help message

Run 'bench help <command>' for command-specific help.

Examples:
  bench run
  bench run --env zero-copy --target 10 --repeat 20
  bench compare
`.trim();

const RUN_HELP = `
bench run - Measure targets across environment builds

Usage:
  bench run [options]

Options:
  --env           Environment to measure (checked, zero-copy). Can be repeated.
                  Default: all
  --target        Target id to measure. Can be repeated. Default: all
  --repeat        Measured invocations per combination (default: from config, 5)
  --warmup        Discarded invocations per combination (default: from config, 1)
  --executor      in-process or subprocess (default: from config, in-process)
  --budget        Compute budget per invocation (default: from config, 200000)
  --out-dir       Report directory (default: from config, data/reports)
  --fail-fast     Stop after the first failed combination
  --no-write      Print the table without writing a report

Settings not given on the command line come from bench.config.json.

Examples:
  bench run --env checked
  bench run --target 8 --target 9 --target 10 --repeat 50
  bench run --executor subprocess --no-write
`.trim();

const LIST_HELP = `
bench list - List variant builds, targets and variation strategies

Usage:
  bench list [--verbose]

Options:
  --verbose, -v   Also print every variation record

Examples:
  bench list
  bench list --verbose
`.trim();

const COMPARE_HELP = `
bench compare - Compare two reports

Usage:
  bench compare [<base.json> <head.json>] [--out-dir <dir>]

Without files, compares the newest report in the report directory
against the one before it.

Examples:
  bench compare
  bench compare data/reports/a.json data/reports/b.json
`.trim();

const COMMAND_HELP: Record<string, string> = {
  run: RUN_HELP,
  list: LIST_HELP,
  compare: COMPARE_HELP,
  help: MAIN_HELP,
};

/**
 * Display help for a command or general usage.
 */
export function* helpCommand(args: string[]): Operation<number> {
  const subcommand = args[0];

  if (subcommand && Object.hasOwn(COMMAND_HELP, subcommand)) {
    console.log(COMMAND_HELP[subcommand]);
  } else if (subcommand) {
    console.error(`Unknown command: ${subcommand}`);
    console.log();
    console.log(MAIN_HELP);
    return 1;
  } else {
    console.log(MAIN_HELP);
  }

  return 0;
}
