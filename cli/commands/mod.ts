/**
 * Command dispatcher for the benchmark CLI.
 *
 * Each command parses its own options.
 *
 * @module
 */

import type { Operation } from "effection";
import { compareCommand } from "./compare.ts";
import { helpCommand } from "./help.ts";
import { listCommand } from "./list.ts";
import { runCommand } from "./run.ts";

/**
 * Command handler signature.
 * Takes remaining args after the command name, returns exit code.
 */
export type CommandHandler = (args: string[]) => Operation<number>;

const commands: Record<string, CommandHandler> = {
  run: runCommand,
  list: listCommand,
  compare: compareCommand,
  help: helpCommand,
};

/**
 * Dispatch to the appropriate command handler.
 *
 * @param args - CLI arguments (e.g., ["run", "--env", "checked"])
 * @returns Exit code
 */
export function* dispatch(args: string[]): Operation<number> {
  const [command, ...rest] = args;

  if (!command || command === "help" || command === "--help" || command === "-h") {
    return yield* helpCommand(rest);
  }

  if (rest.includes("--help") || rest.includes("-h")) {
    return yield* helpCommand([command]);
  }

  const handler = Object.hasOwn(commands, command) ? commands[command] : undefined;
  if (!handler) {
    console.error(`Unknown command: ${command}`);
    console.log();
    return yield* helpCommand([]);
  }

  return yield* handler(rest);
}
