/**
 * Argument parsing for the harness subprocess.
 *
 * @module
 */

/**
 * Parsed harness arguments.
 */
export interface HarnessArgs {
  /** Path of the request file written by the subprocess executor */
  request: string;
}

/**
 * Parse harness CLI arguments.
 */
export function parseHarnessArgs(args: readonly string[]): HarnessArgs {
  const result: HarnessArgs = { request: "" };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case "--request":
        result.request = next ?? "";
        i++;
        break;
    }
  }

  return result;
}

/**
 * Validate harness arguments.
 */
export function validateHarnessArgs(args: HarnessArgs): string | null {
  if (!args.request) {
    return "Missing required --request argument";
  }
  return null;
}
