#!/usr/bin/env -S node --import tsx
/**
 * Benchmark CLI entry point.
 *
 * The whole CLI runs inside one effection root scope.
 *
 * @module
 */

import { exit, main } from "effection";
import { dispatch } from "./commands/mod.ts";

main(function* () {
  const code = yield* dispatch(process.argv.slice(2));
  yield* exit(code);
});
