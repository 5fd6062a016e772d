#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * versio command line entry point.
 * The only place where the Effect runtime is executed.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Match, Option, pipe } from "effect";
import { cli, isVersioError } from "./cli/index";
import { errorMessage, toExitCode } from "./lib/errors";

const exitCodeFromExit = (exit: Exit.Exit<void, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => 0,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => 1,
        onSome: (value: unknown): number =>
          pipe(
            Match.value(value),
            Match.when(isVersioError, (v) => toExitCode(v.code)),
            Match.orElse(() => 1)
          ),
      }),
  });

/** Versio errors were already shown by the command runner. */
const logExitError = (exit: Exit.Exit<void, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => {
          if (!Cause.isInterruptedOnly(cause)) {
            console.error("Unexpected error:", Cause.pretty(cause));
          }
        },
        onSome: (err: unknown): void => {
          if (!isVersioError(err) && err instanceof Error) {
            console.error(`Error: ${err.message}`);
          }
        },
      }),
  });

const program = (argv: readonly string[]): Effect.Effect<void, unknown> =>
  cli(argv).pipe(Effect.provide(NodeContext.layer));

async function main(): Promise<never> {
  const exit = await Effect.runPromiseExit(program(process.argv));
  logExitError(exit);
  process.exit(exitCodeFromExit(exit));
}

main().catch((e: unknown) => {
  console.error(`Error: ${errorMessage(e)}`);
  process.exit(1);
});
