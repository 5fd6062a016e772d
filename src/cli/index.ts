// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI definition. The runCommand wrapper centralizes context resolution,
 * logger installation and error display so each command stays focused on
 * its own logic.
 */

import { type CliApp, Command } from "@effect/cli";
import type { FileSystem } from "@effect/platform";
import chalk from "chalk";
import { Effect, Match, Option, pipe } from "effect";
import { EnvConfigSpec } from "../config/env";
import type { LogFormat } from "../config/field-values";
import { loadConfig } from "../config/loader";
import { resolveSettings } from "../config/resolve";
import { VersioLoggerLive } from "../lib/effect-logger";
import {
  ConfigError,
  ErrorCode,
  type VersioEffectError,
  getErrorCodeName,
} from "../lib/errors";

import { executeBump } from "./commands/bump";
import { executeCheck } from "./commands/check";
import { executeCompare } from "./commands/compare";
import { executeNext } from "./commands/next";
import { executeSchemes } from "./commands/schemes";
import { executeShow } from "./commands/show";
import type { CommandContext } from "./commands/utils";
import {
  type GlobalOptions,
  bumpOptions,
  effectiveFormat,
  fileOption,
  globalOptions,
  leftArg,
  optionalFieldArg,
  optionalFileArg,
  rightArg,
  versionArg,
} from "./options";

export const VERSIO_VERSION = "0.1.0";

// Context resolution

/** Resolves settings from CLI, environment and versio.toml, CLI taking precedence. */
const resolveContext = (
  globals: GlobalOptions,
  file: Option.Option<string>
): Effect.Effect<CommandContext, VersioEffectError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const config = yield* loadConfig(globals.config);
    const env = yield* pipe(
      EnvConfigSpec,
      Effect.mapError(
        (e) =>
          new ConfigError({
            code: ErrorCode.CONFIG_VALIDATION_ERROR,
            message: `Invalid environment configuration: ${String(e)}`,
          })
      )
    );
    const cliFormat = effectiveFormat(globals);
    const settings = resolveSettings(
      {
        logLevel: globals.logLevel,
        format: cliFormat,
        verbose: globals.verbose,
        scheme: globals.scheme,
        file,
      },
      env,
      config
    );
    return { config, settings, format: settings.logFormat };
  });

// Error display

/** Versio errors carry a code and a message; anything else is left to the entry point. */
export const isVersioError = (err: unknown): err is VersioEffectError =>
  typeof err === "object" && err !== null && "_tag" in err && "code" in err && "message" in err;

/** Sync because it runs on the exit path. */
const displayError = (err: unknown, format: LogFormat): void => {
  if (!isVersioError(err)) {
    return;
  }
  pipe(
    Match.value(format),
    Match.when("json", () =>
      process.stdout.write(
        `${JSON.stringify({ error: err.message, code: err.code, name: getErrorCodeName(err.code) })}\n`
      )
    ),
    Match.when("pretty", () => {
      process.stderr.write(`${chalk.red("✗")} ${err.message}\n`);
    }),
    Match.exhaustive
  );
};

// Command runner

const runCommand = (
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, VersioEffectError, FileSystem.FileSystem>,
  file: Option.Option<string> = Option.none()
): Effect.Effect<void, VersioEffectError, FileSystem.FileSystem> =>
  pipe(
    resolveContext(globals, file),
    Effect.tapError((err) =>
      Effect.sync(() =>
        displayError(
          err,
          Option.getOrElse(effectiveFormat(globals), (): LogFormat => "pretty")
        )
      )
    ),
    Effect.flatMap((ctx) =>
      pipe(
        handler(ctx),
        Effect.withLogSpan(`command-${commandName}`),
        Effect.tapError((err) => Effect.sync(() => displayError(err, ctx.format))),
        Effect.provide(
          VersioLoggerLive({
            level: ctx.settings.logLevel,
            format: ctx.settings.logFormat,
          })
        )
      )
    )
  );

// Subcommand definitions

const showCmd = Command.make("show", { ...globalOptions, file: optionalFileArg }, (args) =>
  runCommand(
    args,
    "show",
    (ctx) => executeShow({ ctx, file: ctx.settings.file }),
    args.file
  )
).pipe(Command.withDescription("Print the project version"));

const bumpCmd = Command.make(
  "bump",
  { ...globalOptions, ...bumpOptions, field: optionalFieldArg, file: fileOption },
  (args) =>
    runCommand(
      args,
      "bump",
      (ctx) => executeBump({ ctx, file: ctx.settings.file, bump: args }),
      args.file
    )
).pipe(Command.withDescription("Bump the project version in place"));

const nextCmd = Command.make(
  "next",
  { ...globalOptions, ...bumpOptions, version: versionArg, field: optionalFieldArg },
  (args) =>
    runCommand(args, "next", (ctx) => executeNext({ ctx, version: args.version, bump: args }))
).pipe(Command.withDescription("Print the bumped form of a version"));

const compareCmd = Command.make(
  "compare",
  { ...globalOptions, left: leftArg, right: rightArg },
  (args) =>
    runCommand(args, "compare", (ctx) =>
      executeCompare({ ctx, left: args.left, right: args.right })
    )
).pipe(Command.withDescription("Compare two versions"));

const checkCmd = Command.make("check", { ...globalOptions, version: versionArg }, (args) =>
  runCommand(args, "check", (ctx) => executeCheck({ ctx, version: args.version }))
).pipe(Command.withDescription("Show which scheme accepts a version"));

const schemesCmd = Command.make("schemes", { ...globalOptions }, (args) =>
  runCommand(args, "schemes", (ctx) => executeSchemes({ ctx }))
).pipe(Command.withDescription("List the built-in version schemes"));

// Root command

const versio = Command.make("versio").pipe(
  Command.withDescription("Parse, compare and bump software versions"),
  Command.withSubcommands([showCmd, bumpCmd, nextCmd, compareCmd, checkCmd, schemesCmd])
);

export const cli: (
  args: readonly string[]
) => Effect.Effect<void, unknown, CliApp.CliApp.Environment> = Command.run(versio, {
  name: "versio",
  version: VERSIO_VERSION,
});
