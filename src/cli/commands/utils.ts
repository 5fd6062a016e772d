// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Command context shared by every subcommand, plus the glue that turns
 * resolved settings into version parsing options.
 */

import { Effect, Option, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { ResolvedSettings } from "../../config/resolve";
import type { VersioConfig } from "../../config/schema";
import { ErrorCode, GeneralError } from "../../lib/errors";
import { writeJson, writeOutput } from "../../lib/log";
import { SchemeRegistry, defaultRegistry } from "../../version/registry";
import type { VersionScheme } from "../../version/scheme";
import type { BumpOptions, VersionOptions } from "../../version/version";
import type { BumpArgs } from "../options";

/** Resolved runtime context. CLI args > env vars > config file (priority order). */
export interface CommandContext {
  readonly config: VersioConfig;
  readonly settings: ResolvedSettings;
  /** Program output format; `--json` or `--format` override the log format. */
  readonly format: LogFormat;
}

export const findScheme = (name: string): Effect.Effect<VersionScheme, GeneralError> =>
  pipe(
    defaultRegistry.find(name),
    Option.match({
      onNone: (): Effect.Effect<VersionScheme, GeneralError> =>
        Effect.fail(
          new GeneralError({
            code: ErrorCode.SCHEME_NOT_FOUND,
            message: `Unknown version scheme: ${name}`,
          })
        ),
      onSome: (scheme): Effect.Effect<VersionScheme, GeneralError> => Effect.succeed(scheme),
    })
  );

/** A single named scheme, or a registry over the configured inference order. */
export const versionOptions = (
  settings: ResolvedSettings
): Effect.Effect<VersionOptions, GeneralError> =>
  Option.match(settings.scheme, {
    onSome: (name): Effect.Effect<VersionOptions, GeneralError> =>
      Effect.map(findScheme(name), (scheme) => ({ scheme })),
    onNone: (): Effect.Effect<VersionOptions, GeneralError> =>
      Effect.map(Effect.forEach(settings.schemes, findScheme), (schemes) => ({
        registry: new SchemeRegistry(schemes),
      })),
  });

export const toBumpOptions = (args: BumpArgs): BumpOptions => ({
  subIndex: args.subIndex,
  promote: args.promote,
  ...Option.match(args.field, {
    onNone: () => ({}),
    onSome: (field) => ({ field }),
  }),
  ...Option.match(args.sequence, {
    onNone: () => ({}),
    onSome: (sequence) => ({ sequence }),
  }),
});

export const describeTarget = (args: BumpArgs): string =>
  Option.match(args.field, {
    onNone: () =>
      Option.match(args.sequence, {
        onNone: () => "the last field",
        onSome: (n) => `position ${n}`,
      }),
    onSome: (field) => `field "${field}"`,
  });

/** Emit a result as text or as one JSON line. */
export const emit = (
  ctx: CommandContext,
  text: string,
  json: Readonly<Record<string, unknown>>
): Effect.Effect<void> => (ctx.format === "json" ? writeJson(json) : writeOutput(text));
