// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Setting resolution. Priority: CLI > environment > versio.toml > default.
 */

import { Option, pipe } from "effect";
import type { EnvConfig } from "./env";
import {
  type LogFormat,
  type LogLevel,
  SCHEME_DEFAULT,
  VERSION_FILE_DEFAULT,
} from "./field-values";
import type { VersioConfig } from "./schema";

export interface ConfigField<A> {
  readonly cli: Option.Option<A>;
  readonly env: Option.Option<A>;
  readonly toml: A;
}

export const resolve = <A>(field: ConfigField<A>): A =>
  pipe(
    field.cli,
    Option.orElse(() => field.env),
    Option.getOrElse(() => field.toml)
  );

/** Settings passed on the command line; `None` when a flag was not given. */
export interface CliSettings {
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly verbose: boolean;
  readonly scheme: Option.Option<string>;
  readonly file: Option.Option<string>;
}

export interface ResolvedSettings {
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
  /** Single scheme to parse with; `None` means infer from `schemes`. */
  readonly scheme: Option.Option<string>;
  readonly schemes: readonly string[];
  readonly file: string;
}

/** `--verbose` or VERSIO_DEBUG force debug regardless of other sources. */
export const resolveLogLevel = (cli: CliSettings, env: EnvConfig, toml: VersioConfig): LogLevel =>
  cli.verbose || env.debug
    ? "debug"
    : resolve({ cli: cli.logLevel, env: env.logging.level, toml: toml.logging.level });

export const resolveSettings = (
  cli: CliSettings,
  env: EnvConfig,
  toml: VersioConfig
): ResolvedSettings => ({
  logLevel: resolveLogLevel(cli, env, toml),
  logFormat: resolve({ cli: cli.format, env: env.logging.format, toml: toml.logging.format }),
  scheme: pipe(
    cli.scheme,
    Option.orElse(() => env.scheme),
    Option.orElse(() => Option.fromNullable(toml.scheme))
  ),
  schemes: toml.schemes ?? [SCHEME_DEFAULT],
  file: resolve({
    cli: cli.file,
    env: env.file,
    toml: toml.file ?? VERSION_FILE_DEFAULT,
  }),
});
