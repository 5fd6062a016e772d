// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * All exports are pure Config<A> values; nothing is read until the CLI yields
 * them. Every variable lives under the VERSIO_ namespace. Unset variables are
 * `None` so that a config file value can still apply.
 */

import { Config, ConfigProvider, type Option } from "effect";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES, type LogFormat, type LogLevel } from "./field-values";

export interface EnvConfig {
  readonly logging: {
    readonly level: Option.Option<LogLevel>;
    readonly format: Option.Option<LogFormat>;
  };
  readonly scheme: Option.Option<string>;
  readonly file: Option.Option<string>;
  readonly debug: boolean;
}

// ============================================================================
// Primitive Configs
// ============================================================================

export const LogLevelConfig: Config.Config<Option.Option<LogLevel>> = Config.nested(
  Config.option(Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL")),
  "VERSIO"
);

export const LogFormatConfig: Config.Config<Option.Option<LogFormat>> = Config.nested(
  Config.option(Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT")),
  "VERSIO"
);

/** Scheme name or built-in id, e.g. VERSIO_SCHEME=simple3. */
export const SchemeConfig: Config.Config<Option.Option<string>> = Config.nested(
  Config.option(Config.string("SCHEME")),
  "VERSIO"
);

export const VersionFileConfig: Config.Config<Option.Option<string>> = Config.nested(
  Config.option(Config.string("FILE")),
  "VERSIO"
);

/** When true, forces log level to debug. */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  "VERSIO"
);

// ============================================================================
// Composite Config
// ============================================================================

export const EnvConfigSpec: Config.Config<EnvConfig> = Config.all([
  LogLevelConfig,
  LogFormatConfig,
  SchemeConfig,
  VersionFileConfig,
  DebugModeConfig,
]).pipe(
  Config.map(([level, format, scheme, file, debug]) => ({
    logging: { level, format },
    scheme,
    file,
    debug,
  }))
);

// ============================================================================
// Test Utilities
// ============================================================================

const envVarNames = {
  logLevel: "VERSIO_LOG_LEVEL",
  logFormat: "VERSIO_LOG_FORMAT",
  scheme: "VERSIO_SCHEME",
  file: "VERSIO_FILE",
  debug: "VERSIO_DEBUG",
} as const;

export type TestConfigOverrides = {
  readonly [K in keyof typeof envVarNames]?: string;
};

/**
 * ConfigProvider over a fixed map, for tests.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ logLevel: "debug" });
 * const env = await Effect.runPromise(Effect.withConfigProvider(EnvConfigSpec, provider));
 * ```
 */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {}
): ConfigProvider.ConfigProvider => {
  const entries: ReadonlyArray<readonly [string, string | undefined]> = [
    [envVarNames.logLevel, overrides.logLevel],
    [envVarNames.logFormat, overrides.logFormat],
    [envVarNames.scheme, overrides.scheme],
    [envVarNames.file, overrides.file],
    [envVarNames.debug, overrides.debug],
  ];
  return ConfigProvider.fromMap(
    new Map(entries.flatMap(([name, value]) => (value === undefined ? [] : [[name, value] as const]))),
    { pathDelim: "_" }
  );
};
