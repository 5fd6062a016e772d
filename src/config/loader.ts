// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * TOML configuration loading with fail-fast validation. Files are parsed
 * and validated in a single pass; syntax errors and schema violations are
 * reported with the file path. Without an explicit path, ./versio.toml is
 * optional; an explicit path must exist.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Option, type Schema, pipe } from "effect";
import { parse as parseToml } from "smol-toml";
import { ConfigError, ErrorCode, SystemError, causeOf, errorMessage } from "../lib/errors";
import { decodeToEffect } from "../lib/schema-utils";
import { CONFIG_FILE_NAME } from "./field-values";
import { type VersioConfig, emptyConfig, versioConfigSchema } from "./schema";

export const loadTomlFile = <A, I = A>(
  filePath: string,
  schema: Schema.Schema<A, I, never>
): Effect.Effect<A, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* pipe(
      fs.exists(filePath),
      Effect.orElseSucceed(() => false),
      Effect.filterOrFail(
        (exists): exists is true => exists,
        () =>
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Configuration file not found: ${filePath}`,
            path: filePath,
          })
      )
    );

    const content = yield* fs.readFileString(filePath).pipe(
      Effect.mapError(
        (e): SystemError =>
          new SystemError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to read ${filePath}: ${errorMessage(e)}`,
            path: filePath,
            ...causeOf(e),
          })
      )
    );

    const parsed = yield* Effect.try({
      try: (): unknown => parseToml(content),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Failed to parse TOML in ${filePath}: ${errorMessage(e)}`,
          path: filePath,
          ...causeOf(e),
        }),
    });

    return yield* decodeToEffect(schema, parsed, filePath);
  });

/** Load versio.toml; defaults when no path is given and ./versio.toml is absent. */
export const loadConfig = (
  configPath: Option.Option<string>
): Effect.Effect<VersioConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
  Option.match(configPath, {
    onNone: () =>
      pipe(
        loadTomlFile(`./${CONFIG_FILE_NAME}`, versioConfigSchema),
        Effect.tap(() => Effect.logDebug(`Loaded configuration from ./${CONFIG_FILE_NAME}`)),
        Effect.catchIf(
          (e): e is ConfigError => e._tag === "ConfigError" && e.code === ErrorCode.CONFIG_NOT_FOUND,
          () => Effect.succeed(emptyConfig)
        )
      ),
    onSome: (path) =>
      pipe(
        loadTomlFile(path, versioConfigSchema),
        Effect.tap(() => Effect.logDebug(`Loaded configuration from ${path}`))
      ),
  });
