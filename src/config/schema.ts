// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect schemas for versio.toml.
 * Single source of truth for configuration structure and validation.
 *
 * ```toml
 * scheme = "pep440"
 * schemes = ["pep440", "variable-dotted"]
 * file = "package.json"
 *
 * [logging]
 * level = "info"
 * format = "pretty"
 * ```
 */

import { Schema } from "effect";
import {
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
} from "./field-values";

const nonEmpty = Schema.String.pipe(Schema.minLength(1));

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly format: LogFormat;
}

export const loggingConfigSchema = Schema.Struct({
  level: Schema.optionalWith(Schema.Literal(...LOG_LEVEL_VALUES), {
    default: (): LogLevel => LOG_LEVEL_DEFAULT,
  }),
  format: Schema.optionalWith(Schema.Literal(...LOG_FORMAT_VALUES), {
    default: (): LogFormat => LOG_FORMAT_DEFAULT,
  }),
});

export const versioConfigSchema = Schema.Struct({
  /** Scheme used to parse the project version. */
  scheme: Schema.optional(nonEmpty),
  /** Inference order when no single scheme is set. */
  schemes: Schema.optional(Schema.Array(nonEmpty)),
  /** Project version file, relative to the working directory. */
  file: Schema.optional(nonEmpty),
  logging: Schema.optionalWith(loggingConfigSchema, {
    default: (): LoggingConfig => ({ level: LOG_LEVEL_DEFAULT, format: LOG_FORMAT_DEFAULT }),
  }),
});

export type VersioConfig = Schema.Schema.Type<typeof versioConfigSchema>;

/** Configuration used when no versio.toml exists. */
export const emptyConfig: VersioConfig = {
  logging: { level: LOG_LEVEL_DEFAULT, format: LOG_FORMAT_DEFAULT },
};
