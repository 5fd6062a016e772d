// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions, shared across commands so names and
 * descriptions stay consistent.
 */

import { Args as A, Options as O } from "@effect/cli";
import { Match, Option, pipe } from "effect";
import {
  LOG_FORMAT_VALUES,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
} from "../config/field-values";

// Positional arguments

export const versionArg: A.Args<string> = A.text({ name: "version" }).pipe(
  A.withDescription("Version string, e.g. 1.2.3rc1")
);

export const leftArg: A.Args<string> = A.text({ name: "left" }).pipe(
  A.withDescription("Left-hand version")
);

export const rightArg: A.Args<string> = A.text({ name: "right" }).pipe(
  A.withDescription("Right-hand version, parsed with the left-hand version's scheme")
);

export const optionalFieldArg: A.Args<Option.Option<string>> = A.text({ name: "field" }).pipe(
  A.withDescription("Field or subfield to bump (e.g. minor, pre, dev); defaults to the last field"),
  A.optional
);

export const optionalFileArg: A.Args<Option.Option<string>> = A.text({ name: "file" }).pipe(
  A.withDescription("Project version file (package.json, *.py or plain text)"),
  A.optional
);

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: O.Options<boolean>;
  readonly logLevel: O.Options<Option.Option<LogLevel>>;
  readonly format: O.Options<Option.Option<LogFormat>>;
  readonly json: O.Options<boolean>;
  readonly config: O.Options<Option.Option<string>>;
  readonly scheme: O.Options<Option.Option<string>>;
} = {
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
  config: O.text("config").pipe(
    O.withAlias("c"),
    O.withDescription("Path to versio.toml"),
    O.optional
  ),
  scheme: O.text("scheme").pipe(
    O.withAlias("s"),
    O.withDescription("Version scheme (pep440, simple3, simple4, simple5, perl, variable-dotted)"),
    O.optional
  ),
};

// Bump options

export const bumpOptions: {
  readonly subIndex: O.Options<number>;
  readonly sequence: O.Options<Option.Option<number>>;
  readonly promote: O.Options<boolean>;
} = {
  subIndex: O.integer("sub-index").pipe(
    O.withDefault(-1),
    O.withDescription("Sub-part of the field to bump; negative counts from the right")
  ),
  sequence: O.integer("sequence").pipe(
    O.withDescription("Absolute position to bump (dotted schemes)"),
    O.optional
  ),
  promote: O.boolean("promote").pipe(
    O.withDescription("Drop an exhausted pre/post/dev segment instead of refusing")
  ),
};

export const fileOption: O.Options<Option.Option<string>> = O.text("file").pipe(
  O.withAlias("f"),
  O.withDescription("Project version file"),
  O.optional
);

// Type definitions

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
  readonly config: Option.Option<string>;
  readonly scheme: Option.Option<string>;
}

export interface BumpArgs {
  readonly field: Option.Option<string>;
  readonly subIndex: number;
  readonly sequence: Option.Option<number>;
  readonly promote: boolean;
}

/** --json takes precedence as shorthand for --format=json. */
export const effectiveFormat = (globals: GlobalOptions): Option.Option<LogFormat> =>
  pipe(
    Match.value(globals.json),
    Match.when(true, (): Option.Option<LogFormat> => Option.some("json")),
    Match.when(false, (): Option.Option<LogFormat> => globals.format),
    Match.exhaustive
  );
