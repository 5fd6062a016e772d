// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Custom logger: pretty or JSON lines, a styled success mark, errors on
 * stderr. Failures are displayed by the CLI runner, not through the logger.
 */

import chalk from "chalk";
import { Cause, HashMap, Layer, LogLevel, Logger, Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel as VersioLogLevel } from "../config/field-values";

type LogStyleTag = "success";
type ColorName = "red" | "green" | "yellow" | "blue" | "cyan" | "gray" | "white";

/** Formatting-only annotations, left out of JSON output. */
const INTERNAL_KEYS: ReadonlySet<string> = new Set(["logStyle", "file"]);

export const toEffectLogLevel = (level: VersioLogLevel): LogLevel.LogLevel =>
  pipe(
    Match.value(level),
    Match.when("debug", () => LogLevel.Debug),
    Match.when("info", () => LogLevel.Info),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("error", () => LogLevel.Error),
    Match.exhaustive
  );

const getStringAnnotation = (
  annotations: HashMap.HashMap<string, unknown>,
  key: string
): Option.Option<string> =>
  pipe(
    HashMap.get(annotations, key),
    Option.filter((v): v is string => typeof v === "string")
  );

const getStyle = (annotations: HashMap.HashMap<string, unknown>): Option.Option<LogStyleTag> =>
  pipe(
    getStringAnnotation(annotations, "logStyle"),
    Option.filter((v): v is LogStyleTag => v === "success")
  );

const colorize = (color: ColorName, text: string, useColor: boolean): string =>
  useColor ? chalk[color](text) : text;

const LEVEL_COLORS: Readonly<Record<string, ColorName>> = {
  DEBUG: "gray",
  INFO: "blue",
  WARN: "yellow",
  ERROR: "red",
};

/** Log messages arrive as an array when several values are logged at once. */
const messageText = (message: unknown): string =>
  Array.isArray(message) ? message.map(String).join(" ") : String(message);

const formatCause = (cause: Cause.Cause<unknown>): string =>
  Cause.isEmpty(cause) ? "" : `\n${Cause.pretty(cause)}`;

export const formatPretty = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  cause: Cause.Cause<unknown>,
  useColor: boolean
): string =>
  pipe(
    getStyle(annotations),
    Option.match({
      onNone: (): string => {
        const levelColor = pipe(
          Option.fromNullable(LEVEL_COLORS[logLevel.label]),
          Option.getOrElse((): ColorName => "white")
        );
        const levelStr = colorize(levelColor, logLevel.label.padEnd(5), useColor);
        const fileStr = pipe(
          getStringAnnotation(annotations, "file"),
          Option.match({
            onNone: (): string => "",
            onSome: (f): string => `${colorize("cyan", `[${f}]`, useColor)} `,
          })
        );
        return `${levelStr} ${fileStr}${message}${formatCause(cause)}`;
      },
      onSome: (): string => `${colorize("green", "✓", useColor)} ${message}`,
    })
  );

export const formatJson = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  date: Date
): string =>
  JSON.stringify({
    timestamp: date.toISOString(),
    level: logLevel.label.toLowerCase(),
    ...pipe(
      getStringAnnotation(annotations, "file"),
      Option.match({
        onNone: (): Record<string, never> => ({}),
        onSome: (file): { readonly file: string } => ({ file }),
      })
    ),
    message,
    ...Object.fromEntries(
      Array.from(HashMap.toEntries(annotations)).filter(([k]) => !INTERNAL_KEYS.has(k))
    ),
  });

const isStderrOutput = (logLevel: LogLevel.LogLevel): boolean => logLevel.label === "ERROR";

const VersioLogger = (format: LogFormat, useColor: boolean): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, cause, annotations, date }) => {
    const msg = messageText(message);
    const output = pipe(
      Match.value(format),
      Match.when("json", () => formatJson(logLevel, msg, annotations, date)),
      Match.when("pretty", () => formatPretty(logLevel, msg, annotations, cause, useColor)),
      Match.exhaustive
    );
    const stream = isStderrOutput(logLevel) ? process.stderr : process.stdout;
    stream.write(`${output}\n`);
  });

export const VersioLoggerLive = (options: {
  readonly level: VersioLogLevel;
  readonly format: LogFormat;
  readonly color?: boolean;
}): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(
      Logger.defaultLogger,
      VersioLogger(options.format, options.color ?? chalk.supportsColor !== false)
    ),
    Logger.minimumLogLevel(toEffectLogLevel(options.level))
  );
