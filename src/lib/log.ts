// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Styled logging. Styles travel as log annotations and are rendered by
 * effect-logger.ts.
 */

import { Data, Effect, Match, pipe } from "effect";

type LogStyle = Data.TaggedEnum<{
  success: object;
}>;

const { success } = Data.taggedEnum<LogStyle>();

const encodeStyle = (style: LogStyle): Record<string, string> =>
  pipe(
    Match.value(style),
    Match.tag("success", () => ({ logStyle: "success" })),
    Match.exhaustive
  );

const logStyled = (style: LogStyle, message: string): Effect.Effect<void> =>
  Effect.log(message).pipe(Effect.annotateLogs(encodeStyle(style)));

export const logSuccess = (message: string): Effect.Effect<void> => logStyled(success(), message);

/** Bypasses the logger for program output (versions, comparison results). */
export const writeOutput = (text: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(`${text}\n`);
  });

/** Program output as a single JSON line. */
export const writeJson = (value: unknown): Effect.Effect<void> =>
  writeOutput(JSON.stringify(value));
