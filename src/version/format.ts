// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Positional format templates for field schemes.
 *
 * Supported placeholders:
 * - `{}`      next positional value
 * - `{1}`     value at index 1
 * - `{:d}`    integer value
 * - `{1:02d}` integer value zero-padded to a width of 2
 * - `{{` `}}` literal braces
 *
 * A missing value (absent field or failed cast) renders as an empty string.
 */

import { Match, Option, pipe } from "effect";
import { isDigits } from "../lib/str";
import type { FieldType } from "./scheme";

export type FormatValue = string | bigint;

const PLACEHOLDER = /\{\{|\}\}|\{(\d*)(?::([^{}]*))?\}/g;
const INT_SPEC = /^(0?)(\d*)d$/;

/** Cast a raw field to its declared type; None when the cast does not apply. */
export const castField = (value: string, type: FieldType): Option.Option<FormatValue> =>
  pipe(
    Match.value(type),
    Match.when("string", (): Option.Option<FormatValue> => Option.some(value)),
    Match.when(
      "int",
      (): Option.Option<FormatValue> =>
        isDigits(value) ? Option.some(BigInt(value)) : Option.none()
    ),
    Match.exhaustive
  );

const applySpec = (value: FormatValue, spec: string): string =>
  pipe(
    Option.fromNullable(INT_SPEC.exec(spec)),
    Option.match({
      onNone: (): string => String(value),
      onSome: ([, zero, width]): string => {
        const text = String(value);
        const size = width === undefined || width === "" ? 0 : Number.parseInt(width, 10);
        return text.padStart(size, zero === "0" ? "0" : " ");
      },
    })
  );

export const renderTemplate = (
  template: string,
  values: readonly Option.Option<FormatValue>[]
): string => {
  let auto = 0;
  return template.replace(
    PLACEHOLDER,
    (token: string, index: string | undefined, spec: string | undefined): string => {
      if (token === "{{") {
        return "{";
      }
      if (token === "}}") {
        return "}";
      }
      const position = index === undefined || index === "" ? auto++ : Number.parseInt(index, 10);
      return pipe(
        Option.fromNullable(values[position]),
        Option.flatten,
        Option.match({
          onNone: (): string => "",
          onSome: (value): string => applySpec(value, spec ?? ""),
        })
      );
    }
  );
};
