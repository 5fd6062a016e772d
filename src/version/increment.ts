// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Increment grammar for a single field value.
 *
 * A stored field is re-read as one of two shapes, tried in order:
 *
 * 1. Dotted numeric ("1.2.3"): the sub-part at `subIndex` is incremented and
 *    every sub-part to its right is reset.
 * 2. Prefix + number ("a4", ".post5", "+7"): index 0 addresses the prefix,
 *    which advances along the field's declared sequence; index 1 addresses the
 *    number.
 *
 * Anything else is left alone. Negative indexes count from the right.
 */

import { Data, Option, pipe } from "effect";
import { isAlpha } from "../lib/char";
import { isDigits } from "../lib/str";

/** Outcome of one increment. `exhausted` means the sequence has no next entry. */
export type Increment = Data.TaggedEnum<{
  advanced: { readonly value: string };
  exhausted: object;
  unchanged: object;
}>;

export const Increment = Data.taggedEnum<Increment>();

export interface IncrementContext {
  /** Ordered prefixes this field may carry (e.g. a, b, c, rc). */
  readonly sequence: Option.Option<readonly string[]>;
  readonly clearValue: Option.Option<string>;
}

const PREFIX_NUMERIC = /^(\.?[A-Za-z+]*)(\d+)$/;

/** Value a field starts from when it does not exist yet. */
const INITIAL_NUMBER = "1";

const resolveIndex = (subIndex: number, length: number): Option.Option<number> => {
  const index = subIndex < 0 ? length + subIndex : subIndex;
  return index >= 0 && index < length ? Option.some(index) : Option.none();
};

const isDottedNumeric = (s: string): boolean => s.split(".").every(isDigits);

const succ = (digits: string): string => (BigInt(digits) + 1n).toString();

const incrementDotted = (part: string, subIndex: number, ctx: IncrementContext): Increment => {
  const subParts = part.split(".");
  const reset = pipe(
    ctx.clearValue,
    Option.filter(isDigits),
    Option.getOrElse(() => "0")
  );
  return pipe(
    resolveIndex(subIndex, subParts.length),
    Option.match({
      onNone: (): Increment => Increment.unchanged(),
      onSome: (target): Increment =>
        Increment.advanced({
          value: subParts
            .map((n, i) => (i < target ? n : i === target ? succ(n) : reset))
            .join("."),
        }),
    })
  );
};

/** Next letter for a single-letter prefix without a declared sequence. */
const nextLetter = (prefix: string): Option.Option<string> => {
  const next = String.fromCharCode(prefix.charCodeAt(0) + 1);
  return prefix.length === 1 && isAlpha(prefix) && isAlpha(next) ? Option.some(next) : Option.none();
};

const advancePrefix = (prefix: string, ctx: IncrementContext): Increment => {
  const restart = Option.getOrElse(ctx.clearValue, () => INITIAL_NUMBER);
  return pipe(
    ctx.sequence,
    Option.match({
      onNone: (): Increment =>
        pipe(
          nextLetter(prefix),
          Option.match({
            onNone: (): Increment => Increment.exhausted(),
            onSome: (letter): Increment => Increment.advanced({ value: `${letter}${restart}` }),
          })
        ),
      onSome: (sequence): Increment => {
        const position = prefix === "" ? -1 : sequence.indexOf(prefix);
        if (prefix !== "" && position < 0) {
          return Increment.unchanged();
        }
        return pipe(
          Option.fromNullable(sequence[position + 1]),
          Option.match({
            onNone: (): Increment => Increment.exhausted(),
            onSome: (next): Increment => Increment.advanced({ value: `${next}${restart}` }),
          })
        );
      },
    })
  );
};

const incrementPrefixed = (
  prefix: string,
  digits: string,
  subIndex: number,
  ctx: IncrementContext
): Increment =>
  pipe(
    resolveIndex(subIndex, 2),
    Option.match({
      onNone: (): Increment => Increment.unchanged(),
      onSome: (target): Increment =>
        target === 0
          ? advancePrefix(prefix, ctx)
          : Increment.advanced({ value: `${prefix}${succ(digits)}` }),
    })
  );

/** Build a field that does not exist yet from the first sequence entry. */
const instantiate = (ctx: IncrementContext): Increment =>
  pipe(
    ctx.sequence,
    Option.flatMap((sequence) => Option.fromNullable(sequence[0])),
    Option.match({
      onNone: (): Increment => Increment.unchanged(),
      onSome: (first): Increment => Increment.advanced({ value: `${first}${INITIAL_NUMBER}` }),
    })
  );

/**
 * Increment one field value.
 *
 * @example
 * incrementPart(Option.some("1.2.3"), 1, ctx)  // advanced "1.3.0"
 * incrementPart(Option.some("a4"), 0, preCtx)  // advanced "b1"
 * incrementPart(Option.some("rc1"), 0, preCtx) // exhausted
 * incrementPart(Option.none(), -1, preCtx)     // advanced "a1"
 */
export const incrementPart = (
  part: Option.Option<string>,
  subIndex: number,
  ctx: IncrementContext
): Increment =>
  Option.match(part, {
    onNone: (): Increment => instantiate(ctx),
    onSome: (value): Increment => {
      if (isDottedNumeric(value)) {
        return incrementDotted(value, subIndex, ctx);
      }
      return pipe(
        Option.fromNullable(PREFIX_NUMERIC.exec(value)),
        Option.match({
          onNone: (): Increment => Increment.unchanged(),
          onSome: ([, prefix = "", digits = "0"]): Increment =>
            incrementPrefixed(prefix, digits, subIndex, ctx),
        })
      );
    },
  });
