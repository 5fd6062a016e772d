// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Comparison keys.
 *
 * Two versions are ordered by a derived key rather than by their raw fields:
 *
 * 1. Fields are permuted by the scheme's `compareOrder`, if any.
 * 2. An absent field becomes a single fill element; a present field becomes
 *    its dotted sub-parts, each broken into digit and non-digit runs
 *    ("rc12" -> "rc", 12n).
 * 3. When both sides carry the same field, the shorter one is extended with
 *    the scheme's extend value, so "1.0" meets "1.0.1" as "1.0.0".
 * 4. The flattened keys are padded to equal length with the clear value.
 * 5. Elements are compared left to right; integers numerically, everything
 *    else by code unit.
 *
 * Numbers are bigint: version components are unbounded.
 */

import { Option, Order, pipe } from "effect";
import type { Ordering } from "../lib/comparable";
import { digitRuns, isDigits } from "../lib/str";
import type { VersionScheme } from "./scheme";

export type KeyElement = bigint | string;

/** Key material contributed by one field. */
export interface KeySegment {
  readonly present: boolean;
  readonly elements: readonly KeyElement[];
}

/** Sorts below every digit and letter. */
export const LOWEST_FILL = "";

export const toElement = (s: string): KeyElement => (isDigits(s) ? BigInt(s) : s);

/** Split a field value into key elements. */
export const tokenize = (part: string): readonly KeyElement[] =>
  part
    .split(".")
    .filter((sub) => sub.length > 0)
    .flatMap((sub) => (isDigits(sub) ? [BigInt(sub)] : digitRuns(sub).map(toElement)));

const fillAt = (scheme: VersionScheme, index: number): KeyElement =>
  scheme._tag === "FieldScheme"
    ? pipe(
        scheme.compareFill,
        Option.flatMap((fill) => Option.fromNullable(fill[index])),
        Option.map(toElement),
        Option.getOrElse((): KeyElement => LOWEST_FILL)
      )
    : LOWEST_FILL;

const reorder = (
  scheme: VersionScheme,
  parts: readonly Option.Option<string>[]
): readonly Option.Option<string>[] =>
  scheme._tag === "FieldScheme"
    ? pipe(
        scheme.compareOrder,
        Option.match({
          onNone: (): readonly Option.Option<string>[] => parts,
          onSome: (order): readonly Option.Option<string>[] =>
            order.map((from) => parts[from] ?? Option.none()),
        })
      )
    : parts;

/** Per-field key of one version, before reconciliation with another. */
export const comparisonKey = (
  scheme: VersionScheme,
  parts: readonly Option.Option<string>[]
): readonly KeySegment[] =>
  reorder(scheme, parts).map((part, index) =>
    Option.match(part, {
      onNone: (): KeySegment => ({ present: false, elements: [fillAt(scheme, index)] }),
      onSome: (value): KeySegment => ({ present: true, elements: tokenize(value) }),
    })
  );

/** Element used to pad whole keys to equal length. */
const padElement = (scheme: VersionScheme): KeyElement =>
  scheme._tag === "FieldScheme"
    ? pipe(scheme.clearValue, Option.map(toElement), Option.getOrElse((): KeyElement => LOWEST_FILL))
    : toElement(scheme.clearValue);

const padTo = (
  elements: readonly KeyElement[],
  width: number,
  filler: KeyElement
): readonly KeyElement[] =>
  elements.length >= width
    ? elements
    : [...elements, ...Array.from({ length: width - elements.length }, () => filler)];

/**
 * Align two keys so they can be walked position by position.
 * `scheme` supplies the extend and pad values (the left-hand side's scheme).
 */
export const reconcileKeys = (
  scheme: VersionScheme,
  left: readonly KeySegment[],
  right: readonly KeySegment[]
): readonly [readonly KeyElement[], readonly KeyElement[]] => {
  const extend = toElement(scheme.extendValue);
  const pad = padElement(scheme);
  const fields = Math.max(left.length, right.length);

  const aligned = Array.from({ length: fields }, (_, i): readonly [
    readonly KeyElement[],
    readonly KeyElement[],
  ] => {
    const a = left[i];
    const b = right[i];
    if (a === undefined || b === undefined) {
      return [a?.elements ?? [], b?.elements ?? []];
    }
    const width = Math.max(a.elements.length, b.elements.length);
    const filler = a.present && b.present ? extend : pad;
    return [padTo(a.elements, width, filler), padTo(b.elements, width, filler)];
  });

  const flatLeft = aligned.flatMap(([a]) => a);
  const flatRight = aligned.flatMap(([, b]) => b);
  const width = Math.max(flatLeft.length, flatRight.length);
  return [padTo(flatLeft, width, pad), padTo(flatRight, width, pad)];
};

/** Integers compare numerically; any other pairing compares as text. */
export const elementOrder: Order.Order<KeyElement> = Order.make((x, y) => {
  if (typeof x === "bigint" && typeof y === "bigint") {
    return x < y ? -1 : x > y ? 1 : 0;
  }
  const sx = String(x);
  const sy = String(y);
  return sx < sy ? -1 : sx > sy ? 1 : 0;
});

/** The first differing position decides; reconciled keys have equal length. */
export const compareKeys: Order.Order<readonly KeyElement[]> = Order.array(elementOrder);

export interface KeyedParts {
  readonly scheme: VersionScheme;
  readonly parts: readonly Option.Option<string>[];
}

/** Order two parsed versions; each side's key is built with its own scheme. */
export const compareParts = (left: KeyedParts, right: KeyedParts): Ordering => {
  const [a, b] = reconcileKeys(
    left.scheme,
    comparisonKey(left.scheme, left.parts),
    comparisonKey(right.scheme, right.parts)
  );
  return compareKeys(a, b);
};
