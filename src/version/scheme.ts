// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Version scheme descriptors.
 *
 * A scheme is immutable data describing one family of version strings. There
 * are two variants, distinguished by `_tag`:
 *
 * - FieldScheme: a regular expression with one capture group per named field,
 *   a positional format template and per-field bump/compare metadata.
 * - SplitScheme: an arbitrary number of segments separated by a delimiter.
 *
 * Schemes are created once and shared; nothing in this module mutates them.
 */

import { Data, Match, Option, pipe } from "effect";
import { isWhitespace } from "../lib/char";

// ─────────────────────────────────────────────────────────────────────────────
// Scheme Types
// ─────────────────────────────────────────────────────────────────────────────

/** Scalar type a field is cast to before formatting. */
export type FieldType = "string" | "int";

/** Location of a named sub-part inside a dotted field (e.g. Minor inside Release). */
export interface SubfieldRef {
  readonly field: string;
  readonly index: number;
}

export interface FieldScheme {
  readonly _tag: "FieldScheme";
  readonly name: string;
  readonly description: string;
  /** Anchored at both ends; a prefix match never counts. */
  readonly pattern: RegExp;
  readonly template: string;
  readonly fieldTypes: readonly FieldType[];
  /** Lower-cased, one per capture group. */
  readonly fields: readonly string[];
  readonly subfields: ReadonlyMap<string, SubfieldRef>;
  readonly clearValue: Option.Option<string>;
  readonly sequences: ReadonlyMap<string, readonly string[]>;
  readonly compareOrder: Option.Option<readonly number[]>;
  readonly compareFill: Option.Option<readonly string[]>;
  readonly extendValue: string;
}

export interface SplitScheme {
  readonly _tag: "SplitScheme";
  readonly name: string;
  readonly description: string;
  readonly delimiter: RegExp;
  readonly joinWith: string;
  readonly clearValue: string;
  /** Anchored pattern every segment must satisfy. */
  readonly segment: RegExp;
  readonly extendValue: string;
}

export type VersionScheme = FieldScheme | SplitScheme;

// ─────────────────────────────────────────────────────────────────────────────
// Parse Outcome (Sum Type)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Result of offering a string to one scheme. `noMatch` lets the caller move on
 * to the next candidate; `malformed` is a recognized but broken shape.
 */
export type ParseOutcome = Data.TaggedEnum<{
  matched: { readonly parts: readonly Option.Option<string>[] };
  noMatch: object;
  malformed: { readonly reason: string };
}>;

export const ParseOutcome = Data.taggedEnum<ParseOutcome>();

// ─────────────────────────────────────────────────────────────────────────────
// Pattern Compilation
// ─────────────────────────────────────────────────────────────────────────────

interface StripState {
  readonly out: string;
  readonly inClass: boolean;
  readonly escaped: boolean;
  readonly inComment: boolean;
}

/**
 * Remove whitespace and `#` comments outside character classes, the way an
 * extended-mode regular expression is read.
 */
export const stripExtended = (source: string): string =>
  Array.from(source).reduce<StripState>(
    (st, c): StripState => {
      if (st.inComment) {
        return { ...st, inComment: c !== "\n" };
      }
      if (st.escaped) {
        return { ...st, out: st.out + c, escaped: false };
      }
      if (c === "\\") {
        return { ...st, out: st.out + c, escaped: true };
      }
      if (st.inClass) {
        return { ...st, out: st.out + c, inClass: c !== "]" };
      }
      if (c === "[") {
        return { ...st, out: st.out + c, inClass: true };
      }
      if (c === "#") {
        return { ...st, inComment: true };
      }
      return isWhitespace(c) ? st : { ...st, out: st.out + c };
    },
    { out: "", inClass: false, escaped: false, inComment: false }
  ).out;

/**
 * Compile a pattern anchored at both ends. `flags` accepts the usual
 * RegExp flags plus `x` for extended syntax; `g` and `y` are dropped because
 * they make `exec` stateful.
 */
export const compilePattern = (source: string, flags = ""): RegExp => {
  const extended = flags.includes("x");
  const body = extended ? stripExtended(source) : source;
  const jsFlags = Array.from(flags)
    .filter((f) => f !== "x" && f !== "g" && f !== "y")
    .join("");
  return new RegExp(`^(?:${body})$`, jsFlags);
};

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

export interface FieldSchemeDefinition {
  readonly name: string;
  readonly pattern: string;
  readonly flags?: string;
  readonly template: string;
  /** Omit for schemes whose optional fields are absent rather than zero. */
  readonly clearValue?: string;
  readonly fieldTypes?: readonly FieldType[];
  readonly fields: readonly string[];
  /** Parent field name -> names of its dotted sub-parts, left to right. */
  readonly subfields?: Readonly<Record<string, readonly string[]>>;
  readonly sequences?: Readonly<Record<string, readonly string[]>>;
  readonly compareOrder?: readonly number[];
  readonly compareFill?: readonly string[];
  readonly extendValue?: string;
  readonly description?: string;
}

const lowerKeys = <V>(record: Readonly<Record<string, V>> | undefined): ReadonlyMap<string, V> =>
  new Map(Object.entries(record ?? {}).map(([k, v]): [string, V] => [k.toLowerCase(), v]));

export const fieldScheme = (def: FieldSchemeDefinition): FieldScheme => ({
  _tag: "FieldScheme",
  name: def.name,
  description: def.description ?? def.name,
  pattern: compilePattern(def.pattern, def.flags),
  template: def.template,
  fieldTypes: def.fieldTypes ?? [],
  fields: def.fields.map((f) => f.toLowerCase()),
  subfields: new Map(
    Object.entries(def.subfields ?? {}).flatMap(([parent, names]) =>
      names.map((sub, index): [string, SubfieldRef] => [
        sub.toLowerCase(),
        { field: parent.toLowerCase(), index },
      ])
    )
  ),
  clearValue: Option.fromNullable(def.clearValue),
  sequences: lowerKeys(def.sequences),
  compareOrder: Option.fromNullable(def.compareOrder),
  compareFill: Option.fromNullable(def.compareFill),
  extendValue: def.extendValue ?? "0",
});

export interface SplitSchemeDefinition {
  readonly name: string;
  readonly delimiter?: string;
  readonly joinWith?: string;
  readonly clearValue?: string;
  readonly segment?: string;
  readonly description?: string;
}

export const splitScheme = (def: SplitSchemeDefinition): SplitScheme => ({
  _tag: "SplitScheme",
  name: def.name,
  description: def.description ?? def.name,
  delimiter: new RegExp(def.delimiter ?? "\\."),
  joinWith: def.joinWith ?? ".",
  clearValue: def.clearValue ?? "0",
  segment: compilePattern(def.segment ?? "\\d+"),
  extendValue: def.clearValue ?? "0",
});

// ─────────────────────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────────────────────

const parseFields = (scheme: FieldScheme, input: string): ParseOutcome =>
  pipe(
    Option.fromNullable(scheme.pattern.exec(input)),
    Option.match({
      onNone: (): ParseOutcome => ParseOutcome.noMatch(),
      onSome: (match): ParseOutcome =>
        ParseOutcome.matched({
          parts: match
            .slice(1)
            .map((group: string | undefined) =>
              group === undefined ? scheme.clearValue : Option.some(group)
            ),
        }),
    })
  );

const parseSegments = (scheme: SplitScheme, input: string): ParseOutcome => {
  const segments = input.split(scheme.delimiter);
  if (segments.at(-1) === "") {
    return ParseOutcome.malformed({ reason: "a version can not end with a delimiter" });
  }
  return segments.every((s) => scheme.segment.test(s))
    ? ParseOutcome.matched({ parts: segments.map(Option.some) })
    : ParseOutcome.noMatch();
};

/** Offer `input` to one scheme. Never throws. */
export const parseWith = (scheme: VersionScheme, input: string): ParseOutcome =>
  pipe(
    Match.value(scheme),
    Match.tag("FieldScheme", (s) => parseFields(s, input)),
    Match.tag("SplitScheme", (s) => parseSegments(s, input)),
    Match.exhaustive
  );

/** Whether the scheme accepts the whole string. */
export const accepts = (scheme: VersionScheme, input: string): boolean =>
  parseWith(scheme, input)._tag === "matched";

/** Addressable field names; split schemes are addressed by position only. */
export const schemeFields = (scheme: VersionScheme): readonly string[] =>
  scheme._tag === "FieldScheme" ? scheme.fields : [];

export const describeScheme = (scheme: VersionScheme): string =>
  scheme.description === scheme.name ? scheme.name : `${scheme.name}: ${scheme.description}`;
