// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Version value object.
 *
 * A Version binds a parsed part list to the scheme that accepted it. All
 * behaviour (rendering, comparison, bumping) is driven by that scheme's data.
 * `bump` is the only mutator; callers that share an instance should `clone`
 * before bumping.
 */

import { Either, Option, pipe } from "effect";
import { type Comparable, type Ordering, type Relation, relate } from "../lib/comparable";
import { type VersionError, malformedVersion, unparseableVersion } from "../lib/errors";
import { isDigits } from "../lib/str";
import { castField, renderTemplate } from "./format";
import { Increment, incrementPart } from "./increment";
import { type KeySegment, compareParts, comparisonKey } from "./key";
import { type SchemeRegistry, defaultRegistry } from "./registry";
import { type FieldScheme, type SplitScheme, type VersionScheme, parseWith } from "./scheme";

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

export interface VersionOptions {
  /** Parse with this scheme only. */
  readonly scheme?: VersionScheme;
  /** Schemes tried when `scheme` is omitted. Defaults to the process-wide registry. */
  readonly registry?: SchemeRegistry;
}

export interface BumpOptions {
  /** Field or subfield name, case-insensitive. Defaults to the last field. */
  readonly field?: string;
  /** Sub-part of a dotted field, or 0 (prefix) / 1 (number) of a prefixed one. */
  readonly subIndex?: number;
  /** Absolute part index; addresses split-scheme segments or the n-th field. */
  readonly sequence?: number;
  /** Clear an exhausted sequence field (and only that field) instead of refusing the bump. */
  readonly promote?: boolean;
}

export const UNKNOWN_VERSION = "Unknown version";

// ─────────────────────────────────────────────────────────────────────────────
// Scheme resolution
// ─────────────────────────────────────────────────────────────────────────────

interface Resolved {
  readonly scheme: VersionScheme;
  readonly parts: readonly Option.Option<string>[];
}

/**
 * Offer `input` to each candidate in order. The first match wins; a malformed
 * outcome stops the search.
 */
const resolve = (
  input: string,
  candidates: readonly VersionScheme[]
): Either.Either<Resolved, VersionError> => {
  for (const scheme of candidates) {
    const outcome = parseWith(scheme, input);
    switch (outcome._tag) {
      case "matched":
        return Either.right({ scheme, parts: outcome.parts });
      case "malformed":
        return Either.left(malformedVersion(input, scheme.name, outcome.reason));
      case "noMatch":
        break;
    }
  }
  return Either.left(
    unparseableVersion(
      input,
      candidates.map((s) => s.name)
    )
  );
};

const resolveIndex = (index: number, length: number): Option.Option<number> => {
  const resolved = index < 0 ? length + index : index;
  return resolved >= 0 ? Option.some(resolved) : Option.none();
};

// ─────────────────────────────────────────────────────────────────────────────
// Version
// ─────────────────────────────────────────────────────────────────────────────

export class Version implements Comparable {
  readonly scheme: VersionScheme;
  private current: Option.Option<string>[];

  private constructor(scheme: VersionScheme, parts: readonly Option.Option<string>[]) {
    this.scheme = scheme;
    this.current = [...parts];
  }

  /**
   * Parse without throwing.
   *
   * @example
   * Version.parse("1.2.3rc1")                                  // Right(Version)
   * Version.parse("1.2", { scheme: Simple3VersionScheme })      // Left(UnparseableVersionError)
   */
  static parse(input: string, options: VersionOptions = {}): Either.Either<Version, VersionError> {
    const candidates =
      options.scheme === undefined
        ? (options.registry ?? defaultRegistry).supported
        : [options.scheme];
    return Either.map(resolve(input, candidates), ({ scheme, parts }) => new Version(scheme, parts));
  }

  /** Parse or throw the `VersionError`. */
  static from(input: string, options: VersionOptions = {}): Version {
    return Either.getOrThrowWith(Version.parse(input, options), (e) => e);
  }

  /** Stored parts; absent optional fields are `None`. */
  get parts(): readonly Option.Option<string>[] {
    return [...this.current];
  }

  clone(): Version {
    return new Version(this.scheme, this.current);
  }

  /** Value of a field or subfield by name. */
  field(name: string): Option.Option<string> {
    if (this.scheme._tag === "SplitScheme") {
      return Option.none();
    }
    const key = name.toLowerCase();
    const index = this.scheme.fields.indexOf(key);
    if (index >= 0) {
      return Option.flatten(Option.fromNullable(this.current[index]));
    }
    return pipe(
      Option.fromNullable(this.scheme.subfields.get(key)),
      Option.flatMap((ref) => this.field(ref.field).pipe(Option.map((v) => ({ v, ref })))),
      Option.flatMap(({ v, ref }) => Option.fromNullable(v.split(".")[ref.index]))
    );
  }

  toString(): string {
    if (this.current.length === 0) {
      return UNKNOWN_VERSION;
    }
    return this.scheme._tag === "SplitScheme"
      ? this.current.map((p) => Option.getOrElse(p, () => "")).join(this.scheme.joinWith)
      : this.render(this.scheme);
  }

  private render(scheme: FieldScheme): string {
    const values = scheme.fields.map((_, i) =>
      pipe(
        Option.fromNullable(this.current[i]),
        Option.flatten,
        Option.flatMap((value) => castField(value, scheme.fieldTypes[i] ?? "string"))
      )
    );
    return renderTemplate(scheme.template, values);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Comparison
  // ───────────────────────────────────────────────────────────────────────────

  comparisonKey(): readonly KeySegment[] {
    return comparisonKey(this.scheme, this.current);
  }

  /**
   * Three-way comparison. A string is parsed with this version's scheme;
   * anything that is neither a Version nor a parseable string is not comparable.
   */
  compare(other: unknown): Option.Option<Ordering> {
    const rhs =
      other instanceof Version
        ? Option.some(other)
        : typeof other === "string"
          ? Either.getRight(Version.parse(other, { scheme: this.scheme }))
          : Option.none();
    return Option.map(rhs, (r) =>
      compareParts(
        { scheme: this.scheme, parts: this.current },
        { scheme: r.scheme, parts: r.current }
      )
    );
  }

  private is(other: unknown, relation: Relation): boolean {
    return relate(this, other, relation);
  }

  lt(other: Version | string): boolean {
    return this.is(other, "lt");
  }

  le(other: Version | string): boolean {
    return this.is(other, "le");
  }

  eq(other: unknown): boolean {
    return this.is(other, "eq");
  }

  ne(other: unknown): boolean {
    return this.is(other, "ne");
  }

  ge(other: Version | string): boolean {
    return this.is(other, "ge");
  }

  gt(other: Version | string): boolean {
    return this.is(other, "gt");
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Bumping
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Increment one position in place and reset everything to its right.
   * Returns whether the version changed; an unknown target or an exhausted
   * sequence (without `promote`) is `false` and leaves the version untouched.
   *
   * @example
   * const v = Version.from("1.2.3", { scheme: Simple3VersionScheme });
   * v.bump({ field: "minor" }); // true, v is 1.3.0
   * v.bump({ field: "foo" });   // false
   */
  bump(options: BumpOptions = {}): boolean {
    const { field, subIndex = -1, sequence = -1, promote = false } = options;
    return this.scheme._tag === "SplitScheme"
      ? field === undefined && this.bumpSegment(this.scheme, sequence)
      : this.bumpField(this.scheme, field, subIndex, sequence, promote);
  }

  private bumpSegment(scheme: SplitScheme, sequence: number): boolean {
    const target = sequence >= 0 ? Option.some(sequence) : resolveIndex(sequence, this.current.length);
    return Option.match(target, {
      onNone: () => false,
      onSome: (index) => {
        const segments = Array.from(
          { length: Math.max(this.current.length, index + 1) },
          (_, i) => Option.getOrElse(this.current[i] ?? Option.none(), () => scheme.clearValue)
        );
        const value = segments[index] ?? scheme.clearValue;
        if (!isDigits(value)) {
          return false;
        }
        this.current = segments.map((s, i) =>
          Option.some(i < index ? s : i === index ? (BigInt(value) + 1n).toString() : scheme.clearValue)
        );
        return true;
      },
    });
  }

  private bumpField(
    scheme: FieldScheme,
    field: string | undefined,
    subIndex: number,
    sequence: number,
    promote: boolean
  ): boolean {
    const requested = field ?? (sequence >= 0 ? scheme.fields[sequence] : scheme.fields.at(-1));
    if (requested === undefined) {
      return false;
    }
    const name = requested.toLowerCase();
    const index = scheme.fields.indexOf(name);
    if (index < 0) {
      return pipe(
        Option.fromNullable(scheme.subfields.get(name)),
        Option.match({
          onNone: () => false,
          onSome: (ref) => this.bumpField(scheme, ref.field, ref.index, -1, promote),
        })
      );
    }

    const outcome = incrementPart(this.current[index] ?? Option.none(), subIndex, {
      sequence: Option.fromNullable(scheme.sequences.get(name)),
      clearValue: scheme.clearValue,
    });
    const clearFrom = (from: number, head: readonly Option.Option<string>[]): void => {
      this.current = [...head, ...this.current.slice(from).map(() => scheme.clearValue)];
    };

    return Increment.$match({
      advanced: ({ value }) => {
        clearFrom(index + 1, [...this.current.slice(0, index), Option.some(value)]);
        return true;
      },
      exhausted: () => {
        if (promote) {
          this.current = this.current.map((part, i) => (i === index ? scheme.clearValue : part));
        }
        return promote;
      },
      unchanged: () => false,
    })(outcome);
  }
}

/** Shorthand for `Version.from`. */
export const version = (input: string, options: VersionOptions = {}): Version =>
  Version.from(input, options);
