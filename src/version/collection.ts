// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Sorting and selecting over many versions.
 * String inputs that no scheme accepts are reported, not dropped.
 */

import { Array as Arr, Either, Option, Order, pipe } from "effect";
import type { VersionError } from "../lib/errors";
import { compareParts } from "./key";
import { Version, type VersionOptions } from "./version";

/** Total order over versions by comparison key. */
export const versionOrder: Order.Order<Version> = Order.make((a, b) =>
  compareParts({ scheme: a.scheme, parts: a.parts }, { scheme: b.scheme, parts: b.parts })
);

const parseAll = (
  versions: readonly string[],
  options: VersionOptions
): Either.Either<Version[], VersionError> =>
  Either.all(versions.map((v) => Version.parse(v, options)));

/**
 * Sort version strings in ascending order.
 * @example sortVersions(["1.10", "1.9", "1.9rc1"]) // Right(["1.9rc1", "1.9", "1.10"])
 */
export const sortVersions = (
  versions: readonly string[],
  options: VersionOptions = {}
): Either.Either<string[], VersionError> =>
  pipe(
    parseAll(versions, options),
    Either.map((parsed) => Arr.sort(parsed, versionOrder).map(String))
  );

/** Sort version strings newest first. */
export const sortVersionsDesc = (
  versions: readonly string[],
  options: VersionOptions = {}
): Either.Either<string[], VersionError> =>
  pipe(
    parseAll(versions, options),
    Either.map((parsed) => Arr.sort(parsed, Order.reverse(versionOrder)).map(String))
  );

/** Newest version, `None` for an empty list. */
export const maxVersion = (
  versions: readonly string[],
  options: VersionOptions = {}
): Either.Either<Option.Option<Version>, VersionError> =>
  pipe(
    parseAll(versions, options),
    Either.map((parsed) =>
      Arr.isNonEmptyArray(parsed) ? Option.some(Arr.max(parsed, versionOrder)) : Option.none()
    )
  );

/** Oldest version, `None` for an empty list. */
export const minVersion = (
  versions: readonly string[],
  options: VersionOptions = {}
): Either.Either<Option.Option<Version>, VersionError> =>
  pipe(
    parseAll(versions, options),
    Either.map((parsed) =>
      Arr.isNonEmptyArray(parsed) ? Option.some(Arr.min(parsed, versionOrder)) : Option.none()
    )
  );
