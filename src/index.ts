// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * versio: parse, render, compare and bump software versions under
 * pluggable schemes.
 *
 * @example
 * ```typescript
 * import { Simple3VersionScheme, Version } from "versio";
 *
 * const v = Version.from("1.2.3", { scheme: Simple3VersionScheme });
 * v.bump({ field: "minor" });
 * v.toString(); // "1.3.0"
 * v.gt("1.2.9"); // true
 * ```
 */

export * from "./version";

export { type Comparable, type Ordering, type Relation, orderingSymbol, relate } from "./lib/comparable";

export {
  ErrorCode,
  type ErrorCodeValue,
  MalformedVersionError,
  UnparseableVersionError,
  type VersionError,
  isVersionError,
} from "./lib/errors";

export {
  type BumpReport,
  type VersionFileFormat,
  bumpProjectVersion,
  detectFormat,
  readProjectVersion,
  readVersionString,
  writeProjectVersion,
} from "./project/version-file";
