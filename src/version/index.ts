// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Version model: schemes, parsing, rendering, comparison and bumping.
 */

export {
  accepts,
  compilePattern,
  describeScheme,
  fieldScheme,
  parseWith,
  ParseOutcome,
  schemeFields,
  splitScheme,
} from "./scheme";
export type {
  FieldScheme,
  FieldSchemeDefinition,
  FieldType,
  SplitScheme,
  SplitSchemeDefinition,
  SubfieldRef,
  VersionScheme,
} from "./scheme";

export {
  BUILT_IN_SCHEMES,
  Pep440VersionScheme,
  PerlVersionScheme,
  Simple3VersionScheme,
  Simple4VersionScheme,
  Simple5VersionScheme,
  VariableDottedIntegerVersionScheme,
} from "./schemes";

export { builtInSchemes, defaultRegistry, SchemeRegistry, setSupportedSchemes } from "./registry";

export { compareKeys, compareParts, comparisonKey, reconcileKeys } from "./key";
export type { KeyElement, KeySegment } from "./key";

export { Increment, incrementPart } from "./increment";

export { UNKNOWN_VERSION, Version, version } from "./version";
export type { BumpOptions, VersionOptions } from "./version";

export { maxVersion, minVersion, sortVersions, sortVersionsDesc, versionOrder } from "./collection";
