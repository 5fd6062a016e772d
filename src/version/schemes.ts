// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Built-in version schemes.
 */

import { type VersionScheme, fieldScheme, splitScheme } from "./scheme";

export const Simple3VersionScheme: VersionScheme = fieldScheme({
  name: "A.B.C",
  description: "three numeric parts, e.g. 1.2.3",
  pattern: String.raw`(\d+)\.(\d+)\.(\d+)`,
  template: "{0}.{1}.{2}",
  clearValue: "0",
  fields: ["Major", "Minor", "Tiny"],
});

export const Simple4VersionScheme: VersionScheme = fieldScheme({
  name: "A.B.C.D",
  description: "four numeric parts, e.g. 1.2.3.4",
  pattern: String.raw`(\d+)\.(\d+)\.(\d+)\.(\d+)`,
  template: "{0}.{1}.{2}.{3}",
  clearValue: "0",
  fields: ["Major", "Minor", "Tiny", "Tiny2"],
});

export const Simple5VersionScheme: VersionScheme = fieldScheme({
  name: "A.B.C.D.E",
  description: "five numeric parts, e.g. 1.2.3.4.5",
  pattern: String.raw`(\d+)\.(\d+)\.(\d+)\.(\d+)\.(\d+)`,
  template: "{0}.{1}.{2}.{3}.{4}",
  clearValue: "0",
  fields: ["Major", "Minor", "Tiny", "Tiny2", "Tiny3"],
});

/**
 * PEP 440 public versions with an optional local label.
 *
 * Absent Pre and Dev sort above every present value ("~"), so a final release
 * follows its pre-releases and a dev release precedes what it develops.
 */
export const Pep440VersionScheme: VersionScheme = fieldScheme({
  name: "pep440",
  description: "PEP 440, e.g. 1.2.3rc1.post2.dev3+local",
  pattern: String.raw`
    (\d+(?:\.\d+)*)                      # release
    ((?:a|b|c|rc)\d+)?                   # pre-release
    (\.post\d+)?                         # post-release
    (\.dev\d+)?                          # development release
    (\+(?!\.)[a-zA-Z0-9.]*[a-zA-Z0-9])?  # local label
  `,
  flags: "x",
  template: "{0}{1}{2}{3}{4}",
  fields: ["Release", "Pre", "Post", "Dev", "Local"],
  subfields: { Release: ["Major", "Minor", "Tiny", "Tiny2"] },
  sequences: {
    Pre: ["a", "b", "c", "rc"],
    Post: [".post"],
    Dev: [".dev"],
    Local: ["+"],
  },
  compareFill: ["", "~", "", "~", ""],
});

/** Perl module versions: the fractional part always has at least two digits. */
export const PerlVersionScheme: VersionScheme = fieldScheme({
  name: "A.B",
  description: "Perl style, e.g. 1.02",
  pattern: String.raw`(\d+)\.(\d+)`,
  template: "{0:d}.{1:02d}",
  fieldTypes: ["int", "int"],
  clearValue: "0",
  fields: ["Major", "Minor"],
});

export const VariableDottedIntegerVersionScheme: VersionScheme = splitScheme({
  name: "A.B...",
  description: "any number of dot separated integers, e.g. 1.2.3.4.5.6",
});

/** Built-in schemes by identifier, in display order. */
export const BUILT_IN_SCHEMES: ReadonlyMap<string, VersionScheme> = new Map<string, VersionScheme>([
  ["simple3", Simple3VersionScheme],
  ["simple4", Simple4VersionScheme],
  ["simple5", Simple5VersionScheme],
  ["pep440", Pep440VersionScheme],
  ["perl", PerlVersionScheme],
  ["variable-dotted", VariableDottedIntegerVersionScheme],
]);
