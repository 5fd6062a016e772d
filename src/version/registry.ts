// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Scheme registry.
 *
 * Holds the ordered list of schemes tried when a version is parsed without an
 * explicit scheme. The default instance is configuration: set it once at
 * startup (or in test setup). Changing it while other code is parsing
 * versions from it is the caller's problem; nothing here synchronizes.
 */

import { Array as Arr, Option, pipe } from "effect";
import type { VersionScheme } from "./scheme";
import { BUILT_IN_SCHEMES, Pep440VersionScheme } from "./schemes";

export class SchemeRegistry {
  private schemes: readonly VersionScheme[];

  constructor(schemes: Iterable<VersionScheme> = [Pep440VersionScheme]) {
    this.schemes = Array.from(schemes);
  }

  /** Schemes tried during inference, in order. */
  get supported(): readonly VersionScheme[] {
    return this.schemes;
  }

  setSupportedSchemes(schemes: Iterable<VersionScheme>): void {
    this.schemes = Array.from(schemes);
  }

  /**
   * Look a scheme up by built-in identifier ("pep440", "simple3") or by
   * scheme name ("A.B.C"). Case-insensitive; supported schemes are searched
   * after the built-ins.
   */
  find(name: string): Option.Option<VersionScheme> {
    const key = name.toLowerCase();
    return pipe(
      Option.fromNullable(BUILT_IN_SCHEMES.get(key)),
      Option.orElse(() =>
        Arr.findFirst(
          [...BUILT_IN_SCHEMES.values(), ...this.schemes],
          (scheme) => scheme.name.toLowerCase() === key
        )
      )
    );
  }
}

/** Registry used when a caller does not pass one. */
export const defaultRegistry: SchemeRegistry = new SchemeRegistry();

/** Reconfigure the default registry. */
export const setSupportedSchemes = (schemes: Iterable<VersionScheme>): void =>
  defaultRegistry.setSupportedSchemes(schemes);

/** Built-in identifiers with their schemes, for listings. */
export const builtInSchemes = (): ReadonlyArray<readonly [string, VersionScheme]> =>
  Array.from(BUILT_IN_SCHEMES.entries());
