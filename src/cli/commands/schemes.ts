// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * List the built-in schemes.
 */

import { Effect } from "effect";
import { writeJson, writeOutput } from "../../lib/log";
import { builtInSchemes } from "../../version/registry";
import { schemeFields } from "../../version/scheme";
import type { CommandContext } from "./utils";

export interface SchemesOptions {
  readonly ctx: CommandContext;
}

export const executeSchemes = (options: SchemesOptions): Effect.Effect<void> =>
  options.ctx.format === "json"
    ? writeJson(
        builtInSchemes().map(([id, scheme]) => ({
          id,
          name: scheme.name,
          description: scheme.description,
          fields: schemeFields(scheme),
        }))
      )
    : Effect.forEach(
        builtInSchemes(),
        ([id, scheme]) => writeOutput(`${id.padEnd(16)} ${scheme.name.padEnd(10)} ${scheme.description}`),
        { discard: true }
      );
