// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Report which scheme accepts a version, and its field values.
 */

import { Effect, Option } from "effect";
import type { VersioEffectError } from "../../lib/errors";
import { schemeFields } from "../../version/scheme";
import { Version } from "../../version/version";
import { type CommandContext, emit, versionOptions } from "./utils";

export interface CheckOptions {
  readonly ctx: CommandContext;
  readonly version: string;
}

export const executeCheck = (options: CheckOptions): Effect.Effect<void, VersioEffectError> =>
  Effect.gen(function* () {
    const { ctx } = options;
    const parse = yield* versionOptions(ctx.settings);
    const version = yield* Version.parse(options.version, parse);
    const fields = Object.fromEntries(
      schemeFields(version.scheme).map((name) => [name, Option.getOrNull(version.field(name))])
    );

    yield* Effect.logDebug(`${options.version} accepted by ${version.scheme.name}`);
    yield* emit(ctx, version.scheme.name, {
      version: version.toString(),
      scheme: version.scheme.name,
      fields,
    });
  });
