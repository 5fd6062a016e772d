// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Print what a version becomes after a bump, without touching any file.
 */

import { Effect } from "effect";
import { ErrorCode, GeneralError, type VersioEffectError } from "../../lib/errors";
import { Version } from "../../version/version";
import type { BumpArgs } from "../options";
import { type CommandContext, describeTarget, emit, toBumpOptions, versionOptions } from "./utils";

export interface NextOptions {
  readonly ctx: CommandContext;
  readonly version: string;
  readonly bump: BumpArgs;
}

export const executeNext = (options: NextOptions): Effect.Effect<void, VersioEffectError> =>
  Effect.gen(function* () {
    const { ctx, bump } = options;
    const parse = yield* versionOptions(ctx.settings);
    const version = yield* Version.parse(options.version, parse);
    const before = version.toString();

    if (!version.bump(toBumpOptions(bump))) {
      return yield* Effect.fail(
        new GeneralError({
          code: ErrorCode.BUMP_REJECTED,
          message: `Can not bump ${describeTarget(bump)} of ${before}`,
        })
      );
    }

    yield* Effect.logDebug(`${before} -> ${version.toString()} (${version.scheme.name})`);
    yield* emit(ctx, version.toString(), { before, after: version.toString() });
  });
