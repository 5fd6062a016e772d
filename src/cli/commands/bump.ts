// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Bump the version stored in a project file. A bump that changes nothing
 * is an error and leaves the file as it was.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { ErrorCode, GeneralError, type VersioEffectError } from "../../lib/errors";
import { logSuccess } from "../../lib/log";
import { bumpProjectVersion } from "../../project/version-file";
import type { BumpArgs } from "../options";
import { type CommandContext, describeTarget, emit, toBumpOptions, versionOptions } from "./utils";

export interface BumpCommandOptions {
  readonly ctx: CommandContext;
  readonly file: string;
  readonly bump: BumpArgs;
}

export const executeBump = (
  options: BumpCommandOptions
): Effect.Effect<void, VersioEffectError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const { ctx, file, bump } = options;
    const parse = yield* versionOptions(ctx.settings);
    const report = yield* bumpProjectVersion(file, toBumpOptions(bump), parse);

    if (!report.changed) {
      return yield* Effect.fail(
        new GeneralError({
          code: ErrorCode.BUMP_REJECTED,
          message: `Can not bump ${describeTarget(bump)} of ${report.before}`,
        })
      );
    }

    yield* logSuccess(`${file}: ${report.before} -> ${report.after}`);
    yield* emit(ctx, report.after, { ...report });
  });
