// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Print the project version.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { VersioEffectError } from "../../lib/errors";
import { readProjectVersion } from "../../project/version-file";
import { type CommandContext, emit, versionOptions } from "./utils";

export interface ShowOptions {
  readonly ctx: CommandContext;
  readonly file: string;
}

export const executeShow = (
  options: ShowOptions
): Effect.Effect<void, VersioEffectError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const { ctx, file } = options;
    const parse = yield* versionOptions(ctx.settings);
    const version = yield* readProjectVersion(file, parse);
    yield* emit(ctx, version.toString(), {
      file,
      version: version.toString(),
      scheme: version.scheme.name,
    });
  });
