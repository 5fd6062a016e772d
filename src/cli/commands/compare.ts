// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Compare two versions and print `<`, `=` or `>`.
 */

import { Effect, Option } from "effect";
import { type Ordering, orderingSymbol } from "../../lib/comparable";
import { ErrorCode, GeneralError, type VersioEffectError } from "../../lib/errors";
import { Version } from "../../version/version";
import { type CommandContext, emit, versionOptions } from "./utils";

export interface CompareOptions {
  readonly ctx: CommandContext;
  readonly left: string;
  readonly right: string;
}

export const executeCompare = (options: CompareOptions): Effect.Effect<void, VersioEffectError> =>
  Effect.gen(function* () {
    const { ctx, left, right } = options;
    const parse = yield* versionOptions(ctx.settings);
    const version = yield* Version.parse(left, parse);

    const ordering = yield* Option.match(version.compare(right), {
      onNone: (): Effect.Effect<Ordering, GeneralError> =>
        Effect.fail(
          new GeneralError({
            code: ErrorCode.NOT_COMPARABLE,
            message: `"${right}" is not a ${version.scheme.name} version; can not compare with ${left}`,
          })
        ),
      onSome: (o): Effect.Effect<Ordering, GeneralError> => Effect.succeed(o),
    });

    yield* emit(ctx, orderingSymbol(ordering), {
      left,
      right,
      result: ordering,
      symbol: orderingSymbol(ordering),
    });
  });
