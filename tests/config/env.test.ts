// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Exit, Option } from "effect";
import { describe, expect, test } from "vitest";
import { EnvConfigSpec, createTestConfigProvider } from "../../src/config/env";

const load = (provider: ReturnType<typeof createTestConfigProvider>) =>
  Effect.runPromiseExit(Effect.withConfigProvider(EnvConfigSpec, provider));

describe("EnvConfigSpec", () => {
  test("everything unset", async () => {
    const env = await Effect.runPromise(
      Effect.withConfigProvider(EnvConfigSpec, createTestConfigProvider())
    );

    expect(env).toEqual({
      logging: { level: Option.none(), format: Option.none() },
      scheme: Option.none(),
      file: Option.none(),
      debug: false,
    });
  });

  test("reads VERSIO_ variables", async () => {
    const env = await Effect.runPromise(
      Effect.withConfigProvider(
        EnvConfigSpec,
        createTestConfigProvider({
          logLevel: "debug",
          logFormat: "json",
          scheme: "simple3",
          file: "VERSION",
          debug: "true",
        })
      )
    );

    expect(env.logging.level).toEqual(Option.some("debug"));
    expect(env.logging.format).toEqual(Option.some("json"));
    expect(env.scheme).toEqual(Option.some("simple3"));
    expect(env.file).toEqual(Option.some("VERSION"));
    expect(env.debug).toBe(true);
  });

  test("rejects an unknown log level", async () => {
    const exit = await load(createTestConfigProvider({ logLevel: "loud" }));

    expect(Exit.isFailure(exit)).toBe(true);
  });

  test("rejects a non-boolean debug flag", async () => {
    const exit = await load(createTestConfigProvider({ debug: "maybe" }));

    expect(Exit.isFailure(exit)).toBe(true);
  });
});
