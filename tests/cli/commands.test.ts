// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { NodeContext } from "@effect/platform-node";
import { Cause, type Effect, Exit, LogLevel, Logger, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { executeBump } from "../../src/cli/commands/bump";
import { executeCheck } from "../../src/cli/commands/check";
import { executeCompare } from "../../src/cli/commands/compare";
import { executeNext } from "../../src/cli/commands/next";
import { executeSchemes } from "../../src/cli/commands/schemes";
import { executeShow } from "../../src/cli/commands/show";
import type { CommandContext } from "../../src/cli/commands/utils";
import type { BumpArgs } from "../../src/cli/options";
import type { LogFormat } from "../../src/config/field-values";
import { emptyConfig } from "../../src/config/schema";
import { makeTempDir, removeTempDir, runTestExit } from "../helpers/layers";

const context = (
  format: LogFormat,
  scheme: Option.Option<string> = Option.none()
): CommandContext => ({
  config: emptyConfig,
  settings: {
    logLevel: "info",
    logFormat: format,
    scheme,
    schemes: ["pep440"],
    file: "package.json",
  },
  format,
});

const bumpArgs = (overrides: Partial<BumpArgs> = {}): BumpArgs => ({
  field: Option.none(),
  subIndex: -1,
  sequence: Option.none(),
  promote: false,
  ...overrides,
});

/** Run quietly; log lines would otherwise mix with program output. */
const run = <E extends { readonly code: number }>(
  effect: Effect.Effect<void, E, NodeContext.NodeContext>
): Promise<Exit.Exit<void, E>> => runTestExit(Logger.withMinimumLogLevel(effect, LogLevel.None));

const failureCode = <E extends { readonly code: number }>(
  exit: Exit.Exit<void, E>
): Option.Option<number> =>
  Exit.isFailure(exit) ? Option.map(Cause.failureOption(exit.cause), (e) => e.code) : Option.none();

describe("commands", () => {
  let output: string[] = [];

  beforeEach(() => {
    output = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      output.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ==========================================================================
  // next
  // ==========================================================================

  describe("next", () => {
    test("prints the bumped version", async () => {
      const exit = await run(
        executeNext({
          ctx: context("pretty", Option.some("simple3")),
          version: "1.2.3",
          bump: bumpArgs({ field: Option.some("minor") }),
        })
      );

      expect(Exit.isSuccess(exit)).toBe(true);
      expect(output).toEqual(["1.3.0\n"]);
    });

    test("JSON output", async () => {
      await run(
        executeNext({
          ctx: context("json"),
          version: "1.0rc1",
          bump: bumpArgs({ field: Option.some("pre") }),
        })
      );

      expect(output).toEqual(['{"before":"1.0rc1","after":"1.0rc2"}\n']);
    });

    test("refused bump", async () => {
      const exit = await run(
        executeNext({
          ctx: context("pretty"),
          version: "1.0",
          bump: bumpArgs({ field: Option.some("foo") }),
        })
      );

      expect(failureCode(exit)).toEqual(Option.some(23));
      expect(output).toEqual([]);
    });

    test("unparseable version", async () => {
      const exit = await run(
        executeNext({
          ctx: context("pretty", Option.some("simple3")),
          version: "1.0",
          bump: bumpArgs(),
        })
      );

      expect(failureCode(exit)).toEqual(Option.some(20));
    });
  });

  // ==========================================================================
  // compare
  // ==========================================================================

  describe("compare", () => {
    test("prints the relation", async () => {
      await run(executeCompare({ ctx: context("pretty"), left: "1.2", right: "1.10" }));
      await run(executeCompare({ ctx: context("pretty"), left: "1.0", right: "1.0.0" }));
      await run(executeCompare({ ctx: context("pretty"), left: "2.0", right: "2.0rc1" }));

      expect(output).toEqual(["<\n", "=\n", ">\n"]);
    });

    test("JSON output", async () => {
      await run(executeCompare({ ctx: context("json"), left: "1.0", right: "1.1" }));

      expect(output).toEqual(['{"left":"1.0","right":"1.1","result":-1,"symbol":"<"}\n']);
    });

    test("right side must fit the left side's scheme", async () => {
      const exit = await run(
        executeCompare({
          ctx: context("pretty", Option.some("simple3")),
          left: "1.2.3",
          right: "1.2",
        })
      );

      expect(failureCode(exit)).toEqual(Option.some(3));
    });
  });

  // ==========================================================================
  // check and schemes
  // ==========================================================================

  test("check reports scheme and fields", async () => {
    await run(executeCheck({ ctx: context("json"), version: "1.2.3rc1" }));

    expect(output.map((line) => JSON.parse(line))).toEqual([
      {
        version: "1.2.3rc1",
        scheme: "pep440",
        fields: { release: "1.2.3", pre: "rc1", post: null, dev: null, local: null },
      },
    ]);
  });

  test("schemes lists every built-in", async () => {
    await run(executeSchemes({ ctx: context("pretty") }));

    expect(output).toHaveLength(6);
    expect(output[0]).toBe(
      `${"simple3".padEnd(16)} ${"A.B.C".padEnd(10)} three numeric parts, e.g. 1.2.3\n`
    );
  });

  // ==========================================================================
  // show and bump (project files)
  // ==========================================================================

  describe("project files", () => {
    let dir = "";

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    test("show prints the stored version", async () => {
      const file = join(dir, "VERSION");
      await writeFile(file, "4.5.6\n");

      await run(executeShow({ ctx: context("pretty"), file }));

      expect(output).toEqual(["4.5.6\n"]);
    });

    test("bump writes the file and reports", async () => {
      const file = join(dir, "VERSION");
      await writeFile(file, "4.5.6\n");

      const exit = await run(
        executeBump({
          ctx: context("json"),
          file,
          bump: bumpArgs({ field: Option.some("major") }),
        })
      );

      expect(Exit.isSuccess(exit)).toBe(true);
      expect(await readFile(file, "utf8")).toBe("5.0.0\n");
      expect(output.map((line) => JSON.parse(line))).toEqual([
        { path: file, before: "4.5.6", after: "5.0.0", changed: true },
      ]);
    });

    test("refused bump leaves the file as it was", async () => {
      const file = join(dir, "VERSION");
      await writeFile(file, "1.0.dev3\n");

      const exit = await run(
        executeBump({
          ctx: context("pretty"),
          file,
          bump: bumpArgs({ field: Option.some("dev"), subIndex: 0 }),
        })
      );

      expect(failureCode(exit)).toEqual(Option.some(23));
      expect(await readFile(file, "utf8")).toBe("1.0.dev3\n");
    });
  });
});
