// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Cause, HashMap, LogLevel } from "effect";
import { describe, expect, test } from "vitest";
import { formatJson, formatPretty, toEffectLogLevel } from "../../src/lib/effect-logger";

const annotations = (
  entries: ReadonlyArray<readonly [string, unknown]>
): HashMap.HashMap<string, unknown> => HashMap.fromIterable(entries);

describe("effect logger", () => {
  describe("toEffectLogLevel", () => {
    test("maps every level", () => {
      expect(toEffectLogLevel("debug")).toBe(LogLevel.Debug);
      expect(toEffectLogLevel("info")).toBe(LogLevel.Info);
      expect(toEffectLogLevel("warn")).toBe(LogLevel.Warning);
      expect(toEffectLogLevel("error")).toBe(LogLevel.Error);
    });
  });

  describe("formatPretty", () => {
    test("level and message", () => {
      expect(formatPretty(LogLevel.Info, "hello", annotations([]), Cause.empty, false)).toBe(
        "INFO  hello"
      );
      expect(formatPretty(LogLevel.Warning, "careful", annotations([]), Cause.empty, false)).toBe(
        "WARN  careful"
      );
    });

    test("file annotation", () => {
      expect(
        formatPretty(
          LogLevel.Debug,
          "read 1.2.3",
          annotations([["file", "package.json"]]),
          Cause.empty,
          false
        )
      ).toBe("DEBUG [package.json] read 1.2.3");
    });

    test("success style", () => {
      expect(
        formatPretty(LogLevel.Info, "done", annotations([["logStyle", "success"]]), Cause.empty, false)
      ).toBe("✓ done");
    });

    test("unknown style falls back to the level prefix", () => {
      expect(
        formatPretty(LogLevel.Info, "plain", annotations([["logStyle", "loud"]]), Cause.empty, false)
      ).toBe("INFO  plain");
    });

    test("cause follows the message", () => {
      const line = formatPretty(LogLevel.Error, "boom", annotations([]), Cause.fail("bad"), false);

      expect(line.startsWith("ERROR boom\n")).toBe(true);
    });
  });

  describe("formatJson", () => {
    test("one object per line without internal annotations", () => {
      const line = formatJson(
        LogLevel.Info,
        "wrote 1.3.0",
        annotations([
          ["file", "VERSION"],
          ["logStyle", "success"],
          ["scheme", "pep440"],
        ]),
        new Date(0)
      );

      expect(JSON.parse(line)).toEqual({
        timestamp: "1970-01-01T00:00:00.000Z",
        level: "info",
        file: "VERSION",
        message: "wrote 1.3.0",
        scheme: "pep440",
      });
    });
  });
});
