// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option } from "effect";
import { describe, expect, test } from "vitest";
import {
  compareKeys,
  compareParts,
  comparisonKey,
  elementOrder,
  reconcileKeys,
  tokenize,
} from "../../src/version/key";
import { fieldScheme } from "../../src/version/scheme";
import {
  Pep440VersionScheme,
  Simple3VersionScheme,
  VariableDottedIntegerVersionScheme,
} from "../../src/version/schemes";

const pepParts = (release: string, pre?: string): Option.Option<string>[] => [
  Option.some(release),
  Option.fromNullable(pre),
  Option.none(),
  Option.none(),
  Option.none(),
];

/** Orders by build number before release. */
const buildFirst = fieldScheme({
  name: "build-first",
  pattern: String.raw`(\d+)\+(\d+)`,
  template: "{0}+{1}",
  fields: ["Release", "Build"],
  compareOrder: [1, 0],
});

describe("key module", () => {
  describe("tokenize", () => {
    test("dotted numbers become bigints", () => {
      expect(tokenize("1.2.3")).toEqual([1n, 2n, 3n]);
    });

    test("prefixed numbers split into runs", () => {
      expect(tokenize("rc12")).toEqual(["rc", 12n]);
      expect(tokenize(".post5")).toEqual(["post", 5n]);
      expect(tokenize("+abc.5")).toEqual(["+abc", 5n]);
    });
  });

  describe("comparisonKey", () => {
    test("absent PEP 440 fields take their fill", () => {
      expect(comparisonKey(Pep440VersionScheme, pepParts("1.2"))).toEqual([
        { present: true, elements: [1n, 2n] },
        { present: false, elements: ["~"] },
        { present: false, elements: [""] },
        { present: false, elements: ["~"] },
        { present: false, elements: [""] },
      ]);
    });

    test("compareOrder permutes fields", () => {
      expect(comparisonKey(buildFirst, [Option.some("2"), Option.some("1")])).toEqual([
        { present: true, elements: [1n] },
        { present: true, elements: [2n] },
      ]);
    });
  });

  describe("reconcileKeys", () => {
    test("shorter release is extended with zeros", () => {
      const [left, right] = reconcileKeys(
        Pep440VersionScheme,
        comparisonKey(Pep440VersionScheme, pepParts("1.0")),
        comparisonKey(Pep440VersionScheme, pepParts("1.0.1"))
      );
      expect(left).toEqual([1n, 0n, 0n, "~", "", "~", ""]);
      expect(right).toEqual([1n, 0n, 1n, "~", "", "~", ""]);
    });

    test("present against absent pads with the clear value", () => {
      const [left, right] = reconcileKeys(
        Pep440VersionScheme,
        comparisonKey(Pep440VersionScheme, pepParts("1", "rc1")),
        comparisonKey(Pep440VersionScheme, pepParts("1"))
      );
      expect(left).toEqual([1n, "rc", 1n, "", "~", ""]);
      expect(right).toEqual([1n, "~", "", "", "~", ""]);
    });

    test("dotted keys pad to equal length", () => {
      const key = (s: string) =>
        comparisonKey(
          VariableDottedIntegerVersionScheme,
          s.split(".").map((p) => Option.some(p))
        );
      const [left, right] = reconcileKeys(
        VariableDottedIntegerVersionScheme,
        key("1.2"),
        key("1.2.0.3")
      );
      expect(left).toEqual([1n, 2n, 0n, 0n]);
      expect(right).toEqual([1n, 2n, 0n, 3n]);
    });
  });

  describe("elementOrder", () => {
    test("integers compare numerically", () => {
      expect(elementOrder(9n, 10n)).toBe(-1);
      expect(elementOrder(10n, 10n)).toBe(0);
    });

    test("text compares by code unit", () => {
      expect(elementOrder("a", "b")).toBe(-1);
      expect(elementOrder("rc", "~")).toBe(-1);
      expect(elementOrder("", "dev")).toBe(-1);
    });

    test("mixed pairs compare as text", () => {
      expect(elementOrder(1n, "a")).toBe(-1);
      expect(elementOrder("~", 5n)).toBe(1);
    });
  });

  test("compareKeys decides at the first difference", () => {
    expect(compareKeys([1n, 2n, 9n], [1n, 3n, 0n])).toBe(-1);
    expect(compareKeys([1n, "b"], [1n, "a"])).toBe(1);
    expect(compareKeys([1n], [1n])).toBe(0);
  });

  describe("compareParts", () => {
    test("Simple3", () => {
      const parts = (s: string) => s.split(".").map((p) => Option.some(p));
      expect(
        compareParts(
          { scheme: Simple3VersionScheme, parts: parts("1.2.10") },
          { scheme: Simple3VersionScheme, parts: parts("1.2.9") }
        )
      ).toBe(1);
    });

    test("compareOrder decides which field leads", () => {
      expect(
        compareParts(
          { scheme: buildFirst, parts: [Option.some("2"), Option.some("1")] },
          { scheme: buildFirst, parts: [Option.some("1"), Option.some("5")] }
        )
      ).toBe(-1);
    });

    test("pre-release sorts before the release", () => {
      expect(
        compareParts(
          { scheme: Pep440VersionScheme, parts: pepParts("2.0", "a1") },
          { scheme: Pep440VersionScheme, parts: pepParts("2.0") }
        )
      ).toBe(-1);
    });
  });
});
