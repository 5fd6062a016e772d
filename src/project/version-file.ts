// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Project version files. The format is chosen by file name:
 *
 * - `package.json` (or any `.json`): the top-level `version` string
 * - `*.py`: a `__version__ = '...'` line
 * - anything else: the whole file, trimmed
 *
 * Writes keep the rest of the file intact. A Python module without a
 * `__version__` line gets one appended. Log lines carry a `file` annotation.
 */

import { basename, extname } from "node:path";
import { FileSystem } from "@effect/platform";
import { Effect, Match, Option, Schema, pipe } from "effect";
import {
  ErrorCode,
  SystemError,
  type VersionError,
  causeOf,
  errorMessage,
} from "../lib/errors";
import { type BumpOptions, Version, type VersionOptions } from "../version/version";

export type VersionFileFormat = "json" | "python" | "text";

export interface BumpReport {
  readonly path: string;
  readonly before: string;
  readonly after: string;
  readonly changed: boolean;
}

const PYTHON_VERSION = /^__version__\s*=\s*['"](\S+)['"]/m;

const pythonVersionLine = (version: string): string => `__version__ = '${version}'`;

const PackageVersion = Schema.Struct({ version: Schema.String });
const JsonObject = Schema.Record({ key: Schema.String, value: Schema.Unknown });

export const detectFormat = (path: string): VersionFileFormat =>
  pipe(
    Match.value(extname(basename(path)).toLowerCase()),
    Match.when(".json", (): VersionFileFormat => "json"),
    Match.when(".py", (): VersionFileFormat => "python"),
    Match.orElse((): VersionFileFormat => "text")
  );

// ─────────────────────────────────────────────────────────────────────────────
// File access
// ─────────────────────────────────────────────────────────────────────────────

const invalid = (path: string, reason: string, cause?: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.VERSION_FILE_INVALID,
    message: `Invalid version file ${path}: ${reason}`,
    path,
    ...causeOf(cause),
  });

const readContent = (
  path: string
): Effect.Effect<string, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const exists = yield* fs.exists(path).pipe(
      Effect.mapError(
        (e) =>
          new SystemError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to stat ${path}: ${errorMessage(e)}`,
            path,
            ...causeOf(e),
          })
      )
    );
    if (!exists) {
      return yield* Effect.fail(
        new SystemError({
          code: ErrorCode.VERSION_FILE_NOT_FOUND,
          message: `Version file not found: ${path}`,
          path,
        })
      );
    }
    return yield* fs.readFileString(path).pipe(
      Effect.mapError(
        (e) =>
          new SystemError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to read ${path}: ${errorMessage(e)}`,
            path,
            ...causeOf(e),
          })
      )
    );
  });

const writeContent = (
  path: string,
  content: string
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(path, content).pipe(
      Effect.mapError(
        (e) =>
          new SystemError({
            code: ErrorCode.FILE_WRITE_FAILED,
            message: `Failed to write ${path}: ${errorMessage(e)}`,
            path,
            ...causeOf(e),
          })
      )
    );
  });

const parseJson = (path: string, content: string): Effect.Effect<unknown, SystemError> =>
  Effect.try({
    try: (): unknown => JSON.parse(content),
    catch: (e): SystemError => invalid(path, errorMessage(e), e),
  });

// ─────────────────────────────────────────────────────────────────────────────
// Extract / replace
// ─────────────────────────────────────────────────────────────────────────────

const extractVersion = (
  path: string,
  content: string
): Effect.Effect<string, SystemError> =>
  pipe(
    Match.value(detectFormat(path)),
    Match.when("json", () =>
      pipe(
        parseJson(path, content),
        Effect.flatMap((data) =>
          Schema.decodeUnknown(PackageVersion)(data).pipe(
            Effect.mapError((e) => invalid(path, "no string `version` field", e))
          )
        ),
        Effect.map(({ version }) => version)
      )
    ),
    Match.when("python", () =>
      pipe(
        Option.fromNullable(PYTHON_VERSION.exec(content)),
        Option.flatMap(([, version]) => Option.fromNullable(version)),
        Option.match({
          onNone: () => Effect.fail(invalid(path, "no __version__ assignment")),
          onSome: (version) => Effect.succeed(version),
        })
      )
    ),
    Match.when("text", () => {
      const version = content.trim();
      return version === ""
        ? Effect.fail(invalid(path, "file is empty"))
        : Effect.succeed(version);
    }),
    Match.exhaustive
  );

const replaceVersion = (
  path: string,
  content: string,
  version: string
): Effect.Effect<string, SystemError> =>
  pipe(
    Match.value(detectFormat(path)),
    Match.when("json", () =>
      pipe(
        parseJson(path, content),
        Effect.flatMap((data) =>
          Schema.decodeUnknown(JsonObject)(data).pipe(
            Effect.mapError((e) => invalid(path, "expected a JSON object", e))
          )
        ),
        Effect.map((object) => `${JSON.stringify({ ...object, version }, null, 2)}\n`)
      )
    ),
    Match.when("python", () =>
      Effect.succeed(
        PYTHON_VERSION.test(content)
          ? content.replace(PYTHON_VERSION, pythonVersionLine(version))
          : `${content}\n${pythonVersionLine(version)}\n`
      )
    ),
    Match.when("text", () => Effect.succeed(`${version}\n`)),
    Match.exhaustive
  );

// ─────────────────────────────────────────────────────────────────────────────
// Public operations
// ─────────────────────────────────────────────────────────────────────────────

/** Raw version string stored in a file. */
export const readVersionString = (
  path: string
): Effect.Effect<string, SystemError, FileSystem.FileSystem> =>
  pipe(
    readContent(path),
    Effect.flatMap((content) => extractVersion(path, content))
  );

export const readProjectVersion = (
  path: string,
  options: VersionOptions = {}
): Effect.Effect<Version, SystemError | VersionError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const raw = yield* readVersionString(path);
    const version = yield* Version.parse(raw, options);
    yield* Effect.logDebug(`Read ${version.toString()} (${version.scheme.name})`);
    return version;
  }).pipe(Effect.annotateLogs("file", path));

/**
 * Store a version. Plain text files are created when missing; JSON and
 * Python files must already exist.
 */
export const writeProjectVersion = (
  path: string,
  version: Version | string
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const text = String(version);
    const existing: Effect.Effect<string, SystemError, FileSystem.FileSystem> =
      detectFormat(path) === "text" ? Effect.succeed("") : readContent(path);
    const content = yield* existing;
    const updated = yield* replaceVersion(path, content, text);
    yield* writeContent(path, updated);
    yield* Effect.logInfo(`Wrote version ${text}`);
  }).pipe(Effect.annotateLogs("file", path));

/**
 * Read, bump and write back. The file is left untouched when the bump does
 * not change the version.
 */
export const bumpProjectVersion = (
  path: string,
  bump: BumpOptions = {},
  options: VersionOptions = {}
): Effect.Effect<BumpReport, SystemError | VersionError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const version = yield* readProjectVersion(path, options);
    const before = version.toString();
    const changed = version.bump(bump);
    const after = version.toString();
    yield* Effect.logDebug(`Bump ${before} -> ${after} (changed: ${String(changed)})`);
    if (changed) {
      yield* writeProjectVersion(path, after);
    }
    return { path, before, after, changed };
  }).pipe(Effect.annotateLogs("file", path));
