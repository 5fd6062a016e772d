// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for versio.
 * Tagged errors carry a typed error code that maps to a process exit code.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly NOT_COMPARABLE: 3;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;

  // Version (20-29)
  readonly VERSION_UNPARSEABLE: 20;
  readonly VERSION_MALFORMED: 21;
  readonly SCHEME_NOT_FOUND: 22;
  readonly BUMP_REJECTED: 23;

  // Files (30-39)
  readonly FILE_READ_FAILED: 30;
  readonly FILE_WRITE_FAILED: 31;
  readonly VERSION_FILE_NOT_FOUND: 32;
  readonly VERSION_FILE_INVALID: 33;
}

/**
 * Error codes for all versio operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  NOT_COMPARABLE: 3,

  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,

  VERSION_UNPARSEABLE: 20,
  VERSION_MALFORMED: 21,
  SCHEME_NOT_FOUND: 22,
  BUMP_REJECTED: 23,

  FILE_READ_FAILED: 30,
  FILE_WRITE_FAILED: 31,
  VERSION_FILE_NOT_FOUND: 32,
  VERSION_FILE_INVALID: 33,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ─────────────────────────────────────────────────────────────────────────────
// Version errors (raised by the core at construction time)
// ─────────────────────────────────────────────────────────────────────────────

/** No candidate scheme accepted the input. */
export class UnparseableVersionError extends Data.TaggedError("UnparseableVersionError")<{
  readonly code: typeof ErrorCode.VERSION_UNPARSEABLE;
  readonly message: string;
  readonly input: string;
  readonly schemes: readonly string[];
}> {}

/** A split scheme recognized the shape of the input but found it broken (trailing delimiter). */
export class MalformedVersionError extends Data.TaggedError("MalformedVersionError")<{
  readonly code: typeof ErrorCode.VERSION_MALFORMED;
  readonly message: string;
  readonly input: string;
  readonly scheme: string;
}> {}

export type VersionError = UnparseableVersionError | MalformedVersionError;

export const unparseableVersion = (
  input: string,
  schemes: readonly string[]
): UnparseableVersionError =>
  new UnparseableVersionError({
    code: ErrorCode.VERSION_UNPARSEABLE,
    message: `Can not parse "${input}" with any of: ${schemes.join(", ")}`,
    input,
    schemes,
  });

export const malformedVersion = (
  input: string,
  scheme: string,
  reason: string
): MalformedVersionError =>
  new MalformedVersionError({
    code: ErrorCode.VERSION_MALFORMED,
    message: `Invalid version "${input}" for scheme ${scheme}: ${reason}`,
    input,
    scheme,
  });

export const isVersionError = (e: unknown): e is VersionError =>
  e instanceof UnparseableVersionError || e instanceof MalformedVersionError;

// ─────────────────────────────────────────────────────────────────────────────
// Shell errors (CLI, configuration, project files)
// ─────────────────────────────────────────────────────────────────────────────

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code:
    | typeof ErrorCode.GENERAL_ERROR
    | typeof ErrorCode.NOT_COMPARABLE
    | typeof ErrorCode.SCHEME_NOT_FOUND
    | typeof ErrorCode.BUMP_REJECTED;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code:
    | typeof ErrorCode.CONFIG_NOT_FOUND
    | typeof ErrorCode.CONFIG_PARSE_ERROR
    | typeof ErrorCode.CONFIG_VALIDATION_ERROR;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code:
    | typeof ErrorCode.FILE_READ_FAILED
    | typeof ErrorCode.FILE_WRITE_FAILED
    | typeof ErrorCode.VERSION_FILE_NOT_FOUND
    | typeof ErrorCode.VERSION_FILE_INVALID;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

/** Union of every error the CLI knows how to display. */
export type VersioEffectError = VersionError | GeneralError | ConfigError | SystemError;

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: ErrorCodeValue): number => Math.min(code, 125);

/**
 * Get human-readable error code name.
 */
export const getErrorCodeName = (code: ErrorCodeValue): string => {
  const entry = Object.entries(ErrorCode).find(([, v]) => v === code);
  return entry?.[0] ?? "UNKNOWN";
};

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};

/** Spreadable `cause` field, present only when the thrown value is an Error. */
export const causeOf = (e: unknown): { readonly cause?: Error } =>
  e instanceof Error ? { cause: e } : {};
