// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for gitini.
 * Tagged errors carry typed codes that map to process exit codes.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;

  // Config document (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly NO_SECTION: 12;
  readonly NO_OPTION: 13;
  readonly INVALID_OPTION: 14;
  readonly INVALID_PATTERN: 15;
  readonly ENCODING_ERROR: 16;

  // System (20-29)
  readonly FILE_READ_FAILED: 27;
  readonly FILE_WRITE_FAILED: 28;
}

/**
 * Error codes for all gitini operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,

  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  NO_SECTION: 12,
  NO_OPTION: 13,
  INVALID_OPTION: 14,
  INVALID_PATTERN: 15,
  ENCODING_ERROR: 16,

  FILE_READ_FAILED: 27,
  FILE_WRITE_FAILED: 28,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export type SystemErrorCode = typeof ErrorCode.FILE_READ_FAILED | typeof ErrorCode.FILE_WRITE_FAILED;

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: SystemErrorCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class ConfigNotFoundError extends Data.TaggedError("ConfigNotFoundError")<{
  readonly code: typeof ErrorCode.CONFIG_NOT_FOUND;
  readonly message: string;
  readonly path: string;
}> {}

export class NoSectionError extends Data.TaggedError("NoSectionError")<{
  readonly code: typeof ErrorCode.NO_SECTION;
  readonly message: string;
  readonly section: string;
}> {}

export class NoOptionError extends Data.TaggedError("NoOptionError")<{
  readonly code: typeof ErrorCode.NO_OPTION;
  readonly message: string;
  readonly section: string;
  readonly key: string;
}> {}

export class InvalidOptionError extends Data.TaggedError("InvalidOptionError")<{
  readonly code: typeof ErrorCode.INVALID_OPTION;
  readonly message: string;
}> {}

export class InvalidPatternError extends Data.TaggedError("InvalidPatternError")<{
  readonly code: typeof ErrorCode.INVALID_PATTERN;
  readonly message: string;
  readonly pattern: string;
  readonly cause?: Error;
}> {}

export class EncodingError extends Data.TaggedError("EncodingError")<{
  readonly code: typeof ErrorCode.ENCODING_ERROR;
  readonly message: string;
  readonly encoding: string;
  readonly cause?: Error;
}> {}

/** One offending line of a config file. */
export interface LineProblem {
  readonly line: number;
  readonly text: string;
  readonly reason: string;
}

/** Parse failure. Every bad line is reported, not just the first. */
export class FormatError extends Data.TaggedError("FormatError")<{
  readonly code: typeof ErrorCode.CONFIG_PARSE_ERROR;
  readonly message: string;
  readonly problems: readonly LineProblem[];
}> {}

export type GitiniError =
  | SystemError
  | ConfigNotFoundError
  | NoSectionError
  | NoOptionError
  | InvalidOptionError
  | InvalidPatternError
  | EncodingError
  | FormatError;

// Constructors for the document errors, so call sites stay one line.

export const noSectionError = (section: string): NoSectionError =>
  new NoSectionError({
    code: ErrorCode.NO_SECTION,
    message: `No section: ${JSON.stringify(section)}`,
    section,
  });

export const noOptionError = (section: string, key: string): NoOptionError =>
  new NoOptionError({
    code: ErrorCode.NO_OPTION,
    message: `No option ${JSON.stringify(key)} in section: ${JSON.stringify(section)}`,
    section,
    key,
  });

export const invalidOptionError = (message: string): InvalidOptionError =>
  new InvalidOptionError({ code: ErrorCode.INVALID_OPTION, message });

export const formatError = (problems: readonly LineProblem[]): FormatError =>
  new FormatError({
    code: ErrorCode.CONFIG_PARSE_ERROR,
    message: [
      `Config contains ${problems.length} parsing error${problems.length === 1 ? "" : "s"}`,
      ...problems.map((p) => `  [line ${p.line}]: ${p.reason}: ${JSON.stringify(p.text)}`),
    ].join("\n"),
    problems,
  });

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

/** Keep only real Error causes, in the spread-friendly shape the error classes take. */
export const causeOf = (e: unknown): { readonly cause?: Error } =>
  e instanceof Error ? { cause: e } : {};
