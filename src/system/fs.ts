// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Filesystem operations as Effects over the platform FileSystem service.
 * Platform errors are mapped to SystemError so callers see one error shape.
 */

import { FileSystem } from "@effect/platform";
import { Effect, pipe } from "effect";
import { ErrorCode, SystemError, type SystemErrorCode, causeOf, errorMessage } from "../lib/errors";

const toSystemError =
  (code: SystemErrorCode, message: string, path: string) =>
  (e: unknown): SystemError =>
    new SystemError({
      code,
      message: `${message}: ${errorMessage(e)}`,
      path,
      ...causeOf(e),
    });

export const pathWithSuffix = (base: string, suffix: string): string => `${base}${suffix}`;

/**
 * Read file contents as raw bytes, leaving decoding to the caller.
 */
export const readFileBytes = (
  path: string
): Effect.Effect<Uint8Array, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* pipe(
      fs.readFile(path),
      Effect.mapError(toSystemError(ErrorCode.FILE_READ_FAILED, `Failed to read file ${path}`, path))
    );
  });

export const writeFileBytes = (
  path: string,
  content: Uint8Array
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* pipe(
      fs.writeFile(path, content),
      Effect.mapError(
        toSystemError(ErrorCode.FILE_WRITE_FAILED, `Failed to write file ${path}`, path)
      )
    );
  });

/**
 * Check if a file exists.
 */
export const fileExists = (
  path: string
): Effect.Effect<boolean, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* pipe(
      fs.exists(path),
      Effect.mapError(toSystemError(ErrorCode.FILE_READ_FAILED, `Failed to stat ${path}`, path))
    );
  });

/**
 * Atomically write a file by writing to a temp file beside it first.
 * A failed rename removes the temp file.
 */
export const atomicWrite = (
  filePath: string,
  content: Uint8Array
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const tempPath = pathWithSuffix(
      filePath,
      `.tmp.${process.pid}.${Math.random().toString(36).slice(2, 8)}`
    );

    yield* writeFileBytes(tempPath, content);
    yield* pipe(
      fs.rename(tempPath, filePath),
      Effect.mapError(
        toSystemError(ErrorCode.FILE_WRITE_FAILED, `Failed to atomically write ${filePath}`, filePath)
      ),
      Effect.tapError(() => Effect.ignore(fs.remove(tempPath)))
    );
  });
