// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Config file workflow: load a file into a document, save a document back.
 * Parse and encoding failures abort the load; nothing partial is returned.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import {
  ConfigNotFoundError,
  type EncodingError,
  ErrorCode,
  type FormatError,
  type SystemError,
} from "../lib/errors";
import { atomicWrite, fileExists, readFileBytes } from "../system/fs";
import { type ConfigDocument, empty } from "./document";
import { serialize } from "./serializer";
import { type ReadOptions, encodeText, readDocument } from "./stream";

export interface LoadOptions extends ReadOptions {
  /** Treat a missing file as an empty document. */
  readonly missingOk?: boolean;
}

export type LoadError = ConfigNotFoundError | SystemError | EncodingError | FormatError;

export const loadConfigFile = (
  path: string,
  options: LoadOptions = {}
): Effect.Effect<ConfigDocument, LoadError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const exists = yield* fileExists(path);
    if (!exists) {
      if (options.missingOk === true) {
        yield* Effect.logDebug(`No config at ${path}, starting empty`);
        return empty();
      }
      return yield* Effect.fail(
        new ConfigNotFoundError({
          code: ErrorCode.CONFIG_NOT_FOUND,
          message: `Configuration file not found: ${path}`,
          path,
        })
      );
    }

    const bytes = yield* readFileBytes(path);
    const doc = yield* readDocument(bytes, options);
    yield* Effect.logDebug(`Loaded ${doc.sections.size} section(s) from ${path}`);
    return doc;
  }).pipe(Effect.annotateLogs({ path }));

export const saveConfigFile = (
  path: string,
  doc: ConfigDocument
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* atomicWrite(path, encodeText(serialize(doc)));
    yield* Effect.logDebug(`Wrote ${doc.sections.size} section(s) to ${path}`);
  }).pipe(Effect.annotateLogs({ path }));
