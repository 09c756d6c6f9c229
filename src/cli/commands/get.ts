// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Print the value(s) of one key, one line per multivar entry.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { LogFormat } from "../../config/field-values";
import { getAll } from "../../gitconfig/document";
import { type LoadError, loadConfigFile } from "../../gitconfig/file";
import type { InvalidOptionError, NoOptionError, NoSectionError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { resolveSection } from "./utils";

export interface GetOptions {
  readonly file: string;
  readonly section: string;
  readonly key: string;
  readonly format: LogFormat;
}

export const executeGet = (
  options: GetOptions
): Effect.Effect<
  void,
  LoadError | InvalidOptionError | NoSectionError | NoOptionError,
  FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const id = yield* resolveSection(options.section);
    const doc = yield* loadConfigFile(options.file);
    const values = yield* getAll(doc, id.identity, options.key);

    yield* options.format === "json"
      ? writeOutput(JSON.stringify(values))
      : Effect.forEach(values, writeOutput, { discard: true });
    yield* Effect.logDebug(`${values.length} value(s) for ${options.key}`);
  });
