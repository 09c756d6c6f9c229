// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Print every value as `section[.subsection].key=value`, git-style.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { LogFormat } from "../../config/field-values";
import { toEntries } from "../../gitconfig/document";
import { type LoadError, loadConfigFile } from "../../gitconfig/file";
import { writeOutput } from "../../lib/log";

export interface ListOptions {
  readonly file: string;
  readonly format: LogFormat;
}

export const executeList = (
  options: ListOptions
): Effect.Effect<void, LoadError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const doc = yield* loadConfigFile(options.file);
    const entries = toEntries(doc);

    yield* options.format === "json"
      ? writeOutput(JSON.stringify(entries))
      : Effect.forEach(entries, ({ name, value }) => writeOutput(`${name}=${value}`), {
          discard: true,
        });
  });
