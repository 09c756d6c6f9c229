// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Rewrite a config file in canonical form: tab indentation, `key = value`,
 * comments and blank lines dropped.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { type LoadError, loadConfigFile, saveConfigFile } from "../../gitconfig/file";
import type { SystemError } from "../../lib/errors";
import { logSuccess } from "../../lib/log";

export interface FormatOptions {
  readonly file: string;
}

export const executeFormat = (
  options: FormatOptions
): Effect.Effect<void, LoadError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const doc = yield* loadConfigFile(options.file);
    yield* saveConfigFile(options.file, doc);
    yield* logSuccess(`Formatted ${options.file}`);
  });
