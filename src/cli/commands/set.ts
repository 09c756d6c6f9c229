// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `set` replaces every value of a key; `add` appends one more. Both create
 * the section (and the file) when missing.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { type ConfigDocument, openSection, set, setMultivar } from "../../gitconfig/document";
import type { LoadError } from "../../gitconfig/file";
import type { InvalidOptionError, NoSectionError, SystemError } from "../../lib/errors";
import { logSuccess } from "../../lib/log";
import { modifyConfigFile, resolveSection } from "./utils";

export interface SetOptions {
  readonly file: string;
  readonly section: string;
  readonly key: string;
  readonly value: string;
}

type SetError = LoadError | SystemError | InvalidOptionError | NoSectionError;

const assign = (
  options: SetOptions,
  write: typeof set
): Effect.Effect<void, SetError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const id = yield* resolveSection(options.section);
    yield* modifyConfigFile(options.file, (doc: ConfigDocument) =>
      Effect.gen(function* () {
        openSection(doc, id);
        yield* write(doc, id.identity, options.key, options.value);
      })
    );
  });

export const executeSet = (options: SetOptions): Effect.Effect<void, SetError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* assign(options, set);
    yield* logSuccess(`Set ${options.key} in [${options.section}]`);
  });

export const executeAdd = (options: SetOptions): Effect.Effect<void, SetError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* assign(options, setMultivar);
    yield* logSuccess(`Added ${options.key} to [${options.section}]`);
  });
