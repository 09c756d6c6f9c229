// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Section management: `add-section` and `remove-section`.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { addSection, removeSection } from "../../gitconfig/document";
import type { LoadError } from "../../gitconfig/file";
import {
  type InvalidOptionError,
  type NoSectionError,
  type SystemError,
  noSectionError,
} from "../../lib/errors";
import { logSuccess } from "../../lib/log";
import { modifyConfigFile, resolveSection } from "./utils";

export interface SectionOptions {
  readonly file: string;
  readonly section: string;
}

export const executeAddSection = (
  options: SectionOptions
): Effect.Effect<void, LoadError | SystemError | InvalidOptionError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const id = yield* resolveSection(options.section);
    const created = yield* modifyConfigFile(options.file, (doc) =>
      Effect.gen(function* () {
        return yield* addSection(doc, id.identity);
      })
    );
    yield* created
      ? logSuccess(`Added section [${id.identity}]`)
      : Effect.logInfo(`Section [${id.identity}] already exists`);
  });

export const executeRemoveSection = (
  options: SectionOptions
): Effect.Effect<
  void,
  LoadError | SystemError | InvalidOptionError | NoSectionError,
  FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const id = yield* resolveSection(options.section);
    yield* modifyConfigFile(options.file, (doc) =>
      removeSection(doc, id.identity)
        ? Effect.void
        : Effect.fail(noSectionError(id.identity))
    );
    yield* logSuccess(`Removed section [${id.identity}]`);
  });
