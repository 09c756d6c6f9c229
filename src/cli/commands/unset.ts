// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Remove a key, or only the values of it that match a pattern.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, type Either, Option } from "effect";
import { removeOption, removeOptionRegexp } from "../../gitconfig/document";
import type { LoadError } from "../../gitconfig/file";
import {
  type InvalidOptionError,
  type InvalidPatternError,
  type NoOptionError,
  type NoSectionError,
  type SystemError,
  noOptionError,
} from "../../lib/errors";
import { logSuccess } from "../../lib/log";
import { modifyConfigFile, resolveSection } from "./utils";

export interface UnsetOptions {
  readonly file: string;
  readonly section: string;
  readonly key: string;
  readonly pattern: Option.Option<string>;
}

export const executeUnset = (
  options: UnsetOptions
): Effect.Effect<
  void,
  | LoadError
  | SystemError
  | InvalidOptionError
  | InvalidPatternError
  | NoSectionError
  | NoOptionError,
  FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const id = yield* resolveSection(options.section);
    yield* modifyConfigFile(options.file, (doc) =>
      Effect.gen(function* () {
        const removal: Either.Either<boolean, NoSectionError | InvalidPatternError> = Option.match(
          options.pattern,
          {
            onNone: () => removeOption(doc, id.identity, options.key),
            onSome: (pattern) => removeOptionRegexp(doc, id.identity, options.key, pattern),
          }
        );
        const removed = yield* removal;
        if (!removed) {
          return yield* Effect.fail(noOptionError(id.identity, options.key));
        }
      })
    );
    yield* logSuccess(`Removed ${options.key} from [${options.section}]`);
  });
