// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Load/modify/save plumbing shared by the commands.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { ConfigDocument } from "../../gitconfig/document";
import { type LoadError, loadConfigFile, saveConfigFile } from "../../gitconfig/file";
import { type SectionId, resolveSectionId } from "../../gitconfig/section-name";
import type { InvalidOptionError, SystemError } from "../../lib/errors";

/** Section argument in either identity or dotted form. */
export const resolveSection = (input: string): Effect.Effect<SectionId, InvalidOptionError> =>
  Effect.gen(function* () {
    return yield* resolveSectionId(input);
  });

/**
 * Load `file`, apply `change`, and save. A missing file starts empty so
 * write commands can create it.
 */
export const modifyConfigFile = <A, E>(
  file: string,
  change: (doc: ConfigDocument) => Effect.Effect<A, E>
): Effect.Effect<A, E | LoadError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const doc = yield* loadConfigFile(file, { missingOk: true });
    const result = yield* change(doc);
    yield* saveConfigFile(file, doc);
    return result;
  });
