// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Option keys are case-insensitive. The branded `OptionKey` is the only
 * form used for storage and lookup, so an un-normalized spelling can never
 * reach a section map.
 */

import { Brand, Either, Option, pipe } from "effect";
import { isAlpha, isKeyChar } from "../lib/char";
import { type InvalidOptionError, invalidOptionError } from "../lib/errors";
import { all, uncons } from "../lib/str";

export type OptionKey = string & Brand.Brand<"OptionKey">;

const OptionKey = Brand.nominal<OptionKey>();

/** A key starts with a letter and continues with letters, digits and `-`. */
export const isValidKey = (raw: string): boolean =>
  pipe(
    uncons(raw),
    Option.exists(([head, tail]) => isAlpha(head) && all(isKeyChar)(tail))
  );

/** Case-fold without validation. Lookups of keys that were never valid simply miss. */
export const normalizeKey = (raw: string): OptionKey => OptionKey(raw.trim().toLowerCase());

export const parseKey = (raw: string): Either.Either<OptionKey, InvalidOptionError> => {
  const trimmed = raw.trim();
  return isValidKey(trimmed)
    ? Either.right(normalizeKey(trimmed))
    : Either.left(invalidOptionError(`Invalid key: ${JSON.stringify(raw)}`));
};
