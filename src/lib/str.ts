// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * String operations at the character level. Uses `Array.from()` throughout
 * for correct Unicode surrogate pair handling (string indexing does not).
 * All multi argument functions are curried data-last for `pipe()` composition.
 */

import { Option } from "effect";
import type { CharPred } from "./char";

export const chars = (s: string): readonly string[] => Array.from(s);

/** Split into `[head, tail]`, returning `None` for empty strings. */
export const uncons = (s: string): Option.Option<readonly [string, string]> => {
  const arr = chars(s);
  const first = arr[0];
  return first !== undefined ? Option.some([first, arr.slice(1).join("")] as const) : Option.none();
};

/** Lift a `CharPred` to operate on an entire string (every character must satisfy). */
export const all =
  (pred: CharPred) =>
  (s: string): boolean =>
    chars(s).every(pred);

export const mapCharsToString =
  (f: (c: string) => string) =>
  (s: string): string =>
    Array.from(s).map(f).join("");

/** Drop leading characters matching `pred`. */
export const dropWhile =
  (pred: CharPred) =>
  (s: string): string => {
    const arr = chars(s);
    const index = arr.findIndex((c) => !pred(c));
    return index === -1 ? "" : arr.slice(index).join("");
  };

/** Count trailing occurrences of `char` (e.g. backslashes before a line break). */
export const countTrailing =
  (char: string) =>
  (s: string): number => {
    const arr = chars(s);
    const index = arr.findLastIndex((c) => c !== char);
    return arr.length - 1 - index;
  };

/** Replace characters via a lookup map, passing through unmapped characters. */
export const escapeWith = (mapping: ReadonlyMap<string, string>): ((s: string) => string) =>
  mapCharsToString((c) => mapping.get(c) ?? c);
