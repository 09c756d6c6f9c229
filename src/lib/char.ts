// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Character predicates for key and section name validation. Range
 * comparisons keep the ASCII-only rules of the file format explicit.
 */

/** Predicate over a single character. */
export type CharPred = (c: string) => boolean;

export const isLower: CharPred = (c) => c >= "a" && c <= "z";

export const isUpper: CharPred = (c) => c >= "A" && c <= "Z";

export const isDigit: CharPred = (c) => c >= "0" && c <= "9";

export const isAlpha: CharPred = (c) => isLower(c) || isUpper(c);

export const isAlphaNum: CharPred = (c) => isAlpha(c) || isDigit(c);

/** Indentation characters accepted before option lines. */
export const isIndent: CharPred = (c) => c === " " || c === "\t";

export const isWhitespace: CharPred = (c) => c === " " || c === "\t" || c === "\n" || c === "\r";

export const isOneOf =
  (chars: string): CharPred =>
  (c): boolean =>
    chars.includes(c);

/** Characters allowed in an option key after the leading letter. */
export const isKeyChar: CharPred = (c) => isAlphaNum(c) || c === "-";

/** Characters allowed in a section name (the part before any subsection). */
export const isSectionNameChar: CharPred = (c) => isAlphaNum(c) || isOneOf("-.")(c);
