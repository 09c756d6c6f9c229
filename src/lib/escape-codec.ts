// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Escaping for the quoted subsection of a section header, as in
 * `[remote "dir\\with \"quotes\""]`. The header text keeps the escaped
 * form; `SectionParts.subsection` holds the unescaped one.
 */

import { Array as Arr, pipe } from "effect";

import { escapeWith } from "./str";

export interface EscapeCodec {
  /** Logical subsection text to the form written between the quotes. */
  readonly escape: (s: string) => string;
  /** Quoted form back to logical text. */
  readonly unescape: (s: string) => string;
}

/** Scan state: whether the previous character was an unconsumed prefix. */
type Pending = boolean;

const unescapeWith =
  (prefix: string, mapping: ReadonlyMap<string, string>) =>
  (s: string): string =>
    pipe(
      Arr.mapAccum(Array.from(s), false, (pending: Pending, c): [Pending, string] => {
        if (pending) {
          return [false, mapping.get(c) ?? c];
        }
        return c === prefix ? [true, ""] : [false, c];
      }),
      ([, chars]) => chars.join("")
    );

/**
 * Build a codec from a prefix and `[original, trigger]` pairs; both
 * directions come from the one list. `\x` with no mapping reads as `x`.
 */
export const makeEscapeCodec = (
  prefix: string,
  pairs: ReadonlyArray<readonly [original: string, trigger: string]>
): EscapeCodec => {
  const escapes: ReadonlyMap<string, string> = new Map(
    pairs.map(([original, trigger]) => [original, `${prefix}${trigger}`])
  );
  const unescapes: ReadonlyMap<string, string> = new Map(
    pairs.map(([original, trigger]) => [trigger, original])
  );
  return { escape: escapeWith(escapes), unescape: unescapeWith(prefix, unescapes) };
};

/** Only `"` and `\` are escaped inside a quoted subsection. */
export const subsectionEscapeCodec: EscapeCodec = makeEscapeCodec("\\", [
  ["\\", "\\"],
  ['"', '"'],
]);
