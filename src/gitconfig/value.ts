// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Stored option values.
 *
 * An entry is one occurrence of a key: either assigned text or a bare key
 * (no `=`). A key's stored value is `One` or `Many`; `Many` always holds at
 * least two entries. The transitions between the two (`append`, `retain`)
 * are the only way entries are added or dropped, so the invariant lives
 * here rather than at every call site.
 */

import { Array as Arr, Data, Match, Option, pipe } from "effect";

export type Entry = Data.TaggedEnum<{
  Assigned: { readonly text: string };
  Bare: object;
}>;

export const { Assigned, Bare } = Data.taggedEnum<Entry>();

export type StoredValue = Data.TaggedEnum<{
  One: { readonly entry: Entry };
  Many: { readonly entries: readonly [Entry, Entry, ...Entry[]] };
}>;

export const { One, Many } = Data.taggedEnum<StoredValue>();

/** What `get` hands back: a string for one entry, an ordered array for a multivar. */
export type OptionValue = string | readonly string[];

/** Bare keys are boolean switches that read as true. */
export const BARE_VALUE = "true";

export const entryText = (entry: Entry): string =>
  pipe(
    Match.value(entry),
    Match.tag("Assigned", ({ text }) => text),
    Match.tag("Bare", () => BARE_VALUE),
    Match.exhaustive
  );

export const entries = (value: StoredValue): readonly Entry[] =>
  pipe(
    Match.value(value),
    Match.tag("One", ({ entry }): readonly Entry[] => [entry]),
    Match.tag("Many", (many): readonly Entry[] => many.entries),
    Match.exhaustive
  );

/** Rebuild the variant from a list, collapsing to `One` or to nothing. */
export const fromEntries = (list: readonly Entry[]): Option.Option<StoredValue> => {
  const [first, second, ...rest] = list;
  if (first === undefined) {
    return Option.none();
  }
  return second === undefined
    ? Option.some(One({ entry: first }))
    : Option.some(Many({ entries: [first, second, ...rest] }));
};

/** Record another occurrence: `One` becomes a two-entry `Many`, `Many` grows. */
export const append = (value: StoredValue, entry: Entry): StoredValue =>
  pipe(
    Match.value(value),
    Match.tag("One", (one): StoredValue => Many({ entries: [one.entry, entry] })),
    Match.tag("Many", (many): StoredValue => Many({ entries: [...many.entries, entry] })),
    Match.exhaustive
  );

/** Keep entries satisfying `pred`; `None` when nothing is left. */
export const retain = (
  value: StoredValue,
  pred: (entry: Entry) => boolean
): Option.Option<StoredValue> => fromEntries(Arr.filter(entries(value), pred));

export const toOptionValue = (value: StoredValue): OptionValue =>
  pipe(
    Match.value(value),
    Match.tag("One", ({ entry }): OptionValue => entryText(entry)),
    Match.tag("Many", (many): OptionValue => many.entries.map(entryText)),
    Match.exhaustive
  );
