// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Document to text. Output is canonical: one tab before every option line
 * regardless of how the source was indented, one line per multivar value
 * in stored order, `\n` after every line.
 */

import { Array as Arr, Match, pipe } from "effect";
import type { ConfigDocument, Section } from "./document";
import type { OptionKey } from "./key";
import { type Entry, entries } from "./value";

export const INDENT = "\t";

export const formatHeader = (section: Section): string => `[${section.id.identity}]`;

/** An assigned empty value keeps its `=` (the trailing space is trimmed). */
export const formatEntry = (key: OptionKey, entry: Entry): string =>
  pipe(
    Match.value(entry),
    Match.tag("Assigned", ({ text }) => `${INDENT}${key} = ${text}`.trimEnd()),
    Match.tag("Bare", () => `${INDENT}${key}`),
    Match.exhaustive
  );

export const formatSection = (section: Section): readonly string[] => [
  formatHeader(section),
  ...Arr.flatMap(Array.from(section.options), ([key, value]) =>
    Arr.map(entries(value), (entry) => formatEntry(key, entry))
  ),
];

export const serialize = (doc: ConfigDocument): string =>
  pipe(
    Array.from(doc.sections.values()),
    Arr.flatMap(formatSection),
    Arr.map((line) => `${line}\n`),
    Arr.join("")
  );
