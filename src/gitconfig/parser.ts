// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Tokens to document. Problems are collected across the whole input and
 * reported in one FormatError; a failed parse never yields a document.
 */

import { Array as Arr, Either, Match, Option, pipe } from "effect";
import { type FormatError, type LineProblem, formatError } from "../lib/errors";
import { type ConfigDocument, type Section, empty, openSection, recordEntry } from "./document";
import { isValidKey, normalizeKey } from "./key";
import { type LineToken, tokenize } from "./tokenizer";
import { Assigned, Bare } from "./value";

interface ParseState {
  readonly current: Option.Option<Section>;
  readonly problems: readonly LineProblem[];
}

const problem = (line: number, text: string, reason: string): LineProblem => ({
  line,
  text,
  reason,
});

const applyToken =
  (doc: ConfigDocument) =>
  (state: ParseState, token: LineToken): ParseState =>
    pipe(
      Match.value(token),
      Match.tag("Blank", "Comment", (): ParseState => state),
      Match.tag(
        "Header",
        ({ section }): ParseState => ({ ...state, current: Option.some(openSection(doc, section)) })
      ),
      Match.tag("Invalid", ({ line, text, reason }): ParseState => ({
        ...state,
        problems: [...state.problems, problem(line, text, reason)],
      })),
      Match.tag("Entry", ({ line, text, key, value }): ParseState => {
        const fail = (reason: string): ParseState => ({
          ...state,
          problems: [...state.problems, problem(line, text, reason)],
        });
        if (!isValidKey(key)) {
          return fail(key.length === 0 ? "Missing key" : `Invalid key ${JSON.stringify(key)}`);
        }
        return Option.match(state.current, {
          onNone: (): ParseState => fail("Option outside of any section"),
          onSome: (section): ParseState => {
            recordEntry(
              section,
              normalizeKey(key),
              Option.match(value, {
                onNone: () => Bare(),
                onSome: (assigned) => Assigned({ text: assigned }),
              })
            );
            return state;
          },
        });
      }),
      Match.exhaustive
    );

/** Parse config text into a new document. */
export const parse = (text: string): Either.Either<ConfigDocument, FormatError> => {
  const doc = empty();
  const initial: ParseState = { current: Option.none(), problems: [] };
  const { problems } = Arr.reduce(tokenize(text), initial, applyToken(doc));
  return Arr.isNonEmptyReadonlyArray(problems)
    ? Either.left(formatError(problems))
    : Either.right(doc);
};
