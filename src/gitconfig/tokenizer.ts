// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Line classification for git-style config text. Pure and total: every
 * physical line ends up in exactly one token (continuation lines are folded
 * into the entry that opened them), and nothing here decides whether a
 * token is acceptable in its position. That is the parser's job.
 */

import { Array as Arr, Data, Either, Match, Option, pipe } from "effect";
import { isIndent, isWhitespace } from "../lib/char";
import { countTrailing, dropWhile } from "../lib/str";
import { type SectionId, parseSectionId } from "./section-name";

export type LineToken = Data.TaggedEnum<{
  Blank: { readonly line: number };
  Comment: { readonly line: number; readonly text: string };
  Header: { readonly line: number; readonly text: string; readonly section: SectionId };
  /** `value` is `None` for a bare key. */
  Entry: {
    readonly line: number;
    readonly text: string;
    readonly key: string;
    readonly value: Option.Option<string>;
  };
  Invalid: { readonly line: number; readonly text: string; readonly reason: string };
}>;

export const { Blank, Comment, Header, Entry, Invalid } = Data.taggedEnum<LineToken>();

const COMMENT_CHARS = "#;";

/**
 * `[` body `]`, then an optional trailing comment. Quoted parts of the body
 * may contain `]`.
 */
const HEADER_PATTERN = /^\[((?:[^\]"]|"(?:[^"\\]|\\.)*")*)\]\s*(?:[#;].*)?$/;

export const splitLines = (text: string): readonly string[] => text.split(/\r?\n/);

/** A `;` preceded by whitespace starts an inline comment. */
const stripInlineComment = (value: string): string => {
  const cs = Array.from(value);
  const index = Arr.findFirstIndex(cs, (c, i) => c === ";" && isWhitespace(cs[i - 1] ?? ""));
  return Option.match(index, {
    onNone: (): string => value,
    onSome: (i): string => cs.slice(0, i).join(""),
  });
};

/** Quote-only values stand for the empty string. */
const unquoteEmpty = (value: string): string => (value === '""' || value === "''" ? "" : value);

export const cleanValue = (raw: string): string =>
  pipe(raw.trim(), stripInlineComment, (v) => v.trim(), unquoteEmpty);

/** An odd run of trailing backslashes escapes the line break. */
export const continues = (line: string): boolean => countTrailing("\\")(line) % 2 === 1;

/**
 * `rem` and a word after it is a remark. `rem` alone and `rem = ...` stay
 * entries, so a key named `rem` still round-trips.
 */
const REMARK_PATTERN = /^rem\s+(?!=)\S/i;

const isCommentContent = (content: string): boolean =>
  COMMENT_CHARS.includes(content.charAt(0)) || REMARK_PATTERN.test(content);

const classifyHeader = (line: number, text: string, body: string): LineToken =>
  Either.match(parseSectionId(body), {
    onLeft: (err): LineToken => Invalid({ line, text, reason: err.message }),
    onRight: (section): LineToken => Header({ line, text, section }),
  });

const classifyEntry = (line: number, text: string, content: string): LineToken => {
  const eq = content.indexOf("=");
  return eq === -1
    ? Entry({ line, text, key: content.trim(), value: Option.none() })
    : Entry({
        line,
        text,
        key: content.slice(0, eq).trim(),
        value: Option.some(cleanValue(content.slice(eq + 1))),
      });
};

/** Classify one logical line (continuations already joined). */
export const classifyLine = (line: number, text: string): LineToken => {
  const content = dropWhile(isIndent)(text).trimEnd();
  const header = HEADER_PATTERN.exec(content);
  return pipe(
    Match.value(content),
    Match.when("", () => Blank({ line })),
    Match.when(isCommentContent, () => Comment({ line, text })),
    Match.when(
      (c: string) => c.startsWith("["),
      (): LineToken =>
        header?.[1] === undefined
          ? Invalid({ line, text, reason: "Unterminated section header" })
          : classifyHeader(line, text, header[1])
    ),
    Match.orElse(() => classifyEntry(line, text, content))
  );
};

interface Logical {
  readonly line: number;
  readonly text: string;
}

interface JoinState {
  readonly done: readonly Logical[];
  readonly pending: Option.Option<Logical>;
}

/**
 * Fold physical lines into logical ones. Only entry lines continue; a
 * header or comment ending in a backslash is taken as written.
 */
const joinContinuations = (lines: readonly string[]): readonly Logical[] => {
  const isEntryLine = (text: string): boolean => {
    const content = dropWhile(isIndent)(text);
    return (
      content.length > 0 && !isCommentContent(content) && !content.startsWith("[")
    );
  };

  const step = (state: JoinState, text: string, index: number): JoinState => {
    const current: Logical = Option.match(state.pending, {
      onNone: (): Logical => ({ line: index + 1, text }),
      onSome: (p): Logical => ({ line: p.line, text: `${p.text}${text}` }),
    });
    const open = Option.isSome(state.pending) || isEntryLine(text);
    return open && continues(current.text)
      ? { done: state.done, pending: Option.some({ ...current, text: current.text.slice(0, -1) }) }
      : { done: [...state.done, current], pending: Option.none() };
  };

  const initial: JoinState = { done: [], pending: Option.none() };
  const final = Arr.reduce(lines, initial, step);
  return Option.match(final.pending, {
    onNone: () => final.done,
    onSome: (p) => [...final.done, p],
  });
};

export const tokenize = (text: string): readonly LineToken[] =>
  pipe(
    splitLines(text),
    joinContinuations,
    Arr.map(({ line, text: logical }) => classifyLine(line, logical))
  );
