// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Section identity. A section is named either `name` or `name "subsection"`;
 * the identity string keeps the subsection exactly as quoted in the file
 * (escapes included), while `parts` carries the unescaped subsection for
 * callers that need the logical value.
 */

import { Either, Option, pipe } from "effect";
import { isSectionNameChar } from "../lib/char";
import { type InvalidOptionError, invalidOptionError } from "../lib/errors";
import { subsectionEscapeCodec } from "../lib/escape-codec";
import { all } from "../lib/str";

export interface SectionParts {
  readonly name: string;
  /** Unescaped subsection text. */
  readonly subsection: Option.Option<string>;
}

export interface SectionId {
  /** Canonical identity: `name` or `name "escaped subsection"`. */
  readonly identity: string;
  readonly parts: SectionParts;
}

/** `name` followed by an optional quoted subsection in which `\"` and `\\` are escapes. */
const IDENTITY_PATTERN = /^(\S+?)(?:\s+"((?:[^"\\]|\\.)*)")?$/;

const isValidName = (name: string): boolean => name.length > 0 && all(isSectionNameChar)(name);

const buildIdentity = (name: string, rawSubsection: Option.Option<string>): string =>
  Option.match(rawSubsection, {
    onNone: (): string => name,
    onSome: (raw): string => `${name} "${raw}"`,
  });

/**
 * Parse the text between the brackets of a header (or a caller-supplied
 * identity). Whitespace around the name and before the quote is not part of
 * the identity.
 */
export const parseSectionId = (text: string): Either.Either<SectionId, InvalidOptionError> => {
  const match = IDENTITY_PATTERN.exec(text.trim());
  const name = match?.[1];
  if (match === null || name === undefined || !isValidName(name)) {
    return Either.left(invalidOptionError(`Invalid section name: ${JSON.stringify(text)}`));
  }
  const rawSubsection = Option.fromNullable(match[2]);
  return Either.right({
    identity: buildIdentity(name, rawSubsection),
    parts: {
      name,
      subsection: Option.map(rawSubsection, subsectionEscapeCodec.unescape),
    },
  });
};

/** Build an identity from a name and an unescaped subsection. */
export const makeSectionId = (
  name: string,
  subsection: Option.Option<string> = Option.none()
): Either.Either<SectionId, InvalidOptionError> =>
  isValidName(name)
    ? Either.right({
        identity: buildIdentity(name, Option.map(subsection, subsectionEscapeCodec.escape)),
        parts: { name, subsection },
      })
    : Either.left(invalidOptionError(`Invalid section name: ${JSON.stringify(name)}`));

/**
 * Accept the dotted form used on command lines (`remote.origin` means
 * `remote "origin"`) as well as the identity form. The first dot splits the
 * name from the subsection, so subsections may contain dots.
 */
export const resolveSectionId = (input: string): Either.Either<SectionId, InvalidOptionError> => {
  const dot = input.indexOf(".");
  return input.includes('"') || dot === -1
    ? parseSectionId(input)
    : makeSectionId(input.slice(0, dot), Option.some(input.slice(dot + 1)));
};

/** Git-style dotted prefix: `remote.origin` for `remote "origin"`. */
export const toDottedName = (parts: SectionParts): string =>
  pipe(
    parts.subsection,
    Option.match({
      onNone: (): string => parts.name,
      onSome: (sub): string => `${parts.name}.${sub}`,
    })
  );
