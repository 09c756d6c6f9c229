// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * In-memory config document and the mutation API over it.
 *
 * A document owns an ordered map of sections; a section owns an ordered map
 * from normalized key to stored value. Operations mutate in place and report
 * failure synchronously as `Either` lefts. Replacing or shrinking a value
 * keeps the key where it was, so untouched lines serialize unchanged.
 */

import { Array as Arr, Either, Equivalence, Match, Option, pipe } from "effect";
import {
  ErrorCode,
  type InvalidOptionError,
  InvalidPatternError,
  type NoOptionError,
  type NoSectionError,
  causeOf,
  errorMessage,
  invalidOptionError,
  noOptionError,
  noSectionError,
} from "../lib/errors";
import { type OptionKey, normalizeKey, parseKey } from "./key";
import { type SectionId, parseSectionId, toDottedName } from "./section-name";
import { cleanValue, continues } from "./tokenizer";
import {
  Assigned,
  type Entry,
  One,
  type OptionValue,
  type StoredValue,
  append,
  entries,
  entryText,
  retain,
  toOptionValue,
} from "./value";

export interface Section {
  readonly id: SectionId;
  readonly options: Map<OptionKey, StoredValue>;
}

export interface ConfigDocument {
  readonly sections: Map<string, Section>;
}

export const empty = (): ConfigDocument => ({ sections: new Map() });

// ============================================================================
// Lookup helpers
// ============================================================================

/** Callers may space the subsection differently than the canonical identity. */
const canonicalIdentity = (section: string): string =>
  pipe(
    parseSectionId(section),
    Either.match({
      onLeft: (): string => section,
      onRight: (id): string => id.identity,
    })
  );

const findSection = (
  doc: ConfigDocument,
  section: string
): Either.Either<Section, NoSectionError> =>
  pipe(
    Option.fromNullable(doc.sections.get(canonicalIdentity(section))),
    Either.fromOption(() => noSectionError(section))
  );

const findValue = (
  doc: ConfigDocument,
  section: string,
  key: string
): Either.Either<StoredValue, NoSectionError | NoOptionError> =>
  Either.flatMap(findSection(doc, section), (target) =>
    pipe(
      Option.fromNullable(target.options.get(normalizeKey(key))),
      Either.fromOption(() => noOptionError(section, key))
    )
  );

/** A value is accepted only if it reads back unchanged once written. */
const validateValue = (value: string): Either.Either<string, InvalidOptionError> => {
  const reject = (reason: string): Either.Either<string, InvalidOptionError> =>
    Either.left(invalidOptionError(`${reason}: ${JSON.stringify(value)}`));
  return pipe(
    Match.value(value),
    Match.when(
      (v: string) => /[\r\n]/.test(v),
      () => reject("Value must be a single line")
    ),
    Match.when(continues, () => reject("Value must not end in an unpaired backslash")),
    Match.when(
      (v: string) => cleanValue(v) !== v,
      () => reject("Value would not read back unchanged")
    ),
    Match.orElse((v): Either.Either<string, InvalidOptionError> => Either.right(v))
  );
};

const compilePattern = (pattern: string | RegExp): Either.Either<RegExp, InvalidPatternError> =>
  pattern instanceof RegExp
    ? Either.right(pattern)
    : Either.try({
        try: (): RegExp => new RegExp(pattern),
        catch: (e): InvalidPatternError =>
          new InvalidPatternError({
            code: ErrorCode.INVALID_PATTERN,
            message: `Invalid pattern ${JSON.stringify(pattern)}: ${errorMessage(e)}`,
            pattern,
            ...causeOf(e),
          }),
      });

// ============================================================================
// Sections
// ============================================================================

export const sections = (doc: ConfigDocument): readonly string[] => Array.from(doc.sections.keys());

export const hasSection = (doc: ConfigDocument, section: string): boolean =>
  doc.sections.has(canonicalIdentity(section));

/** Open a section for an already parsed identity, reusing an existing one. */
export const openSection = (doc: ConfigDocument, id: SectionId): Section => {
  const existing = doc.sections.get(id.identity);
  if (existing !== undefined) {
    return existing;
  }
  const created: Section = { id, options: new Map() };
  doc.sections.set(id.identity, created);
  return created;
};

/** Idempotent: `true` when the section was created, `false` when it already existed. */
export const addSection = (
  doc: ConfigDocument,
  section: string
): Either.Either<boolean, InvalidOptionError> =>
  Either.map(parseSectionId(section), (id) => {
    const existed = doc.sections.has(id.identity);
    openSection(doc, id);
    return !existed;
  });

export const removeSection = (doc: ConfigDocument, section: string): boolean =>
  doc.sections.delete(canonicalIdentity(section));

// ============================================================================
// Queries
// ============================================================================

export const options = (
  doc: ConfigDocument,
  section: string
): Either.Either<readonly OptionKey[], NoSectionError> =>
  Either.map(findSection(doc, section), (target) => Array.from(target.options.keys()));

export const hasOption = (doc: ConfigDocument, section: string, key: string): boolean =>
  Either.isRight(findValue(doc, section, key));

/** A string for a single value, the ordered array for a multivar. */
export const get = (
  doc: ConfigDocument,
  section: string,
  key: string
): Either.Either<OptionValue, NoSectionError | NoOptionError> =>
  Either.map(findValue(doc, section, key), toOptionValue);

/** Every value of a key as an array, whatever its shape. */
export const getAll = (
  doc: ConfigDocument,
  section: string,
  key: string
): Either.Either<readonly string[], NoSectionError | NoOptionError> =>
  Either.map(findValue(doc, section, key), (value) => Arr.map(entries(value), entryText));

export const items = (
  doc: ConfigDocument,
  section: string
): Either.Either<ReadonlyArray<readonly [OptionKey, OptionValue]>, NoSectionError> =>
  Either.map(findSection(doc, section), (target) =>
    Array.from(target.options, ([key, value]) => [key, toOptionValue(value)] as const)
  );

// ============================================================================
// Mutation
// ============================================================================

/** Append an occurrence of `key`, promoting a single value to a multivar. */
export const recordEntry = (target: Section, key: OptionKey, entry: Entry): void => {
  const current = target.options.get(key);
  target.options.set(key, current === undefined ? One({ entry }) : append(current, entry));
};

/** Replace every value of `key` with `value`, collapsing a multivar. */
export const set = (
  doc: ConfigDocument,
  section: string,
  key: string,
  value: string
): Either.Either<void, NoSectionError | InvalidOptionError> =>
  Either.gen(function* () {
    const target = yield* findSection(doc, section);
    const normalized = yield* parseKey(key);
    const text = yield* validateValue(value);
    target.options.set(normalized, One({ entry: Assigned({ text }) }));
  });

/** Add `value` after any existing values of `key`. */
export const setMultivar = (
  doc: ConfigDocument,
  section: string,
  key: string,
  value: string
): Either.Either<void, NoSectionError | InvalidOptionError> =>
  Either.gen(function* () {
    const target = yield* findSection(doc, section);
    const normalized = yield* parseKey(key);
    const text = yield* validateValue(value);
    recordEntry(target, normalized, Assigned({ text }));
  });

/** Drop `key` with all of its values. `true` when it existed. */
export const removeOption = (
  doc: ConfigDocument,
  section: string,
  key: string
): Either.Either<boolean, NoSectionError> =>
  Either.map(findSection(doc, section), (target) => target.options.delete(normalizeKey(key)));

/**
 * Drop the values of `key` that contain a match for `pattern` (unanchored).
 * `true` iff at least one value was removed. A multivar left with one value
 * becomes a single value again; a key left with none is removed.
 */
export const removeOptionRegexp = (
  doc: ConfigDocument,
  section: string,
  key: string,
  pattern: string | RegExp
): Either.Either<boolean, NoSectionError | InvalidPatternError> =>
  Either.gen(function* () {
    const target = yield* findSection(doc, section);
    const regexp = yield* compilePattern(pattern);
    const normalized = normalizeKey(key);
    const current = target.options.get(normalized);
    if (current === undefined) {
      return false;
    }
    const keep = (entry: Entry): boolean => entryText(entry).search(regexp) === -1;
    const before = entries(current).length;
    const remaining = retain(current, keep);
    const after = Option.match(remaining, {
      onNone: (): number => 0,
      onSome: (value): number => entries(value).length,
    });
    if (after === before) {
      return false;
    }
    Option.match(remaining, {
      onNone: (): void => {
        target.options.delete(normalized);
      },
      onSome: (value): void => {
        target.options.set(normalized, value);
      },
    });
    return true;
  });

/** Fold `source` into `target` as if its text followed the target's. */
export const merge = (target: ConfigDocument, source: ConfigDocument): void => {
  for (const section of source.sections.values()) {
    const into = openSection(target, section.id);
    for (const [key, value] of section.options) {
      for (const entry of entries(value)) {
        recordEntry(into, key, entry);
      }
    }
  }
};

// ============================================================================
// Comparison and listing
// ============================================================================

const entrySignature = (entry: Entry): string =>
  pipe(
    Match.value(entry),
    Match.tag("Assigned", ({ text }) => `=${text}`),
    Match.tag("Bare", () => ""),
    Match.exhaustive
  );

const signatureEquivalence = Arr.getEquivalence(Equivalence.string);

const sectionSignature = (section: Section): readonly string[] =>
  Arr.flatMap(Array.from(section.options), ([key, value]) =>
    Arr.map(entries(value), (entry) => `${key}${entrySignature(entry)}`)
  );

/**
 * Structural equality: same sections in the same order, same keys in the
 * same order, same values in the same order.
 */
export const equals = (a: ConfigDocument, b: ConfigDocument): boolean => {
  const left = Array.from(a.sections.values());
  const right = Array.from(b.sections.values());
  return (
    left.length === right.length &&
    left.every((section, i) => {
      const other = right[i];
      return (
        other !== undefined &&
        section.id.identity === other.id.identity &&
        signatureEquivalence(sectionSignature(section), sectionSignature(other))
      );
    })
  );
};

export interface DottedEntry {
  /** `section[.subsection].key` */
  readonly name: string;
  readonly value: string;
}

/** Flatten to git-style `name=value` pairs, one per value. */
export const toEntries = (doc: ConfigDocument): readonly DottedEntry[] =>
  Arr.flatMap(Array.from(doc.sections.values()), (section) =>
    Arr.flatMap(Array.from(section.options), ([key, value]) =>
      Arr.map(entries(value), (entry) => ({
        name: `${toDottedName(section.id.parts)}.${key}`,
        value: entryText(entry),
      }))
    )
  );
