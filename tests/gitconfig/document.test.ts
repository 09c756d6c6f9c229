// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either } from "effect";
import { beforeEach, describe, expect, test } from "vitest";
import {
  type ConfigDocument,
  addSection,
  empty,
  equals,
  get,
  getAll,
  hasOption,
  hasSection,
  items,
  merge,
  options,
  removeOption,
  removeOptionRegexp,
  removeSection,
  sections,
  set,
  setMultivar,
  toEntries,
} from "../../src/gitconfig/document";
import { parse } from "../../src/gitconfig/parser";
import { serialize } from "../../src/gitconfig/serializer";
import { leftTag } from "../helpers/either";
import {
  FOO_REFSPEC,
  ORIGIN_REFSPEC,
  REMOTE,
  SAMPLE_CONFIG,
  SAMPLE_LINES,
  TAGS_REFSPEC,
  canonicalLines,
} from "../helpers/fixtures";

const load = (text: string): ConfigDocument => Either.getOrThrow(parse(text));

describe("ConfigDocument", () => {
  let doc: ConfigDocument;

  beforeEach(() => {
    doc = load(SAMPLE_CONFIG);
  });

  describe("sections", () => {
    test("hasSection accepts loosely spaced identities", () => {
      expect(hasSection(doc, 'remote   "origin"')).toBe(true);
      expect(hasSection(doc, "remote")).toBe(false);
    });

    test("addSection creates once and is idempotent", () => {
      expect(Either.getOrThrow(addSection(doc, "foo"))).toBe(true);
      expect(Either.getOrThrow(addSection(doc, "foo"))).toBe(false);
      expect(sections(doc).at(-1)).toBe("foo");
    });

    test("addSection rejects an invalid name", () => {
      expect(leftTag(addSection(doc, "has space"))).toBe("InvalidOptionError");
    });

    test("a new section accepts options", () => {
      Either.getOrThrow(addSection(doc, "foo"));
      Either.getOrThrow(set(doc, "foo", "bar", "baz"));
      expect(Either.getOrThrow(get(doc, "foo", "bar"))).toBe("baz");
    });

    test("removeSection reports whether the section existed", () => {
      expect(removeSection(doc, 'color "diff"')).toBe(true);
      expect(removeSection(doc, 'color "diff"')).toBe(false);
      expect(hasSection(doc, 'color "diff"')).toBe(false);
    });
  });

  describe("queries", () => {
    test("get fails with NoSectionError for an unknown section", () => {
      expect(leftTag(get(doc, "nope", "k"))).toBe("NoSectionError");
    });

    test("get fails with NoOptionError for an unknown key", () => {
      expect(leftTag(get(doc, "core", "nope"))).toBe("NoOptionError");
    });

    test("getAll wraps a single value", () => {
      expect(Either.getOrThrow(getAll(doc, REMOTE, "fetch"))).toEqual([ORIGIN_REFSPEC]);
    });

    test("hasOption is case-insensitive", () => {
      expect(hasOption(doc, "core", "FileMode")).toBe(true);
      expect(hasOption(doc, "core", "editor")).toBe(false);
      expect(hasOption(doc, "nope", "editor")).toBe(false);
    });

    test("items pairs keys with values", () => {
      expect(Either.getOrThrow(items(doc, 'color "diff"'))).toEqual([
        ["old", "196"],
        ["new", "39"],
      ]);
    });

    test("options fails for an unknown section", () => {
      expect(leftTag(options(doc, "nope"))).toBe("NoSectionError");
    });
  });

  describe("set", () => {
    test("adds a new option to an existing section", () => {
      Either.getOrThrow(set(doc, "http", "useragent", "test-agent"));
      expect(Either.getOrThrow(get(doc, "http", "useragent"))).toBe("test-agent");
    });

    test("normalizes the key it replaces", () => {
      Either.getOrThrow(set(doc, "http", "sslVerify", "true"));
      expect(Either.getOrThrow(get(doc, "http", "sslverify"))).toBe("true");
      expect(Either.getOrThrow(options(doc, "http"))).toEqual(["sslverify"]);
    });

    test("collapses a multivar to one value", () => {
      Either.getOrThrow(setMultivar(doc, REMOTE, "fetch", TAGS_REFSPEC));
      Either.getOrThrow(set(doc, REMOTE, "fetch", FOO_REFSPEC));
      expect(Either.getOrThrow(get(doc, REMOTE, "fetch"))).toBe(FOO_REFSPEC);
    });

    test("keeps the position of a replaced key", () => {
      Either.getOrThrow(set(doc, "core", "pager", "more"));
      expect(Either.getOrThrow(options(doc, "core"))[0]).toBe("pager");
    });

    test("fails for a missing section", () => {
      expect(leftTag(set(doc, "nope", "k", "v"))).toBe("NoSectionError");
    });

    test("rejects an invalid key", () => {
      expect(leftTag(set(doc, "core", "bad key", "v"))).toBe("InvalidOptionError");
    });

    test("rejects a value spanning lines", () => {
      expect(leftTag(set(doc, "core", "pager", "a\nb"))).toBe("InvalidOptionError");
    });

    test("rejects a trailing unpaired backslash and leaves the next section intact", () => {
      const target = load("[a]\n[b]\n\tk = v");
      expect(leftTag(set(target, "a", "path", "C:\\dir\\"))).toBe("InvalidOptionError");
      expect(hasOption(target, "a", "path")).toBe(false);
      expect(Either.getOrThrow(get(load(serialize(target)), "b", "k"))).toBe("v");
    });

    test.each([
      ["an inline comment", "a ;b"],
      ["a tab before a semicolon", "a\t;b"],
      ["quoted empty string", '""'],
      ["single-quoted empty string", "''"],
      ["surrounding whitespace", "  padded  "],
      ["a trailing space", "end "],
    ])("rejects a value that would not read back: %s", (_label, value) => {
      expect(leftTag(set(doc, "core", "pager", value))).toBe("InvalidOptionError");
      expect(leftTag(setMultivar(doc, REMOTE, "fetch", value))).toBe("InvalidOptionError");
      expect(Either.getOrThrow(get(doc, "core", "pager"))).toBe("less -R");
    });
  });

  describe("setMultivar", () => {
    test("promotes a single value to an ordered sequence", () => {
      expect(Either.getOrThrow(get(doc, REMOTE, "fetch"))).toBe(ORIGIN_REFSPEC);
      Either.getOrThrow(setMultivar(doc, REMOTE, "fetch", TAGS_REFSPEC));
      expect(Either.getOrThrow(get(doc, REMOTE, "fetch"))).toEqual([ORIGIN_REFSPEC, TAGS_REFSPEC]);
    });

    test("writes the new value right after the first", () => {
      Either.getOrThrow(setMultivar(doc, REMOTE, "fetch", TAGS_REFSPEC));
      const expected = [...canonicalLines(SAMPLE_LINES)];
      expected.splice(6, 0, `\tfetch = ${TAGS_REFSPEC}`);
      expect(serialize(doc)).toBe(`${expected.join("\n")}\n`);
    });

    test("a new key holds a single value", () => {
      Either.getOrThrow(setMultivar(doc, "core", "editor", "vi"));
      expect(Either.getOrThrow(get(doc, "core", "editor"))).toBe("vi");
    });
  });

  describe("removeOption", () => {
    test("removes a key with all of its values", () => {
      Either.getOrThrow(setMultivar(doc, REMOTE, "fetch", TAGS_REFSPEC));
      for (const key of ["fetch", "pushurl"]) {
        expect(Either.getOrThrow(removeOption(doc, REMOTE, key))).toBe(true);
        expect(leftTag(get(doc, REMOTE, key))).toBe("NoOptionError");
      }
    });

    test("returns false for a missing key", () => {
      expect(Either.getOrThrow(removeOption(doc, "core", "editor"))).toBe(false);
    });

    test("fails for a missing section", () => {
      expect(leftTag(removeOption(doc, "nope", "k"))).toBe("NoSectionError");
    });
  });

  describe("removeOptionRegexp", () => {
    test("removes matching values one pattern at a time", () => {
      Either.getOrThrow(setMultivar(doc, REMOTE, "fetch", TAGS_REFSPEC));
      Either.getOrThrow(setMultivar(doc, REMOTE, "fetch", FOO_REFSPEC));
      const all = [ORIGIN_REFSPEC, TAGS_REFSPEC, FOO_REFSPEC];
      expect(Either.getOrThrow(get(doc, REMOTE, "fetch"))).toEqual(all);

      expect(Either.getOrThrow(removeOptionRegexp(doc, REMOTE, "fetch", "\\d{7,10}"))).toBe(false);
      expect(Either.getOrThrow(get(doc, REMOTE, "fetch"))).toEqual(all);

      expect(Either.getOrThrow(removeOptionRegexp(doc, REMOTE, "fetch", "tags"))).toBe(true);
      expect(Either.getOrThrow(get(doc, REMOTE, "fetch"))).toEqual([ORIGIN_REFSPEC, FOO_REFSPEC]);

      expect(Either.getOrThrow(removeOptionRegexp(doc, REMOTE, "fetch", "foo"))).toBe(true);
      expect(Either.getOrThrow(get(doc, REMOTE, "fetch"))).toBe(ORIGIN_REFSPEC);

      expect(Either.getOrThrow(removeOptionRegexp(doc, REMOTE, "fetch", "heads"))).toBe(true);
      expect(leftTag(get(doc, REMOTE, "fetch"))).toBe("NoOptionError");
    });

    test("accepts a RegExp", () => {
      expect(Either.getOrThrow(removeOptionRegexp(doc, "core", "pager", /^LESS/i))).toBe(true);
      expect(hasOption(doc, "core", "pager")).toBe(false);
    });

    test("matches bare keys as true", () => {
      const bare = load("[core]\n\tbare\n\tbare = false");
      expect(Either.getOrThrow(removeOptionRegexp(bare, "core", "bare", "^true$"))).toBe(true);
      expect(Either.getOrThrow(get(bare, "core", "bare"))).toBe("false");
    });

    test("keeps the key in place when values remain", () => {
      const multi = load("[a]\n\tk = 1\n\tk = 2\n\tk = 3\n\tj = x");
      Either.getOrThrow(removeOptionRegexp(multi, "a", "k", "2"));
      expect(serialize(multi)).toBe("[a]\n\tk = 1\n\tk = 3\n\tj = x\n");
    });

    test("returns false for a missing key", () => {
      expect(Either.getOrThrow(removeOptionRegexp(doc, "core", "editor", "."))).toBe(false);
    });

    test("fails for a missing section", () => {
      expect(leftTag(removeOptionRegexp(doc, "nope", "k", "."))).toBe("NoSectionError");
    });

    test("fails for a pattern that does not compile", () => {
      expect(leftTag(removeOptionRegexp(doc, "core", "pager", "("))).toBe("InvalidPatternError");
    });
  });

  describe("values written through the mutation API", () => {
    test.each([
      ["an even run of backslashes", "C:\\dir\\\\"],
      ["a backslash inside", "a\\b"],
      ["a semicolon without whitespace", "log --format=%h;%s"],
      ["a hash", "#fff"],
      ["double quotes", 'say "hi"'],
      ["a single quote", "it's"],
      ["an inner tab", "tab\tinside"],
      ["non-ASCII text", "Grüße 🌍"],
      ["the empty string", ""],
    ])("set survives serialize and parse: %s", (_label, value) => {
      Either.getOrThrow(set(doc, "core", "pager", value));
      const reparsed = load(serialize(doc));
      expect(equals(doc, reparsed)).toBe(true);
      expect(Either.getOrThrow(get(reparsed, "core", "pager"))).toBe(value);
    });

    test.each([
      ["an even run of backslashes", "refs\\\\"],
      ["double quotes", '"quoted"'],
      ["non-ASCII text", "+refs/heads/ветка"],
    ])("setMultivar survives serialize and parse: %s", (_label, value) => {
      Either.getOrThrow(setMultivar(doc, REMOTE, "fetch", value));
      const reparsed = load(serialize(doc));
      expect(equals(doc, reparsed)).toBe(true);
      expect(Either.getOrThrow(getAll(reparsed, REMOTE, "fetch"))).toEqual([ORIGIN_REFSPEC, value]);
    });
  });

  describe("equals", () => {
    test("a document equals its own serialized form re-parsed", () => {
      expect(equals(doc, load(serialize(doc)))).toBe(true);
    });

    test("a changed value breaks equality", () => {
      const other = load(SAMPLE_CONFIG);
      Either.getOrThrow(set(other, "core", "bare", "true"));
      expect(equals(doc, other)).toBe(false);
    });

    test("a bare key differs from an assigned true", () => {
      expect(equals(load("[a]\n\tk"), load("[a]\n\tk = true"))).toBe(false);
    });

    test("section order matters", () => {
      expect(equals(load("[a]\n[b]"), load("[b]\n[a]"))).toBe(false);
    });
  });

  describe("merge", () => {
    test("extends existing sections and appends new ones", () => {
      const target = load("[a]\n\tk = 1");
      merge(target, load("[a]\n\tk = 2\n[b]\n\tj = 3"));
      expect(sections(target)).toEqual(["a", "b"]);
      expect(Either.getOrThrow(get(target, "a", "k"))).toEqual(["1", "2"]);
    });

    test("merging into an empty document copies it", () => {
      const target = empty();
      merge(target, doc);
      expect(equals(target, doc)).toBe(true);
    });
  });

  describe("toEntries", () => {
    test("flattens to dotted names, one per value", () => {
      const small = load('[remote "origin"]\n\turl = x\n\tfetch = a\n\tfetch = b\n[core]\n\tbare');
      expect(toEntries(small)).toEqual([
        { name: "remote.origin.url", value: "x" },
        { name: "remote.origin.fetch", value: "a" },
        { name: "remote.origin.fetch", value: "b" },
        { name: "core.bare", value: "true" },
      ]);
    });
  });
});
