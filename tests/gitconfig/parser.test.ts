// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either } from "effect";
import { describe, expect, test } from "vitest";
import { get, getAll, options, sections } from "../../src/gitconfig/document";
import { parse } from "../../src/gitconfig/parser";
import type { LineProblem } from "../../src/lib/errors";
import { SAMPLE_CONFIG } from "../helpers/fixtures";

const problemsOf = (text: string): readonly LineProblem[] =>
  Either.match(parse(text), {
    onLeft: (e): readonly LineProblem[] => e.problems,
    onRight: (): readonly LineProblem[] => [],
  });

describe("parse", () => {
  test("keeps sections in order of first appearance", () => {
    const doc = Either.getOrThrow(parse(SAMPLE_CONFIG));
    expect(sections(doc)).toEqual([
      "user",
      'remote "origin"',
      'color "diff"',
      "core",
      "alias",
      "http",
    ]);
  });

  test("keeps keys in insertion order", () => {
    const doc = Either.getOrThrow(parse(SAMPLE_CONFIG));
    expect(Either.getOrThrow(options(doc, "core"))).toEqual([
      "pager",
      "repositoryformatversion",
      "filemode",
      "bare",
      "logallrefupdates",
    ]);
  });

  test("numbers load as strings", () => {
    const doc = Either.getOrThrow(parse(SAMPLE_CONFIG));
    expect(Either.getOrThrow(get(doc, 'color "diff"', "old"))).toBe("196");
  });

  test("space-indented entries load with non-ASCII text intact", () => {
    const doc = Either.getOrThrow(parse(SAMPLE_CONFIG));
    expect(Either.getOrThrow(get(doc, "user", "name"))).toBe("Артём Анисимов");
  });

  test("quotes and backslashes are kept literally", () => {
    const doc = Either.getOrThrow(parse(SAMPLE_CONFIG));
    expect(Either.getOrThrow(get(doc, "alias", "modified"))).toBe(
      "! git status --porcelain | awk 'match($1, \"M\"){print $2}'"
    );
    expect(Either.getOrThrow(get(doc, "alias", "hist"))).toBe(
      'log --pretty=format:\\"%h %ad | %s%d [%an]\\" --graph --date=short'
    );
  });

  test("keys are folded to lower case", () => {
    const doc = Either.getOrThrow(parse("[http]\n\tSslVerify = false"));
    expect(Either.getOrThrow(options(doc, "http"))).toEqual(["sslverify"]);
  });

  test("repeated keys, in any case, become a multivar", () => {
    const doc = Either.getOrThrow(parse("[a]\n\tk = 1\n\tK = 2"));
    expect(Either.getOrThrow(get(doc, "a", "k"))).toEqual(["1", "2"]);
  });

  test("a repeated header reopens its section", () => {
    const doc = Either.getOrThrow(parse("[a]\n\tk = 1\n[b]\n\tj = 2\n[a]\n\tk = 3"));
    expect(sections(doc)).toEqual(["a", "b"]);
    expect(Either.getOrThrow(getAll(doc, "a", "k"))).toEqual(["1", "3"]);
  });

  test("bare keys read as true", () => {
    const doc = Either.getOrThrow(parse("[core]\n\tbare"));
    expect(Either.getOrThrow(get(doc, "core", "bare"))).toBe("true");
  });

  test("empty input gives an empty document", () => {
    expect(sections(Either.getOrThrow(parse("")))).toEqual([]);
  });

  test("comments and blank lines are skipped", () => {
    const doc = Either.getOrThrow(parse("# header\n\n[a] ; here\n\t; inside\n\tk = v"));
    expect(Either.getOrThrow(get(doc, "a", "k"))).toBe("v");
  });

  test("rem remarks are skipped", () => {
    const doc = Either.getOrThrow(parse("[a]\nrem set by hand\n\tREM keep k\n\tk = v"));
    expect(Either.getOrThrow(options(doc, "a"))).toEqual(["k"]);
  });

  describe("errors", () => {
    test("every bad line is reported with its number", () => {
      const problems = problemsOf("\tk = v\n[a]\n\t= x\n\tbad_key = 1\n[oops");
      expect(problems.map((p) => [p.line, p.reason])).toEqual([
        [1, "Option outside of any section"],
        [3, "Missing key"],
        [4, 'Invalid key "bad_key"'],
        [5, "Unterminated section header"],
      ]);
    });

    test("problems carry the offending text", () => {
      expect(problemsOf("k = v")).toEqual([
        { line: 1, text: "k = v", reason: "Option outside of any section" },
      ]);
    });

    test("the message summarizes every problem", () => {
      const result = parse("k = v");
      const message = Either.match(result, {
        onLeft: (e): string => e.message,
        onRight: (): string => "",
      });
      expect(message).toBe(
        'Config contains 1 parsing error\n  [line 1]: Option outside of any section: "k = v"'
      );
    });

    test("a key starting with a digit is invalid", () => {
      expect(problemsOf("[a]\n\t9lives = 1").map((p) => p.reason)).toEqual([
        'Invalid key "9lives"',
      ]);
    });
  });
});
