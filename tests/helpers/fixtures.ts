// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Shared config text. The user.name line is indented with spaces instead of
 * a tab to check that mixed indentation loads.
 */

export const SAMPLE_LINES: readonly string[] = [
  "[user]",
  "        name = Артём Анисимов",
  "\temail = dev@example.com",
  '[remote "origin"]',
  "\turl = https://example.com/acme/widgets.git",
  "\tfetch = +refs/heads/*:refs/remotes/origin/*",
  "\tpushurl = git@example.com:acme/widgets.git",
  '[color "diff"]',
  "\told = 196",
  "\tnew = 39",
  "[core]",
  "\tpager = less -R",
  "\trepositoryformatversion = 0",
  "\tfilemode = true",
  "\tbare = false",
  "\tlogallrefupdates = true",
  "[alias]",
  "\tmodified = ! git status --porcelain | awk 'match($1, \"M\"){print $2}'",
  "\tgraph = log --all --decorate --oneline --graph",
  '\thist = log --pretty=format:\\"%h %ad | %s%d [%an]\\" --graph --date=short',
  "[http]",
  "\tsslverify = false",
];

export const SAMPLE_CONFIG: string = SAMPLE_LINES.join("\n");

/** The sample as the serializer writes it: tab indentation, trailing newline. */
export const canonicalLines = (lines: readonly string[]): readonly string[] =>
  lines.map((line) => line.replace(/^ {8}/, "\t"));

export const REMOTE = 'remote "origin"';
export const ORIGIN_REFSPEC = "+refs/heads/*:refs/remotes/origin/*";
export const TAGS_REFSPEC = "+refs/tags/*:refs/tags/*";
export const FOO_REFSPEC = "+refs/foo/*:refs/foo/*";
