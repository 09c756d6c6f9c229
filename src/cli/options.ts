// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions, shared so every command names and
 * describes them the same way.
 */

import { Args as A, Options as O } from "@effect/cli";
import type { Args } from "@effect/cli/Args";
import type { Options } from "@effect/cli/Options";
import type { Option } from "effect";
import type { LogFormat, LogLevel } from "../config/field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "../config/field-values";

// Shared positional arguments

export const sectionArg: Args<string> = A.text({ name: "section" }).pipe(
  A.withDescription('Section as `remote "origin"` or remote.origin')
);

export const keyArg: Args<string> = A.text({ name: "key" }).pipe(
  A.withDescription("Option key (case-insensitive)")
);

export const valueArg: Args<string> = A.text({ name: "value" }).pipe(
  A.withDescription("Option value")
);

export const patternArg: Args<Option.Option<string>> = A.text({ name: "pattern" }).pipe(
  A.withDescription("Only remove values containing a match for this regular expression"),
  A.optional
);

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: Options<boolean>;
  readonly logLevel: Options<Option.Option<LogLevel>>;
  readonly format: Options<Option.Option<LogFormat>>;
  readonly file: Options<Option.Option<string>>;
} = {
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output format"),
    O.optional
  ),
  file: O.text("file").pipe(
    O.withAlias("f"),
    O.withDescription("Config file to operate on (default: $GITINI_FILE or .git/config)"),
    O.optional
  ),
};

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly file: Option.Option<string>;
}
