// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes context resolution,
 * logger installation and error display so each command stays focused.
 */

import { Command } from "@effect/cli";
import type { CliApp } from "@effect/cli/CliApp";
import { Effect, Match, pipe } from "effect";
import {
  ColorConfig,
  ConfigFileOptionConfig,
  DebugModeConfig,
  LogFormatOptionConfig,
  LogLevelOptionConfig,
} from "../config/env";
import {
  CONFIG_FILE_DEFAULT,
  LOG_FORMAT_DEFAULT,
  LOG_LEVEL_DEFAULT,
  type LogFormat,
  type LogLevel,
} from "../config/field-values";
import { resolve } from "../config/resolve";
import { GitiniLoggerLive, colorize } from "../lib/effect-logger";
import { type GitiniError, getErrorCodeName } from "../lib/errors";
import { GITINI_VERSION } from "../lib/version";

import { executeFormat } from "./commands/format";
import { executeGet } from "./commands/get";
import { executeList } from "./commands/list";
import { executeAddSection, executeRemoveSection } from "./commands/section";
import { executeAdd, executeSet } from "./commands/set";
import { executeUnset } from "./commands/unset";
import {
  type GlobalOptions,
  globalOptions,
  keyArg,
  patternArg,
  sectionArg,
  valueArg,
} from "./options";

/** Resolved runtime context for commands: CLI args > env vars > defaults. */
export interface CommandContext {
  readonly file: string;
  readonly format: LogFormat;
  readonly logLevel: LogLevel;
  readonly color: boolean;
}

// Context resolution

export const resolveContext = (globals: GlobalOptions): Effect.Effect<CommandContext, unknown> =>
  Effect.gen(function* () {
    const envLogLevel = yield* LogLevelOptionConfig;
    const envLogFormat = yield* LogFormatOptionConfig;
    const envFile = yield* ConfigFileOptionConfig;
    const envDebug = yield* DebugModeConfig;
    const color = yield* ColorConfig;

    const logLevel: LogLevel = pipe(
      Match.value(globals.verbose || envDebug),
      Match.when(true, (): LogLevel => "debug"),
      Match.when(
        false,
        (): LogLevel =>
          resolve({ cli: globals.logLevel, env: envLogLevel, fallback: LOG_LEVEL_DEFAULT })
      ),
      Match.exhaustive
    );

    return {
      file: resolve({ cli: globals.file, env: envFile, fallback: CONFIG_FILE_DEFAULT }),
      format: resolve({ cli: globals.format, env: envLogFormat, fallback: LOG_FORMAT_DEFAULT }),
      logLevel,
      color: color && process.stderr.isTTY === true,
    };
  });

// Error display

const isGitiniError = (err: unknown): err is GitiniError =>
  typeof err === "object" && err !== null && "_tag" in err && "code" in err && "message" in err;

/** Sync because it runs on the exit path. */
const displayError = (err: unknown, ctx: CommandContext): void => {
  if (!isGitiniError(err)) {
    return;
  }
  pipe(
    Match.value(ctx.format),
    Match.when("json", () =>
      process.stdout.write(`${JSON.stringify({ error: err.message, code: getErrorCodeName(err.code) })}\n`)
    ),
    Match.when("pretty", () => {
      process.stderr.write(`${colorize("red", "✗", ctx.color)} ${err.message}\n`);
    }),
    Match.exhaustive
  );
};

// Command runner

const runCommand = <R>(
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, unknown, R>
): Effect.Effect<void, unknown, R> =>
  Effect.gen(function* () {
    const ctx = yield* resolveContext(globals);
    yield* pipe(
      handler(ctx),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => Effect.sync(() => displayError(err, ctx))),
      Effect.provide(
        GitiniLoggerLive({ level: ctx.logLevel, format: ctx.format, color: ctx.color })
      )
    );
  });

// Subcommand definitions

const getCmd = Command.make(
  "get",
  { ...globalOptions, section: sectionArg, key: keyArg },
  (args) =>
    runCommand(args, "get", (ctx) =>
      executeGet({ file: ctx.file, section: args.section, key: args.key, format: ctx.format })
    )
).pipe(Command.withDescription("Print the value(s) of a key"));

const setCmd = Command.make(
  "set",
  { ...globalOptions, section: sectionArg, key: keyArg, value: valueArg },
  (args) =>
    runCommand(args, "set", (ctx) =>
      executeSet({ file: ctx.file, section: args.section, key: args.key, value: args.value })
    )
).pipe(Command.withDescription("Set a key, replacing all of its values"));

const addCmd = Command.make(
  "add",
  { ...globalOptions, section: sectionArg, key: keyArg, value: valueArg },
  (args) =>
    runCommand(args, "add", (ctx) =>
      executeAdd({ file: ctx.file, section: args.section, key: args.key, value: args.value })
    )
).pipe(Command.withDescription("Append a value to a multivar key"));

const unsetCmd = Command.make(
  "unset",
  { ...globalOptions, section: sectionArg, key: keyArg, pattern: patternArg },
  (args) =>
    runCommand(args, "unset", (ctx) =>
      executeUnset({
        file: ctx.file,
        section: args.section,
        key: args.key,
        pattern: args.pattern,
      })
    )
).pipe(Command.withDescription("Remove a key, or the values matching a pattern"));

const addSectionCmd = Command.make(
  "add-section",
  { ...globalOptions, section: sectionArg },
  (args) =>
    runCommand(args, "add-section", (ctx) =>
      executeAddSection({ file: ctx.file, section: args.section })
    )
).pipe(Command.withDescription("Add an empty section"));

const removeSectionCmd = Command.make(
  "remove-section",
  { ...globalOptions, section: sectionArg },
  (args) =>
    runCommand(args, "remove-section", (ctx) =>
      executeRemoveSection({ file: ctx.file, section: args.section })
    )
).pipe(Command.withDescription("Remove a section and all of its keys"));

const listCmd = Command.make("list", { ...globalOptions }, (args) =>
  runCommand(args, "list", (ctx) => executeList({ file: ctx.file, format: ctx.format }))
).pipe(Command.withDescription("List every value as name=value"));

const formatCmd = Command.make("format", { ...globalOptions }, (args) =>
  runCommand(args, "format", (ctx) => executeFormat({ file: ctx.file }))
).pipe(Command.withDescription("Rewrite the file in canonical form"));

// Root command

const gitini = Command.make("gitini").pipe(
  Command.withDescription("Read and edit git-style config files"),
  Command.withSubcommands([
    getCmd,
    setCmd,
    addCmd,
    unsetCmd,
    addSectionCmd,
    removeSectionCmd,
    listCmd,
    formatCmd,
  ])
);

/** Takes argv as in process.argv: the first two entries are skipped. */
export const cli: (args: readonly string[]) => Effect.Effect<void, unknown, CliApp.Environment> =
  Command.run(gitini, {
    name: "gitini",
    version: GITINI_VERSION,
  });
