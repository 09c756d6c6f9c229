// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI logger. Replaces Effect's default logger with one that renders
 * success/failure marks, tags lines with the config file being worked on,
 * and can emit one JSON object per line instead.
 */

import { Cause, HashMap, Layer, LogLevel, Logger, Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel as GitiniLogLevel } from "../config/field-values";

type LogStyleTag = "success" | "fail";
type ColorName = "red" | "green" | "yellow" | "blue" | "cyan" | "gray" | "white";

const ANSI: Readonly<Record<ColorName, string>> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  white: "\x1b[37m",
};
const RESET = "\x1b[0m";

/** Formatting-only annotations, never emitted as JSON fields. */
const INTERNAL_KEYS: ReadonlySet<string> = new Set(["logStyle"]);

export const toEffectLogLevel = (level: GitiniLogLevel): LogLevel.LogLevel =>
  pipe(
    Match.value(level),
    Match.when("debug", () => LogLevel.Debug),
    Match.when("info", () => LogLevel.Info),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("error", () => LogLevel.Error),
    Match.exhaustive
  );

const getStringAnnotation = (
  annotations: HashMap.HashMap<string, unknown>,
  key: string
): Option.Option<string> =>
  pipe(
    HashMap.get(annotations, key),
    Option.filter((v): v is string => typeof v === "string")
  );

const getStyle = (annotations: HashMap.HashMap<string, unknown>): Option.Option<LogStyleTag> =>
  pipe(
    getStringAnnotation(annotations, "logStyle"),
    Option.filter((v): v is LogStyleTag => v === "success" || v === "fail")
  );

export const colorize = (color: ColorName, text: string, useColor: boolean): string =>
  useColor ? `${ANSI[color]}${text}${RESET}` : text;

const LEVEL_COLORS: Readonly<Record<string, ColorName>> = {
  DEBUG: "gray",
  INFO: "blue",
  WARN: "yellow",
  ERROR: "red",
};

const formatCause = (cause: Cause.Cause<unknown>): string =>
  Cause.isEmpty(cause) ? "" : `\n${Cause.pretty(cause)}`;

export const formatPretty = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  cause: Cause.Cause<unknown>,
  useColor: boolean
): string =>
  pipe(
    getStyle(annotations),
    Option.match({
      onNone: (): string => {
        const levelColor = pipe(
          Option.fromNullable(LEVEL_COLORS[logLevel.label]),
          Option.getOrElse((): ColorName => "white")
        );
        const levelStr = colorize(levelColor, logLevel.label.padEnd(5), useColor);
        const pathStr = pipe(
          getStringAnnotation(annotations, "path"),
          Option.match({
            onNone: (): string => "",
            onSome: (p): string => `${colorize("cyan", `[${p}]`, useColor)} `,
          })
        );
        return `${levelStr} ${pathStr}${message}${formatCause(cause)}`;
      },
      onSome: (style): string =>
        pipe(
          Match.value(style),
          Match.when("success", () => `${colorize("green", "✓", useColor)} ${message}`),
          Match.when("fail", () => `${colorize("red", "✗", useColor)} ${message}`),
          Match.exhaustive
        ),
    })
  );

const collectExternalAnnotations = (
  annotations: HashMap.HashMap<string, unknown>
): Record<string, unknown> =>
  Object.fromEntries(
    Array.from(HashMap.toEntries(annotations)).filter(([k]) => !INTERNAL_KEYS.has(k))
  );

export const formatJson = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  date: Date
): string =>
  JSON.stringify({
    timestamp: date.toISOString(),
    level: logLevel.label.toLowerCase(),
    message,
    ...collectExternalAnnotations(annotations),
  });

/** Errors and failure marks go to stderr so stdout carries only command output. */
const isStderrOutput = (logLevel: LogLevel.LogLevel, style: Option.Option<LogStyleTag>): boolean =>
  logLevel.label === "ERROR" ||
  pipe(
    style,
    Option.map((s) => s === "fail"),
    Option.getOrElse(() => false)
  );

const GitiniLogger = (format: LogFormat, useColor: boolean): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, cause, annotations, date }) => {
    const msg = Array.isArray(message) ? message.map(String).join(" ") : String(message);
    const output = pipe(
      Match.value(format),
      Match.when("json", () => formatJson(logLevel, msg, annotations, date)),
      Match.when("pretty", () => formatPretty(logLevel, msg, annotations, cause, useColor)),
      Match.exhaustive
    );
    const stream = isStderrOutput(logLevel, getStyle(annotations)) ? process.stderr : process.stdout;
    stream.write(`${output}\n`);
  });

export const GitiniLoggerLive = (options: {
  readonly level: GitiniLogLevel;
  readonly format: LogFormat;
  readonly color?: boolean;
}): Layer.Layer<never> => {
  const useColor = options.color ?? process.stdout.isTTY === true;
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, GitiniLogger(options.format, useColor)),
    Logger.minimumLogLevel(toEffectLogLevel(options.level))
  );
};
