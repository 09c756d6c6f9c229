// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * All exports are pure Config<A> values; nothing is read until a Config is
 * yielded at the CLI boundary. Optional variants return `Option` so the CLI
 * can layer flags over environment over defaults with `resolve`.
 */

import { Config, ConfigProvider, Option, pipe } from "effect";
import {
  CONFIG_FILE_DEFAULT,
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
} from "./field-values";

const NAMESPACE = "GITINI";

/**
 * Environment configuration shape.
 */
export interface EnvConfig {
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
  readonly configFile: string;
  readonly debug: boolean;
  readonly color: boolean;
}

/** GITINI_LOG_LEVEL, absent unless set. */
export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = Config.nested(
  Config.option(Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL")),
  NAMESPACE
);

/** GITINI_LOG_FORMAT, absent unless set. */
export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = Config.nested(
  Config.option(Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT")),
  NAMESPACE
);

/** GITINI_FILE: the config file commands operate on when no --file is given. */
export const ConfigFileOptionConfig: Config.Config<Option.Option<string>> = Config.nested(
  Config.option(Config.string("FILE")),
  NAMESPACE
);

/**
 * GITINI_DEBUG. When true, forces log level to debug.
 */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  NAMESPACE
);

/** Colors are on unless NO_COLOR is set to a non-empty value. */
export const ColorConfig: Config.Config<boolean> = pipe(
  Config.option(Config.string("NO_COLOR")),
  Config.map((noColor) =>
    Option.match(noColor, {
      onNone: (): boolean => true,
      onSome: (v): boolean => v.length === 0,
    })
  )
);

/**
 * Combined environment configuration with defaults applied.
 */
export const EnvConfigSpec: Config.Config<EnvConfig> = Config.all([
  LogLevelOptionConfig,
  LogFormatOptionConfig,
  ConfigFileOptionConfig,
  DebugModeConfig,
  ColorConfig,
]).pipe(
  Config.map(([logLevel, logFormat, configFile, debug, color]) => ({
    logging: {
      level: Option.getOrElse(logLevel, (): LogLevel => LOG_LEVEL_DEFAULT),
      format: Option.getOrElse(logFormat, (): LogFormat => LOG_FORMAT_DEFAULT),
    },
    configFile: Option.getOrElse(configFile, () => CONFIG_FILE_DEFAULT),
    debug,
    color,
  }))
);

/**
 * Test config override options using camelCase keys.
 */
export interface TestConfigOverrides {
  readonly logLevel?: string;
  readonly logFormat?: string;
  readonly configFile?: string;
  readonly debug?: string;
  readonly noColor?: string;
}

/**
 * Environment variable names used in testing.
 */
const envVarNames: { readonly [K in keyof TestConfigOverrides]-?: string } = {
  logLevel: "GITINI_LOG_LEVEL",
  logFormat: "GITINI_LOG_FORMAT",
  configFile: "GITINI_FILE",
  debug: "GITINI_DEBUG",
  noColor: "NO_COLOR",
};

const overrideEntry = (
  name: string,
  value: string | undefined
): ReadonlyArray<readonly [string, string]> => (value === undefined ? [] : [[name, value]]);

/**
 * Create a ConfigProvider for testing. Only the given overrides are set,
 * so unset variables exercise the defaults.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ logLevel: "debug" });
 * const env = Effect.runSync(Effect.withConfigProvider(EnvConfigSpec, provider));
 * ```
 */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {}
): ConfigProvider.ConfigProvider => {
  const entries = [
    ...overrideEntry(envVarNames.logLevel, overrides.logLevel),
    ...overrideEntry(envVarNames.logFormat, overrides.logFormat),
    ...overrideEntry(envVarNames.configFile, overrides.configFile),
    ...overrideEntry(envVarNames.debug, overrides.debug),
    ...overrideEntry(envVarNames.noColor, overrides.noColor),
  ];
  return ConfigProvider.fromMap(new Map(entries), { pathDelim: "_" });
};
