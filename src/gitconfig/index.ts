// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Public surface of the git-style config parser/serializer.
 */

// Document model and mutation API
export {
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
} from "./document";
export type { ConfigDocument, DottedEntry, Section } from "./document";

// Keys and section names
export { isValidKey, normalizeKey, parseKey } from "./key";
export type { OptionKey } from "./key";
export { makeSectionId, parseSectionId, resolveSectionId, toDottedName } from "./section-name";
export type { SectionId, SectionParts } from "./section-name";

// Values
export { BARE_VALUE } from "./value";
export type { Entry, OptionValue, StoredValue } from "./value";

// Text in and out
export { tokenize } from "./tokenizer";
export type { LineToken } from "./tokenizer";
export { parse } from "./parser";
export { serialize } from "./serializer";
export { read, readDocument, write } from "./stream";
export type { BinarySink, ConfigSink, ConfigSource, ReadOptions, TextSink } from "./stream";

// Files
export { loadConfigFile, saveConfigFile } from "./file";
export type { LoadError, LoadOptions } from "./file";

// Errors
export {
  ConfigNotFoundError,
  EncodingError,
  ErrorCode,
  FormatError,
  InvalidOptionError,
  InvalidPatternError,
  NoOptionError,
  NoSectionError,
  SystemError,
} from "../lib/errors";
export type { GitiniError, LineProblem } from "../lib/errors";
