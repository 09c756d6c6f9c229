// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Stream boundary. Sources are text or raw bytes in a declared encoding;
 * sinks take either text or bytes. The document is drained in one write.
 */

import { Either, Match, pipe } from "effect";
import {
  EncodingError,
  ErrorCode,
  type FormatError,
  causeOf,
  errorMessage,
} from "../lib/errors";
import { type ConfigDocument, merge } from "./document";
import { parse } from "./parser";
import { serialize } from "./serializer";

export type ConfigSource = string | Uint8Array;

export interface TextSink {
  readonly mode: "text";
  readonly write: (chunk: string) => void;
}

/** Receives the serialized document encoded as UTF-8. */
export interface BinarySink {
  readonly mode: "binary";
  readonly write: (chunk: Uint8Array) => void;
}

export type ConfigSink = TextSink | BinarySink;

export interface ReadOptions {
  /** WHATWG encoding label for byte sources. */
  readonly encoding?: string;
}

export const DEFAULT_ENCODING = "utf-8";

export const decodeSource = (
  source: ConfigSource,
  options: ReadOptions = {}
): Either.Either<string, EncodingError> => {
  const encoding = options.encoding ?? DEFAULT_ENCODING;
  return typeof source === "string"
    ? Either.right(source)
    : Either.try({
        try: (): string => new TextDecoder(encoding, { fatal: true }).decode(source),
        catch: (e): EncodingError =>
          new EncodingError({
            code: ErrorCode.ENCODING_ERROR,
            message: `Cannot decode config as ${encoding}: ${errorMessage(e)}`,
            encoding,
            ...causeOf(e),
          }),
      });
};

/** Parse a source into a new document. */
export const readDocument = (
  source: ConfigSource,
  options: ReadOptions = {}
): Either.Either<ConfigDocument, EncodingError | FormatError> =>
  Either.flatMap(decodeSource(source, options), parse);

/**
 * Parse a source and fold it into `doc`. Repeated sections extend existing
 * ones. On failure `doc` is left untouched.
 */
export const read = (
  doc: ConfigDocument,
  source: ConfigSource,
  options: ReadOptions = {}
): Either.Either<void, EncodingError | FormatError> =>
  Either.map(readDocument(source, options), (parsed) => merge(doc, parsed));

export const encodeText = (text: string): Uint8Array => new TextEncoder().encode(text);

/** Serialize `doc` and hand it to `sink` in one chunk. */
export const write = (doc: ConfigDocument, sink: ConfigSink): void => {
  const text = serialize(doc);
  pipe(
    Match.value(sink),
    Match.when({ mode: "text" }, (s) => s.write(text)),
    Match.when({ mode: "binary" }, (s) => s.write(encodeText(text))),
    Match.exhaustive
  );
};
