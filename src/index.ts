// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * gitini - read and edit git-style config files.
 *
 * This is the imperative shell: the only place the Effect runtime is executed.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Match, Option, pipe } from "effect";
import { cli } from "./cli/index";

const exitCodeFromExit = (exit: Exit.Exit<void, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => 0,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => 1,
        onSome: (value: unknown): number =>
          pipe(
            Match.value(value),
            Match.when(
              (v: unknown): v is { code: number } =>
                typeof v === "object" && v !== null && "code" in v && typeof v.code === "number",
              (v: { code: number }) => Math.min(v.code, 125)
            ),
            Match.orElse(() => 1)
          ),
      }),
  });

/** Failures were already reported by the command runner; only defects are left. */
const logDefect = (exit: Exit.Exit<void, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => console.error("Unexpected error:", Cause.pretty(cause)),
        onSome: (): void => undefined,
      }),
  });

async function main(): Promise<never> {
  const exit = await Effect.runPromiseExit(
    cli(process.argv).pipe(Effect.provide(NodeContext.layer))
  );
  logDefect(exit);
  process.exit(exitCodeFromExit(exit));
}

void main();
