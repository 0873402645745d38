#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * aspace-ops: backup restore and release management for an ArchivesSpace
 * Docker deployment.
 *
 * This is the "imperative shell" - the only place where the Effect runtime
 * is executed.
 */

import { ValidationError } from "@effect/cli";
import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Option, pipe } from "effect";
import { cli } from "./cli/index";
import { hoistOptions } from "./cli/options";
import { ErrorCode, type OpsError, toExitCode } from "./lib/errors";

type MainError = OpsError | ValidationError.ValidationError;

export const program = (argv: readonly string[]): Effect.Effect<void, MainError> =>
  pipe(cli(hoistOptions(argv)), Effect.provide(NodeContext.layer));

/** Usage errors exit 2; everything else exits with its error code. */
export const exitCodeFor = (error: MainError): number =>
  ValidationError.isValidationError(error) ? ErrorCode.INVALID_ARGS : toExitCode(error.code);

export const exitCodeFromExit = (exit: Exit.Exit<void, MainError>): number =>
  Exit.match(exit, {
    onSuccess: (): number => 0,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => 1,
        onSome: exitCodeFor,
      }),
  });

/** Failures were already displayed by the command runner; only defects are printed here. */
const logDefect = (exit: Exit.Exit<void, MainError>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => console.error("Unexpected error:", Cause.pretty(cause)),
        onSome: (): void => undefined,
      }),
  });

async function main(): Promise<never> {
  const exit = await Effect.runPromiseExit(program(process.argv));
  logDefect(exit);
  process.exit(exitCodeFromExit(exit));
}

if (require.main === module) {
  main().catch((e: unknown) => {
    console.error("Unexpected error:", e);
    process.exit(1);
  });
}
