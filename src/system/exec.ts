// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Command execution via the @effect/platform Command API.
 *
 * Arguments are always structured arrays; nothing goes through a shell
 * unless the caller runs `sh -c` explicitly. Piping (`gunzip -c dump | mysql`)
 * uses `pipeFrom`, which starts both processes and connects them directly.
 */

import { Command } from "@effect/platform";
import type { CommandExecutor } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Duration, Effect, Option, Stream, pipe } from "effect";
import { ErrorCode, GeneralError, SystemError, causeProps, errorMessage } from "../lib/errors";

export interface ExecOptions {
  readonly env?: Record<string, string>;
  readonly cwd?: string;
  /** Kills the process and fails with EXEC_TIMEOUT once exceeded. */
  readonly timeout?: Duration.DurationInput;
  readonly stdin?: string;
  /** Producer whose stdout becomes this command's stdin. */
  readonly pipeFrom?: readonly string[];
}

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/** Internalizes NodeContext.layer so callers don't need R type parameter. */
const withExecutor = <A, E>(
  effect: Effect.Effect<A, E, CommandExecutor.CommandExecutor>
): Effect.Effect<A, E> => effect.pipe(Effect.provide(NodeContext.layer));

const execError = (command: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.EXEC_FAILED,
    message: `Failed to execute: ${command}: ${errorMessage(e)}`,
    ...causeProps(e),
  });

const timeoutError = (command: string, timeout: Duration.DurationInput): SystemError =>
  new SystemError({
    code: ErrorCode.EXEC_TIMEOUT,
    message: `Timed out after ${Duration.format(Duration.decode(timeout))}: ${command}`,
  });

/** Non-empty guarantee prevents index errors on destructuring. */
interface ValidatedCommand {
  readonly cmd: string;
  readonly args: readonly string[];
}

const validateCommand = (
  command: readonly string[]
): Effect.Effect<ValidatedCommand, GeneralError> =>
  pipe(
    Effect.succeed(command),
    Effect.filterOrFail(
      (c): c is readonly [string, ...string[]] => c.length > 0 && c[0] !== undefined && c[0] !== "",
      () =>
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: "Command array cannot be empty",
        })
    ),
    Effect.map(([cmd, ...args]): ValidatedCommand => ({ cmd, args }))
  );

const streamToString = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(
    stream,
    Stream.decodeText("utf-8"),
    Stream.runFold("", (acc, s) => acc + s)
  );

const processEnv = (): Record<string, string> =>
  Object.fromEntries(
    Object.entries(process.env).filter((entry): entry is [string, string] => entry[1] !== undefined)
  );

const describeCommand = (command: readonly string[], options: ExecOptions): string =>
  pipe(
    Option.fromNullable(options.pipeFrom),
    Option.match({
      onNone: (): string => command.join(" "),
      onSome: (from): string => `${from.join(" ")} | ${command.join(" ")}`,
    })
  );

const buildCommand = (
  main: ValidatedCommand,
  producer: Option.Option<ValidatedCommand>,
  options: ExecOptions
): Command.Command => {
  const consumer = Command.make(main.cmd, ...main.args);
  const base = Option.match(producer, {
    onNone: (): Command.Command => consumer,
    onSome: (p): Command.Command => pipe(Command.make(p.cmd, ...p.args), Command.pipeTo(consumer)),
  });
  return pipe(
    base,
    (c) => Command.env(c, { ...processEnv(), ...options.env }),
    (c) => (options.cwd !== undefined ? Command.workingDirectory(c, options.cwd) : c),
    (c) => (options.stdin !== undefined ? Command.feed(c, options.stdin) : c)
  );
};

export const exec = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  Effect.gen(function* () {
    const main = yield* validateCommand(command);
    const producer = yield* pipe(
      Option.fromNullable(options.pipeFrom),
      Option.match({
        onNone: (): Effect.Effect<Option.Option<ValidatedCommand>, GeneralError> =>
          Effect.succeed(Option.none()),
        onSome: (from): Effect.Effect<Option.Option<ValidatedCommand>, GeneralError> =>
          Effect.map(validateCommand(from), Option.some),
      })
    );
    const commandStr = describeCommand(command, options);
    const configured = buildCommand(main, producer, options);

    const run = withExecutor(
      Effect.gen(function* () {
        const process = yield* Command.start(configured);

        // Parallel capture: exitCode + both streams ready independently
        const [exitCode, stdout, stderr] = yield* Effect.all(
          [
            process.exitCode,
            streamToString(process.stdout),
            streamToString(process.stderr),
          ],
          { concurrency: 3 }
        );

        return { exitCode, stdout, stderr };
      }).pipe(Effect.scoped)
    ).pipe(Effect.mapError((e) => execError(commandStr, e)));

    return yield* pipe(
      Option.fromNullable(options.timeout),
      Option.match({
        onNone: (): Effect.Effect<ExecResult, SystemError> => run,
        onSome: (timeout): Effect.Effect<ExecResult, SystemError> =>
          Effect.timeoutFail(run, {
            duration: timeout,
            onTimeout: () => timeoutError(commandStr, timeout),
          }),
      })
    );
  });

/** Fails if exit code is non-zero. Use exec() when exit code matters but isn't fatal. */
export const execSuccess = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  pipe(
    exec(command, options),
    Effect.filterOrFail(
      (result): result is ExecResult => result.exitCode === 0,
      (result) => {
        const stderr = result.stderr.trim();
        return new SystemError({
          code: ErrorCode.EXEC_FAILED,
          message: `Command failed with exit code ${result.exitCode}: ${describeCommand(command, options)}${stderr ? `\n${stderr}` : ""}`,
        });
      }
    )
  );
