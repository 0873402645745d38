// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Compose service: the `docker compose` and `docker volume` calls the
 * deployment workflows make.
 */

import { Context, type Duration, Effect, Layer, pipe } from "effect";
import { DeployError, ErrorCode, type GeneralError, type SystemError } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";
import { CommandRunner } from "../system/services/executor";

export interface ComposeService {
  readonly down: (dir: AbsolutePath) => Effect.Effect<void, DeployError>;
  readonly pull: (dir: AbsolutePath) => Effect.Effect<void, DeployError>;
  /** `up -d --build --force-recreate`. */
  readonly up: (dir: AbsolutePath) => Effect.Effect<void, DeployError>;
  readonly removeVolumes: (names: readonly string[]) => Effect.Effect<void, DeployError>;
}

export interface Compose {
  readonly _tag: "Compose";
}

export const Compose: Context.Tag<Compose, ComposeService> = Context.GenericTag<
  Compose,
  ComposeService
>("aspace-ops/Compose");

const composeError =
  (what: string) =>
  (e: SystemError | GeneralError): DeployError =>
    new DeployError({
      code: ErrorCode.COMPOSE_FAILED,
      message: `${what} failed: ${e.message}`,
    });

export const ComposeLive = (options: {
  /** Bounds `down` and volume removal. */
  readonly commandTimeout: Duration.Duration;
  /** Bounds image pulls and `up`, which may build. */
  readonly pullTimeout: Duration.Duration;
}): Layer.Layer<Compose, never, CommandRunner> =>
  Layer.effect(
    Compose,
    Effect.map(CommandRunner, (runner) => {
      const compose = (
        dir: AbsolutePath,
        args: readonly string[],
        timeout: Duration.Duration
      ): Effect.Effect<void, DeployError> =>
        pipe(
          runner.execSuccess(["docker", "compose", ...args], { cwd: dir, timeout }),
          Effect.mapError(composeError(`docker compose ${args.join(" ")} in ${dir}`)),
          Effect.asVoid
        );

      return {
        down: (dir: AbsolutePath): Effect.Effect<void, DeployError> =>
          compose(dir, ["down"], options.commandTimeout),
        pull: (dir: AbsolutePath): Effect.Effect<void, DeployError> =>
          compose(dir, ["pull"], options.pullTimeout),
        up: (dir: AbsolutePath): Effect.Effect<void, DeployError> =>
          compose(dir, ["up", "-d", "--build", "--force-recreate"], options.pullTimeout),
        removeVolumes: (names: readonly string[]): Effect.Effect<void, DeployError> =>
          pipe(
            runner.execSuccess(["docker", "volume", "rm", ...names], {
              timeout: options.commandTimeout,
            }),
            Effect.mapError(composeError(`docker volume rm ${names.join(" ")}`)),
            Effect.asVoid
          ),
      };
    })
  );
