// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CommandRunner service using Context.Tag pattern.
 * Wraps the functions from src/system/exec.ts so collaborators can be tested
 * against a recording fake instead of real processes.
 */

import { Context, Layer } from "effect";
import { exec, execSuccess } from "../exec";

export interface CommandRunnerService {
  readonly exec: typeof exec;
  readonly execSuccess: typeof execSuccess;
}

/**
 * CommandRunner service identifier for Effect dependency injection.
 */
export interface CommandRunner {
  readonly _tag: "CommandRunner";
}

/**
 * Use with `yield* CommandRunner` to access the service in Effect generators.
 */
export const CommandRunner: Context.Tag<CommandRunner, CommandRunnerService> = Context.GenericTag<
  CommandRunner,
  CommandRunnerService
>("aspace-ops/CommandRunner");

export const CommandRunnerLive: Layer.Layer<CommandRunner> = Layer.succeed(CommandRunner, {
  exec,
  execSuccess,
});
