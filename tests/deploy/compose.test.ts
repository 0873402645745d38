// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Duration, Effect, Layer } from "effect";
import { describe, expect, test } from "vitest";
import { Compose, ComposeLive, type ComposeService } from "../../src/deploy/compose";
import { ErrorCode } from "../../src/lib/errors";
import { path } from "../../src/lib/types";
import { failureOf, okResult, recordingRunner, runTest, runTestExit } from "../helpers/layers";

const DIR = path("/srv/aspace");
const COMMAND_TIMEOUT = Duration.minutes(5);
const PULL_TIMEOUT = Duration.minutes(30);

const withCompose = <A, E>(
  runner: ReturnType<typeof recordingRunner>,
  f: (compose: ComposeService) => Effect.Effect<A, E>
) =>
  Effect.flatMap(Compose, f).pipe(
    Effect.provide(
      ComposeLive({ commandTimeout: COMMAND_TIMEOUT, pullTimeout: PULL_TIMEOUT }).pipe(
        Layer.provide(runner.layer)
      )
    )
  );

describe("ComposeLive", () => {
  test("runs compose subcommands in the deployment directory", async () => {
    const runner = recordingRunner();

    await runTest(
      withCompose(runner, (compose) =>
        Effect.all([compose.down(DIR), compose.pull(DIR), compose.up(DIR)])
      )
    );

    expect(runner.calls).toEqual([
      { command: ["docker", "compose", "down"], options: { cwd: DIR, timeout: COMMAND_TIMEOUT } },
      { command: ["docker", "compose", "pull"], options: { cwd: DIR, timeout: PULL_TIMEOUT } },
      {
        command: ["docker", "compose", "up", "-d", "--build", "--force-recreate"],
        options: { cwd: DIR, timeout: PULL_TIMEOUT },
      },
    ]);
  });

  test("removes volumes by name", async () => {
    const runner = recordingRunner();

    await runTest(withCompose(runner, (compose) => compose.removeVolumes(["app-data", "solr-data"])));

    expect(runner.calls.map((c) => c.command)).toEqual([
      ["docker", "volume", "rm", "app-data", "solr-data"],
    ]);
  });

  test("reports which compose call failed", async () => {
    const runner = recordingRunner(() => ({ exitCode: 1, stdout: "", stderr: "no such image" }));

    const exit = await runTestExit(withCompose(runner, (compose) => compose.pull(DIR)));

    const error = failureOf(exit);
    expect(error.code).toBe(ErrorCode.COMPOSE_FAILED);
    expect(error.message).toBe(
      "docker compose pull in /srv/aspace failed: Command failed with exit code 1: docker compose pull"
    );
  });

  test("stops at the first failing call", async () => {
    const runner = recordingRunner((command) =>
      command[2] === "down" ? { exitCode: 1, stdout: "", stderr: "" } : okResult()
    );

    await runTestExit(
      withCompose(runner, (compose) => Effect.all([compose.down(DIR), compose.up(DIR)]))
    );

    expect(runner.calls).toHaveLength(1);
  });
});
