// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { existsSync, writeFileSync } from "node:fs";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Duration, Effect, Layer, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { BackupFetcher, BackupFetcherLive, s3Url } from "../../src/backup/fetch";
import { ErrorCode } from "../../src/lib/errors";
import { toAbsolutePathUnsafe } from "../../src/lib/paths";
import { type AbsolutePath, backupDate } from "../../src/lib/types";
import { TEST_DB, failureOf, okResult, recordingRunner, runTest, runTestExit } from "../helpers/layers";

const DATE = backupDate("2024-03-01");

describe("s3Url", () => {
  test("builds the object URL from a bare bucket", () => {
    expect(s3Url("backups", TEST_DB, DATE)).toBe("s3://backups/archives-2024-03-01.sql.gz");
  });

  test("accepts an s3:// prefix and a trailing slash", () => {
    expect(s3Url("s3://backups/nightly/", TEST_DB, DATE)).toBe(
      "s3://backups/nightly/archives-2024-03-01.sql.gz"
    );
  });
});

describe("BackupFetcherLive", () => {
  let dir: AbsolutePath;

  beforeEach(async () => {
    dir = toAbsolutePathUnsafe(await mkdtemp(join(tmpdir(), "aspace-ops-fetch-")));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const fetcherLayer = (
    runner: ReturnType<typeof recordingRunner>,
    bucket: Option.Option<string> = Option.some("backups")
  ) =>
    BackupFetcherLive({
      bucket,
      db: TEST_DB,
      dir,
      awsCli: "aws",
      timeout: Duration.minutes(30),
    }).pipe(Layer.provide(runner.layer));

  test("has no remote URL without a bucket", async () => {
    const runner = recordingRunner();
    const url = await runTest(
      Effect.map(BackupFetcher, (f) => f.remoteUrl(DATE)).pipe(
        Effect.provide(fetcherLayer(runner, Option.none()))
      )
    );
    expect(Option.isNone(url)).toBe(true);
  });

  test("copies into a partial file and renames it into place", async () => {
    const runner = recordingRunner((command) => {
      const target = command[4];
      if (target !== undefined) {
        writeFileSync(target, "-- dump\n");
      }
      return okResult();
    });

    const result = await runTest(
      Effect.flatMap(BackupFetcher, (f) => f.fetch(DATE)).pipe(
        Effect.provide(fetcherLayer(runner))
      )
    );

    const target = `${dir}/archives-2024-03-01.sql.gz`;
    expect(result).toBe(target);
    expect(runner.calls.map((c) => c.command)).toEqual([
      ["aws", "s3", "cp", "s3://backups/archives-2024-03-01.sql.gz", `${target}.part`, "--no-progress"],
    ]);
    expect(runner.calls[0]?.options.timeout).toEqual(Duration.minutes(30));
    expect(await readFile(target, "utf-8")).toBe("-- dump\n");
    expect(existsSync(`${target}.part`)).toBe(false);
  });

  test("removes the partial file when the copy fails", async () => {
    const runner = recordingRunner((command) => {
      const target = command[4];
      if (target !== undefined) {
        writeFileSync(target, "-- trunc");
      }
      return { exitCode: 1, stdout: "", stderr: "An error occurred (404)" };
    });

    const exit = await runTestExit(
      Effect.flatMap(BackupFetcher, (f) => f.fetch(DATE)).pipe(
        Effect.provide(fetcherLayer(runner))
      )
    );

    expect(failureOf(exit).code).toBe(ErrorCode.EXEC_FAILED);
    expect(existsSync(`${dir}/archives-2024-03-01.sql.gz.part`)).toBe(false);
    expect(existsSync(`${dir}/archives-2024-03-01.sql.gz`)).toBe(false);
  });
});
