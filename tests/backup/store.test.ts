// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { BackupStore, BackupStoreLive, listArtifacts } from "../../src/backup/store";
import { toAbsolutePathUnsafe } from "../../src/lib/paths";
import { type AbsolutePath, backupDate, pathJoin } from "../../src/lib/types";
import { TEST_DB, runTest } from "../helpers/layers";

describe("BackupStore", () => {
  let dir: AbsolutePath;

  beforeEach(async () => {
    dir = toAbsolutePathUnsafe(await mkdtemp(join(tmpdir(), "aspace-ops-store-")));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const touch = (name: string): Promise<void> => writeFile(join(dir, name), "-- dump\n");

  test("lists one artifact per date, newest first", async () => {
    await touch("archives-2024-01-15.sql.gz");
    await touch("archives-2024-03-01.sql");
    await touch("archives-2024-03-01.sql.gz");
    await touch("archives-2024-02-10.sql");
    await touch("other-2024-04-01.sql.gz");
    await touch("archives-2024-04-01.sql.gz.part");
    await touch("notes.txt");

    const artifacts = await runTest(listArtifacts(dir, TEST_DB));

    expect(artifacts.map((a) => a.fileName)).toEqual([
      "archives-2024-03-01.sql.gz",
      "archives-2024-02-10.sql",
      "archives-2024-01-15.sql.gz",
    ]);
    expect(artifacts[1]?.compression).toBe("none");
    expect(artifacts[0]?.path).toBe(pathJoin(dir, "archives-2024-03-01.sql.gz"));
  });

  test("an empty directory has no artifacts", async () => {
    const artifacts = await runTest(listArtifacts(dir, TEST_DB));
    expect(artifacts).toEqual([]);
  });

  test("a missing directory is an empty store", async () => {
    const artifacts = await runTest(listArtifacts(pathJoin(dir, "missing"), TEST_DB));
    expect(artifacts).toEqual([]);
  });

  test("the live layer reports its location and download paths", async () => {
    await touch("archives-2024-03-01.sql.gz");

    const result = await runTest(
      Effect.gen(function* () {
        const store = yield* BackupStore;
        const listed = yield* store.list();
        return {
          location: store.location,
          count: listed.length,
          target: store.pathFor(backupDate("2024-05-06")),
        };
      }).pipe(Effect.provide(BackupStoreLive({ dir, db: TEST_DB })))
    );

    expect(result).toEqual({
      location: dir,
      count: 1,
      target: `${dir}/archives-2024-05-06.sql.gz`,
    });
  });
});
