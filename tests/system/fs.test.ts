// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdtemp, readFile as readRaw, readlink, rm, symlink, writeFile as writeRaw } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors";
import { toAbsolutePathUnsafe } from "../../src/lib/paths";
import { type AbsolutePath, pathJoin } from "../../src/lib/types";
import {
  atomicWrite,
  deleteFileIfExists,
  directoryExists,
  ensureDirectory,
  fileExists,
  listDirectory,
  readFile,
  readSymlink,
  replaceSymlink,
} from "../../src/system/fs";
import { failureOf, runTest, runTestExit } from "../helpers/layers";

describe("fs", () => {
  let dir: AbsolutePath;

  beforeEach(async () => {
    dir = toAbsolutePathUnsafe(await mkdtemp(join(tmpdir(), "aspace-ops-fs-")));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("atomicWrite leaves only the final file", async () => {
    const target = pathJoin(dir, "config.rb");
    await runTest(atomicWrite(target, "AppConfig[:x] = 1\n"));

    expect(await readRaw(target, "utf8")).toBe("AppConfig[:x] = 1\n");
    expect(await runTest(listDirectory(dir))).toEqual(["config.rb"]);
    expect(await runTest(readFile(target))).toBe("AppConfig[:x] = 1\n");
  });

  test("readFile failure names the path", async () => {
    const missing = pathJoin(dir, "missing.txt");
    const error = failureOf(await runTestExit(readFile(missing)));
    expect(error.code).toBe(ErrorCode.FILE_READ_FAILED);
    expect(error.message.startsWith(`Failed to read ${missing}: `)).toBe(true);
  });

  test("existence checks", async () => {
    const file = pathJoin(dir, "a.txt");
    await writeRaw(file, "x");
    const sub = pathJoin(dir, "nested", "deeper");
    await runTest(ensureDirectory(sub));

    expect(await runTest(fileExists(file))).toBe(true);
    expect(await runTest(directoryExists(file))).toBe(false);
    expect(await runTest(directoryExists(sub))).toBe(true);
    expect(await runTest(fileExists(pathJoin(dir, "nope")))).toBe(false);
  });

  test("deleteFileIfExists tolerates a missing file", async () => {
    const file = pathJoin(dir, "a.txt");
    await writeRaw(file, "x");
    await runTest(deleteFileIfExists(file));
    await runTest(deleteFileIfExists(file));
    expect(await runTest(fileExists(file))).toBe(false);
  });

  describe("symlinks", () => {
    test("readSymlink is None for a missing path and a plain directory", async () => {
      expect(Option.isNone(await runTest(readSymlink(pathJoin(dir, "none"))))).toBe(true);
      expect(Option.isNone(await runTest(readSymlink(dir)))).toBe(true);
    });

    test("replaceSymlink creates and then swaps a link", async () => {
      const a = pathJoin(dir, "a");
      const b = pathJoin(dir, "b");
      const link = pathJoin(dir, "current");
      await runTest(ensureDirectory(a));
      await runTest(ensureDirectory(b));

      expect(Option.isNone(await runTest(replaceSymlink(a, link)))).toBe(true);
      expect(await readlink(link)).toBe(a);

      expect(await runTest(replaceSymlink(b, link))).toEqual(Option.some(a));
      expect(await readlink(link)).toBe(b);
    });

    test("replaceSymlink refuses to replace a regular file", async () => {
      const link = pathJoin(dir, "current");
      await writeRaw(link, "not a link");

      const error = failureOf(await runTestExit(replaceSymlink(pathJoin(dir, "a"), link)));
      expect(error.code).toBe(ErrorCode.FILE_WRITE_FAILED);
      expect(error.message).toBe(`${link} exists and is not a symbolic link; move it aside first`);
      expect(await readRaw(link, "utf8")).toBe("not a link");
    });

    test("a dangling link is replaced", async () => {
      const link = pathJoin(dir, "current");
      const gone = pathJoin(dir, "gone");
      const b = pathJoin(dir, "b");
      await symlink(gone, link);
      await runTest(ensureDirectory(b));

      expect(await runTest(replaceSymlink(b, link))).toEqual(Option.some(gone));
      expect(await readlink(link)).toBe(b);
    });
  });
});
