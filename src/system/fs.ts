// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Filesystem operations over the @effect/platform FileSystem service.
 * Every failure is a SystemError naming the path; the FileSystem requirement
 * is satisfied by NodeContext.layer at the CLI boundary and in tests.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import { ErrorCode, SystemError, causeProps, errorMessage } from "../lib/errors";
import { type AbsolutePath, pathWithSuffix } from "../lib/types";

type Fs = FileSystem.FileSystem;

const readError =
  (message: string) =>
  (e: unknown): SystemError =>
    new SystemError({
      code: ErrorCode.FILE_READ_FAILED,
      message: `${message}: ${errorMessage(e)}`,
      ...causeProps(e),
    });

const writeError =
  (message: string) =>
  (e: unknown): SystemError =>
    new SystemError({
      code: ErrorCode.FILE_WRITE_FAILED,
      message: `${message}: ${errorMessage(e)}`,
      ...causeProps(e),
    });

export const readFile = (path: AbsolutePath): Effect.Effect<string, SystemError, Fs> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs.readFileString(path).pipe(Effect.mapError(readError(`Failed to read ${path}`)))
  );

export const writeFile = (
  path: AbsolutePath,
  content: string
): Effect.Effect<void, SystemError, Fs> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs.writeFileString(path, content).pipe(Effect.mapError(writeError(`Failed to write ${path}`)))
  );

export const writeBytes = (
  path: AbsolutePath,
  content: Uint8Array
): Effect.Effect<void, SystemError, Fs> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs.writeFile(path, content).pipe(Effect.mapError(writeError(`Failed to write ${path}`)))
  );

/** Writes to `<path>.tmp` then renames, so readers never see a partial file. */
export const atomicWrite = (
  path: AbsolutePath,
  content: string
): Effect.Effect<void, SystemError, Fs> => {
  const tmp = pathWithSuffix(path, ".tmp");
  return pipe(
    writeFile(tmp, content),
    Effect.zipRight(renameFile(tmp, path))
  );
};

/** Follows symlinks: a dangling link does not exist. */
export const fileExists = (path: AbsolutePath): Effect.Effect<boolean, never, Fs> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs.exists(path).pipe(Effect.orElseSucceed(() => false))
  );

export const directoryExists = (path: AbsolutePath): Effect.Effect<boolean, never, Fs> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs.stat(path).pipe(
      Effect.map((info) => info.type === "Directory"),
      Effect.orElseSucceed(() => false)
    )
  );

/** Entry names (not paths) directly under `path`. */
export const listDirectory = (
  path: AbsolutePath
): Effect.Effect<readonly string[], SystemError, Fs> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs.readDirectory(path).pipe(Effect.mapError(readError(`Failed to list ${path}`)))
  );

export const ensureDirectory = (path: AbsolutePath): Effect.Effect<void, SystemError, Fs> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs
      .makeDirectory(path, { recursive: true })
      .pipe(Effect.mapError(writeError(`Failed to create directory ${path}`)))
  );

export const renameFile = (
  from: AbsolutePath,
  to: AbsolutePath
): Effect.Effect<void, SystemError, Fs> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs.rename(from, to).pipe(Effect.mapError(writeError(`Failed to move ${from} to ${to}`)))
  );

export const deleteFileIfExists = (path: AbsolutePath): Effect.Effect<void, SystemError, Fs> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const exists = yield* fileExists(path);
    yield* Effect.when(
      fs.remove(path).pipe(Effect.mapError(writeError(`Failed to delete ${path}`))),
      () => exists
    );
  });

export const deleteDirectory = (path: AbsolutePath): Effect.Effect<void, SystemError, Fs> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const exists = yield* fileExists(path);
    yield* Effect.when(
      fs
        .remove(path, { recursive: true })
        .pipe(Effect.mapError(writeError(`Failed to delete directory ${path}`))),
      () => exists
    );
  });

/** Target of a symbolic link; None when `path` is absent or not a link. */
export const readSymlink = (path: AbsolutePath): Effect.Effect<Option.Option<string>, never, Fs> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs.readLink(path).pipe(
      Effect.map(Option.some),
      Effect.orElseSucceed(() => Option.none())
    )
  );

/**
 * Points `link` at `target`. An existing link is replaced; an existing
 * regular file or directory at `link` is left alone and reported.
 */
export const replaceSymlink = (
  target: AbsolutePath,
  link: AbsolutePath
): Effect.Effect<Option.Option<string>, SystemError, Fs> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const previous = yield* readSymlink(link);
    const occupied = yield* fileExists(link);

    if (Option.isNone(previous) && occupied) {
      return yield* Effect.fail(
        new SystemError({
          code: ErrorCode.FILE_WRITE_FAILED,
          message: `${link} exists and is not a symbolic link; move it aside first`,
        })
      );
    }

    yield* Effect.when(
      fs.remove(link).pipe(Effect.mapError(writeError(`Failed to remove link ${link}`))),
      () => Option.isSome(previous)
    );
    yield* fs
      .symlink(target, link)
      .pipe(Effect.mapError(writeError(`Failed to link ${link} -> ${target}`)));
    return previous;
  });
