// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * BackupFetcher service: copies a dated dump from the S3 bucket into the
 * backup directory. Downloads land in `<name>.part` and are renamed when
 * complete, so an interrupted copy never looks like an artifact.
 */

import { FileSystem } from "@effect/platform";
import { Context, Duration, Effect, Layer, Option, pipe } from "effect";
import type { GeneralError, SystemError } from "../lib/errors";
import { backupFileName } from "../lib/paths";
import type { AbsolutePath, BackupDate, DatabaseName } from "../lib/types";
import { pathJoin, pathWithSuffix } from "../lib/types";
import { deleteFileIfExists, ensureDirectory, renameFile } from "../system/fs";
import { CommandRunner } from "../system/services/executor";

export interface BackupFetcherService {
  /** Remote URL for `date`; None when no bucket is configured. */
  readonly remoteUrl: (date: BackupDate) => Option.Option<string>;
  readonly fetch: (date: BackupDate) => Effect.Effect<AbsolutePath, SystemError | GeneralError>;
}

export interface BackupFetcher {
  readonly _tag: "BackupFetcher";
}

export const BackupFetcher: Context.Tag<BackupFetcher, BackupFetcherService> = Context.GenericTag<
  BackupFetcher,
  BackupFetcherService
>("aspace-ops/BackupFetcher");

export const s3Url = (bucket: string, db: DatabaseName, date: BackupDate): string =>
  `s3://${bucket.replace(/^s3:\/\//, "").replace(/\/+$/, "")}/${backupFileName(db, date)}`;

export interface S3FetcherOptions {
  readonly bucket: Option.Option<string>;
  readonly db: DatabaseName;
  readonly dir: AbsolutePath;
  readonly awsCli: string;
  readonly timeout: Duration.Duration;
}

export const BackupFetcherLive = (
  options: S3FetcherOptions
): Layer.Layer<BackupFetcher, never, FileSystem.FileSystem | CommandRunner> =>
  Layer.effect(
    BackupFetcher,
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const runner = yield* CommandRunner;

      const remoteUrl = (date: BackupDate): Option.Option<string> =>
        Option.map(options.bucket, (bucket) => s3Url(bucket, options.db, date));

      const download = (
        url: string,
        date: BackupDate
      ): Effect.Effect<AbsolutePath, SystemError | GeneralError, FileSystem.FileSystem> =>
        Effect.gen(function* () {
          const target = pathJoin(options.dir, backupFileName(options.db, date));
          const partial = pathWithSuffix(target, ".part");

          yield* ensureDirectory(options.dir);
          yield* Effect.logInfo(`Downloading ${url}`);
          yield* pipe(
            runner.execSuccess([options.awsCli, "s3", "cp", url, partial, "--no-progress"], {
              timeout: options.timeout,
            }),
            Effect.tapError(() =>
              deleteFileIfExists(partial).pipe(
                Effect.catchAll((e) => Effect.logWarning(`Could not remove ${partial}: ${e.message}`))
              )
            )
          );
          yield* renameFile(partial, target);
          return target;
        });

      return {
        remoteUrl,
        fetch: (date: BackupDate): Effect.Effect<AbsolutePath, SystemError | GeneralError> =>
          Option.match(remoteUrl(date), {
            onNone: (): Effect.Effect<AbsolutePath, SystemError | GeneralError> =>
              Effect.dieMessage("fetch called without a configured bucket"),
            onSome: (url): Effect.Effect<AbsolutePath, SystemError | GeneralError> =>
              download(url, date).pipe(Effect.provideService(FileSystem.FileSystem, fs)),
          }),
      };
    })
  );
