// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Release service: installs a release's compose bundle next to the others,
 * points its configuration at this deployment, and seeds its database.
 *
 * Layout under RELEASES_DIR:
 *   archivesspace-docker-<tag>/          installed release
 *   archivesspace-docker-<tag>.zip       download, removed after extraction
 *   .archivesspace-docker-<tag>.extract/ staging, removed after extraction
 */

import { FileSystem, HttpClient } from "@effect/platform";
import { Context, type Duration, Effect, Layer, Match, pipe } from "effect";
import type { BackupArtifact } from "../backup/artifact";
import { DeployError, ErrorCode, type GeneralError, SystemError, causeProps } from "../lib/errors";
import { releaseDir, releaseDirName } from "../lib/paths";
import type { AbsolutePath, DatabaseName, ReleaseTag } from "../lib/types";
import { pathJoin } from "../lib/types";
import {
  atomicWrite,
  deleteDirectory,
  deleteFileIfExists,
  directoryExists,
  ensureDirectory,
  fileExists,
  readFile,
  renameFile,
  writeBytes,
} from "../system/fs";
import { CommandRunner } from "../system/services/executor";
import { rewriteReleaseConfigRb, rewriteReleaseEnv } from "./config-rewrite";

export interface ReleaseService {
  /** Downloads and extracts `tag`, replacing an existing install of it. */
  readonly install: (
    tag: ReleaseTag,
    url: string
  ) => Effect.Effect<AbsolutePath, DeployError | SystemError>;
  readonly configure: (
    dir: AbsolutePath,
    db: DatabaseName,
    domain: string
  ) => Effect.Effect<void, SystemError>;
  /** Writes the dump, uncompressed, to `<dir>/sql/<db>-<date>.sql`. */
  readonly seedDatabase: (
    dir: AbsolutePath,
    artifact: BackupArtifact,
    db: DatabaseName
  ) => Effect.Effect<AbsolutePath, SystemError | GeneralError>;
}

export interface Releases {
  readonly _tag: "Releases";
}

export const Releases: Context.Tag<Releases, ReleaseService> = Context.GenericTag<
  Releases,
  ReleaseService
>("aspace-ops/Releases");

/** Directory the release zip unpacks to. */
const ZIP_ROOT = "archivesspace";

export const seedFileName = (db: DatabaseName, artifact: BackupArtifact): string =>
  `${db}-${artifact.date}.sql`;

export const seedCommand = (artifact: BackupArtifact, target: AbsolutePath): readonly string[] =>
  pipe(
    Match.value(artifact.compression),
    Match.when("gzip", (): readonly string[] => [
      "sh",
      "-c",
      'gunzip -c -- "$1" > "$2"',
      "sh",
      artifact.path,
      target,
    ]),
    Match.when("none", (): readonly string[] => ["cp", "--", artifact.path, target]),
    Match.exhaustive
  );

export interface ReleaseServiceOptions {
  readonly releasesDir: AbsolutePath;
  /** Bounds the download and the seed copy. */
  readonly transferTimeout: Duration.Duration;
  readonly commandTimeout: Duration.Duration;
}

export const ReleasesLive = (
  options: ReleaseServiceOptions
): Layer.Layer<Releases, never, HttpClient.HttpClient | CommandRunner | FileSystem.FileSystem> =>
  Layer.effect(
    Releases,
    Effect.gen(function* () {
      const client = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk);
      const runner = yield* CommandRunner;
      const fs = yield* FileSystem.FileSystem;

      const download = (
        url: string,
        target: AbsolutePath
      ): Effect.Effect<void, DeployError, FileSystem.FileSystem> =>
        pipe(
          client.get(url),
          Effect.flatMap((response) => response.arrayBuffer),
          Effect.scoped,
          Effect.flatMap((buffer) => writeBytes(target, new Uint8Array(buffer))),
          Effect.timeoutFail({
            duration: options.transferTimeout,
            onTimeout: () =>
              new SystemError({ code: ErrorCode.EXEC_TIMEOUT, message: "download timed out" }),
          }),
          Effect.mapError(
            (e) =>
              new DeployError({
                code: ErrorCode.RELEASE_DOWNLOAD_FAILED,
                message: `Failed to download ${url}: ${e.message}`,
                ...causeProps(e),
              })
          )
        );

      const cleanup = (paths: {
        readonly zip: AbsolutePath;
        readonly staging: AbsolutePath;
      }): Effect.Effect<void, never, FileSystem.FileSystem> =>
        pipe(
          deleteFileIfExists(paths.zip),
          Effect.zipRight(deleteDirectory(paths.staging)),
          Effect.catchAll((e) => Effect.logWarning(`Cleanup incomplete: ${e.message}`))
        );

      const install = (
        tag: ReleaseTag,
        url: string
      ): Effect.Effect<AbsolutePath, DeployError | SystemError, FileSystem.FileSystem> => {
        const name = releaseDirName(tag);
        const target = releaseDir(options.releasesDir, tag);
        const paths = {
          zip: pathJoin(options.releasesDir, `${name}.zip`),
          staging: pathJoin(options.releasesDir, `.${name}.extract`),
        };

        return Effect.gen(function* () {
          yield* ensureDirectory(options.releasesDir);
          yield* Effect.logInfo(`Downloading ${url}`);
          yield* download(url, paths.zip);

          yield* deleteDirectory(paths.staging);
          yield* pipe(
            runner.execSuccess(["unzip", "-q", paths.zip, "-d", paths.staging], {
              timeout: options.commandTimeout,
            }),
            Effect.mapError(
              (e) =>
                new DeployError({
                  code: ErrorCode.RELEASE_EXTRACT_FAILED,
                  message: `Failed to extract ${paths.zip}: ${e.message}`,
                })
            )
          );

          const nested = pathJoin(paths.staging, ZIP_ROOT);
          const root = (yield* directoryExists(nested)) ? nested : paths.staging;

          if (yield* directoryExists(target)) {
            yield* Effect.logInfo(`Replacing existing ${target}`);
            yield* deleteDirectory(target);
          }
          yield* renameFile(root, target);
          return target;
        }).pipe(Effect.ensuring(cleanup(paths)));
      };

      const rewriteIfPresent = (
        file: AbsolutePath,
        rewrite: (content: string) => string
      ): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
        Effect.gen(function* () {
          if (!(yield* fileExists(file))) {
            yield* Effect.logWarning(`${file} not found, leaving it unconfigured`);
            return;
          }
          const content = yield* readFile(file);
          yield* atomicWrite(file, rewrite(content));
          yield* Effect.logDebug(`Updated ${file}`);
        });

      const configure = (
        dir: AbsolutePath,
        db: DatabaseName,
        domain: string
      ): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
        pipe(
          rewriteIfPresent(pathJoin(dir, ".env"), (c) => rewriteReleaseEnv(c, db)),
          Effect.zipRight(
            rewriteIfPresent(pathJoin(dir, "config", "config.rb"), (c) =>
              rewriteReleaseConfigRb(c, db, domain)
            )
          )
        );

      const seedDatabase = (
        dir: AbsolutePath,
        artifact: BackupArtifact,
        db: DatabaseName
      ): Effect.Effect<AbsolutePath, SystemError | GeneralError, FileSystem.FileSystem> =>
        Effect.gen(function* () {
          const sqlDir = pathJoin(dir, "sql");
          const target = pathJoin(sqlDir, seedFileName(db, artifact));
          yield* ensureDirectory(sqlDir);
          yield* runner.execSuccess(seedCommand(artifact, target), {
            timeout: options.transferTimeout,
          });
          return target;
        });

      const withFs = <A, E>(
        effect: Effect.Effect<A, E, FileSystem.FileSystem>
      ): Effect.Effect<A, E> => Effect.provideService(effect, FileSystem.FileSystem, fs);

      return {
        install: (tag: ReleaseTag, url: string) => withFs(install(tag, url)),
        configure: (dir: AbsolutePath, db: DatabaseName, domain: string) =>
          withFs(configure(dir, db, domain)),
        seedDatabase: (dir: AbsolutePath, artifact: BackupArtifact, db: DatabaseName) =>
          withFs(seedDatabase(dir, artifact, db)),
      };
    })
  );
