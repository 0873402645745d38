// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Database service: loads a dump into the MySQL container.
 *
 * The dump is streamed (`gunzip -c` or `cat`) into `mysql` running under
 * `docker exec -i`; nothing is decompressed to disk. The password reaches the
 * container as MYSQL_PWD through the environment, never on a command line.
 */

import { Context, Effect, Layer, Match, Redacted, pipe } from "effect";
import type { BackupArtifact } from "../backup/artifact";
import type { GeneralError, SystemError } from "../lib/errors";
import type { AbsolutePath, ContainerName, DatabaseName } from "../lib/types";
import type { ExecResult } from "../system/exec";
import { CommandRunner } from "../system/services/executor";

export interface DatabaseService {
  /**
   * Runs the restore and reports how it exited; a non-zero exit is a result,
   * not a failure. Fails only when the command cannot run or the archive is
   * corrupt.
   */
  readonly restore: (artifact: BackupArtifact) => Effect.Effect<ExecResult, SystemError | GeneralError>;
}

export interface Database {
  readonly _tag: "Database";
}

export const Database: Context.Tag<Database, DatabaseService> = Context.GenericTag<
  Database,
  DatabaseService
>("aspace-ops/Database");

export interface MysqlTarget {
  readonly container: ContainerName;
  readonly user: string;
  readonly password: Redacted.Redacted;
  readonly database: DatabaseName;
  readonly composeDir: AbsolutePath;
}

export const mysqlCommand = (target: MysqlTarget): readonly string[] => [
  "docker",
  "exec",
  "-i",
  "-e",
  "MYSQL_PWD",
  target.container,
  "mysql",
  "-u",
  target.user,
  target.database,
];

export const dumpReader = (artifact: BackupArtifact): readonly string[] =>
  pipe(
    Match.value(artifact.compression),
    Match.when("gzip", (): readonly string[] => ["gunzip", "-c", artifact.path]),
    Match.when("none", (): readonly string[] => ["cat", artifact.path]),
    Match.exhaustive
  );

export const DatabaseLive = (target: MysqlTarget): Layer.Layer<Database, never, CommandRunner> =>
  Layer.effect(
    Database,
    Effect.map(CommandRunner, (runner) => ({
      restore: (artifact: BackupArtifact): Effect.Effect<ExecResult, SystemError | GeneralError> =>
        Effect.gen(function* () {
          yield* Effect.when(
            pipe(
              Effect.logDebug(`Verifying ${artifact.fileName}`),
              Effect.zipRight(runner.execSuccess(["gunzip", "-t", artifact.path]))
            ),
            () => artifact.compression === "gzip"
          );

          yield* Effect.logDebug(
            `Loading ${artifact.fileName} into ${target.database} on ${target.container}`
          );
          return yield* runner.exec(mysqlCommand(target), {
            pipeFrom: dumpReader(artifact),
            env: { MYSQL_PWD: Redacted.value(target.password) },
            cwd: target.composeDir,
          });
        }),
    }))
  );
