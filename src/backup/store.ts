// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * BackupStore service: the directory the nightly dump job writes into.
 */

import { FileSystem } from "@effect/platform";
import { Array as Arr, Context, Effect, Layer, pipe } from "effect";
import type { SystemError } from "../lib/errors";
import type { AbsolutePath, BackupDate, DatabaseName } from "../lib/types";
import { pathJoin } from "../lib/types";
import { backupFileName } from "../lib/paths";
import { directoryExists, listDirectory } from "../system/fs";
import { type BackupArtifact, artifactFromEntry, normalizeArtifacts } from "./artifact";

export interface BackupStoreService {
  /** Directory shown in messages and used as the download target. */
  readonly location: AbsolutePath;
  /** One artifact per date, newest first. */
  readonly list: () => Effect.Effect<readonly BackupArtifact[], SystemError>;
  /** Where the compressed artifact for `date` lives once downloaded. */
  readonly pathFor: (date: BackupDate) => AbsolutePath;
}

export interface BackupStore {
  readonly _tag: "BackupStore";
}

export const BackupStore: Context.Tag<BackupStore, BackupStoreService> = Context.GenericTag<
  BackupStore,
  BackupStoreService
>("aspace-ops/BackupStore");

/** A missing directory is an empty store. */
export const listArtifacts = (
  dir: AbsolutePath,
  db: DatabaseName
): Effect.Effect<readonly BackupArtifact[], SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const exists = yield* directoryExists(dir);
    if (!exists) {
      yield* Effect.logDebug(`Backup directory ${dir} does not exist`);
      return [];
    }
    const entries = yield* listDirectory(dir);
    return pipe(
      entries,
      Arr.filterMap((name) => artifactFromEntry(dir, db, name)),
      normalizeArtifacts
    );
  });

export const BackupStoreLive = (options: {
  readonly dir: AbsolutePath;
  readonly db: DatabaseName;
}): Layer.Layer<BackupStore, never, FileSystem.FileSystem> =>
  Layer.effect(
    BackupStore,
    Effect.map(FileSystem.FileSystem, (fs) => ({
      location: options.dir,
      list: (): Effect.Effect<readonly BackupArtifact[], SystemError> =>
        listArtifacts(options.dir, options.db).pipe(
          Effect.provideService(FileSystem.FileSystem, fs)
        ),
      pathFor: (date: BackupDate): AbsolutePath =>
        pathJoin(options.dir, backupFileName(options.db, date)),
    }))
  );
