// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Upgrade and rollback. Both end by switching the compose-directory link to
 * a release directory and recreating the stack from it; an upgrade first
 * installs the release and seeds its database from a backup.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import type { BackupArtifact } from "../backup/artifact";
import type { BackupFetcher } from "../backup/fetch";
import type { BackupStore } from "../backup/store";
import type { LayoutConfig, ReleaseConfig } from "../config/loader";
import {
  DeployError,
  ErrorCode,
  type GeneralError,
  type NotFoundError,
  type SystemError,
} from "../lib/errors";
import { type StepCounter, createStepCounter, logSuccess } from "../lib/log";
import { releaseDir } from "../lib/paths";
import type { AbsolutePath, BackupDate, DatabaseName, ReleaseTag } from "../lib/types";
import { fetchIfMissing, selectArtifact } from "../restore/orchestrator";
import { directoryExists, readSymlink, replaceSymlink } from "../system/fs";
import { Compose } from "./compose";
import { Releases } from "./release";

export interface SwitchSettings {
  readonly composeDir: AbsolutePath;
  readonly layout: LayoutConfig;
}

export interface SwitchResult {
  readonly releaseDir: AbsolutePath;
  /** Link target before the switch, if the compose directory was a link. */
  readonly previous: Option.Option<string>;
}

export interface UpgradeResult extends SwitchResult {
  readonly artifact: BackupArtifact;
  readonly seedFile: AbsolutePath;
}

type SwitchError = DeployError | SystemError;

const switchStepCount = (rebuildIndex: boolean): number => (rebuildIndex ? 4 : 3);

/** Stops the current stack, optionally drops the index volumes, relinks, and starts. */
const switchTo = (
  settings: SwitchSettings,
  dir: AbsolutePath,
  rebuildIndex: boolean,
  steps: StepCounter
): Effect.Effect<SwitchResult, SwitchError, Compose | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const compose = yield* Compose;
    const { composeDir, layout } = settings;

    yield* steps.next("Stopping current services");
    if (yield* directoryExists(composeDir)) {
      yield* compose.down(composeDir);
    } else {
      yield* Effect.logInfo(`${composeDir} does not exist, nothing to stop`);
    }

    if (rebuildIndex) {
      const volumes = [layout.appDataVolume, layout.solrDataVolume];
      yield* steps.next(`Removing index volumes ${volumes.join(", ")}`);
      yield* pipe(
        compose.removeVolumes(volumes),
        Effect.catchAll((e) => Effect.logWarning(`${e.message} (volumes may not exist)`))
      );
    }

    yield* steps.next(`Linking ${composeDir} -> ${dir}`);
    const previous = yield* replaceSymlink(dir, composeDir);
    yield* Option.match(previous, {
      onNone: (): Effect.Effect<void> => Effect.void,
      onSome: (target): Effect.Effect<void> => Effect.logInfo(`Previously linked to ${target}`),
    });

    yield* Effect.logInfo("Pulling images and starting services");
    yield* compose.pull(composeDir);
    yield* compose.up(composeDir);

    return { releaseDir: dir, previous };
  });

export interface UpgradeSettings extends SwitchSettings {
  readonly db: DatabaseName;
  readonly release: ReleaseConfig;
}

export const upgrade = (
  settings: UpgradeSettings,
  requested: Option.Option<BackupDate>,
  rebuildIndex: boolean
): Effect.Effect<
  UpgradeResult,
  SwitchError | NotFoundError | GeneralError,
  Releases | Compose | BackupStore | BackupFetcher | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const releases = yield* Releases;
    const { release, db } = settings;
    const steps = yield* createStepCounter(3 + switchStepCount(rebuildIndex));

    yield* steps.next(`Installing release ${release.tag}`);
    const dir = yield* releases.install(release.tag, release.releaseUrl);

    yield* steps.next("Updating release configuration");
    yield* releases.configure(dir, db, release.domain);

    yield* steps.next("Seeding the release database");
    yield* fetchIfMissing(requested);
    const artifact = yield* selectArtifact(requested);
    const seedFile = yield* releases.seedDatabase(dir, artifact, db);
    yield* Effect.logInfo(`Seeded ${seedFile} from ${artifact.fileName}`);

    const switched = yield* switchTo(settings, dir, rebuildIndex, steps);
    yield* logSuccess(
      `Upgraded to ${release.tag}. The application may take a few minutes to become available.`
    );
    return { ...switched, artifact, seedFile };
  });

export const rollback = (
  settings: SwitchSettings,
  tag: ReleaseTag,
  rebuildIndex: boolean
): Effect.Effect<SwitchResult, SwitchError, Compose | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const dir = releaseDir(settings.layout.releasesDir, tag);

    if (!(yield* directoryExists(dir))) {
      return yield* Effect.fail(
        new DeployError({
          code: ErrorCode.RELEASE_NOT_FOUND,
          message: `Release ${tag} is not installed: ${dir} does not exist`,
        })
      );
    }

    const current = yield* readSymlink(settings.composeDir);
    if (Option.contains(current, dir)) {
      yield* Effect.logWarning(`${settings.composeDir} already points at ${dir}; recreating it`);
    }

    const steps = yield* createStepCounter(switchStepCount(rebuildIndex));
    const switched = yield* switchTo(settings, dir, rebuildIndex, steps);
    yield* logSuccess(`Rolled back to ${tag}`);
    return switched;
  });
