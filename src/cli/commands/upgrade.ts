// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `upgrade` and `rollback`: switch the deployment to another release. The
 * caller checks for root first; both replace the compose-directory link.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import type { BackupFetcher } from "../../backup/fetch";
import type { BackupStore } from "../../backup/store";
import type { LogFormat } from "../../config/field-values";
import type { Compose } from "../../deploy/compose";
import type { Releases } from "../../deploy/release";
import {
  type SwitchResult,
  type SwitchSettings,
  type UpgradeSettings,
  rollback,
  upgrade,
} from "../../deploy/workflows";
import type { DeployError, GeneralError, NotFoundError, SystemError } from "../../lib/errors";
import type { BackupDate, ReleaseTag } from "../../lib/types";
import { artifactJson, emit } from "./output";

const switchJson = (result: SwitchResult): Record<string, unknown> => ({
  releaseDir: result.releaseDir,
  previous: Option.getOrNull(result.previous),
});

export const executeUpgrade = (options: {
  readonly settings: UpgradeSettings;
  readonly date: Option.Option<BackupDate>;
  readonly rebuildIndex: boolean;
  readonly format: LogFormat;
}): Effect.Effect<
  void,
  DeployError | SystemError | NotFoundError | GeneralError,
  Releases | Compose | BackupStore | BackupFetcher | FileSystem.FileSystem
> =>
  pipe(
    upgrade(options.settings, options.date, options.rebuildIndex),
    Effect.flatMap((result) =>
      emit(
        options.format,
        {
          ...switchJson(result),
          tag: options.settings.release.tag,
          artifact: artifactJson(result.artifact),
          seedFile: result.seedFile,
        },
        () => Effect.void
      )
    )
  );

export const executeRollback = (options: {
  readonly settings: SwitchSettings;
  readonly tag: ReleaseTag;
  readonly rebuildIndex: boolean;
  readonly format: LogFormat;
}): Effect.Effect<void, DeployError | SystemError, Compose | FileSystem.FileSystem> =>
  pipe(
    rollback(options.settings, options.tag, options.rebuildIndex),
    Effect.flatMap((result) =>
      emit(options.format, { ...switchJson(result), tag: options.tag }, () => Effect.void)
    )
  );
