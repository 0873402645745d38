// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/** `backups`: list restorable backups, newest first. */

import { Effect } from "effect";
import { BackupStore } from "../../backup/store";
import type { LogFormat } from "../../config/field-values";
import type { SystemError } from "../../lib/errors";
import { artifactJson, describeArtifact, emit, logLines } from "./output";

export const executeBackups = (options: {
  readonly format: LogFormat;
}): Effect.Effect<void, SystemError, BackupStore> =>
  Effect.gen(function* () {
    const store = yield* BackupStore;
    const artifacts = yield* store.list();

    yield* emit(options.format, artifacts.map(artifactJson), () =>
      artifacts.length === 0
        ? Effect.logWarning(`No backups found in ${store.location}`)
        : logLines([
            `${artifacts.length} backup(s) in ${store.location}:`,
            ...artifacts.map(describeArtifact),
          ])
    );
  });
