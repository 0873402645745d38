// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `restore [date]`: load a backup into the running database and signal the
 * search index. With --dry-run, only report what would be restored.
 */

import { Effect, Option, pipe } from "effect";
import type { BackupFetcher } from "../../backup/fetch";
import type { BackupStore } from "../../backup/store";
import type { LogFormat } from "../../config/field-values";
import type { NotFoundError, SystemError } from "../../lib/errors";
import { logSuccess } from "../../lib/log";
import type { BackupDate } from "../../lib/types";
import {
  type RestorePlan,
  type RestoreSettings,
  type RunError,
  type RunRequirements,
  type RunResult,
  plan,
  run,
} from "../../restore/orchestrator";
import { artifactJson, describeArtifact, emit, logLines } from "./output";

export interface RestoreOptions {
  readonly settings: RestoreSettings;
  readonly date: Option.Option<BackupDate>;
  readonly rebuildIndex: boolean;
  readonly dryRun: boolean;
  readonly format: LogFormat;
}

const planLines = (p: RestorePlan): readonly string[] => [
  ...Option.match(p.artifact, {
    onNone: (): readonly string[] =>
      Option.match(p.download, {
        onNone: (): readonly string[] => [],
        onSome: (url): readonly string[] => [`Would download: ${url}`],
      }),
    onSome: (a): readonly string[] => [`Would restore: ${describeArtifact(a)}`],
  }),
  `Would run a ${p.mode} reindex`,
  ...(p.adminReset ? ["Would reset the admin password"] : []),
];

const executeDryRun = (
  options: RestoreOptions
): Effect.Effect<void, NotFoundError | SystemError, BackupStore | BackupFetcher> =>
  Effect.gen(function* () {
    const p = yield* plan(options.settings, options.date, options.rebuildIndex);
    yield* emit(
      options.format,
      {
        dryRun: true,
        artifact: Option.getOrNull(Option.map(p.artifact, artifactJson)),
        download: Option.getOrNull(p.download),
        reindexMode: p.mode,
        adminReset: p.adminReset,
      },
      () => logLines(planLines(p))
    );
  });

const report = (result: RunResult, format: LogFormat): Effect.Effect<void> =>
  emit(
    format,
    {
      artifact: artifactJson(result.artifact),
      reindex: result.reindex,
      adminReset: Option.isSome(result.adminReset),
    },
    () =>
      pipe(
        logSuccess(`Restored ${result.artifact.fileName}`),
        Effect.zipRight(
          logSuccess(
            `Triggered ${result.reindex.mode} reindex; the application re-indexes in the background`
          )
        )
      )
  );

export const executeRestore = (
  options: RestoreOptions
): Effect.Effect<void, RunError, RunRequirements> =>
  options.dryRun
    ? executeDryRun(options)
    : pipe(
        run(options.settings, options.date, options.rebuildIndex),
        Effect.flatMap((result) => report(result, options.format))
      );
