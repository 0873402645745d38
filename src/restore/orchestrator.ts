// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Backup restore orchestration: pick a dated backup, load it into the
 * database, then signal the search index once.
 *
 * Restore and reindex are not transactional together. A reindex failure
 * leaves the database restored and the index stale; `aspace-ops reindex`
 * repeats only the index step.
 */

import { Array as Arr, Clock, Duration, Effect, Either, Option, Redacted, pipe } from "effect";
import { Admin } from "../app/admin";
import type { BackupArtifact } from "../backup/artifact";
import { pickArtifact } from "../backup/artifact";
import { BackupFetcher } from "../backup/fetch";
import { BackupStore } from "../backup/store";
import { type ReindexMode, reindexModeFor } from "../config/field-values";
import { Database } from "../database/service";
import {
  AdminResetError,
  ErrorCode,
  type GeneralError,
  NotFoundError,
  ReindexFailedError,
  RestoreFailedError,
  SystemError,
} from "../lib/errors";
import { createStepCounter, inStep, logSuccess } from "../lib/log";
import { type BackupDate, BackupDateSchema } from "../lib/types";
import { type ReindexReport, SearchIndex } from "../search/service";

/** Settings the orchestrator needs, taken from DeploymentConfig by the caller. */
export interface RestoreSettings {
  readonly restoreTimeout: Duration.DurationInput;
  readonly reindexTimeout: Duration.DurationInput;
  readonly adminPassword: Option.Option<Redacted.Redacted>;
}

export interface RestoreResult {
  readonly artifact: BackupArtifact;
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface RunResult {
  readonly artifact: BackupArtifact;
  readonly restore: RestoreResult;
  readonly reindex: ReindexReport;
  readonly adminReset: Option.Option<"done">;
}

export interface RestorePlan {
  readonly date: Option.Option<BackupDate>;
  /** Local artifact, when one matches. */
  readonly artifact: Option.Option<BackupArtifact>;
  /** Remote URL the artifact would be downloaded from first. */
  readonly download: Option.Option<string>;
  readonly mode: ReindexMode;
  readonly adminReset: boolean;
}

const OUTPUT_TAIL_LINES = 20;

/** Last lines of command output, for error messages. */
const tail = (text: string): string =>
  pipe(text.trimEnd().split("\n"), Arr.takeRight(OUTPUT_TAIL_LINES), Arr.join("\n"));

const timeoutError = (what: string, timeout: Duration.DurationInput): SystemError =>
  new SystemError({
    code: ErrorCode.EXEC_TIMEOUT,
    message: `${what} did not finish within ${Duration.format(Duration.decode(timeout))}`,
  });

// ============================================================================
// Selection
// ============================================================================

/**
 * Latest artifact when `requested` is None, otherwise the artifact with that
 * exact date. Reads the store only.
 */
export const selectArtifact = (
  requested: Option.Option<BackupDate>
): Effect.Effect<BackupArtifact, NotFoundError | SystemError, BackupStore> =>
  Effect.gen(function* () {
    const store = yield* BackupStore;
    const artifacts = yield* store.list();
    return yield* Either.match(pickArtifact(artifacts, requested, store.location), {
      onLeft: (e): Effect.Effect<BackupArtifact, NotFoundError> => Effect.fail(e),
      onRight: (a): Effect.Effect<BackupArtifact, NotFoundError> => Effect.succeed(a),
    });
  });

/** Local calendar date of `at`, the datestamp the nightly dump job writes. */
export const localBackupDate = (at: Date): BackupDate =>
  BackupDateSchema.make(
    [
      String(at.getFullYear()).padStart(4, "0"),
      String(at.getMonth() + 1).padStart(2, "0"),
      String(at.getDate()).padStart(2, "0"),
    ].join("-")
  );

const today: Effect.Effect<BackupDate> = Effect.map(Clock.currentTimeMillis, (ms) =>
  localBackupDate(new Date(ms))
);

/** Some(url) when `date` is absent locally and the bucket can supply it. */
const remoteIfMissing = (
  date: BackupDate
): Effect.Effect<Option.Option<string>, SystemError, BackupStore | BackupFetcher> =>
  Effect.gen(function* () {
    const store = yield* BackupStore;
    const fetcher = yield* BackupFetcher;
    const artifacts = yield* store.list();
    return artifacts.some((a) => a.date === date) ? Option.none() : fetcher.remoteUrl(date);
  });

/**
 * Downloads the artifact the bucket should hold when it is missing locally.
 *
 * With a requested date, a failed download is reported as NotFound. Without
 * one, today's dump is fetched; if that fails the latest local backup is used.
 */
export const fetchIfMissing = (
  requested: Option.Option<BackupDate>
): Effect.Effect<void, NotFoundError | SystemError, BackupStore | BackupFetcher> =>
  Effect.gen(function* () {
    const store = yield* BackupStore;
    const fetcher = yield* BackupFetcher;
    const date = yield* Option.match(requested, {
      onNone: (): Effect.Effect<BackupDate> => today,
      onSome: (d): Effect.Effect<BackupDate> => Effect.succeed(d),
    });
    const remote = yield* remoteIfMissing(date);
    if (Option.isNone(remote)) {
      return;
    }
    const url = remote.value;

    const download = pipe(
      fetcher.fetch(date),
      Effect.tap((path) => logSuccess(`Downloaded ${path}`)),
      Effect.asVoid
    );

    yield* Option.match(requested, {
      onNone: (): Effect.Effect<void> =>
        Effect.catchAll(download, (e) =>
          Effect.logWarning(
            `Downloading ${url} failed: ${e.message}; falling back to the latest local backup`
          )
        ),
      onSome: (): Effect.Effect<void, NotFoundError> =>
        Effect.mapError(
          download,
          (e) =>
            new NotFoundError({
              code: ErrorCode.BACKUP_NOT_FOUND,
              message: `No backup for ${date} in ${store.location}, and downloading ${url} failed: ${e.message}`,
              requestedDate: date,
            })
        ),
    });
  });

/** What `run` would do, without touching the database or the index. */
export const plan = (
  settings: RestoreSettings,
  requested: Option.Option<BackupDate>,
  rebuildIndex: boolean
): Effect.Effect<RestorePlan, NotFoundError | SystemError, BackupStore | BackupFetcher> =>
  Effect.gen(function* () {
    const store = yield* BackupStore;
    const fetcher = yield* BackupFetcher;
    const artifacts = yield* store.list();
    const base = {
      date: requested,
      mode: reindexModeFor(rebuildIndex),
      adminReset: Option.isSome(settings.adminPassword),
    };

    return yield* Either.match(pickArtifact(artifacts, requested, store.location), {
      onRight: (artifact): Effect.Effect<RestorePlan, NotFoundError> =>
        Effect.succeed({ ...base, artifact: Option.some(artifact), download: Option.none() }),
      onLeft: (notFound): Effect.Effect<RestorePlan, NotFoundError> =>
        pipe(
          requested,
          Option.flatMap(fetcher.remoteUrl),
          Option.match({
            onNone: (): Effect.Effect<RestorePlan, NotFoundError> => Effect.fail(notFound),
            onSome: (url): Effect.Effect<RestorePlan, NotFoundError> =>
              Effect.succeed({ ...base, artifact: Option.none(), download: Option.some(url) }),
          })
        ),
    });
  });

// ============================================================================
// Restore and reindex
// ============================================================================

/** Loads one artifact. Never retried: a partial load needs an operator's judgement. */
export const restore = (
  settings: RestoreSettings,
  artifact: BackupArtifact
): Effect.Effect<RestoreResult, RestoreFailedError, Database> =>
  Effect.gen(function* () {
    const database = yield* Database;

    const result = yield* pipe(
      database.restore(artifact),
      Effect.timeoutFail({
        duration: settings.restoreTimeout,
        onTimeout: () => timeoutError(`Restore of ${artifact.fileName}`, settings.restoreTimeout),
      }),
      Effect.mapError(
        (e: SystemError | GeneralError) =>
          new RestoreFailedError({
            code: ErrorCode.RESTORE_FAILED,
            message: `Restore of ${artifact.fileName} failed: ${e.message}`,
            path: artifact.path,
          })
      )
    );

    if (result.exitCode !== 0) {
      const output = tail(result.stderr || result.stdout);
      return yield* Effect.fail(
        new RestoreFailedError({
          code: ErrorCode.RESTORE_FAILED,
          message: `Restore of ${artifact.fileName} exited with status ${result.exitCode}${output ? `:\n${output}` : ""}`,
          path: artifact.path,
          exitCode: result.exitCode,
          output,
        })
      );
    }

    return { artifact, ...result };
  });

/** Signals the search index once. Does not undo a prior restore on failure. */
export const reindex = (
  settings: RestoreSettings,
  mode: ReindexMode
): Effect.Effect<ReindexReport, ReindexFailedError, SearchIndex> =>
  Effect.gen(function* () {
    const index = yield* SearchIndex;
    return yield* pipe(
      index.trigger(mode),
      Effect.timeoutFail({
        duration: settings.reindexTimeout,
        onTimeout: () => timeoutError(`The ${mode} reindex`, settings.reindexTimeout),
      }),
      Effect.mapError(
        (e: SystemError | GeneralError) =>
          new ReindexFailedError({
            code: ErrorCode.REINDEX_FAILED,
            message: `The ${mode} reindex failed: ${e.message}`,
            mode,
          })
      )
    );
  });

const resetAdmin = (
  password: Redacted.Redacted
): Effect.Effect<void, AdminResetError, Admin> =>
  Effect.gen(function* () {
    const admin = yield* Admin;
    yield* pipe(
      admin.resetPassword(password),
      Effect.mapError(
        (e) =>
          new AdminResetError({
            code: ErrorCode.ADMIN_RESET_FAILED,
            message: `Admin password reset failed: ${e.message.replaceAll(Redacted.value(password), "<redacted>")}`,
          })
      )
    );
  });

export const recoveryHint = (mode: ReindexMode): string =>
  mode === "full-rebuild" ? "aspace-ops reindex --rebuild-index" : "aspace-ops reindex";

export type RunError =
  | NotFoundError
  | SystemError
  | RestoreFailedError
  | ReindexFailedError
  | AdminResetError;

export type RunRequirements = BackupStore | BackupFetcher | Database | SearchIndex | Admin;

/**
 * Select, restore, reindex; then reset the admin password when one is
 * configured. Exactly one restore and one reindex whenever selection succeeds
 * and the restore completes.
 */
export const run = (
  settings: RestoreSettings,
  requested: Option.Option<BackupDate>,
  rebuildIndex: boolean
): Effect.Effect<RunResult, RunError, RunRequirements> =>
  Effect.gen(function* () {
    const mode = reindexModeFor(rebuildIndex);
    const steps = yield* createStepCounter(Option.isSome(settings.adminPassword) ? 4 : 3);

    yield* steps.next("Selecting backup");
    const artifact = yield* pipe(
      fetchIfMissing(requested),
      Effect.zipRight(selectArtifact(requested)),
      Effect.tap((a) => Effect.logInfo(`Using ${a.path}`)),
      inStep("select")
    );

    yield* steps.next(`Restoring ${artifact.fileName}`);
    const restored = yield* restore(settings, artifact).pipe(inStep("restore"));

    yield* steps.next(mode === "full-rebuild" ? "Rebuilding search index" : "Triggering soft reindex");
    const reindexed = yield* pipe(
      reindex(settings, mode),
      inStep("reindex"),
      Effect.mapError(
        (e) =>
          new ReindexFailedError({
            code: e.code,
            mode: e.mode,
            message: `${e.message}\nThe database was restored from ${artifact.fileName}; run '${recoveryHint(mode)}' to retry the index step.`,
          })
      )
    );

    const adminReset = yield* Option.match(settings.adminPassword, {
      onNone: (): Effect.Effect<Option.Option<"done">> => Effect.succeed(Option.none()),
      onSome: (password): Effect.Effect<Option.Option<"done">, AdminResetError, Admin> =>
        pipe(
          steps.next("Resetting admin password"),
          Effect.zipRight(resetAdmin(password).pipe(inStep("admin"))),
          Effect.as(Option.some("done" as const))
        ),
    });

    return { artifact, restore: restored, reindex: reindexed, adminReset };
  });
