// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes settings loading,
 * logger setup, and error display to avoid duplication across commands.
 */

import { type CliApp, Command, type ValidationError } from "@effect/cli";
import { NodeContext } from "@effect/platform-node";
import { type ConfigProvider, Effect, Layer, Match, Option, pipe } from "effect";
import { BackupStoreLive } from "../backup/store";
import {
  LOG_FORMAT_DEFAULT,
  LOG_LEVEL_DEFAULT,
  type LogFormat,
  type LogLevel,
} from "../config/field-values";
import {
  loadComposeSettings,
  loadDeploymentConfig,
  loadEnvProvider,
  loadLayoutConfig,
  loadLoggingEnv,
  loadReleaseConfig,
} from "../config/loader";
import { resolve } from "../config/resolve";
import { OpsLoggerLive, terminalSupportsColor } from "../lib/effect-logger";
import type { OpsError } from "../lib/errors";
import { toAbsolutePathEffect } from "../lib/paths";
import {
  type AbsolutePath,
  type BackupDate,
  decodeReleaseTag,
  parseBackupDateArg,
  parseErrorToGeneralError,
} from "../lib/types";
import { VERSION } from "../lib/version";
import { requireRoot } from "../system/privileges";

import { executeBackups } from "./commands/backups";
import { executeReindex } from "./commands/reindex";
import { executeRestore } from "./commands/restore";
import { executeRollback, executeUpgrade } from "./commands/upgrade";
import {
  type GlobalOptions,
  dateOption,
  dryRun,
  effectiveFormat,
  globalOptions,
  optionalDateArg,
  rebuildIndex,
  tagArg,
} from "./options";
import { restoreLayer, restoreSettings, rollbackLayer, upgradeLayer } from "./runtime";

/** Resolved runtime context for commands. CLI flags take precedence over the environment. */
interface CommandContext {
  readonly provider: ConfigProvider.ConfigProvider;
  /** None when the default env file was absent. */
  readonly envFile: Option.Option<AbsolutePath>;
  readonly envFilePath: AbsolutePath;
  readonly format: LogFormat;
  readonly logLevel: LogLevel;
}

const DEFAULT_ENV_FILE = ".env";

// Context resolution

const resolveContext = (globals: GlobalOptions): Effect.Effect<CommandContext, OpsError> =>
  Effect.gen(function* () {
    const envFilePath = yield* toAbsolutePathEffect(
      Option.getOrElse(globals.envFile, () => DEFAULT_ENV_FILE)
    );
    const loaded = yield* pipe(
      loadEnvProvider({ path: envFilePath, explicit: Option.isSome(globals.envFile) }),
      Effect.provide(NodeContext.layer)
    );
    const env = yield* loadLoggingEnv(loaded.provider);

    const logLevel: LogLevel = pipe(
      Match.value(globals.verbose || env.debug),
      Match.when(true, (): LogLevel => "debug"),
      Match.when(
        false,
        (): LogLevel =>
          resolve({ cli: globals.logLevel, env: env.level, fallback: LOG_LEVEL_DEFAULT })
      ),
      Match.exhaustive
    );

    const format: LogFormat = resolve({
      cli: effectiveFormat(globals),
      env: env.format,
      fallback: LOG_FORMAT_DEFAULT,
    });

    return { provider: loaded.provider, envFile: loaded.file, envFilePath, format, logLevel };
  });

// Error display

/** Formats error for terminal output with optional color. */
const displayError = (err: OpsError, format: LogFormat): Effect.Effect<void> =>
  Effect.sync(() =>
    pipe(
      Match.value(format),
      Match.when("json", () =>
        process.stdout.write(`${JSON.stringify({ error: err.message, code: err.code })}\n`)
      ),
      Match.when("pretty", () => {
        const prefix = terminalSupportsColor() ? "\x1b[31m✗\x1b[0m" : "✗";
        process.stderr.write(`${prefix} ${err.message}\n`);
      }),
      Match.exhaustive
    )
  );

// Command runner

/** Centralizes context and error handling so each command stays focused on its logic. */
const runCommand = (
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, OpsError>
): Effect.Effect<void, OpsError> =>
  Effect.gen(function* () {
    const ctx = yield* pipe(
      resolveContext(globals),
      Effect.tapError((err) => displayError(err, effectiveFormatOrDefault(globals)))
    );
    yield* pipe(
      Option.match(ctx.envFile, {
        onNone: (): Effect.Effect<void> =>
          Effect.logWarning(`${ctx.envFilePath} not found, using the process environment only`),
        onSome: (file): Effect.Effect<void> => Effect.logDebug(`Loaded settings from ${file}`),
      }),
      Effect.zipRight(handler(ctx)),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => displayError(err, ctx.format)),
      Effect.provide(OpsLoggerLive({ level: ctx.logLevel, format: ctx.format }))
    );
  });

/** Format for errors raised before the environment is read. */
const effectiveFormatOrDefault = (globals: GlobalOptions): LogFormat =>
  Option.getOrElse(effectiveFormat(globals), (): LogFormat => LOG_FORMAT_DEFAULT);

/** Malformed dates are rejected before the deployment settings are read. */
const parseOptionalDate = (
  input: Option.Option<string>
): Effect.Effect<Option.Option<BackupDate>, OpsError> =>
  Option.match(input, {
    onNone: (): Effect.Effect<Option.Option<BackupDate>, OpsError> =>
      Effect.succeed(Option.none()),
    onSome: (raw): Effect.Effect<Option.Option<BackupDate>, OpsError> =>
      Effect.map(parseBackupDateArg(raw), Option.some),
  });

// Subcommand definitions

const restoreCmd = Command.make(
  "restore",
  { ...globalOptions, date: optionalDateArg, rebuildIndex, dryRun },
  (args) =>
    runCommand(args, "restore", (ctx) =>
      Effect.gen(function* () {
        const date = yield* parseOptionalDate(args.date);
        const config = yield* loadDeploymentConfig(ctx.provider);
        yield* pipe(
          executeRestore({
            settings: restoreSettings(config),
            date,
            rebuildIndex: args.rebuildIndex,
            dryRun: args.dryRun,
            format: ctx.format,
          }),
          Effect.provide(restoreLayer(config))
        );
      })
    )
).pipe(
  Command.withDescription("Restore the database from a dated backup and reindex search")
);

const reindexCmd = Command.make("reindex", { ...globalOptions, rebuildIndex }, (args) =>
  runCommand(args, "reindex", (ctx) =>
    Effect.gen(function* () {
      const config = yield* loadDeploymentConfig(ctx.provider);
      yield* pipe(
        executeReindex({
          settings: restoreSettings(config),
          rebuildIndex: args.rebuildIndex,
          format: ctx.format,
        }),
        Effect.provide(restoreLayer(config))
      );
    })
  )
).pipe(Command.withDescription("Trigger a soft reindex, or a full rebuild, without restoring"));

const backupsCmd = Command.make("backups", { ...globalOptions }, (args) =>
  runCommand(args, "backups", (ctx) =>
    Effect.gen(function* () {
      const config = yield* loadDeploymentConfig(ctx.provider);
      yield* pipe(
        executeBackups({ format: ctx.format }),
        Effect.provide(
          BackupStoreLive({ dir: config.backupDir, db: config.db }).pipe(
            Layer.provide(NodeContext.layer)
          )
        )
      );
    })
  )
).pipe(Command.withDescription("List available backups, newest first"));

const upgradeCmd = Command.make(
  "upgrade",
  { ...globalOptions, rebuildIndex, date: dateOption },
  (args) =>
    runCommand(args, "upgrade", (ctx) =>
      Effect.gen(function* () {
        const date = yield* parseOptionalDate(args.date);
        yield* requireRoot("upgrade");
        const config = yield* loadDeploymentConfig(ctx.provider);
        const layout = yield* loadLayoutConfig(ctx.provider);
        const release = yield* loadReleaseConfig(ctx.provider);
        yield* pipe(
          executeUpgrade({
            settings: { composeDir: config.composeDir, layout, db: config.db, release },
            date,
            rebuildIndex: args.rebuildIndex,
            format: ctx.format,
          }),
          Effect.provide(upgradeLayer(config, layout))
        );
      })
    )
).pipe(Command.withDescription("Install the configured release and switch the deployment to it"));

const rollbackCmd = Command.make(
  "rollback",
  { ...globalOptions, tag: tagArg, rebuildIndex },
  (args) =>
    runCommand(args, "rollback", (ctx) =>
      Effect.gen(function* () {
        const tag = yield* pipe(
          decodeReleaseTag(args.tag),
          Effect.mapError(parseErrorToGeneralError)
        );
        yield* requireRoot("rollback");
        const settings = yield* loadComposeSettings(ctx.provider);
        const layout = yield* loadLayoutConfig(ctx.provider);
        yield* pipe(
          executeRollback({
            settings: { composeDir: settings.composeDir, layout },
            tag,
            rebuildIndex: args.rebuildIndex,
            format: ctx.format,
          }),
          Effect.provide(rollbackLayer(settings))
        );
      })
    )
).pipe(Command.withDescription("Switch the deployment back to an installed release"));

// Root command

const aspaceOps = Command.make("aspace-ops").pipe(
  Command.withDescription("Backup restore and release management for an ArchivesSpace deployment"),
  Command.withSubcommands([restoreCmd, reindexCmd, backupsCmd, upgradeCmd, rollbackCmd])
);

export const cli: (
  args: readonly string[]
) => Effect.Effect<void, OpsError | ValidationError.ValidationError, CliApp.CliApp.Environment> =
  Command.run(aspaceOps, {
    name: "aspace-ops",
    version: VERSION,
  });
