// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Env-file loading with fail-fast validation. The file is parsed with dotenv
 * and layered over the process environment as a ConfigProvider; the Config
 * specs in env.ts are then read through it once per command, before any
 * side-effecting step. An explicit --env-file must exist; the default `.env`
 * may be absent, in which case only the process environment is used.
 */

import type { FileSystem } from "@effect/platform";
import { parse as parseDotenv } from "dotenv";
import {
  Config,
  ConfigError as EffectConfigError,
  ConfigProvider,
  Effect,
  Option,
  pipe,
} from "effect";
import type { Redacted } from "effect";
import { ConfigError, ConfigMissingError, ErrorCode } from "../lib/errors";
import { toAbsolutePathEffect } from "../lib/paths";
import type { AbsolutePath, ContainerName, DatabaseName, ReleaseTag } from "../lib/types";
import { fileExists, readFile } from "../system/fs";
import {
  ComposeDirConfig,
  DeploymentConfigSpec,
  LayoutConfigSpec,
  type LoggingEnv,
  LoggingEnvSpec,
  ReleaseConfigSpec,
  type Timeouts,
  TimeoutsConfig,
} from "./env";

export interface DeploymentConfig {
  readonly db: DatabaseName;
  readonly mysql: {
    readonly user: string;
    readonly password: Redacted.Redacted;
    readonly container: ContainerName;
  };
  readonly appContainer: ContainerName;
  readonly backupDir: AbsolutePath;
  readonly bucket: Option.Option<string>;
  readonly awsCli: string;
  readonly composeDir: AbsolutePath;
  readonly solrUrl: string;
  readonly adminPassword: Option.Option<Redacted.Redacted>;
  readonly timeouts: Timeouts;
}

export interface LayoutConfig {
  readonly releasesDir: AbsolutePath;
  readonly appDataVolume: string;
  readonly solrDataVolume: string;
}

export interface ReleaseConfig {
  readonly tag: ReleaseTag;
  readonly domain: string;
  /** Download URL with the tag substituted. */
  readonly releaseUrl: string;
}

export interface EnvFileSource {
  readonly path: AbsolutePath;
  /** Given on the command line rather than defaulted. */
  readonly explicit: boolean;
}

/** Entries from the env file win; anything else comes from the process environment. */
export const providerFromEntries = (
  entries: Readonly<Record<string, string>>
): ConfigProvider.ConfigProvider =>
  pipe(
    ConfigProvider.fromMap(new Map(Object.entries(entries)), { pathDelim: "_" }),
    ConfigProvider.orElse(() => ConfigProvider.fromEnv())
  );

export const parseEnvContent = (content: string): Record<string, string> => parseDotenv(content);

export interface LoadedEnv {
  readonly provider: ConfigProvider.ConfigProvider;
  /** None when the default env file was absent. */
  readonly file: Option.Option<AbsolutePath>;
}

export const loadEnvProvider = (
  source: EnvFileSource
): Effect.Effect<LoadedEnv, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const exists = yield* fileExists(source.path);

    if (!exists) {
      if (source.explicit) {
        return yield* Effect.fail(
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Env file not found: ${source.path}`,
            path: source.path,
          })
        );
      }
      return { provider: ConfigProvider.fromEnv(), file: Option.none() };
    }

    const content = yield* pipe(
      readFile(source.path),
      Effect.mapError(
        (e) =>
          new ConfigError({
            code: ErrorCode.CONFIG_PARSE_ERROR,
            message: e.message,
            path: source.path,
          })
      )
    );
    return {
      provider: providerFromEntries(parseEnvContent(content)),
      file: Option.some(source.path),
    };
  });

/** Missing keys are ConfigMissing; malformed values are a parse error. */
export const fromEffectConfigError = (
  error: EffectConfigError.ConfigError
): ConfigMissingError | ConfigError =>
  EffectConfigError.isMissingDataOnly(error)
    ? new ConfigMissingError({
        code: ErrorCode.CONFIG_MISSING,
        message: `Missing required settings: ${String(error)}`,
      })
    : new ConfigError({
        code: ErrorCode.CONFIG_PARSE_ERROR,
        message: `Invalid settings: ${String(error)}`,
      });

const readConfig = <A>(
  spec: Config.Config<A>,
  provider: ConfigProvider.ConfigProvider
): Effect.Effect<A, ConfigMissingError | ConfigError> =>
  pipe(spec, Effect.withConfigProvider(provider), Effect.mapError(fromEffectConfigError));

export const loadDeploymentConfig = (
  provider: ConfigProvider.ConfigProvider
): Effect.Effect<DeploymentConfig, ConfigMissingError | ConfigError> =>
  Effect.gen(function* () {
    const raw = yield* readConfig(DeploymentConfigSpec, provider);
    const backupDir = yield* toAbsolutePathEffect(raw.backupDir);
    const composeDir = yield* toAbsolutePathEffect(raw.composeDir);

    return {
      db: raw.db,
      mysql: { user: raw.mysqlUser, password: raw.mysqlPassword, container: raw.mysqlContainer },
      appContainer: raw.appContainer,
      backupDir,
      bucket: raw.bucket,
      awsCli: raw.awsCli,
      composeDir,
      solrUrl: raw.solrUrl,
      adminPassword: raw.adminPassword,
      timeouts: raw.timeouts,
    };
  });

export const loadLayoutConfig = (
  provider: ConfigProvider.ConfigProvider
): Effect.Effect<LayoutConfig, ConfigMissingError | ConfigError> =>
  Effect.gen(function* () {
    const raw = yield* readConfig(LayoutConfigSpec, provider);
    const releasesDir = yield* toAbsolutePathEffect(raw.releasesDir);
    return { ...raw, releasesDir };
  });

export const loadReleaseConfig = (
  provider: ConfigProvider.ConfigProvider
): Effect.Effect<ReleaseConfig, ConfigMissingError | ConfigError> =>
  Effect.map(readConfig(ReleaseConfigSpec, provider), (raw) => ({
    ...raw,
    releaseUrl: raw.releaseUrl.replaceAll("{tag}", raw.tag),
  }));

export const loadLoggingEnv = (
  provider: ConfigProvider.ConfigProvider
): Effect.Effect<LoggingEnv, ConfigMissingError | ConfigError> =>
  readConfig(LoggingEnvSpec, provider);

export interface ComposeSettings {
  readonly composeDir: AbsolutePath;
  readonly timeouts: Timeouts;
}

/** The subset rollback needs; it touches neither the database nor the backups. */
export const loadComposeSettings = (
  provider: ConfigProvider.ConfigProvider
): Effect.Effect<ComposeSettings, ConfigMissingError | ConfigError> =>
  Effect.gen(function* () {
    const raw = yield* readConfig(
      Config.all({ composeDir: ComposeDirConfig, timeouts: TimeoutsConfig }),
      provider
    );
    const composeDir = yield* toAbsolutePathEffect(raw.composeDir);
    return { composeDir, timeouts: raw.timeouts };
  });
