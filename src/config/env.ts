// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for the deployment settings.
 *
 * All exports are pure Config<A> values; nothing is read until a Config is
 * yielded inside an Effect with a ConfigProvider in scope (see loader.ts).
 */

import { Config, ConfigProvider, Duration, Schema } from "effect";
import type { Option, Redacted } from "effect";
import type { ContainerName, DatabaseName, ReleaseTag } from "../lib/types";
import { ContainerNameSchema, DatabaseNameSchema, ReleaseTagSchema, containerName } from "../lib/types";
import type { LogFormat, LogLevel } from "./field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "./field-values";

/** Namespace for the tool's own settings (`ASPACE_OPS_LOG_LEVEL`, ...). */
export const ENV_NAMESPACE = "ASPACE_OPS";

export const DEFAULT_RELEASE_URL =
  "https://github.com/archivesspace/archivesspace/releases/download/{tag}/archivesspace-docker-{tag}.zip";

// ============================================================================
// Shapes
// ============================================================================

export interface Timeouts {
  readonly restore: Duration.Duration;
  readonly reindex: Duration.Duration;
  readonly fetch: Duration.Duration;
  readonly command: Duration.Duration;
}

/**
 * Settings every command needs. Paths are still as written in the env file;
 * the loader resolves them to absolute paths.
 */
export interface RawDeploymentConfig {
  readonly db: DatabaseName;
  readonly mysqlUser: string;
  readonly mysqlPassword: Redacted.Redacted;
  readonly mysqlContainer: ContainerName;
  readonly appContainer: ContainerName;
  readonly backupDir: string;
  readonly bucket: Option.Option<string>;
  readonly awsCli: string;
  readonly composeDir: string;
  readonly solrUrl: string;
  readonly adminPassword: Option.Option<Redacted.Redacted>;
  readonly timeouts: Timeouts;
}

/** Where releases live and which volumes hold the index; upgrade and rollback. */
export interface RawLayoutConfig {
  readonly releasesDir: string;
  readonly appDataVolume: string;
  readonly solrDataVolume: string;
}

/** The release an upgrade installs. */
export interface RawReleaseConfig {
  readonly tag: ReleaseTag;
  readonly domain: string;
  readonly releaseUrl: string;
}

export interface LoggingEnv {
  readonly level: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly debug: boolean;
}

// ============================================================================
// Primitive Configs
// ============================================================================

const branded = <B extends string>(
  name: string,
  schema: Schema.Schema<B, string, never>,
  description: string
): Config.Config<B> =>
  Config.string(name).pipe(
    Config.validate({
      message: `Expected ${description}`,
      validation: (s: string): s is B => Schema.is(schema)(s),
    })
  );

const nonEmpty = (name: string): Config.Config<string> =>
  Config.string(name).pipe(
    Config.validate({ message: "Expected a non-empty value", validation: (s) => s.trim() !== "" })
  );

export const DatabaseNameConfig: Config.Config<DatabaseName> = branded(
  "DB",
  DatabaseNameSchema,
  "a database name of letters, digits, '_' or '-'"
);

export const MysqlPasswordConfig: Config.Config<Redacted.Redacted> =
  Config.redacted("MYSQL_PASSWORD");

export const MysqlUserConfig: Config.Config<string> = nonEmpty("MYSQL_USER").pipe(
  Config.withDefault("as")
);

export const MysqlContainerConfig: Config.Config<ContainerName> = branded(
  "MYSQL_CONTAINER",
  ContainerNameSchema,
  "a container name"
).pipe(Config.withDefault(containerName("mysql")));

export const AppContainerConfig: Config.Config<ContainerName> = branded(
  "APP_CONTAINER",
  ContainerNameSchema,
  "a container name"
).pipe(Config.withDefault(containerName("archivesspace")));

export const BackupDirConfig: Config.Config<string> = nonEmpty("BACKUP_DIR").pipe(
  Config.withDefault("./backups")
);

export const BucketConfig: Config.Config<Option.Option<string>> = Config.option(nonEmpty("BUCKET"));

export const AwsCliConfig: Config.Config<string> = nonEmpty("AWS_CLI").pipe(
  Config.withDefault("aws")
);

export const ComposeDirConfig: Config.Config<string> = nonEmpty("COMPOSE_DIR").pipe(
  Config.withDefault("/opt/archivesspace")
);

export const SolrUrlConfig: Config.Config<string> = Config.url("SOLR_URL").pipe(
  Config.map((u) => u.toString().replace(/\/+$/, "")),
  Config.withDefault("http://localhost:8983/solr/archivesspace")
);

export const AdminPasswordConfig: Config.Config<Option.Option<Redacted.Redacted>> = Config.option(
  Config.redacted("ADMIN_PASSWORD")
);

export const TimeoutsConfig: Config.Config<Timeouts> = Config.all({
  restore: Config.duration("RESTORE_TIMEOUT").pipe(Config.withDefault(Duration.hours(2))),
  reindex: Config.duration("REINDEX_TIMEOUT").pipe(Config.withDefault(Duration.minutes(10))),
  fetch: Config.duration("FETCH_TIMEOUT").pipe(Config.withDefault(Duration.minutes(30))),
  command: Config.duration("COMMAND_TIMEOUT").pipe(Config.withDefault(Duration.minutes(5))),
});

export const ReleaseTagConfig: Config.Config<ReleaseTag> = branded(
  "TAG",
  ReleaseTagSchema,
  "a release tag such as v4.0.0"
);

export const DomainConfig: Config.Config<string> = nonEmpty("DOMAIN");

export const ReleasesDirConfig: Config.Config<string> = nonEmpty("RELEASES_DIR").pipe(
  Config.withDefault(".")
);

export const ReleaseUrlConfig: Config.Config<string> = Config.string("RELEASE_URL").pipe(
  Config.validate({
    message: "Expected a URL template containing {tag}",
    validation: (s) => s.includes("{tag}"),
  }),
  Config.withDefault(DEFAULT_RELEASE_URL)
);

export const AppDataVolumeConfig: Config.Config<string> = nonEmpty("APP_DATA_VOLUME").pipe(
  Config.withDefault("archivesspace_app-data")
);

export const SolrDataVolumeConfig: Config.Config<string> = nonEmpty("SOLR_DATA_VOLUME").pipe(
  Config.withDefault("archivesspace_solr-data")
);

// Logging, under the ASPACE_OPS_ namespace

/** Optional so that an unset variable doesn't override lower-priority sources. */
export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = Config.nested(
  Config.option(Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL")),
  ENV_NAMESPACE
);

export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = Config.nested(
  Config.option(Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT")),
  ENV_NAMESPACE
);

/** When true, forces log level to debug. */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  ENV_NAMESPACE
);

// ============================================================================
// Composite Configs
// ============================================================================

export const DeploymentConfigSpec: Config.Config<RawDeploymentConfig> = Config.all({
  db: DatabaseNameConfig,
  mysqlUser: MysqlUserConfig,
  mysqlPassword: MysqlPasswordConfig,
  mysqlContainer: MysqlContainerConfig,
  appContainer: AppContainerConfig,
  backupDir: BackupDirConfig,
  bucket: BucketConfig,
  awsCli: AwsCliConfig,
  composeDir: ComposeDirConfig,
  solrUrl: SolrUrlConfig,
  adminPassword: AdminPasswordConfig,
  timeouts: TimeoutsConfig,
});

export const LayoutConfigSpec: Config.Config<RawLayoutConfig> = Config.all({
  releasesDir: ReleasesDirConfig,
  appDataVolume: AppDataVolumeConfig,
  solrDataVolume: SolrDataVolumeConfig,
});

export const ReleaseConfigSpec: Config.Config<RawReleaseConfig> = Config.all({
  tag: ReleaseTagConfig,
  domain: DomainConfig,
  releaseUrl: ReleaseUrlConfig,
});

export const LoggingEnvSpec: Config.Config<LoggingEnv> = Config.all({
  level: LogLevelOptionConfig,
  format: LogFormatOptionConfig,
  debug: DebugModeConfig,
});

// ============================================================================
// Test Utilities
// ============================================================================

/** The settings a minimal deployment needs; overrides replace or add keys. */
const TEST_DEFAULTS: Readonly<Record<string, string>> = {
  DB: "archives",
  MYSQL_PASSWORD: "test-secret",
};

/**
 * Create a ConfigProvider for testing. A key mapped to `undefined` is removed
 * from the defaults.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ BUCKET: "nightly-dumps" });
 * const result = await Effect.runPromise(
 *   Effect.withConfigProvider(DeploymentConfigSpec, provider)
 * );
 * ```
 */
export const createTestConfigProvider = (
  overrides: Readonly<Record<string, string | undefined>> = {}
): ConfigProvider.ConfigProvider => {
  const entries = new Map<string, string>(Object.entries(TEST_DEFAULTS));
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      entries.delete(key);
    } else {
      entries.set(key, value);
    }
  }
  return ConfigProvider.fromMap(entries, { pathDelim: "_" });
};
