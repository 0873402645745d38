// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Live layers for CLI commands, built from the configuration loaded for the
 * command. Tests provide `Layer.succeed` fakes for the same tags instead.
 */

import { FetchHttpClient, type FileSystem, type HttpClient } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Layer } from "effect";
import { Admin, AdminLive } from "../app/admin";
import { BackupFetcher, BackupFetcherLive } from "../backup/fetch";
import { BackupStore, BackupStoreLive } from "../backup/store";
import type { ComposeSettings, DeploymentConfig, LayoutConfig } from "../config/loader";
import { Database, DatabaseLive } from "../database/service";
import { Compose, ComposeLive } from "../deploy/compose";
import { Releases, ReleasesLive } from "../deploy/release";
import type { RestoreSettings } from "../restore/orchestrator";
import { SearchIndex, SearchIndexLive } from "../search/service";
import { CommandRunner, CommandRunnerLive } from "../system/services/executor";

/** Processes, files and HTTP, for every live collaborator. */
export type PlatformServices = CommandRunner | HttpClient.HttpClient | NodeContext.NodeContext;

export const PlatformLive: Layer.Layer<PlatformServices> = Layer.mergeAll(
  CommandRunnerLive,
  FetchHttpClient.layer,
  NodeContext.layer
);

export const restoreSettings = (config: DeploymentConfig): RestoreSettings => ({
  restoreTimeout: config.timeouts.restore,
  reindexTimeout: config.timeouts.reindex,
  adminPassword: config.adminPassword,
});

export type BackupServices = BackupStore | BackupFetcher;

export const backupLayer = (
  config: DeploymentConfig
): Layer.Layer<BackupServices, never, FileSystem.FileSystem | CommandRunner> =>
  Layer.merge(
    BackupStoreLive({ dir: config.backupDir, db: config.db }),
    BackupFetcherLive({
      bucket: config.bucket,
      db: config.db,
      dir: config.backupDir,
      awsCli: config.awsCli,
      timeout: config.timeouts.fetch,
    })
  );

export type RestoreServices = BackupServices | Database | SearchIndex | Admin | PlatformServices;

export const restoreLayer = (config: DeploymentConfig): Layer.Layer<RestoreServices> =>
  Layer.mergeAll(
    backupLayer(config),
    DatabaseLive({
      container: config.mysql.container,
      user: config.mysql.user,
      password: config.mysql.password,
      database: config.db,
      composeDir: config.composeDir,
    }),
    SearchIndexLive({
      solrUrl: config.solrUrl,
      appContainer: config.appContainer,
      composeDir: config.composeDir,
    }),
    AdminLive({ appContainer: config.appContainer, composeDir: config.composeDir })
  ).pipe(Layer.provideMerge(PlatformLive));

const composeLayer = (settings: ComposeSettings): Layer.Layer<Compose, never, CommandRunner> =>
  ComposeLive({
    commandTimeout: settings.timeouts.command,
    pullTimeout: settings.timeouts.fetch,
  });

export type UpgradeServices = BackupServices | Compose | Releases | PlatformServices;

export const upgradeLayer = (
  config: DeploymentConfig,
  layout: LayoutConfig
): Layer.Layer<UpgradeServices> =>
  Layer.mergeAll(
    backupLayer(config),
    composeLayer(config),
    ReleasesLive({
      releasesDir: layout.releasesDir,
      transferTimeout: config.timeouts.fetch,
      commandTimeout: config.timeouts.command,
    })
  ).pipe(Layer.provideMerge(PlatformLive));

export type RollbackServices = Compose | PlatformServices;

export const rollbackLayer = (settings: ComposeSettings): Layer.Layer<RollbackServices> =>
  composeLayer(settings).pipe(Layer.provideMerge(PlatformLive));
