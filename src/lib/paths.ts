// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Path resolution and the deployment's naming conventions. Settings may hold
 * relative paths (`./backups`); they are resolved against the working
 * directory once, when the configuration is loaded.
 */

import { normalize, resolve } from "node:path";
import { Effect } from "effect";
import { ConfigError, ErrorCode } from "./errors";
import type { AbsolutePath, BackupDate, DatabaseName, ReleaseTag } from "./types";
import { pathJoin } from "./types";

/** Rejects null bytes to prevent path injection attacks. */
const hasNullByte = (p: string): boolean => p.includes("\x00");

const resolveToAbsolute = (p: string): AbsolutePath => {
  const normalized = normalize(p);
  return (
    normalized.startsWith("/") ? normalized : resolve(process.cwd(), normalized)
  ) as AbsolutePath;
};

/** Use for all user-provided or config-file paths. */
export const toAbsolutePathEffect = (p: string): Effect.Effect<AbsolutePath, ConfigError> =>
  hasNullByte(p)
    ? Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Invalid path contains null byte: ${p}`,
        })
      )
    : Effect.succeed(resolveToAbsolute(p));

/** Use ONLY for trusted paths (hardcoded defaults, validated inputs). */
export const toAbsolutePathUnsafe = (p: string): AbsolutePath => resolveToAbsolute(p);

/** `<db>-YYYY-MM-DD.sql.gz`, the name the nightly dump job and the bucket use. */
export const backupFileName = (db: DatabaseName, date: BackupDate): string =>
  `${db}-${date}.sql.gz`;

export const releaseDirName = (tag: ReleaseTag): string => `archivesspace-docker-${tag}`;

export const releaseDir = (releasesDir: AbsolutePath, tag: ReleaseTag): AbsolutePath =>
  pathJoin(releasesDir, releaseDirName(tag));
