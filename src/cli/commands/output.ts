// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Result rendering shared by the commands: one JSON document on stdout for
 * `--format json`, log lines otherwise.
 */

import { Effect, Match, pipe } from "effect";
import type { BackupArtifact } from "../../backup/artifact";
import type { LogFormat } from "../../config/field-values";
import { writeOutput } from "../../lib/log";

export interface ArtifactJson {
  readonly date: string;
  readonly path: string;
  readonly compression: string;
}

export const artifactJson = (artifact: BackupArtifact): ArtifactJson => ({
  date: artifact.date,
  path: artifact.path,
  compression: artifact.compression,
});

/** Emits `json` as a document, or runs `pretty` for human output. */
export const emit = (
  format: LogFormat,
  json: unknown,
  pretty: () => Effect.Effect<void>
): Effect.Effect<void> =>
  pipe(
    Match.value(format),
    Match.when("json", () => writeOutput(JSON.stringify(json, null, 2))),
    Match.when("pretty", pretty),
    Match.exhaustive
  );

export const describeArtifact = (artifact: BackupArtifact): string =>
  `${artifact.date}  ${artifact.path}${artifact.compression === "gzip" ? "" : "  (uncompressed)"}`;

/** Logs each line at info level, in order. */
export const logLines = (lines: readonly string[]): Effect.Effect<void> =>
  Effect.forEach(lines, (line) => Effect.logInfo(line), { discard: true });
