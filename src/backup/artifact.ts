// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Backup artifacts: dated dump files named `<db>-YYYY-MM-DD.sql[.gz]`.
 * Parsing and selection are pure; the store supplies directory entries.
 */

import { Array as Arr, Either, Option, Order, pipe } from "effect";
import { ErrorCode, NotFoundError } from "../lib/errors";
import type { AbsolutePath, BackupDate, DatabaseName } from "../lib/types";
import { isBackupDate, pathJoin } from "../lib/types";

export type Compression = "gzip" | "none";

export interface BackupArtifact {
  readonly date: BackupDate;
  readonly path: AbsolutePath;
  readonly fileName: string;
  readonly compression: Compression;
}

const ARTIFACT_NAME = /^(.+)-(\d{4}-\d{2}-\d{2})\.sql(\.gz)?$/;

export interface ParsedArtifactName {
  readonly date: BackupDate;
  readonly compression: Compression;
}

/** None for files of other databases, other extensions, or impossible dates. */
export const parseArtifactName = (
  db: DatabaseName,
  fileName: string
): Option.Option<ParsedArtifactName> =>
  pipe(
    Option.fromNullable(ARTIFACT_NAME.exec(fileName)),
    Option.filter((m) => m[1] === db),
    Option.flatMap((m) =>
      pipe(
        Option.fromNullable(m[2]),
        Option.filter(isBackupDate),
        Option.map(
          (date): ParsedArtifactName => ({
            date,
            compression: m[3] === undefined ? "none" : "gzip",
          })
        )
      )
    )
  );

export const artifactFromEntry = (
  dir: AbsolutePath,
  db: DatabaseName,
  fileName: string
): Option.Option<BackupArtifact> =>
  Option.map(parseArtifactName(db, fileName), ({ date, compression }) => ({
    date,
    path: pathJoin(dir, fileName),
    fileName,
    compression,
  }));

const byDateDesc: Order.Order<BackupArtifact> = Order.reverse(
  Order.mapInput(Order.string, (a: BackupArtifact) => a.date)
);

/** Gzip before plain, so the first artifact seen for a date is the preferred one. */
const byCompression: Order.Order<BackupArtifact> = Order.mapInput(
  Order.number,
  (a: BackupArtifact) => (a.compression === "gzip" ? 0 : 1)
);

/**
 * One artifact per date, newest first. When a date has both a `.sql.gz` and a
 * `.sql` file, the compressed one is kept.
 */
export const normalizeArtifacts = (
  artifacts: readonly BackupArtifact[]
): readonly BackupArtifact[] =>
  pipe(
    artifacts,
    Arr.sort(Order.combine(byDateDesc, byCompression)),
    Arr.dedupeWith((a, b) => a.date === b.date)
  );

/**
 * Latest artifact when no date is requested, otherwise the artifact with
 * exactly that date. `location` names the store in the error message.
 */
export const pickArtifact = (
  artifacts: readonly BackupArtifact[],
  requested: Option.Option<BackupDate>,
  location: string
): Either.Either<BackupArtifact, NotFoundError> => {
  const normalized = normalizeArtifacts(artifacts);
  return Option.match(requested, {
    onNone: (): Either.Either<BackupArtifact, NotFoundError> =>
      Either.fromOption(
        Arr.head(normalized),
        () =>
          new NotFoundError({
            code: ErrorCode.BACKUP_NOT_FOUND,
            message: `No backups found in ${location}`,
          })
      ),
    onSome: (date): Either.Either<BackupArtifact, NotFoundError> =>
      Either.fromOption(
        Arr.findFirst(normalized, (a) => a.date === date),
        () =>
          new NotFoundError({
            code: ErrorCode.BACKUP_NOT_FOUND,
            message: `No backup for ${date} in ${location}`,
            requestedDate: date,
          })
      ),
  });
};
