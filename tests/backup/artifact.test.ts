// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either, Option } from "effect";
import { describe, expect, test } from "vitest";
import {
  artifactFromEntry,
  normalizeArtifacts,
  parseArtifactName,
  pickArtifact,
} from "../../src/backup/artifact";
import { backupDate, databaseName, path } from "../../src/lib/types";
import { BACKUP_DIR, TEST_DB, makeArtifact } from "../helpers/layers";

describe("parseArtifactName", () => {
  test("parses a compressed dump", () => {
    expect(parseArtifactName(TEST_DB, "archives-2024-03-01.sql.gz")).toEqual(
      Option.some({ date: "2024-03-01", compression: "gzip" })
    );
  });

  test("parses an uncompressed dump", () => {
    expect(parseArtifactName(TEST_DB, "archives-2024-03-01.sql")).toEqual(
      Option.some({ date: "2024-03-01", compression: "none" })
    );
  });

  test("ignores other databases", () => {
    expect(Option.isNone(parseArtifactName(TEST_DB, "other-2024-03-01.sql.gz"))).toBe(true);
  });

  test("requires the whole prefix to match the database", () => {
    const db = databaseName("arch");
    expect(Option.isNone(parseArtifactName(db, "archives-2024-03-01.sql.gz"))).toBe(true);
  });

  test("handles database names containing dashes", () => {
    const db = databaseName("aspace-prod");
    expect(parseArtifactName(db, "aspace-prod-2024-03-01.sql.gz")).toEqual(
      Option.some({ date: "2024-03-01", compression: "gzip" })
    );
  });

  test("ignores partial downloads and other extensions", () => {
    expect(Option.isNone(parseArtifactName(TEST_DB, "archives-2024-03-01.sql.gz.part"))).toBe(
      true
    );
    expect(Option.isNone(parseArtifactName(TEST_DB, "archives-2024-03-01.tar.gz"))).toBe(true);
  });

  test("ignores impossible calendar dates", () => {
    expect(Option.isNone(parseArtifactName(TEST_DB, "archives-2024-02-30.sql.gz"))).toBe(true);
    expect(Option.isNone(parseArtifactName(TEST_DB, "archives-2024-13-01.sql.gz"))).toBe(true);
  });
});

describe("artifactFromEntry", () => {
  test("joins the directory and file name", () => {
    expect(artifactFromEntry(path("/var/backups"), TEST_DB, "archives-2024-03-01.sql.gz")).toEqual(
      Option.some({
        date: "2024-03-01",
        path: "/var/backups/archives-2024-03-01.sql.gz",
        fileName: "archives-2024-03-01.sql.gz",
        compression: "gzip",
      })
    );
  });
});

describe("normalizeArtifacts", () => {
  test("sorts newest first", () => {
    const result = normalizeArtifacts([
      makeArtifact("2024-01-02"),
      makeArtifact("2024-03-01"),
      makeArtifact("2023-12-31"),
    ]);
    expect(result.map((a) => a.date)).toEqual(["2024-03-01", "2024-01-02", "2023-12-31"]);
  });

  test("keeps the compressed artifact when a date has both", () => {
    const result = normalizeArtifacts([
      makeArtifact("2024-03-01", "none"),
      makeArtifact("2024-03-01", "gzip"),
    ]);
    expect(result).toHaveLength(1);
    expect(result[0]?.fileName).toBe("archives-2024-03-01.sql.gz");
  });
});

describe("pickArtifact", () => {
  const artifacts = [
    makeArtifact("2024-01-15"),
    makeArtifact("2024-03-01"),
    makeArtifact("2024-02-10", "none"),
  ];

  test("picks the latest when no date is requested", () => {
    const result = pickArtifact(artifacts, Option.none(), BACKUP_DIR);
    expect(Either.map(result, (a) => a.date)).toEqual(Either.right("2024-03-01"));
  });

  test("picks the exact date when one is requested", () => {
    const result = pickArtifact(artifacts, Option.some(backupDate("2024-02-10")), BACKUP_DIR);
    expect(Either.map(result, (a) => a.fileName)).toEqual(
      Either.right("archives-2024-02-10.sql")
    );
  });

  test("never falls back to a nearby date", () => {
    const result = pickArtifact(artifacts, Option.some(backupDate("2024-02-11")), BACKUP_DIR);
    expect(Either.isLeft(result)).toBe(true);
    Either.match(result, {
      onLeft: (e) => {
        expect(e.message).toBe("No backup for 2024-02-11 in /backups");
        expect(e.requestedDate).toBe("2024-02-11");
        expect(e.code).toBe(50);
      },
      onRight: () => undefined,
    });
  });

  test("reports an empty store", () => {
    const result = pickArtifact([], Option.none(), BACKUP_DIR);
    expect(Either.mapLeft(result, (e) => e.message)).toEqual(
      Either.left("No backups found in /backups")
    );
  });
});
