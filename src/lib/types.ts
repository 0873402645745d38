// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Branded types prevent accidental mixing of same-underlying-type values.
 * A `BackupDate` and a `ReleaseTag` are both strings, but the compiler
 * rejects passing a tag where a date is expected.
 */

import { type Brand, Effect, type ParseResult, Schema, type SchemaAST, pipe } from "effect";
import { ErrorCode, GeneralError } from "./errors";
import { formatParseError } from "./schema-utils";

export type AbsolutePath = string & Brand.Brand<"AbsolutePath">;
export type BackupDate = string & Brand.Brand<"BackupDate">;
export type DatabaseName = string & Brand.Brand<"DatabaseName">;
export type ReleaseTag = string & Brand.Brand<"ReleaseTag">;
export type ContainerName = string & Brand.Brand<"ContainerName">;

const absolutePathMsg = (): string => "Path must be absolute (start with /)";
const backupDateMsg = (): string => "Date must be a calendar date in YYYY-MM-DD form";
const databaseNameMsg = (): string => "Database name must match [A-Za-z0-9_-]+";
const releaseTagMsg = (): string => "Release tag must match [A-Za-z0-9._-]+ and not start with .";
const containerNameMsg = (): string => "Invalid container name";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** Round-trips through Date so that 2024-02-30 is rejected. */
export const isCalendarDate = (s: string): boolean => {
  if (!ISO_DATE.test(s)) {
    return false;
  }
  const parsed = new Date(`${s}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === s;
};

export const AbsolutePathSchema: Schema.BrandSchema<AbsolutePath, string, never> =
  Schema.String.pipe(
    Schema.filter((s): boolean => s.startsWith("/"), { message: absolutePathMsg }),
    Schema.brand("AbsolutePath")
  );

export const BackupDateSchema: Schema.BrandSchema<BackupDate, string, never> = Schema.String.pipe(
  Schema.filter(isCalendarDate, { message: backupDateMsg }),
  Schema.brand("BackupDate")
);

export const DatabaseNameSchema: Schema.BrandSchema<DatabaseName, string, never> =
  Schema.String.pipe(
    Schema.pattern(/^[A-Za-z0-9_-]+$/, { message: databaseNameMsg }),
    Schema.brand("DatabaseName")
  );

export const ReleaseTagSchema: Schema.BrandSchema<ReleaseTag, string, never> = Schema.String.pipe(
  Schema.pattern(/^[A-Za-z0-9_-][A-Za-z0-9._-]*$/, { message: releaseTagMsg }),
  Schema.brand("ReleaseTag")
);

export const ContainerNameSchema: Schema.BrandSchema<ContainerName, string, never> =
  Schema.String.pipe(
    Schema.pattern(/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/, { message: containerNameMsg }),
    Schema.brand("ContainerName")
  );

export const isAbsolutePath: (u: unknown) => u is AbsolutePath = Schema.is(AbsolutePathSchema);
export const isBackupDate: (u: unknown) => u is BackupDate = Schema.is(BackupDateSchema);

export const decodeBackupDate: (
  i: string,
  options?: SchemaAST.ParseOptions
) => Effect.Effect<BackupDate, ParseResult.ParseError, never> = Schema.decode(BackupDateSchema);

export const decodeReleaseTag: (
  i: string,
  options?: SchemaAST.ParseOptions
) => Effect.Effect<ReleaseTag, ParseResult.ParseError, never> = Schema.decode(ReleaseTagSchema);

/** Bridge Schema `ParseError` into the application error hierarchy. */
export const parseErrorToGeneralError = (error: ParseResult.ParseError): GeneralError =>
  new GeneralError({
    code: ErrorCode.INVALID_ARGS,
    message: formatParseError(error),
  });

/** CLI-facing date parse: malformed input is INVALID_ARGS. */
export const parseBackupDateArg = (input: string): Effect.Effect<BackupDate, GeneralError> =>
  pipe(
    decodeBackupDate(input),
    Effect.mapError(
      () =>
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: `Invalid date '${input}': expected YYYY-MM-DD`,
        })
    )
  );

type AbsolutePathLiteral = `/${string}`;

/**
 * Compile-time validated `AbsolutePath` from a string literal.
 * For dynamic paths, use `toAbsolutePathEffect` or `pathJoin`.
 */
export const path = <const S extends AbsolutePathLiteral>(literal: S): AbsolutePath =>
  literal as string as AbsolutePath;

/** Branded literal constructor for tests and defaults. */
export const backupDate = <const S extends string>(literal: S): BackupDate =>
  literal as string as BackupDate;

/** Branded literal constructor. For dynamic input, decode with `DatabaseNameSchema`. */
export const databaseName = <const S extends string>(literal: S): DatabaseName =>
  literal as string as DatabaseName;

/** Branded literal constructor. For dynamic input, use `decodeReleaseTag`. */
export const releaseTag = <const S extends string>(literal: S): ReleaseTag =>
  literal as string as ReleaseTag;

/** Branded literal constructor. For dynamic input, decode with `ContainerNameSchema`. */
export const containerName = <const S extends string>(literal: S): ContainerName =>
  literal as string as ContainerName;

const collapseSlashes = (s: string): string => s.replace(/\/{2,}/g, "/");

/** Join path segments, preserving `AbsolutePath` brand when the base is branded. */
export function pathJoin(base: AbsolutePath, ...segments: string[]): AbsolutePath;
export function pathJoin(base: string, ...segments: string[]): string;
export function pathJoin(base: string, ...segments: string[]): string {
  return segments.length === 0 ? base : collapseSlashes([base, ...segments].join("/"));
}

/** Append a suffix (e.g. `".part"`), preserving `AbsolutePath` brand. */
export function pathWithSuffix(base: AbsolutePath, suffix: string): AbsolutePath;
export function pathWithSuffix(base: string, suffix: string): string;
export function pathWithSuffix(base: string, suffix: string): string {
  return `${base}${suffix}`;
}
