// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for aspace-ops.
 * Every failure is a tagged error with a typed code that maps to an exit code.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;
  readonly ROOT_REQUIRED: 3;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_MISSING: 12;

  // System (20-29)
  readonly EXEC_FAILED: 20;
  readonly EXEC_TIMEOUT: 21;
  readonly FILE_READ_FAILED: 22;
  readonly FILE_WRITE_FAILED: 23;
  readonly HTTP_FAILED: 24;

  // Backup/Restore (50-59)
  readonly BACKUP_NOT_FOUND: 50;
  readonly RESTORE_FAILED: 51;
  readonly ADMIN_RESET_FAILED: 53;

  // Search index (60-69)
  readonly REINDEX_FAILED: 60;

  // Deployment (70-79)
  readonly RELEASE_DOWNLOAD_FAILED: 70;
  readonly RELEASE_EXTRACT_FAILED: 71;
  readonly COMPOSE_FAILED: 72;
  readonly RELEASE_NOT_FOUND: 73;
}

/**
 * Error codes for all aspace-ops operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,
  ROOT_REQUIRED: 3,

  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_MISSING: 12,

  EXEC_FAILED: 20,
  EXEC_TIMEOUT: 21,
  FILE_READ_FAILED: 22,
  FILE_WRITE_FAILED: 23,
  HTTP_FAILED: 24,

  BACKUP_NOT_FOUND: 50,
  RESTORE_FAILED: 51,
  ADMIN_RESET_FAILED: 53,

  REINDEX_FAILED: 60,

  RELEASE_DOWNLOAD_FAILED: 70,
  RELEASE_EXTRACT_FAILED: 71,
  COMPOSE_FAILED: 72,
  RELEASE_NOT_FOUND: 73,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

type GeneralCode =
  | typeof ErrorCode.GENERAL_ERROR
  | typeof ErrorCode.INVALID_ARGS
  | typeof ErrorCode.ROOT_REQUIRED;

type ConfigCode = typeof ErrorCode.CONFIG_NOT_FOUND | typeof ErrorCode.CONFIG_PARSE_ERROR;

type SystemCode =
  | typeof ErrorCode.EXEC_FAILED
  | typeof ErrorCode.EXEC_TIMEOUT
  | typeof ErrorCode.FILE_READ_FAILED
  | typeof ErrorCode.FILE_WRITE_FAILED
  | typeof ErrorCode.HTTP_FAILED;

type DeployCode =
  | typeof ErrorCode.RELEASE_DOWNLOAD_FAILED
  | typeof ErrorCode.RELEASE_EXTRACT_FAILED
  | typeof ErrorCode.COMPOSE_FAILED
  | typeof ErrorCode.RELEASE_NOT_FOUND;

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: GeneralCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

/** Env file could not be found or parsed. */
export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: ConfigCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

/** Required settings absent; always raised before any side-effecting step. */
export class ConfigMissingError extends Data.TaggedError("ConfigMissing")<{
  readonly code: typeof ErrorCode.CONFIG_MISSING;
  readonly message: string;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: SystemCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class NotFoundError extends Data.TaggedError("NotFound")<{
  readonly code: typeof ErrorCode.BACKUP_NOT_FOUND;
  readonly message: string;
  readonly requestedDate?: string;
}> {}

export class RestoreFailedError extends Data.TaggedError("RestoreFailed")<{
  readonly code: typeof ErrorCode.RESTORE_FAILED;
  readonly message: string;
  readonly path: string;
  readonly exitCode?: number;
  readonly output?: string;
}> {}

export class AdminResetError extends Data.TaggedError("AdminResetFailed")<{
  readonly code: typeof ErrorCode.ADMIN_RESET_FAILED;
  readonly message: string;
}> {}

export class ReindexFailedError extends Data.TaggedError("ReindexFailed")<{
  readonly code: typeof ErrorCode.REINDEX_FAILED;
  readonly message: string;
  readonly mode: string;
}> {}

export class DeployError extends Data.TaggedError("DeployError")<{
  readonly code: DeployCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

/** Union of every error the CLI can surface. */
export type OpsError =
  | GeneralError
  | ConfigError
  | ConfigMissingError
  | SystemError
  | NotFoundError
  | RestoreFailedError
  | AdminResetError
  | ReindexFailedError
  | DeployError;

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: ErrorCodeValue): number => Math.min(code, 125);

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};

/** Spread into an error constructor to keep the original Error as cause. */
export const causeProps = (e: unknown): { cause?: Error } =>
  e instanceof Error ? { cause: e } : {};
