// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions. Sharing these ensures consistent naming
 * and descriptions across commands, and enables type-safe composition.
 */

import { Args as A, Options as O } from "@effect/cli";
import { Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel } from "../config/field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "../config/field-values";

// Shared positional arguments

/** Validated later so a malformed date is INVALID_ARGS rather than a usage error. */
export const optionalDateArg: A.Args<Option.Option<string>> = A.text({ name: "date" }).pipe(
  A.withDescription("Backup date (YYYY-MM-DD); defaults to the latest backup"),
  A.optional
);

export const tagArg: A.Args<string> = A.text({ name: "tag" }).pipe(
  A.withDescription("Installed release tag to switch back to (e.g. v3.5.1)")
);

// Global options (spread into every command)

export const globalOptions: {
  readonly envFile: O.Options<Option.Option<string>>;
  readonly verbose: O.Options<boolean>;
  readonly logLevel: O.Options<Option.Option<LogLevel>>;
  readonly format: O.Options<Option.Option<LogFormat>>;
  readonly json: O.Options<boolean>;
} = {
  envFile: O.text("env-file").pipe(
    O.withAlias("e"),
    O.withDescription("Settings file (default: .env in the working directory)"),
    O.optional
  ),
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
};

// Per-command options

export const rebuildIndex: O.Options<boolean> = O.boolean("rebuild-index").pipe(
  O.withDescription("Delete and fully rebuild the search index instead of a soft reindex")
);

export const dryRun: O.Options<boolean> = O.boolean("dry-run").pipe(
  O.withDescription("Show which backup would be restored without doing it")
);

export const dateOption: O.Options<Option.Option<string>> = O.text("date").pipe(
  O.withDescription("Seed the new release from this backup date instead of the latest"),
  O.optional
);

// Type definitions

export interface GlobalOptions {
  readonly envFile: Option.Option<string>;
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
}

/** Resolves format: --json takes precedence as shorthand for --format=json. */
export const effectiveFormat = (globals: GlobalOptions): Option.Option<LogFormat> =>
  pipe(
    Match.value(globals.json),
    Match.when(true, (): Option.Option<LogFormat> => Option.some("json")),
    Match.when(false, (): Option.Option<LogFormat> => globals.format),
    Match.exhaustive
  );

// Argument order

/** Options that take the next argument as their value. */
const VALUE_OPTIONS: ReadonlySet<string> = new Set([
  "--env-file",
  "-e",
  "--log-level",
  "--format",
  "--date",
]);

interface ArgvSplit {
  readonly options: readonly string[];
  readonly positionals: readonly string[];
  readonly expectValue: boolean;
  readonly passthrough: boolean;
}

/**
 * Moves options ahead of positional arguments after the subcommand, so that
 * `restore 2024-03-01 --rebuild-index` parses like
 * `restore --rebuild-index 2024-03-01`. Everything from `--` on keeps its place.
 */
export const hoistOptions = (argv: readonly string[]): readonly string[] => {
  const split = argv.slice(2).reduce<ArgvSplit>(
    (acc, token): ArgvSplit => {
      if (acc.passthrough) {
        return { ...acc, positionals: [...acc.positionals, token] };
      }
      if (acc.expectValue) {
        return { ...acc, options: [...acc.options, token], expectValue: false };
      }
      if (token === "--") {
        return { ...acc, positionals: [...acc.positionals, token], passthrough: true };
      }
      if (token.startsWith("-") && token.length > 1) {
        return { ...acc, options: [...acc.options, token], expectValue: VALUE_OPTIONS.has(token) };
      }
      return { ...acc, positionals: [...acc.positionals, token] };
    },
    { options: [], positionals: [], expectValue: false, passthrough: false }
  );

  return [
    ...argv.slice(0, 2),
    ...split.positionals.slice(0, 1),
    ...split.options,
    ...split.positionals.slice(1),
  ];
};
