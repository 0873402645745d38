// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Pure rewrites of the configuration a release ships with, pointing it at
 * this deployment's database and public domain.
 */

import type { DatabaseName } from "../lib/types";

const escapeRegExp = (s: string): string => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Replaces every `KEY=...` line whose value contains `oldValue` with
 * `KEY=newValue`. Lines for other keys are untouched.
 */
export const replaceEnvValue = (
  content: string,
  key: string,
  oldValue: string,
  newValue: string
): string =>
  content.replace(
    new RegExp(`^${escapeRegExp(key)}=.*${escapeRegExp(oldValue)}.*$`, "gm"),
    () => `${key}=${newValue}`
  );

/**
 * After each occurrence of `key`, replaces the first `oldValue` on the same
 * line with `newValue`.
 */
export const replaceRubyValue = (
  content: string,
  key: string,
  oldValue: string,
  newValue: string
): string =>
  content.replace(
    new RegExp(`(${escapeRegExp(key)}.*?)${escapeRegExp(oldValue)}`, "g"),
    (_match, prefix: string) => `${prefix}${newValue}`
  );

/** Release `.env`: the compose file reads the database name from here. */
export const rewriteReleaseEnv = (content: string, db: DatabaseName): string =>
  replaceEnvValue(content, "MYSQL_DATABASE", "archivesspace", db);

const PROXY_URL_KEYS: readonly string[] = [
  "AppConfig[:oai_proxy_url]",
  "AppConfig[:frontend_proxy_url]",
  "AppConfig[:public_proxy_url]",
];

/** Release `config/config.rb`: database URL and the public proxy URLs. */
export const rewriteReleaseConfigRb = (
  content: string,
  db: DatabaseName,
  domain: string
): string =>
  PROXY_URL_KEYS.reduce(
    (acc, key) => replaceRubyValue(acc, key, "localhost", domain),
    replaceRubyValue(content, "AppConfig[:db_url]", "archivesspace", db)
  );
