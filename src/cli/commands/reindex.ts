// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/** `reindex`: repeat only the index step, e.g. after a failed restore run. */

import { Effect } from "effect";
import { type LogFormat, reindexModeFor } from "../../config/field-values";
import type { ReindexFailedError } from "../../lib/errors";
import { logSuccess } from "../../lib/log";
import { type RestoreSettings, reindex } from "../../restore/orchestrator";
import type { SearchIndex } from "../../search/service";
import { emit } from "./output";

export interface ReindexOptions {
  readonly settings: RestoreSettings;
  readonly rebuildIndex: boolean;
  readonly format: LogFormat;
}

export const executeReindex = (
  options: ReindexOptions
): Effect.Effect<void, ReindexFailedError, SearchIndex> =>
  Effect.gen(function* () {
    const mode = reindexModeFor(options.rebuildIndex);
    yield* Effect.logInfo(`Starting ${mode} reindex`);
    const report = yield* reindex(options.settings, mode);
    yield* emit(options.format, report, () => logSuccess(`Triggered ${mode} reindex`));
  });
