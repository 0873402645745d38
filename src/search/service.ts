// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Search index service: Solr plus the application's indexer.
 *
 * The application's indexer records how far it got in per-indexer state
 * files. Removing them makes it walk the whole database again on its next
 * cycle: against the existing index for a soft reindex, or against an index
 * emptied by a delete-all query for a full rebuild.
 */

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Context, Effect, Layer, Match, Schema, pipe } from "effect";
import type { ReindexMode } from "../config/field-values";
import { ErrorCode, type GeneralError, SystemError, causeProps } from "../lib/errors";
import { decodeToEffect } from "../lib/schema-utils";
import type { AbsolutePath, ContainerName } from "../lib/types";
import { CommandRunner } from "../system/services/executor";

export const INDEXER_STATE_DIRS: readonly string[] = [
  "/archivesspace/data/indexer_state",
  "/archivesspace/data/indexer_pui_state",
];

export type ReindexStep = "ping" | "delete-documents" | "clear-indexer-state";

export interface ReindexReport {
  readonly mode: ReindexMode;
  readonly steps: readonly ReindexStep[];
}

export interface SearchIndexService {
  readonly trigger: (mode: ReindexMode) => Effect.Effect<ReindexReport, SystemError | GeneralError>;
}

export interface SearchIndex {
  readonly _tag: "SearchIndex";
}

export const SearchIndex: Context.Tag<SearchIndex, SearchIndexService> = Context.GenericTag<
  SearchIndex,
  SearchIndexService
>("aspace-ops/SearchIndex");

const PingResponse = Schema.Struct({ status: Schema.Literal("OK") });

const UpdateResponse = Schema.Struct({
  responseHeader: Schema.Struct({ status: Schema.Literal(0) }),
});

export const clearStateCommand = (appContainer: ContainerName): readonly string[] => [
  "docker",
  "exec",
  appContainer,
  "sh",
  "-c",
  INDEXER_STATE_DIRS.map((dir) => `rm -f ${dir}/*`).join(" && "),
];

const httpError =
  (url: string) =>
  (e: unknown): SystemError =>
    new SystemError({
      code: ErrorCode.HTTP_FAILED,
      message: `Solr request to ${url} failed: ${e instanceof Error ? e.message : String(e)}`,
      ...causeProps(e),
    });

export interface SolrOptions {
  readonly solrUrl: string;
  readonly appContainer: ContainerName;
  readonly composeDir: AbsolutePath;
}

export const SearchIndexLive = (
  options: SolrOptions
): Layer.Layer<SearchIndex, never, HttpClient.HttpClient | CommandRunner> =>
  Layer.effect(
    SearchIndex,
    Effect.gen(function* () {
      const client = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk);
      const runner = yield* CommandRunner;

      const ping: Effect.Effect<void, SystemError> = Effect.gen(function* () {
        const url = `${options.solrUrl}/admin/ping?wt=json`;
        const body = yield* pipe(
          client.get(url),
          Effect.flatMap((response) => response.json),
          Effect.scoped,
          Effect.mapError(httpError(url))
        );
        yield* decodeToEffect(PingResponse, body, url);
      });

      const deleteDocuments: Effect.Effect<void, SystemError> = Effect.gen(function* () {
        const url = `${options.solrUrl}/update?commit=true`;
        const request = yield* pipe(
          HttpClientRequest.post(url),
          HttpClientRequest.bodyJson({ delete: { query: "*:*" } }),
          Effect.mapError(httpError(url))
        );
        const body = yield* pipe(
          client.execute(request),
          Effect.flatMap((response) => response.json),
          Effect.scoped,
          Effect.mapError(httpError(url))
        );
        yield* decodeToEffect(UpdateResponse, body, url);
      });

      const clearIndexerState: Effect.Effect<void, SystemError | GeneralError> = Effect.asVoid(
        runner.execSuccess(clearStateCommand(options.appContainer), { cwd: options.composeDir })
      );

      const trigger = (
        mode: ReindexMode
      ): Effect.Effect<ReindexReport, SystemError | GeneralError> =>
        Effect.gen(function* () {
          yield* ping;
          yield* Effect.logDebug(`Solr at ${options.solrUrl} is up`);

          const steps: readonly ReindexStep[] = yield* pipe(
            Match.value(mode),
            Match.when("soft", (): Effect.Effect<readonly ReindexStep[], SystemError> =>
              Effect.succeed(["ping"])
            ),
            Match.when("full-rebuild", (): Effect.Effect<readonly ReindexStep[], SystemError> =>
              pipe(
                Effect.logInfo("Deleting all documents from the search index"),
                Effect.zipRight(deleteDocuments),
                Effect.as<readonly ReindexStep[]>(["ping", "delete-documents"])
              )
            ),
            Match.exhaustive
          );

          yield* clearIndexerState;
          return { mode, steps: [...steps, "clear-indexer-state"] };
        });

      return { trigger };
    })
  );
