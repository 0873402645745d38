// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { HttpClient, HttpClientResponse } from "@effect/platform";
import { Effect, Layer } from "effect";
import { describe, expect, test } from "vitest";
import type { ReindexMode } from "../../src/config/field-values";
import { ErrorCode } from "../../src/lib/errors";
import { containerName, path } from "../../src/lib/types";
import { SearchIndex, SearchIndexLive, clearStateCommand } from "../../src/search/service";
import { failureOf, recordingRunner, runTest, runTestExit } from "../helpers/layers";

const SOLR = "http://solr:8983/solr/archivesspace";

interface SeenRequest {
  readonly method: string;
  readonly url: string;
  readonly body: string;
}

/** HttpClient answering from `respond`, recording each request. */
const fakeSolr = (respond: (url: string) => { readonly status: number; readonly body: unknown }) => {
  const requests: SeenRequest[] = [];
  const client = HttpClient.make((request, url) =>
    Effect.sync(() => {
      requests.push({
        method: request.method,
        url: url.toString(),
        body:
          request.body._tag === "Uint8Array" ? new TextDecoder().decode(request.body.body) : "",
      });
      const answer = respond(url.toString());
      return HttpClientResponse.fromWeb(
        request,
        new Response(JSON.stringify(answer.body), {
          status: answer.status,
          headers: { "content-type": "application/json" },
        })
      );
    })
  );
  return { requests, layer: Layer.succeed(HttpClient.HttpClient, client) };
};

const healthy = (url: string) =>
  url.includes("/admin/ping")
    ? { status: 200, body: { status: "OK" } }
    : { status: 200, body: { responseHeader: { status: 0, QTime: 12 } } };

const trigger = (
  solr: ReturnType<typeof fakeSolr>,
  runner: ReturnType<typeof recordingRunner>,
  mode: ReindexMode
) =>
  Effect.flatMap(SearchIndex, (index) => index.trigger(mode)).pipe(
    Effect.provide(
      SearchIndexLive({
        solrUrl: SOLR,
        appContainer: containerName("archivesspace"),
        composeDir: path("/srv/aspace"),
      }).pipe(Layer.provide(Layer.merge(solr.layer, runner.layer)))
    )
  );

describe("clearStateCommand", () => {
  test("removes both indexers' state files", () => {
    expect(clearStateCommand(containerName("archivesspace"))).toEqual([
      "docker",
      "exec",
      "archivesspace",
      "sh",
      "-c",
      "rm -f /archivesspace/data/indexer_state/* && rm -f /archivesspace/data/indexer_pui_state/*",
    ]);
  });
});

describe("SearchIndexLive", () => {
  test("a soft reindex checks Solr and clears indexer state", async () => {
    const solr = fakeSolr(healthy);
    const runner = recordingRunner();

    const report = await runTest(trigger(solr, runner, "soft"));

    expect(report).toEqual({ mode: "soft", steps: ["ping", "clear-indexer-state"] });
    expect(solr.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      `GET ${SOLR}/admin/ping?wt=json`,
    ]);
    expect(runner.calls.map((c) => c.command)).toEqual([
      clearStateCommand(containerName("archivesspace")),
    ]);
    expect(runner.calls[0]?.options).toEqual({ cwd: "/srv/aspace" });
  });

  test("repeating a soft reindex gives the same report and never deletes documents", async () => {
    const solr = fakeSolr(healthy);
    const runner = recordingRunner();

    const first = await runTest(trigger(solr, runner, "soft"));
    const second = await runTest(trigger(solr, runner, "soft"));

    expect(second).toEqual(first);
    expect(solr.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      `GET ${SOLR}/admin/ping?wt=json`,
      `GET ${SOLR}/admin/ping?wt=json`,
    ]);
    expect(solr.requests.some((r) => r.url.includes("/update"))).toBe(false);
    expect(runner.calls.map((c) => c.command)).toEqual([
      clearStateCommand(containerName("archivesspace")),
      clearStateCommand(containerName("archivesspace")),
    ]);
  });

  test("a full rebuild deletes every document before clearing state", async () => {
    const solr = fakeSolr(healthy);
    const runner = recordingRunner();

    const report = await runTest(trigger(solr, runner, "full-rebuild"));

    expect(report.steps).toEqual(["ping", "delete-documents", "clear-indexer-state"]);
    expect(solr.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      `GET ${SOLR}/admin/ping?wt=json`,
      `POST ${SOLR}/update?commit=true`,
    ]);
    expect(JSON.parse(solr.requests[1]?.body ?? "")).toEqual({ delete: { query: "*:*" } });
    expect(runner.calls).toHaveLength(1);
  });

  test("an unreachable Solr fails before any state is touched", async () => {
    const solr = fakeSolr(() => ({ status: 503, body: { error: "unavailable" } }));
    const runner = recordingRunner();

    const exit = await runTestExit(trigger(solr, runner, "full-rebuild"));

    const error = failureOf(exit);
    expect(error.code).toBe(ErrorCode.HTTP_FAILED);
    expect(error.message.startsWith(`Solr request to ${SOLR}/admin/ping?wt=json failed: `)).toBe(
      true
    );
    expect(solr.requests).toHaveLength(1);
    expect(runner.calls).toEqual([]);
  });

  test("an unhealthy ping response fails", async () => {
    const solr = fakeSolr(() => ({ status: 200, body: { status: "DOWN" } }));
    const runner = recordingRunner();

    const exit = await runTestExit(trigger(solr, runner, "soft"));

    const error = failureOf(exit);
    expect(error.code).toBe(ErrorCode.HTTP_FAILED);
    expect(error.message.startsWith(`Unexpected response from ${SOLR}/admin/ping?wt=json:`)).toBe(
      true
    );
    expect(runner.calls).toEqual([]);
  });

  test("a rejected delete query fails the rebuild", async () => {
    const solr = fakeSolr((url) =>
      url.includes("/update")
        ? { status: 200, body: { responseHeader: { status: 1 } } }
        : { status: 200, body: { status: "OK" } }
    );
    const runner = recordingRunner();

    const exit = await runTestExit(trigger(solr, runner, "full-rebuild"));

    expect(failureOf(exit).message.startsWith(`Unexpected response from ${SOLR}/update?commit=true:`)).toBe(
      true
    );
    expect(runner.calls).toEqual([]);
  });
});
