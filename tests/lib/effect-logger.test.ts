// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Cause, Effect, HashMap, LogLevel } from "effect";
import { describe, expect, test } from "vitest";
import { formatJson, formatPretty } from "../../src/lib/effect-logger";
import { createStepCounter, inStep, logFail, logSuccess } from "../../src/lib/log";
import { type CapturedLog, captureLogs } from "../helpers/layers";

const none: HashMap.HashMap<string, unknown> = HashMap.empty();

describe("formatPretty", () => {
  test("plain lines carry the padded level", () => {
    expect(formatPretty(LogLevel.Info, "hello", none, Cause.empty, false)).toBe("INFO  hello");
    expect(formatPretty(LogLevel.Warning, "careful", none, Cause.empty, false)).toBe(
      "WARN  careful"
    );
  });

  test("step annotation prefixes the message", () => {
    const annotations = HashMap.make(["step", "restore"]);
    expect(formatPretty(LogLevel.Debug, "piping", annotations, Cause.empty, false)).toBe(
      "DEBUG [restore] piping"
    );
  });

  test("styled lines", () => {
    const stepped = HashMap.make(["logStyle", "step"], ["stepNumber", "2"], ["stepTotal", "4"]);
    expect(formatPretty(LogLevel.Info, "Restoring", stepped, Cause.empty, false)).toBe(
      "[2/4] → Restoring"
    );
    expect(
      formatPretty(LogLevel.Info, "Done", HashMap.make(["logStyle", "success"]), Cause.empty, false)
    ).toBe("✓ Done");
    expect(
      formatPretty(LogLevel.Info, "Broke", HashMap.make(["logStyle", "fail"]), Cause.empty, false)
    ).toBe("✗ Broke");
  });

  test("colour wraps the level", () => {
    expect(formatPretty(LogLevel.Error, "x", none, Cause.empty, true)).toBe(
      "\x1b[31mERROR\x1b[0m x"
    );
  });
});

describe("formatJson", () => {
  test("drops formatting annotations and keeps the rest", () => {
    const annotations = HashMap.make(["logStyle", "success"], ["step", "reindex"]);
    const line = formatJson(LogLevel.Info, "ok", annotations, new Date("2024-03-01T00:00:00Z"));
    expect(JSON.parse(line)).toEqual({
      timestamp: "2024-03-01T00:00:00.000Z",
      level: "info",
      message: "ok",
      step: "reindex",
    });
  });
});

describe("styled log helpers", () => {
  test("step counter numbers its lines", async () => {
    const logs: CapturedLog[] = [];
    await Effect.runPromise(
      Effect.gen(function* () {
        const steps = yield* createStepCounter(2);
        yield* steps.next("first");
        yield* steps.next("second");
        yield* logSuccess("finished");
        yield* logFail("nope");
        return yield* steps.current;
      }).pipe(Effect.provide(captureLogs(logs)))
    );

    expect(logs.map((l) => l.message)).toEqual(["first", "second", "finished", "nope"]);
    expect(logs.map((l) => l.style._tag === "Some" && l.style.value)).toEqual([
      "step",
      "step",
      "success",
      "fail",
    ]);
  });

  test("inStep annotates nested lines", async () => {
    const logs: CapturedLog[] = [];
    await Effect.runPromise(
      Effect.logInfo("inside").pipe(inStep("restore"), Effect.provide(captureLogs(logs)))
    );
    expect(logs).toHaveLength(1);
    expect(logs[0]?.message).toBe("inside");
  });
});
