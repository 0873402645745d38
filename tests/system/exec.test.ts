// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors";
import { exec, execSuccess } from "../../src/system/exec";
import { failureOf, runTest, runTestExit } from "../helpers/layers";

describe("exec", () => {
  test("rejects an empty command before spawning", async () => {
    const error = failureOf(await runTestExit(exec([])));
    expect(error.code).toBe(ErrorCode.INVALID_ARGS);
    expect(error.message).toBe("Command array cannot be empty");
  });

  test("rejects an empty producer in a pipe", async () => {
    const error = failureOf(await runTestExit(execSuccess(["mysql"], { pipeFrom: [""] })));
    expect(error.code).toBe(ErrorCode.INVALID_ARGS);
  });

  test("connects a producer to the command's stdin", async () => {
    const result = await runTest(execSuccess(["wc", "-c"], { pipeFrom: ["printf", "hello"] }));
    expect(result.stdout.trim()).toBe("5");
  });

  test("feeds stdin", async () => {
    const result = await runTest(execSuccess(["cat"], { stdin: "line\n" }));
    expect(result.stdout).toBe("line\n");
  });

  test("a non-zero exit fails with the command line", async () => {
    const error = failureOf(await runTestExit(execSuccess(["sh", "-c", "exit 3"])));
    expect(error.code).toBe(ErrorCode.EXEC_FAILED);
    expect(error.message).toBe("Command failed with exit code 3: sh -c exit 3");
  });

  test("kills a command that outlives its timeout", async () => {
    const started = Date.now();
    const error = failureOf(await runTestExit(exec(["sleep", "5"], { timeout: "200 millis" })));

    expect(error.code).toBe(ErrorCode.EXEC_TIMEOUT);
    expect(error.message.endsWith(": sleep 5")).toBe(true);
    expect(Date.now() - started).toBeLessThan(3000);
  });
});
