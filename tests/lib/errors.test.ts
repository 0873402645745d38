// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import {
  ErrorCode,
  GeneralError,
  errorMessage,
  toExitCode,
} from "../../src/lib/errors";

describe("errors", () => {
  test("toExitCode passes codes through", () => {
    expect(toExitCode(ErrorCode.INVALID_ARGS)).toBe(2);
    expect(toExitCode(ErrorCode.BACKUP_NOT_FOUND)).toBe(50);
    expect(toExitCode(ErrorCode.RELEASE_NOT_FOUND)).toBe(73);
  });

  test("error codes are distinct", () => {
    const values = Object.values(ErrorCode);
    expect(new Set(values).size).toBe(values.length);
  });

  test("errorMessage reads errors and strings", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });

  test("tagged errors carry code and message", () => {
    const error = new GeneralError({ code: ErrorCode.ROOT_REQUIRED, message: "need root" });
    expect(error._tag).toBe("GeneralError");
    expect(error.code).toBe(3);
    expect(error.message).toBe("need root");
  });
});
