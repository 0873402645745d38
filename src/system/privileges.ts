// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, pipe } from "effect";
import { ErrorCode, GeneralError } from "../lib/errors";

/**
 * Check if current process is running as root.
 */
export const isRoot = (): boolean => process.getuid?.() === 0;

/**
 * Require root privileges; `action` names what needs them in the message.
 */
export const requireRoot = (action: string): Effect.Effect<void, GeneralError> =>
  pipe(
    Effect.sync(isRoot),
    Effect.filterOrFail(
      (root): root is true => root === true,
      () =>
        new GeneralError({
          code: ErrorCode.ROOT_REQUIRED,
          message: `${action} must run as root (it replaces the compose directory link). Run with sudo.`,
        })
    ),
    Effect.asVoid
  );
