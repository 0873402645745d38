// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Context, Effect, Layer, Redacted } from "effect";
import type { GeneralError, SystemError } from "../lib/errors";
import type { AbsolutePath, ContainerName } from "../lib/types";
import { CommandRunner } from "../system/services/executor";

/** Path of the reset script inside the application image. */
export const PASSWORD_RESET_SCRIPT = "/archivesspace/scripts/password-reset.sh";

export interface AdminService {
  /** Sets the `admin` user's password; a restored database carries the source's. */
  readonly resetPassword: (password: Redacted.Redacted) => Effect.Effect<void, SystemError | GeneralError>;
}

export interface Admin {
  readonly _tag: "Admin";
}

export const Admin: Context.Tag<Admin, AdminService> = Context.GenericTag<Admin, AdminService>(
  "aspace-ops/Admin"
);

/** Variable carrying the new password into the container. */
const PASSWORD_VAR = "ADMIN_PASSWORD";

/**
 * `docker exec` argv for the reset. The password travels in the environment
 * (`-e NAME` copies it from ours), so the host-side command line never holds
 * it; the script inside the container still receives it as an argument.
 */
export const resetCommand = (container: ContainerName): readonly string[] => [
  "docker",
  "exec",
  "-e",
  PASSWORD_VAR,
  container,
  "sh",
  "-c",
  `exec "$0" admin "$${PASSWORD_VAR}"`,
  PASSWORD_RESET_SCRIPT,
];

export const AdminLive = (options: {
  readonly appContainer: ContainerName;
  readonly composeDir: AbsolutePath;
}): Layer.Layer<Admin, never, CommandRunner> =>
  Layer.effect(
    Admin,
    Effect.map(CommandRunner, (runner) => ({
      resetPassword: (password: Redacted.Redacted): Effect.Effect<void, SystemError | GeneralError> =>
        Effect.asVoid(
          runner.execSuccess(resetCommand(options.appContainer), {
            env: { [PASSWORD_VAR]: Redacted.value(password) },
            cwd: options.composeDir,
          })
        ),
    }))
  );
