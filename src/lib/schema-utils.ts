// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema helpers shared by HTTP response decoding and argument parsing.
 */

import { Effect, Either, ParseResult, Schema } from "effect";
import { ErrorCode, SystemError } from "./errors";

export const formatParseError = (error: ParseResult.ParseError): string =>
  ParseResult.TreeFormatter.formatErrorSync(error);

/**
 * Decode unknown data with a schema, returning Effect.
 * The context names the source (URL, file) in the failure message.
 */
export const decodeToEffect = <A, I = A>(
  schema: Schema.Schema<A, I, never>,
  data: unknown,
  context: string
): Effect.Effect<A, SystemError> =>
  Either.match(Schema.decodeUnknownEither(schema)(data), {
    onLeft: (error): Effect.Effect<A, SystemError> =>
      Effect.fail(
        new SystemError({
          code: ErrorCode.HTTP_FAILED,
          message: `Unexpected response from ${context}:\n${formatParseError(error)}`,
        })
      ),
    onRight: (value): Effect.Effect<A, SystemError> => Effect.succeed(value),
  });
