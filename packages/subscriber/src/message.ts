// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Maps decoded protocol values to server events.
 *
 * Pub/sub responses are arrays whose first element names the kind:
 *
 * - `subscribe | unsubscribe` channel, count
 * - `psubscribe | punsubscribe` pattern, count
 * - `message` channel, payload
 * - `pmessage` pattern, channel, payload
 */

import {
  textOf,
  type ProtocolValue,
  type ProtocolValueKind,
} from "@resp-pubsub/protocol";
import { ResponseError, type ResponseErrorReason } from "./errors.js";
import type { ServerEvent } from "./types.js";

export type MapResult =
  | { readonly ok: true; readonly event: ServerEvent }
  | { readonly ok: false; readonly error: ResponseError };

/**
 * Map one decoded value to its event.
 *
 * @throws {ResponseError} if the value is not a pub/sub response
 *
 * @example
 * ```typescript
 * fromResponse(resp.array(resp.bulk("message"), resp.bulk("news"), resp.bulk("hi")));
 * // { type: "published", channel: "news", payload: "hi" }
 * ```
 */
export function fromResponse(value: ProtocolValue): ServerEvent {
  if (value.kind !== "array") {
    throw new ResponseError(
      `Expected an array response, got ${value.kind}`,
      "MALFORMED_RESPONSE",
    );
  }

  const [head, ...fields] = value.items;
  const kind = textOf(head);
  if (kind === undefined) {
    throw new ResponseError(
      `Expected text as the response kind, got ${describe(head)}`,
      "MALFORMED_RESPONSE",
    );
  }

  const read = new FieldReader(kind.toLowerCase(), fields);
  switch (read.kind) {
    case "subscribe":
      return {
        type: "subscribed",
        channel: read.text(0, "channel", "INVALID_CHANNEL"),
        count: read.count(1),
      };
    case "unsubscribe":
      return {
        type: "unsubscribed",
        channel: read.text(0, "channel", "INVALID_CHANNEL"),
        count: read.count(1),
      };
    case "psubscribe":
      return {
        type: "pattern-subscribed",
        pattern: read.text(0, "pattern", "INVALID_PATTERN"),
        count: read.count(1),
      };
    case "punsubscribe":
      return {
        type: "pattern-unsubscribed",
        pattern: read.text(0, "pattern", "INVALID_PATTERN"),
        count: read.count(1),
      };
    case "message":
      return {
        type: "published",
        channel: read.text(0, "channel", "INVALID_CHANNEL"),
        payload: read.text(1, "payload", "INVALID_PAYLOAD"),
      };
    case "pmessage":
      return {
        type: "pattern-published",
        pattern: read.text(0, "pattern", "INVALID_PATTERN"),
        channel: read.text(1, "channel", "INVALID_CHANNEL"),
        payload: read.text(2, "payload", "INVALID_PAYLOAD"),
      };
    default:
      throw new ResponseError(
        `Unknown response kind "${kind}"`,
        "UNKNOWN_TYPE",
      );
  }
}

/**
 * Non-throwing form of {@link fromResponse}, for the read loop.
 */
export function tryFromResponse(value: ProtocolValue): MapResult {
  try {
    return { ok: true, event: fromResponse(value) };
  } catch (error) {
    if (error instanceof ResponseError) {
      return { ok: false, error };
    }
    throw error;
  }
}

class FieldReader {
  constructor(
    readonly kind: string,
    private readonly fields: readonly ProtocolValue[],
  ) {}

  text(index: number, label: string, reason: ResponseErrorReason): string {
    const value = this.fields[index];
    const text = textOf(value);
    if (text === undefined) {
      throw this.invalid(label, "text", value, reason);
    }
    return text;
  }

  count(index: number): number {
    const value = this.fields[index];
    if (
      value?.kind !== "integer" ||
      value.value < BigInt(Number.MIN_SAFE_INTEGER) ||
      value.value > BigInt(Number.MAX_SAFE_INTEGER)
    ) {
      throw this.invalid("count", "an integer", value, "INVALID_COUNT");
    }
    return Number(value.value);
  }

  private invalid(
    label: string,
    expected: string,
    value: ProtocolValue | undefined,
    reason: ResponseErrorReason,
  ): ResponseError {
    return new ResponseError(
      `Expected ${expected} for the ${label} of a "${this.kind}" response, got ${describe(value)}`,
      reason,
    );
  }
}

function describe(
  value: ProtocolValue | undefined,
): ProtocolValueKind | "nothing" {
  return value?.kind ?? "nothing";
}
