// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { resp, type ProtocolValue } from "@resp-pubsub/protocol";
import { describe, expect, it } from "vitest";
import {
  fromResponse,
  ResponseError,
  tryFromResponse,
} from "../src/index.js";

function mappingError(value: ProtocolValue): ResponseError {
  const result = tryFromResponse(value);
  if (result.ok) {
    throw new Error(`Expected a mapping failure, got ${result.event.type}`);
  }
  return result.error;
}

describe("fromResponse", () => {
  describe("Subscription confirmations", () => {
    it("maps subscribe", () => {
      expect(
        fromResponse(
          resp.array(resp.bulk("subscribe"), resp.bulk("news"), resp.integer(1)),
        ),
      ).toEqual({ type: "subscribed", channel: "news", count: 1 });
    });

    it("maps unsubscribe", () => {
      expect(
        fromResponse(
          resp.array(resp.bulk("unsubscribe"), resp.bulk("news"), resp.integer(0)),
        ),
      ).toEqual({ type: "unsubscribed", channel: "news", count: 0 });
    });

    it("maps psubscribe", () => {
      expect(
        fromResponse(
          resp.array(resp.bulk("psubscribe"), resp.bulk("a.*"), resp.integer(2)),
        ),
      ).toEqual({ type: "pattern-subscribed", pattern: "a.*", count: 2 });
    });

    it("maps punsubscribe", () => {
      expect(
        fromResponse(
          resp.array(resp.bulk("punsubscribe"), resp.bulk("a.*"), resp.integer(1)),
        ),
      ).toEqual({ type: "pattern-unsubscribed", pattern: "a.*", count: 1 });
    });
  });

  describe("Messages", () => {
    it("maps message", () => {
      expect(
        fromResponse(
          resp.array(resp.bulk("message"), resp.bulk("news"), resp.bulk("hi")),
        ),
      ).toEqual({ type: "published", channel: "news", payload: "hi" });
    });

    it("maps pmessage", () => {
      expect(
        fromResponse(
          resp.array(
            resp.bulk("pmessage"),
            resp.bulk("news.*"),
            resp.bulk("news.eu"),
            resp.bulk("hi"),
          ),
        ),
      ).toEqual({
        type: "pattern-published",
        pattern: "news.*",
        channel: "news.eu",
        payload: "hi",
      });
    });

    it("keeps an empty payload", () => {
      expect(
        fromResponse(
          resp.array(resp.bulk("message"), resp.bulk("news"), resp.bulk("")),
        ),
      ).toEqual({ type: "published", channel: "news", payload: "" });
    });
  });

  describe("Textual forms", () => {
    it("accepts simple strings and any letter case for the kind", () => {
      expect(
        fromResponse(
          resp.array(resp.simple("SUBSCRIBE"), resp.simple("news"), resp.integer(3)),
        ),
      ).toEqual({ type: "subscribed", channel: "news", count: 3 });
    });
  });

  describe("Rejections", () => {
    it("rejects a non-array value", () => {
      const error = mappingError(resp.bulk("message"));
      expect(error.reason).toBe("MALFORMED_RESPONSE");
      expect(error.message).toBe("Expected an array response, got bulk");
    });

    it("rejects an empty array", () => {
      const error = mappingError(resp.array());
      expect(error.reason).toBe("MALFORMED_RESPONSE");
      expect(error.message).toBe("Expected text as the response kind, got nothing");
    });

    it("rejects a non-textual first element", () => {
      const error = mappingError(resp.array(resp.integer(1), resp.bulk("news")));
      expect(error.reason).toBe("MALFORMED_RESPONSE");
      expect(error.message).toBe("Expected text as the response kind, got integer");
    });

    it("rejects an unknown kind", () => {
      const error = mappingError(resp.array(resp.bulk("pong"), resp.bulk("")));
      expect(error.reason).toBe("UNKNOWN_TYPE");
      expect(error.message).toBe('Unknown response kind "pong"');
    });

    it("rejects a null channel", () => {
      const error = mappingError(
        resp.array(resp.bulk("unsubscribe"), resp.null(), resp.integer(0)),
      );
      expect(error.reason).toBe("INVALID_CHANNEL");
      expect(error.message).toBe(
        'Expected text for the channel of a "unsubscribe" response, got null',
      );
    });

    it("rejects a non-textual pattern", () => {
      const error = mappingError(
        resp.array(resp.bulk("psubscribe"), resp.array(), resp.integer(1)),
      );
      expect(error.reason).toBe("INVALID_PATTERN");
    });

    it("rejects a textual count", () => {
      const error = mappingError(
        resp.array(resp.bulk("subscribe"), resp.bulk("news"), resp.bulk("1")),
      );
      expect(error.reason).toBe("INVALID_COUNT");
      expect(error.message).toBe(
        'Expected an integer for the count of a "subscribe" response, got bulk',
      );
    });

    it("rejects a count beyond the safe integer range", () => {
      const error = mappingError(
        resp.array(
          resp.bulk("subscribe"),
          resp.bulk("news"),
          resp.integer(9007199254740992n),
        ),
      );
      expect(error.reason).toBe("INVALID_COUNT");
    });

    it("rejects a missing payload", () => {
      const error = mappingError(
        resp.array(resp.bulk("pmessage"), resp.bulk("a.*"), resp.bulk("a.b")),
      );
      expect(error.reason).toBe("INVALID_PAYLOAD");
      expect(error.message).toBe(
        'Expected text for the payload of a "pmessage" response, got nothing',
      );
    });

    it("throws ResponseError from the throwing form", () => {
      expect(() => fromResponse(resp.integer(1))).toThrow(ResponseError);
    });
  });
});

describe("tryFromResponse", () => {
  it("wraps a mapped event", () => {
    expect(
      tryFromResponse(
        resp.array(resp.bulk("message"), resp.bulk("news"), resp.bulk("hi")),
      ),
    ).toEqual({
      ok: true,
      event: { type: "published", channel: "news", payload: "hi" },
    });
  });

  it("carries the error code on failure", () => {
    expect(mappingError(resp.null())).toMatchObject({
      code: "RESPONSE_ERROR",
      reason: "MALFORMED_RESPONSE",
      retryable: false,
    });
  });
});
