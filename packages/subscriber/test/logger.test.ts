// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, LOG_CONTEXT } from "../src/index.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("forwards to the custom log function", () => {
    const log = vi.fn();
    const logger = createLogger({ log });

    logger.debug(LOG_CONTEXT.CONNECTION, "Connecting", { attempt: 0 });
    logger.error(LOG_CONTEXT.STREAM, "Boom");

    expect(log.mock.calls).toEqual([
      ["debug", "connection", "Connecting", { attempt: 0 }],
      ["error", "stream", "Boom", undefined],
    ]);
  });

  it("drops messages below minLevel", () => {
    const log = vi.fn();
    const logger = createLogger({ log, minLevel: "warn" });

    logger.debug("stream", "a");
    logger.info("stream", "b");
    logger.warn("stream", "c");
    logger.error("stream", "d");

    expect(log.mock.calls.map((call) => call[0])).toEqual(["warn", "error"]);
  });

  it("writes to the console when no log function is given", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createLogger();

    logger.warn(LOG_CONTEXT.SUBSCRIPTION, "Replay failed", { channel: "news" });

    expect(warn).toHaveBeenCalledWith("[subscription] Replay failed", {
      channel: "news",
    });
  });

  it("does not also write to the console when a log function is given", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger({ log: vi.fn() });

    logger.error("connection", "Down");

    expect(error).not.toHaveBeenCalled();
  });
});
