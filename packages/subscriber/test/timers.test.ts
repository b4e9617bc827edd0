// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  AbortError,
  awaitWithAbort,
  linkSignals,
  sleep,
  withTimeout,
} from "../src/timers.js";

describe("sleep", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after the delay", async () => {
    const done = vi.fn();
    const pending = sleep(1_000, new AbortController().signal).then(done);

    await vi.advanceTimersByTimeAsync(999);
    expect(done).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it("rejects as soon as the signal aborts", async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AbortError);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("rejects at once for an aborted signal", async () => {
    await expect(sleep(10, AbortSignal.abort())).rejects.toBeInstanceOf(
      AbortError,
    );
  });
});

describe("withTimeout", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("rejects with the timeout error when the promise is too slow", async () => {
    const pending = withTimeout(new Promise(() => undefined), 50, () =>
      new Error("too slow"),
    );
    const assertion = expect(pending).rejects.toThrow("too slow");

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it("passes the result through and clears its timer", async () => {
    await expect(
      withTimeout(Promise.resolve("ok"), 50, () => new Error("too slow")),
    ).resolves.toBe("ok");
    expect(vi.getTimerCount()).toBe(0);
  });

  it("waits forever without a timeout", () => {
    const promise = Promise.resolve(1);
    expect(withTimeout(promise, undefined, () => new Error("x"))).toBe(promise);
  });
});

describe("awaitWithAbort", () => {
  it("passes the result through", async () => {
    await expect(
      awaitWithAbort(Promise.resolve(7), new AbortController().signal),
    ).resolves.toBe(7);
  });

  it("rejects when the signal aborts first", async () => {
    const controller = new AbortController();
    const pending = awaitWithAbort(new Promise(() => undefined), controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AbortError);
  });

  it("passes rejections through", async () => {
    const failure = new Error("boom");
    await expect(
      awaitWithAbort(Promise.reject(failure), new AbortController().signal),
    ).rejects.toBe(failure);
  });
});

describe("linkSignals", () => {
  it("aborts when any source aborts, with its reason", () => {
    const a = new AbortController();
    const b = new AbortController();
    const link = linkSignals(a.signal, undefined, b.signal);

    b.abort("shutdown");

    expect(link.signal.aborted).toBe(true);
    expect(link.signal.reason).toBe("shutdown");
  });

  it("starts aborted when a source already is", () => {
    const link = linkSignals(undefined, AbortSignal.abort("early"));
    expect(link.signal.aborted).toBe(true);
    expect(link.signal.reason).toBe("early");
  });

  it("detaches from the sources on dispose", () => {
    const a = new AbortController();
    const link = linkSignals(a.signal);

    link.dispose();
    a.abort();

    expect(link.signal.aborted).toBe(false);
  });
});
