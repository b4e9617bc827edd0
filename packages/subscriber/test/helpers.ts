// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Test helpers for subscriber tests
 */

import { vi } from "vitest";
import {
  AbortError,
  type ConnectionFactory,
  type DomainEvent,
  type SubscriberConnection,
} from "../src/index.js";

export interface MockConnection extends SubscriberConnection {
  /** Deliver text (as UTF-8) or raw bytes to the reader */
  push(data: string | Uint8Array): void;
  /** Peer closed the connection */
  end(): void;
  /** Fail the next read */
  fail(error: Error): void;
  /** Reject every later write with `error` */
  failWrites(error?: Error): void;
  readonly written: readonly string[];
  readonly closed: boolean;
}

/**
 * Creates an in-memory connection that simulates a socket's read side and
 * records every write.
 */
export function createMockConnection(): MockConnection {
  const queue: Uint8Array[] = [];
  const written: string[] = [];
  let waiting: {
    resolve: (result: IteratorResult<Uint8Array>) => void;
    reject: (error: unknown) => void;
  } | null = null;
  let ended = false;
  let closed = false;
  let readError: Error | undefined;
  let writeError: Error | undefined;

  const settle = () => {
    const reader = waiting;
    if (!reader) return;
    const chunk = queue.shift();
    if (chunk) {
      waiting = null;
      reader.resolve({ done: false, value: chunk });
    } else if (readError) {
      waiting = null;
      reader.reject(readError);
      readError = undefined;
    } else if (ended) {
      waiting = null;
      reader.resolve({ done: true, value: undefined });
    }
  };

  return {
    incoming: {
      [Symbol.asyncIterator]: () => ({
        next: () =>
          new Promise<IteratorResult<Uint8Array>>((resolve, reject) => {
            waiting = { resolve, reject };
            settle();
          }),
      }),
    },

    async write(data) {
      if (closed) throw new Error("Connection is closed");
      if (writeError) throw writeError;
      written.push(data);
    },

    close() {
      closed = true;
      ended = true;
      settle();
    },

    push(data) {
      queue.push(typeof data === "string" ? Buffer.from(data, "utf8") : data);
      settle();
    },

    end() {
      ended = true;
      settle();
    },

    fail(error) {
      readError = error;
      settle();
    },

    failWrites(error = new Error("EPIPE")) {
      writeError = error;
    },

    get written() {
      return written;
    },

    get closed() {
      return closed;
    },
  };
}

type Plan = { type: "fail"; error: Error } | { type: "hang" };

/** Called with each mock connection before the factory hands it out */
export type ConnectHook = (connection: MockConnection, index: number) => void;

/**
 * Connection factory handing out mock connections, with scripted failures.
 */
export function createMockConnector(options: { onConnect?: ConnectHook } = {}) {
  const plans: Plan[] = [];
  const connections: MockConnection[] = [];

  const connect = vi.fn<ConnectionFactory>((_address, { signal }) => {
    const plan = plans.shift();
    if (plan?.type === "fail") {
      return Promise.reject(plan.error);
    }
    if (plan?.type === "hang") {
      return new Promise<SubscriberConnection>((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(new AbortError()), {
          once: true,
        });
      });
    }
    const connection = createMockConnection();
    options.onConnect?.(connection, connections.length);
    connections.push(connection);
    return Promise.resolve(connection);
  });

  return {
    connect,
    connections,

    /** Fail the next `count` connect attempts */
    failNext(count: number, error = new Error("ECONNREFUSED")) {
      for (let i = 0; i < count; i++) plans.push({ type: "fail", error });
    },

    /** Keep the next connect attempt pending until aborted */
    hangNext() {
      plans.push({ type: "hang" });
    },

    connection(index: number): MockConnection {
      const connection = connections[index];
      if (!connection) throw new Error(`No connection #${index}`);
      return connection;
    },
  };
}

/**
 * Pull the next event, failing if the feed ended.
 */
export async function nextEvent(
  feed: AsyncIterator<DomainEvent>,
): Promise<DomainEvent> {
  const result = await feed.next();
  if (result.done) {
    throw new Error("Event feed ended unexpectedly");
  }
  return result.value;
}
