// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { SubscriberError } from "./errors.js";
import type { LoggerAdapter } from "./logger.js";

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

/** Server confirmed a channel subscription. */
export interface SubscribedEvent {
  readonly type: "subscribed";
  readonly channel: string;
  /** Subscriptions (channels and patterns) now held by the connection. */
  readonly count: number;
}

export interface UnsubscribedEvent {
  readonly type: "unsubscribed";
  readonly channel: string;
  readonly count: number;
}

export interface PatternSubscribedEvent {
  readonly type: "pattern-subscribed";
  readonly pattern: string;
  readonly count: number;
}

export interface PatternUnsubscribedEvent {
  readonly type: "pattern-unsubscribed";
  readonly pattern: string;
  readonly count: number;
}

/** Message published to a subscribed channel. */
export interface PublishedEvent {
  readonly type: "published";
  readonly channel: string;
  readonly payload: string;
}

/** Message published to a channel matching a subscribed pattern. */
export interface PatternPublishedEvent {
  readonly type: "pattern-published";
  readonly pattern: string;
  readonly channel: string;
  readonly payload: string;
}

/** Events that originate from a server response. */
export type ServerEvent =
  | SubscribedEvent
  | UnsubscribedEvent
  | PatternSubscribedEvent
  | PatternUnsubscribedEvent
  | PublishedEvent
  | PatternPublishedEvent;

/** Connection is up and every registered subscription has been replayed. */
export interface ConnectedEvent {
  readonly type: "connected";
}

/** Connection ended; the session is reconnecting. */
export interface DisconnectedEvent {
  readonly type: "disconnected";
  readonly cause: SubscriberError;
}

/** Received data could not be turned into an event; the stream continues. */
export interface DecodeErrorEvent {
  readonly type: "decode-error";
  readonly cause: SubscriberError;
}

export type DomainEvent =
  | ServerEvent
  | ConnectedEvent
  | DisconnectedEvent
  | DecodeErrorEvent;

export type DomainEventType = DomainEvent["type"];

// ---------------------------------------------------------------------------
// Connection
// ---------------------------------------------------------------------------

export interface ServerAddress {
  readonly host: string;
  readonly port: number;
}

/**
 * One established connection.
 *
 * `incoming` ends when the peer closes and throws on read errors.
 */
export interface SubscriberConnection {
  readonly incoming: AsyncIterable<Uint8Array>;
  /** Resolves once the data is handed to the transport. */
  write(data: string): Promise<void>;
  /** Tear the connection down. Safe to call more than once. */
  close(): void;
}

/**
 * Opens a connection. Must reject with an abort error once `signal` fires.
 */
export type ConnectionFactory = (
  address: ServerAddress,
  options: { signal: AbortSignal },
) => Promise<SubscriberConnection>;

// ---------------------------------------------------------------------------
// Options and status
// ---------------------------------------------------------------------------

export interface RetryOptions {
  /** Retries per connect cycle before it fails (default: 8) */
  maxAttempts?: number;
  /** Cap on the squared backoff delay (default: 64000) */
  maxDelayMs?: number;
  /** Upper bound, exclusive, of the uniform jitter added to each delay (default: 1000) */
  jitterMs?: number;
}

export interface SubscriberOptions {
  /** Server address, `host:port` or `[ipv6]:port` */
  address: string;
  retry?: RetryOptions;
  /** End a connection that stays silent this long. Disabled by default. */
  idleTimeoutMs?: number;
  /** Defaults to console output at warn level and above */
  logger?: LoggerAdapter;
  /** Connection factory; defaults to plain TCP */
  connect?: ConnectionFactory;
}

export interface ResolvedRetryOptions {
  readonly maxAttempts: number;
  readonly maxDelayMs: number;
  readonly jitterMs: number;
}

export interface ResolvedSubscriberOptions {
  readonly address: ServerAddress;
  readonly retry: ResolvedRetryOptions;
  readonly idleTimeoutMs: number | undefined;
  readonly logger: LoggerAdapter;
  readonly connect: ConnectionFactory;
}

export type SubscriberState =
  | "disconnected"
  | "connecting"
  | "resubscribing"
  | "streaming"
  | "closed";

export interface SubscriberStatus {
  readonly state: SubscriberState;
  /** Whether a connection is installed for writes */
  readonly connected: boolean;
  readonly channels: {
    readonly exact: readonly string[];
    readonly patterns: readonly string[];
  };
  /** Most recent connection failure (never auto-cleared) */
  readonly lastError?: {
    readonly code: string;
    readonly message: string;
    readonly at: number;
  };
}

export interface ListenOptions {
  /** Ends the feed when aborted */
  signal?: AbortSignal;
}
