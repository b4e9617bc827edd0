// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @resp-pubsub/subscriber - Reconnecting pub/sub subscriber
 *
 * Keeps one subscription session against a server across disconnects:
 * - Registry of desired channels and patterns, replayed on every reconnect
 * - Squared backoff with jitter between connect attempts
 * - One ordered async feed of typed events
 * - Cancellation through AbortSignal, `close()` or leaving the loop
 */

export { Subscriber, createSubscriber } from "./subscriber.js";
export { SubscriptionRegistry } from "./registry.js";
export { fromResponse, tryFromResponse } from "./message.js";
export type { MapResult } from "./message.js";
export { calculateBackoff } from "./backoff.js";
export { connectTcp } from "./connection.js";
export { DEFAULT_RETRY, parseAddress, resolveOptions } from "./options.js";
export { createLogger, LOG_CONTEXT } from "./logger.js";
export type { LoggerAdapter, LoggerOptions, LogLevel } from "./logger.js";
export { AbortError } from "./timers.js";
export {
  isConnected,
  isDecodeError,
  isDisconnected,
  isMessage,
  isPatternPublished,
  isPatternSubscribed,
  isPatternUnsubscribed,
  isPublished,
  isServerEvent,
  isSubscribed,
  isUnsubscribed,
} from "./events.js";
export {
  ConfigurationError,
  ConnectError,
  ConnectionLostError,
  NotSubscribedError,
  ProtocolError,
  ResponseError,
  StateError,
  SubscriberError,
  Utf8Error,
  WriteError,
} from "./errors.js";
export type { ResponseErrorReason, SubscriberErrorCode } from "./errors.js";
export type {
  ConnectedEvent,
  ConnectionFactory,
  DecodeErrorEvent,
  DisconnectedEvent,
  DomainEvent,
  DomainEventType,
  ListenOptions,
  PatternPublishedEvent,
  PatternSubscribedEvent,
  PatternUnsubscribedEvent,
  PublishedEvent,
  ResolvedRetryOptions,
  ResolvedSubscriberOptions,
  RetryOptions,
  ServerAddress,
  ServerEvent,
  SubscribedEvent,
  SubscriberConnection,
  SubscriberOptions,
  SubscriberState,
  SubscriberStatus,
  UnsubscribedEvent,
} from "./types.js";
