// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Unified error code type for the subscriber
 */
export type SubscriberErrorCode =
  | "CONNECT_FAILED"
  | "CONNECTION_LOST"
  | "WRITE_FAILED"
  | "NOT_SUBSCRIBED"
  | "INVALID_UTF8"
  | "PROTOCOL_ERROR"
  | "RESPONSE_ERROR"
  | "CONFIGURATION_ERROR"
  | "STATE_ERROR";

/**
 * Base error class for the subscriber
 *
 * Every error the session raises or reports in an event extends this class.
 * Check `code` for the condition and `retryable` to decide whether the same
 * operation can succeed later.
 */
export class SubscriberError extends Error {
  /**
   * Error code for programmatic handling
   */
  declare readonly code: SubscriberErrorCode;

  /**
   * Whether this error is transient
   * - true: network/connection issues; the session retries on its own
   * - false: bad input, bad usage or a closed session
   */
  retryable: boolean;

  /**
   * Original error that caused this, if any (socket error, etc.)
   */
  override cause?: unknown;

  /**
   * Channel or pattern the failed operation targeted, if any
   */
  channel?: string | undefined;

  constructor(
    message: string,
    options?: {
      code?: SubscriberErrorCode;
      retryable?: boolean;
      cause?: unknown;
      channel?: string;
    },
  ) {
    super(message);
    this.name = "SubscriberError";
    this.code = options?.code ?? "CONNECTION_LOST";
    this.retryable = options?.retryable ?? false;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    this.channel = options?.channel;
    Object.setPrototypeOf(this, SubscriberError.prototype);
  }
}

/**
 * A connect cycle used up its retries
 */
export class ConnectError extends SubscriberError {
  declare readonly code: "CONNECT_FAILED";

  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, { code: "CONNECT_FAILED", retryable: true, ...options });
    this.name = "ConnectError";
    Object.setPrototypeOf(this, ConnectError.prototype);
  }
}

/**
 * Established connection ended: stream closed, read failed or went idle
 */
export class ConnectionLostError extends SubscriberError {
  declare readonly code: "CONNECTION_LOST";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { code: "CONNECTION_LOST", retryable: true, ...options });
    this.name = "ConnectionLostError";
    Object.setPrototypeOf(this, ConnectionLostError.prototype);
  }
}

/**
 * Command could not be written to the connection
 */
export class WriteError extends SubscriberError {
  declare readonly code: "WRITE_FAILED";

  constructor(
    message: string,
    options?: { cause?: unknown; channel?: string },
  ) {
    super(message, { code: "WRITE_FAILED", retryable: true, ...options });
    this.name = "WriteError";
    Object.setPrototypeOf(this, WriteError.prototype);
  }
}

/**
 * Unsubscribe of a channel or pattern that is not registered
 */
export class NotSubscribedError extends SubscriberError {
  declare readonly code: "NOT_SUBSCRIBED";

  constructor(
    message: string,
    options: { channel: string },
  ) {
    super(message, { code: "NOT_SUBSCRIBED", retryable: false, ...options });
    this.name = "NotSubscribedError";
    Object.setPrototypeOf(this, NotSubscribedError.prototype);
  }
}

/**
 * Received bytes are not valid UTF-8
 */
export class Utf8Error extends SubscriberError {
  declare readonly code: "INVALID_UTF8";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { code: "INVALID_UTF8", retryable: false, ...options });
    this.name = "Utf8Error";
    Object.setPrototypeOf(this, Utf8Error.prototype);
  }
}

/**
 * Received text does not follow the wire grammar
 */
export class ProtocolError extends SubscriberError {
  declare readonly code: "PROTOCOL_ERROR";

  constructor(
    message: string,
    /** Number of buffered characters discarded with the bad value. */
    public readonly discarded: number,
  ) {
    super(message, { code: "PROTOCOL_ERROR", retryable: false });
    this.name = "ProtocolError";
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }
}

/**
 * Why a decoded value is not a pub/sub response
 */
export type ResponseErrorReason =
  | "MALFORMED_RESPONSE"
  | "UNKNOWN_TYPE"
  | "INVALID_CHANNEL"
  | "INVALID_PATTERN"
  | "INVALID_COUNT"
  | "INVALID_PAYLOAD";

/**
 * Decoded value could not be mapped to an event
 */
export class ResponseError extends SubscriberError {
  declare readonly code: "RESPONSE_ERROR";

  constructor(
    message: string,
    public readonly reason: ResponseErrorReason,
  ) {
    super(message, { code: "RESPONSE_ERROR", retryable: false });
    this.name = "ResponseError";
    Object.setPrototypeOf(this, ResponseError.prototype);
  }
}

/**
 * Configuration error (invalid options)
 */
export class ConfigurationError extends SubscriberError {
  declare readonly code: "CONFIGURATION_ERROR";

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message, { code: "CONFIGURATION_ERROR", retryable: false });
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Operation not allowed in the session's current state
 */
export class StateError extends SubscriberError {
  declare readonly code: "STATE_ERROR";

  constructor(message: string) {
    super(message, { code: "STATE_ERROR", retryable: false });
    this.name = "StateError";
    Object.setPrototypeOf(this, StateError.prototype);
  }
}
