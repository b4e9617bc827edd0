// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  isInlineSafe,
  MalformedUtf8Error,
  renderCommand,
  RespDecoder,
  Utf8ChunkDecoder,
  type Command,
  type CommandType,
} from "@resp-pubsub/protocol";
import { calculateBackoff } from "./backoff.js";
import {
  ConnectError,
  ConnectionLostError,
  NotSubscribedError,
  ProtocolError,
  StateError,
  SubscriberError,
  Utf8Error,
  WriteError,
} from "./errors.js";
import { LOG_CONTEXT, type LoggerAdapter } from "./logger.js";
import { tryFromResponse } from "./message.js";
import { resolveOptions } from "./options.js";
import { SubscriptionRegistry } from "./registry.js";
import {
  AbortError,
  awaitWithAbort,
  linkSignals,
  sleep,
  withTimeout,
} from "./timers.js";
import type {
  DomainEvent,
  ListenOptions,
  ResolvedSubscriberOptions,
  ServerAddress,
  SubscriberConnection,
  SubscriberOptions,
  SubscriberState,
  SubscriberStatus,
} from "./types.js";

/**
 * Long-lived pub/sub session against one server.
 *
 * ## Invariants
 *
 * **Registry first**: a channel counts as subscribed the moment `subscribe()`
 * resolves, whether or not a connection is up. The registry persists across
 * reconnects and is replayed in full (channels, then patterns) on every new
 * connection before `connected` is emitted.
 *
 * **Single writer**: at most one connection is installed for writes. All
 * commands go through one send queue, so command lines never interleave.
 *
 * **Transport errors stay inside**: connect and read failures never reject a
 * caller's promise. They show up as `disconnected` events and in `status()`;
 * the session reconnects on its own, forever, until cancelled.
 *
 * ## Lifecycle
 *
 * `disconnected → connecting → resubscribing → streaming → disconnected`,
 * and `closed` once `close()` is called.
 *
 * @example
 * ```typescript
 * const subscriber = createSubscriber({ address: "127.0.0.1:6379" });
 * await subscriber.subscribe("news");
 * await subscriber.psubscribe("alerts.*");
 *
 * for await (const event of subscriber.listen()) {
 *   if (event.type === "published") console.log(event.channel, event.payload);
 * }
 * ```
 */
export class Subscriber {
  readonly address: ServerAddress;

  private readonly options: ResolvedSubscriberOptions;
  private readonly logger: LoggerAdapter;
  private readonly registry = new SubscriptionRegistry();
  private readonly closeController = new AbortController();

  // Installed writer; null while disconnected
  private connection: SubscriberConnection | null = null;
  // Tail of the send queue; never rejects
  private sendQueue: Promise<void> = Promise.resolve();
  private currentState: SubscriberState = "disconnected";
  private listening = false;
  private lastError: SubscriberStatus["lastError"];

  constructor(options: SubscriberOptions) {
    this.options = resolveOptions(options);
    this.address = this.options.address;
    this.logger = this.options.logger;
  }

  get state(): SubscriberState {
    return this.currentState;
  }

  /**
   * Register a channel and send SUBSCRIBE if connected.
   *
   * @throws {TypeError} if the name cannot be sent as an inline argument
   * @throws {WriteError} if the command could not be written; the channel stays registered
   * @throws {StateError} after `close()`
   */
  async subscribe(channel: string): Promise<void> {
    this.assertUsable("subscribe", channel);
    if (!this.registry.addChannel(channel)) {
      this.logger.debug(
        LOG_CONTEXT.SUBSCRIPTION,
        "Channel already registered",
        { channel },
      );
    }
    await this.send({ type: "subscribe", name: channel });
  }

  /**
   * Forget a channel and send UNSUBSCRIBE if connected.
   *
   * @throws {NotSubscribedError} if the channel is not registered; nothing is sent
   */
  async unsubscribe(channel: string): Promise<void> {
    this.assertUsable("unsubscribe", channel);
    if (!this.registry.removeChannel(channel)) {
      throw new NotSubscribedError(`Not subscribed to channel "${channel}"`, {
        channel,
      });
    }
    await this.send({ type: "unsubscribe", name: channel });
  }

  /**
   * Register a glob pattern and send PSUBSCRIBE if connected.
   */
  async psubscribe(pattern: string): Promise<void> {
    this.assertUsable("psubscribe", pattern);
    if (!this.registry.addPattern(pattern)) {
      this.logger.debug(
        LOG_CONTEXT.SUBSCRIPTION,
        "Pattern already registered",
        { pattern },
      );
    }
    await this.send({ type: "psubscribe", name: pattern });
  }

  /**
   * Forget a glob pattern and send PUNSUBSCRIBE if connected.
   *
   * @throws {NotSubscribedError} if the pattern is not registered; nothing is sent
   */
  async punsubscribe(pattern: string): Promise<void> {
    this.assertUsable("punsubscribe", pattern);
    if (!this.registry.removePattern(pattern)) {
      throw new NotSubscribedError(`Not subscribed to pattern "${pattern}"`, {
        channel: pattern,
      });
    }
    await this.send({ type: "punsubscribe", name: pattern });
  }

  isSubscribed(channel: string): boolean {
    return this.registry.hasChannel(channel);
  }

  isPatternSubscribed(pattern: string): boolean {
    return this.registry.hasPattern(pattern);
  }

  status(): SubscriberStatus {
    return {
      state: this.currentState,
      connected: this.connection !== null,
      channels: {
        exact: this.registry.channels(),
        patterns: this.registry.patterns(),
      },
      ...(this.lastError ? { lastError: this.lastError } : {}),
    };
  }

  /**
   * Event feed for the session: connects lazily on the first pull, then
   * reconnects until cancelled. Only one feed may be active at a time; a
   * second one fails with StateError on its first pull.
   *
   * The feed ends without further events when `signal` aborts, when
   * `close()` is called, or when the consumer stops iterating.
   */
  listen(
    options: ListenOptions = {},
  ): AsyncGenerator<DomainEvent, void, undefined> {
    return this.run(options.signal);
  }

  /**
   * End the session: stop the feed, drop the connection and reject further
   * subscription changes. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.currentState === "closed") return;
    this.currentState = "closed";
    this.closeController.abort();
    this.release();
    this.logger.info(LOG_CONTEXT.CONNECTION, "Subscriber closed");
    await this.sendQueue;
  }

  private async *run(
    external: AbortSignal | undefined,
  ): AsyncGenerator<DomainEvent, void, undefined> {
    if (this.currentState === "closed") {
      return;
    }
    if (this.listening) {
      throw new StateError(
        "Another listener is already active on this subscriber",
      );
    }

    this.listening = true;
    const link = linkSignals(this.closeController.signal, external);
    const signal = link.signal;

    try {
      while (!signal.aborted) {
        this.setState("connecting");
        let connection: SubscriberConnection;
        try {
          connection = await this.connectWithRetry(signal);
        } catch (error) {
          if (!(error instanceof ConnectError)) throw error;
          this.recordError(error);
          this.logger.warn(
            LOG_CONTEXT.CONNECTION,
            "Connect cycle failed; starting over",
            { attempts: error.attempts, cause: error.cause },
          );
          continue;
        }

        this.setState("resubscribing");
        this.connection = connection;
        try {
          await this.replay(signal);
        } catch (error) {
          if (!(error instanceof WriteError)) throw error;
          this.release();
          this.recordError(error);
          this.logger.warn(
            LOG_CONTEXT.SUBSCRIPTION,
            "Replay failed; reconnecting",
            { channel: error.channel, cause: error.cause },
          );
          continue;
        }

        this.setState("streaming");
        yield { type: "connected" };

        const cause = yield* this.stream(connection, signal);
        this.release();
        this.setState("disconnected");
        this.recordError(cause);
        this.logger.warn(LOG_CONTEXT.CONNECTION, "Disconnected", {
          message: cause.message,
          cause: cause.cause,
        });
        yield { type: "disconnected", cause };
      }
    } catch (error) {
      if (!signal.aborted) throw error;
      this.logger.debug(LOG_CONTEXT.STREAM, "Listener cancelled");
    } finally {
      link.dispose();
      this.release();
      this.listening = false;
      this.setState("disconnected");
    }
  }

  /**
   * One connect cycle: the first try plus up to `retry.maxAttempts` retries,
   * sleeping `min(attempt², cap) + jitter` before each retry.
   *
   * @throws {ConnectError} once the retries are used up
   * @throws {AbortError} if cancelled
   */
  private async connectWithRetry(
    signal: AbortSignal,
  ): Promise<SubscriberConnection> {
    const { retry } = this.options;
    const { host, port } = this.address;
    let attempt = 0;

    for (;;) {
      try {
        this.logger.debug(LOG_CONTEXT.CONNECTION, "Connecting", {
          host,
          port,
          attempt,
        });
        const connection = await this.options.connect(this.address, {
          signal,
        });
        if (signal.aborted) {
          connection.close();
          throw new AbortError();
        }
        this.logger.info(LOG_CONTEXT.CONNECTION, "Connected", { host, port });
        return connection;
      } catch (error) {
        if (signal.aborted) throw error;
        if (attempt >= retry.maxAttempts) {
          throw new ConnectError(
            `Could not connect to ${host}:${port} after ${attempt + 1} attempts`,
            attempt + 1,
            { cause: error },
          );
        }
        attempt++;
        const delay = calculateBackoff(attempt, retry);
        this.logger.warn(
          LOG_CONTEXT.CONNECTION,
          `Connect failed; retrying in ${delay}ms`,
          { attempt, delay, error },
        );
        await sleep(delay, signal);
      }
    }
  }

  private async replay(signal: AbortSignal): Promise<void> {
    const channels = this.registry.channels();
    const patterns = this.registry.patterns();
    this.logger.debug(LOG_CONTEXT.SUBSCRIPTION, "Replaying subscriptions", {
      channels: channels.length,
      patterns: patterns.length,
    });

    // Names removed mid-replay already queued their UNSUBSCRIBE
    for (const name of channels) {
      if (!this.registry.hasChannel(name)) continue;
      await awaitWithAbort(this.send({ type: "subscribe", name }), signal);
    }
    for (const name of patterns) {
      if (!this.registry.hasPattern(name)) continue;
      await awaitWithAbort(this.send({ type: "psubscribe", name }), signal);
    }
  }

  /**
   * Read until the connection ends. Returns why it ended.
   */
  private async *stream(
    connection: SubscriberConnection,
    signal: AbortSignal,
  ): AsyncGenerator<DomainEvent, ConnectionLostError, undefined> {
    const utf8 = new Utf8ChunkDecoder();
    const decoder = new RespDecoder();
    const reader = connection.incoming[Symbol.asyncIterator]();
    const { idleTimeoutMs } = this.options;

    for (;;) {
      let chunk: IteratorResult<Uint8Array>;
      try {
        chunk = await awaitWithAbort(
          withTimeout(
            reader.next(),
            idleTimeoutMs,
            () =>
              new ConnectionLostError(
                `No data received for ${idleTimeoutMs}ms`,
              ),
          ),
          signal,
        );
      } catch (error) {
        if (signal.aborted) throw error;
        return error instanceof ConnectionLostError
          ? error
          : new ConnectionLostError("Read failed", { cause: error });
      }

      if (chunk.done) {
        return new ConnectionLostError("Connection closed by server");
      }
      for (const event of this.decodeChunk(chunk.value, utf8, decoder)) {
        // Events still buffered from this chunk are dropped on cancellation
        if (signal.aborted) throw new AbortError();
        yield event;
      }
    }
  }

  private decodeChunk(
    chunk: Uint8Array,
    utf8: Utf8ChunkDecoder,
    decoder: RespDecoder,
  ): DomainEvent[] {
    let text: string;
    try {
      text = utf8.decode(chunk);
    } catch (error) {
      if (!(error instanceof MalformedUtf8Error)) throw error;
      // The byte stream lost its place; a held partial value cannot complete
      decoder.reset();
      this.logger.warn(LOG_CONTEXT.STREAM, "Discarded chunk", {
        bytes: error.byteLength,
      });
      const cause = new Utf8Error(error.message, { cause: error });
      return [{ type: "decode-error", cause }];
    }

    const result = decoder.feed(text);
    const events: DomainEvent[] = [];

    for (const value of result.values) {
      const mapped = tryFromResponse(value);
      if (mapped.ok) {
        events.push(mapped.event);
      } else {
        this.logger.warn(LOG_CONTEXT.STREAM, "Unrecognized response", {
          reason: mapped.error.reason,
          message: mapped.error.message,
        });
        events.push({ type: "decode-error", cause: mapped.error });
      }
    }

    if (result.failure) {
      const { offset, reason } = result.failure;
      this.logger.warn(LOG_CONTEXT.STREAM, "Discarded malformed input", {
        offset,
        reason,
        discarded: result.remainder.length,
      });
      events.push({
        type: "decode-error",
        cause: new ProtocolError(reason, result.remainder.length),
      });
    }

    return events;
  }

  /**
   * Queue one command behind every earlier one. The writer is looked up when
   * the command's turn comes; with none installed the command is left to the
   * next replay.
   */
  private send(command: Command): Promise<void> {
    const result = this.sendQueue.then(() => this.write(command));
    // Failures reach the caller through `result`; the queue itself moves on
    this.sendQueue = result.catch(() => undefined);
    return result;
  }

  private async write(command: Command): Promise<void> {
    const connection = this.connection;
    if (!connection) {
      this.logger.debug(
        LOG_CONTEXT.SUBSCRIPTION,
        "Not connected; deferred to replay",
        { command: command.type, name: command.name },
      );
      return;
    }

    this.logger.debug(LOG_CONTEXT.SUBSCRIPTION, "Sending", {
      command: command.type,
      name: command.name,
    });
    try {
      await connection.write(renderCommand(command));
    } catch (error) {
      throw new WriteError(
        `Failed to send ${command.type.toUpperCase()} for "${command.name}"`,
        { cause: error, channel: command.name },
      );
    }
  }

  private assertUsable(operation: CommandType, name: string): void {
    if (this.currentState === "closed") {
      throw new StateError(`Cannot ${operation}: subscriber is closed`);
    }
    if (!isInlineSafe(name)) {
      throw new TypeError(
        `Cannot ${operation} ${JSON.stringify(name)}: ` +
          "names must be non-empty, free of whitespace and control " +
          "characters, and must not start with a quote",
      );
    }
  }

  private release(): void {
    const connection = this.connection;
    this.connection = null;
    connection?.close();
  }

  private setState(state: SubscriberState): void {
    // closed is terminal
    if (this.currentState !== "closed") {
      this.currentState = state;
    }
  }

  private recordError(error: SubscriberError): void {
    this.lastError = {
      code: error.code,
      message: error.message,
      at: Date.now(),
    };
  }
}

/**
 * Create a subscriber. Nothing connects until the first pull from `listen()`.
 *
 * @throws {ConfigurationError} if the options are invalid
 */
export function createSubscriber(options: SubscriberOptions): Subscriber {
  return new Subscriber(options);
}
