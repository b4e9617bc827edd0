// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type {
  ConnectedEvent,
  DecodeErrorEvent,
  DisconnectedEvent,
  DomainEvent,
  PatternPublishedEvent,
  PatternSubscribedEvent,
  PatternUnsubscribedEvent,
  PublishedEvent,
  ServerEvent,
  SubscribedEvent,
  UnsubscribedEvent,
} from "./types.js";

export function isSubscribed(event: DomainEvent): event is SubscribedEvent {
  return event.type === "subscribed";
}

export function isUnsubscribed(event: DomainEvent): event is UnsubscribedEvent {
  return event.type === "unsubscribed";
}

export function isPatternSubscribed(
  event: DomainEvent,
): event is PatternSubscribedEvent {
  return event.type === "pattern-subscribed";
}

export function isPatternUnsubscribed(
  event: DomainEvent,
): event is PatternUnsubscribedEvent {
  return event.type === "pattern-unsubscribed";
}

export function isPublished(event: DomainEvent): event is PublishedEvent {
  return event.type === "published";
}

export function isPatternPublished(
  event: DomainEvent,
): event is PatternPublishedEvent {
  return event.type === "pattern-published";
}

export function isConnected(event: DomainEvent): event is ConnectedEvent {
  return event.type === "connected";
}

export function isDisconnected(event: DomainEvent): event is DisconnectedEvent {
  return event.type === "disconnected";
}

export function isDecodeError(event: DomainEvent): event is DecodeErrorEvent {
  return event.type === "decode-error";
}

/**
 * Published payload on either a channel or a pattern match.
 */
export function isMessage(
  event: DomainEvent,
): event is PublishedEvent | PatternPublishedEvent {
  return event.type === "published" || event.type === "pattern-published";
}

/**
 * Whether the event came from a server response rather than the session.
 */
export function isServerEvent(event: DomainEvent): event is ServerEvent {
  return !isConnected(event) && !isDisconnected(event) && !isDecodeError(event);
}
