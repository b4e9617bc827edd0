// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Channels and patterns the caller wants subscribed.
 *
 * Persists across reconnects and is the only source of truth for replay.
 * Every method runs to completion synchronously, so each mutation is atomic
 * with respect to the read loop and concurrent callers.
 */
export class SubscriptionRegistry {
  private readonly channelSet = new Set<string>();
  private readonly patternSet = new Set<string>();

  /** @returns true if the channel was not registered before */
  addChannel(channel: string): boolean {
    return addNew(this.channelSet, channel);
  }

  /** @returns false if the channel was not registered */
  removeChannel(channel: string): boolean {
    return this.channelSet.delete(channel);
  }

  addPattern(pattern: string): boolean {
    return addNew(this.patternSet, pattern);
  }

  removePattern(pattern: string): boolean {
    return this.patternSet.delete(pattern);
  }

  hasChannel(channel: string): boolean {
    return this.channelSet.has(channel);
  }

  hasPattern(pattern: string): boolean {
    return this.patternSet.has(pattern);
  }

  /** Snapshot; later mutations do not affect it. */
  channels(): string[] {
    return [...this.channelSet];
  }

  /** Snapshot; later mutations do not affect it. */
  patterns(): string[] {
    return [...this.patternSet];
  }

  get size(): number {
    return this.channelSet.size + this.patternSet.size;
  }
}

function addNew(set: Set<string>, name: string): boolean {
  if (set.has(name)) return false;
  set.add(name);
  return true;
}
