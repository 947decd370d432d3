/**
 * Held-message store
 * Keeps every message per recipient until it is acknowledged
 */

import { randomUUID } from 'crypto';

export interface HeldMessage {
  id: string;
  target: string;
  body: Record<string, unknown>;
  enqueuedAt: number;
  deliveredAt: number | null;
  deliveryCount: number;
}

export interface MessageStoreOptions {
  /** A delivered but unacknowledged message becomes due again after this */
  redeliveryTimeoutMs: number;
  maxHeldPerAgent: number;
  now?: () => number;
}

export class InboxFullError extends Error {
  constructor(readonly target: string, readonly limit: number) {
    super(`Inbox for ${target} is full (${limit} held messages)`);
    this.name = 'InboxFullError';
  }
}

export class MessageStore {
  private readonly inboxes = new Map<string, HeldMessage[]>();
  private readonly options: MessageStoreOptions;
  private readonly now: () => number;

  constructor(options: MessageStoreOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  push(target: string, body: Record<string, unknown>): HeldMessage {
    const inbox = this.inboxes.get(target) ?? [];
    if (
      this.options.maxHeldPerAgent > 0 &&
      inbox.length >= this.options.maxHeldPerAgent
    ) {
      throw new InboxFullError(target, this.options.maxHeldPerAgent);
    }

    const message: HeldMessage = {
      id: randomUUID(),
      target,
      body,
      enqueuedAt: this.now(),
      deliveredAt: null,
      deliveryCount: 0,
    };
    inbox.push(message);
    this.inboxes.set(target, inbox);
    return message;
  }

  /**
   * Mark up to `limit` due messages as delivered and return them in arrival
   * order. A message is due when it was never delivered or its redelivery
   * timeout has elapsed.
   */
  claim(target: string, limit = Number.POSITIVE_INFINITY): HeldMessage[] {
    const inbox = this.inboxes.get(target);
    if (!inbox) {
      return [];
    }

    const now = this.now();
    const claimed: HeldMessage[] = [];
    for (const message of inbox) {
      if (claimed.length >= limit) break;
      if (this.isDue(message, now)) {
        message.deliveredAt = now;
        message.deliveryCount++;
        claimed.push(message);
      }
    }
    return claimed;
  }

  acknowledge(target: string, messageId: string): boolean {
    const inbox = this.inboxes.get(target);
    if (!inbox) {
      return false;
    }
    const index = inbox.findIndex((message) => message.id === messageId);
    if (index === -1) {
      return false;
    }
    inbox.splice(index, 1);
    if (inbox.length === 0) {
      this.inboxes.delete(target);
    }
    return true;
  }

  /**
   * Milliseconds until the earliest in-flight message becomes due again, or
   * null when nothing is in flight
   */
  nextRedeliveryIn(target: string): number | null {
    const inbox = this.inboxes.get(target);
    if (!inbox) {
      return null;
    }
    const now = this.now();
    let earliest: number | null = null;
    for (const message of inbox) {
      if (message.deliveredAt === null) continue;
      const dueIn = Math.max(
        0,
        message.deliveredAt + this.options.redeliveryTimeoutMs - now,
      );
      earliest = earliest === null ? dueIn : Math.min(earliest, dueIn);
    }
    return earliest;
  }

  heldCount(target: string): number {
    return this.inboxes.get(target)?.length ?? 0;
  }

  get totalHeld(): number {
    let total = 0;
    for (const inbox of this.inboxes.values()) {
      total += inbox.length;
    }
    return total;
  }

  private isDue(message: HeldMessage, now: number): boolean {
    return (
      message.deliveredAt === null ||
      now - message.deliveredAt >= this.options.redeliveryTimeoutMs
    );
  }
}
