/**
 * Relay Hub
 * Registry, held-message store and inbox notifications behind one facade.
 * The HTTP relay server and the in-process transport both sit on top of it.
 */

import { EventEmitter } from 'events';
import logger from '../utils/logger';
import type { AgentInfo } from '../transport/transport';
import { AgentRegistry, RegisteredAgent } from './agentRegistry';
import { HeldMessage, MessageStore } from './messageStore';
import {
  DEFAULT_RELAY_SETTINGS,
  RelaySettings,
} from '../config/relayConfig';

export class UnknownAgentError extends Error {
  constructor(readonly agentId: string) {
    super(`Agent ${agentId} not found`);
    this.name = 'UnknownAgentError';
  }
}

export interface RegistrationResult {
  agent_id: string;
  token: string;
}

export interface WireDelivery {
  message_id: string;
  message: Record<string, unknown>;
}

export interface WaitOptions {
  timeoutMs: number;
  limit?: number;
  signal?: AbortSignal;
}

export interface RelayStats {
  agents: number;
  heldMessages: number;
}

export class RelayHub extends EventEmitter {
  readonly registry: AgentRegistry;
  readonly store: MessageStore;

  constructor(
    settings: Pick<
      RelaySettings,
      'redeliveryTimeoutMs' | 'maxHeldPerAgent'
    > = DEFAULT_RELAY_SETTINGS,
    now?: () => number,
  ) {
    super();
    // One listener per open stream or pending receive
    this.setMaxListeners(0);
    this.registry = new AgentRegistry();
    this.store = new MessageStore({
      redeliveryTimeoutMs: settings.redeliveryTimeoutMs,
      maxHeldPerAgent: settings.maxHeldPerAgent,
      now,
    });
  }

  register(agentId: string, info: AgentInfo = {}): RegistrationResult {
    const token = this.registry.register(agentId, info);
    logger.info('Agent registered', { agentId });
    // Messages held before a re-registration become visible to the new stream
    this.emit(`inbox:${agentId}`);
    return { agent_id: agentId, token };
  }

  authenticate(token: string): string | undefined {
    const agentId = this.registry.authenticate(token);
    if (agentId) {
      this.registry.heartbeat(agentId);
    }
    return agentId;
  }

  /**
   * Hold a message for `target`; the relay stamps the authenticated sender
   */
  deliver(
    sender: string,
    target: string,
    body: Record<string, unknown>,
  ): HeldMessage {
    if (!this.registry.has(target)) {
      throw new UnknownAgentError(target);
    }
    const held = this.store.push(target, { ...body, sender });
    logger.debug('Message held for delivery', {
      messageId: held.id,
      sender,
      target,
      type: body.type,
    });
    this.emit(`inbox:${target}`);
    return held;
  }

  claim(agentId: string, limit?: number): WireDelivery[] {
    return this.store.claim(agentId, limit).map(toWireDelivery);
  }

  acknowledge(agentId: string, messageId: string): boolean {
    const removed = this.store.acknowledge(agentId, messageId);
    logger.debug('Message acknowledged', { agentId, messageId, removed });
    return removed;
  }

  /**
   * Claim due messages, waiting up to `timeoutMs` for one to arrive or for
   * an unacknowledged message to become due again
   */
  async waitForMessages(
    agentId: string,
    options: WaitOptions,
  ): Promise<WireDelivery[]> {
    const deadline = Date.now() + options.timeoutMs;

    for (;;) {
      const claimed = this.claim(agentId, options.limit);
      if (claimed.length > 0) {
        return claimed;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0 || options.signal?.aborted) {
        return [];
      }

      const redeliveryIn = this.store.nextRedeliveryIn(agentId);
      const waitMs =
        redeliveryIn === null ? remaining : Math.min(remaining, redeliveryIn);
      await this.waitForInbox(agentId, waitMs, options.signal);
    }
  }

  /**
   * Resolves when `agentId` gets a new message, after `ms`, or on abort
   */
  waitForInbox(agentId: string, ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const event = `inbox:${agentId}`;
      const done = () => {
        clearTimeout(timer);
        this.off(event, done);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.on(event, done);
      signal?.addEventListener('abort', done, { once: true });
    });
  }

  listAgents(): RegisteredAgent[] {
    return this.registry.list();
  }

  stats(): RelayStats {
    return {
      agents: this.registry.size,
      heldMessages: this.store.totalHeld,
    };
  }
}

function toWireDelivery(message: HeldMessage): WireDelivery {
  return { message_id: message.id, message: message.body };
}
