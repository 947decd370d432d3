/**
 * In-process transport over a shared RelayHub
 * Same hold-until-acknowledged semantics as the HTTP relay, without sockets.
 */

import type { Delivery, OutboundMessage } from '../types/messageTypes';
import { RelayHub, UnknownAgentError, WireDelivery } from '../relay/relayHub';
import { InboxFullError } from '../relay/messageStore';
import { AgentInfo, SendAck, Transport } from './transport';
import { AgentUnreachableError, NotRegisteredError } from './errors';

export class InMemoryTransport implements Transport {
  private agentName: string | null = null;
  private readonly closeController = new AbortController();

  constructor(private readonly hub: RelayHub) {}

  async register(agentName: string, info?: AgentInfo): Promise<string> {
    const { token } = this.hub.register(agentName, info);
    this.agentName = agentName;
    return token;
  }

  async send(target: string, message: OutboundMessage): Promise<SendAck> {
    const sender = this.requireAgent('send');
    try {
      const held = this.hub.deliver(sender, target, { ...message });
      return { status: 'delivered', message_id: held.id };
    } catch (error) {
      if (error instanceof UnknownAgentError || error instanceof InboxFullError) {
        throw new AgentUnreachableError(target, error.message);
      }
      throw error;
    }
  }

  async receive(timeoutMs: number, signal?: AbortSignal): Promise<Delivery | null> {
    const agentName = this.requireAgent('receive');
    if (this.closeController.signal.aborted) {
      return null;
    }

    // Either the caller's signal or close() ends the wait
    const abort = new AbortController();
    const onAbort = () => abort.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    this.closeController.signal.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) abort.abort();

    let delivery: WireDelivery | undefined;
    try {
      [delivery] = await this.hub.waitForMessages(agentName, {
        timeoutMs,
        limit: 1,
        signal: abort.signal,
      });
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.closeController.signal.removeEventListener('abort', onAbort);
    }
    return delivery
      ? { messageId: delivery.message_id, body: delivery.message }
      : null;
  }

  async acknowledge(agentName: string, messageId: string): Promise<void> {
    this.requireAgent('acknowledge');
    this.hub.acknowledge(agentName, messageId);
  }

  async close(): Promise<void> {
    this.closeController.abort();
  }

  private requireAgent(operation: string): string {
    if (!this.agentName) {
      throw new NotRegisteredError(operation);
    }
    return this.agentName;
  }
}
