import type { Delivery, OutboundMessage } from '../types/messageTypes';

export interface AgentInfo {
  name?: string;
  capabilities?: string[];
  [key: string]: unknown;
}

export interface SendAck {
  status: 'delivered';
  message_id: string;
}

/**
 * Point-to-point channel between a named agent and the relay
 *
 * The relay holds a delivered message until it is acknowledged, so callers
 * acknowledge only after the effect of processing has been recorded.
 */
export interface Transport {
  /** Fresh token on every call; must precede every other operation */
  register(agentName: string, info?: AgentInfo): Promise<string>;

  send(target: string, message: OutboundMessage): Promise<SendAck>;

  /** Resolves null when nothing arrives within `timeoutMs` or on abort */
  receive(timeoutMs: number, signal?: AbortSignal): Promise<Delivery | null>;

  /** Unknown or already acknowledged ids are not an error */
  acknowledge(agentName: string, messageId: string): Promise<void>;

  close(): Promise<void>;
}
