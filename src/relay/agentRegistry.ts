/**
 * Agent Registry
 * Issues opaque bearer tokens and tracks when each agent was last seen
 */

import { randomUUID } from 'crypto';
import type { AgentInfo } from '../transport/transport';

export interface RegisteredAgent {
  agentId: string;
  info: AgentInfo;
  registeredAt: Date;
  lastSeen: Date;
}

export class AgentRegistry {
  private readonly agents = new Map<string, RegisteredAgent>();
  private readonly tokens = new Map<string, string>();

  /**
   * Register (or re-register) an agent and return a fresh token; earlier
   * tokens stay valid
   */
  register(agentId: string, info: AgentInfo = {}): string {
    const now = new Date();
    const existing = this.agents.get(agentId);
    this.agents.set(agentId, {
      agentId,
      info,
      registeredAt: existing?.registeredAt ?? now,
      lastSeen: now,
    });

    const token = randomUUID();
    this.tokens.set(token, agentId);
    return token;
  }

  authenticate(token: string): string | undefined {
    return this.tokens.get(token);
  }

  has(agentId: string): boolean {
    return this.agents.has(agentId);
  }

  get(agentId: string): RegisteredAgent | undefined {
    return this.agents.get(agentId);
  }

  heartbeat(agentId: string): void {
    const agent = this.agents.get(agentId);
    if (agent) {
      agent.lastSeen = new Date();
    }
  }

  list(): RegisteredAgent[] {
    return Array.from(this.agents.values());
  }

  get size(): number {
    return this.agents.size;
  }
}
