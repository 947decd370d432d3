/**
 * HTTP transport
 * POSTs for register/send/acknowledge, Server-Sent Events (or long polling)
 * for receive. Frames from the stream are buffered until `receive` asks.
 */

import EventSource from 'eventsource';
import { z } from 'zod';
import logger from '../utils/logger';
import { AsyncQueue } from '../utils/asyncQueue';
import type { Delivery, OutboundMessage } from '../types/messageTypes';
import {
  loadTransportSettings,
  TransportSettings,
} from '../config/relayConfig';
import { AgentInfo, SendAck, Transport } from './transport';
import {
  AgentUnreachableError,
  describeError,
  NotRegisteredError,
  TransportError,
  TransportUnavailableError,
} from './errors';

const WireDeliverySchema = z.object({
  message_id: z.string().min(1),
  message: z.unknown(),
});

const RegisterResponseSchema = z.object({
  agent_id: z.string(),
  token: z.string().min(1),
});

const SendResponseSchema = z.object({
  status: z.literal('delivered'),
  message_id: z.string(),
});

const PollResponseSchema = z.object({
  messages: z.array(WireDeliverySchema),
});

interface TimedSignal {
  signal: AbortSignal;
  dispose: () => void;
}

/**
 * Abort on `timeoutMs` or when the caller's signal aborts
 */
function timedSignal(timeoutMs: number, outer?: AbortSignal): TimedSignal {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  const timer = setTimeout(onAbort, timeoutMs);
  outer?.addEventListener('abort', onAbort, { once: true });
  if (outer?.aborted) controller.abort();
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      outer?.removeEventListener('abort', onAbort);
    },
  };
}

function readField(event: unknown, key: 'status' | 'message'): string | number | undefined {
  if (typeof event !== 'object' || event === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(event, key);
  return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}

export class HttpTransport implements Transport {
  private readonly settings: TransportSettings;
  private agentName: string | null = null;
  private token: string | null = null;
  private stream: EventSource | null = null;
  private streamError: TransportError | null = null;
  private readonly inbox = new AsyncQueue<Delivery>();
  private closed = false;

  constructor(settings: Partial<TransportSettings> = {}) {
    this.settings = { ...loadTransportSettings(), ...settings };
  }

  get baseUrl(): string {
    return this.settings.relayUrl.replace(/\/+$/, '');
  }

  async register(agentName: string, info: AgentInfo = {}): Promise<string> {
    const response = await this.request('/register', {
      method: 'POST',
      body: JSON.stringify({ agent_id: agentName, info }),
    });
    if (!response.ok) {
      throw new TransportUnavailableError(
        `Registration failed with HTTP ${response.status}`,
        { agentName, status: response.status },
      );
    }

    const { token } = await this.readJson(response, RegisterResponseSchema);
    this.agentName = agentName;
    this.token = token;

    // A stream opened with the previous token is replaced on next receive
    this.closeStream();
    logger.info('Registered with relay', { agentName, relay: this.baseUrl });
    return token;
  }

  async send(target: string, message: OutboundMessage): Promise<SendAck> {
    const token = this.requireToken('send');
    const response = await this.request(
      `/message/${encodeURIComponent(target)}`,
      { method: 'POST', body: JSON.stringify(message) },
      token,
    );

    if (response.status === 404 || response.status === 503) {
      throw new AgentUnreachableError(
        target,
        `Agent ${target} unreachable (HTTP ${response.status})`,
      );
    }
    if (!response.ok) {
      throw new TransportUnavailableError(
        `Send failed with HTTP ${response.status}`,
        { target, status: response.status },
      );
    }

    const ack = await this.readJson(response, SendResponseSchema);
    return { status: ack.status, message_id: ack.message_id };
  }

  async receive(timeoutMs: number, signal?: AbortSignal): Promise<Delivery | null> {
    this.requireToken('receive');
    if (this.closed) {
      return null;
    }

    if (this.settings.mode === 'poll') {
      if (this.inbox.size === 0) {
        await this.poll(timeoutMs, signal);
      }
      return (await this.inbox.take(0, signal)) ?? null;
    }

    if (this.streamError) {
      const error = this.streamError;
      this.streamError = null;
      throw error;
    }
    this.ensureStream();
    return (await this.inbox.take(timeoutMs, signal)) ?? null;
  }

  async acknowledge(agentName: string, messageId: string): Promise<void> {
    const token = this.requireToken('acknowledge');
    const response = await this.request(
      '/acknowledge',
      {
        method: 'POST',
        body: JSON.stringify({ agent_id: agentName, message_id: messageId }),
      },
      token,
    );
    if (!response.ok) {
      throw new TransportUnavailableError(
        `Acknowledge failed with HTTP ${response.status}`,
        { agentName, messageId, status: response.status },
      );
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.closeStream();
    this.inbox.close();
  }

  private ensureStream(): void {
    if (this.stream || !this.token) {
      return;
    }

    const stream = new EventSource(`${this.baseUrl}/events`, {
      headers: { Authorization: `Bearer ${this.token}` },
    });

    stream.onmessage = (event: { data: string }) => {
      this.handleFrame(event.data);
    };
    stream.onerror = (event: unknown) => {
      const status = readField(event, 'status');
      // The client reconnects on its own unless the relay refused the stream
      if (stream.readyState === EventSource.CLOSED) {
        this.streamError = new TransportUnavailableError(
          `Event stream closed${status !== undefined ? ` (HTTP ${status})` : ''}`,
          { agentName: this.agentName, status },
        );
        if (this.stream === stream) {
          this.stream = null;
        }
      }
      logger.warn('Event stream error', {
        agentName: this.agentName,
        status,
        message: readField(event, 'message'),
      });
    };

    this.stream = stream;
    logger.debug('Event stream opened', { agentName: this.agentName });
  }

  private closeStream(): void {
    if (this.stream) {
      this.stream.close();
      this.stream = null;
    }
  }

  private handleFrame(data: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      logger.warn('Discarding undecodable event frame', {
        agentName: this.agentName,
        error: describeError(error),
      });
      return;
    }

    const frame = WireDeliverySchema.safeParse(parsed);
    if (!frame.success) {
      logger.warn('Discarding event frame without message id', {
        agentName: this.agentName,
      });
      return;
    }
    this.inbox.push({ messageId: frame.data.message_id, body: frame.data.message });
  }

  private async poll(waitMs: number, signal?: AbortSignal): Promise<void> {
    const token = this.requireToken('receive');
    let response: Response;
    try {
      response = await this.request(
        `/events?mode=poll&wait=${Math.max(0, Math.floor(waitMs))}`,
        { method: 'GET' },
        token,
        waitMs + this.settings.requestTimeoutMs,
        signal,
      );
    } catch (error) {
      if (signal?.aborted) {
        return;
      }
      throw error;
    }

    if (!response.ok) {
      throw new TransportUnavailableError(
        `Poll failed with HTTP ${response.status}`,
        { agentName: this.agentName, status: response.status },
      );
    }
    const { messages } = await this.readJson(response, PollResponseSchema);
    for (const delivery of messages) {
      this.inbox.push({ messageId: delivery.message_id, body: delivery.message });
    }
  }

  private async request(
    path: string,
    init: { method: string; body?: string },
    token?: string,
    timeoutMs = this.settings.requestTimeoutMs,
    signal?: AbortSignal,
  ): Promise<Response> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (init.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    const timed = timedSignal(timeoutMs, signal);
    try {
      return await fetch(`${this.baseUrl}${path}`, {
        method: init.method,
        body: init.body,
        headers,
        signal: timed.signal,
      });
    } catch (error) {
      const timedOut = timed.signal.aborted && !signal?.aborted;
      throw new TransportUnavailableError(
        timedOut
          ? `Request to ${path} timed out after ${timeoutMs}ms`
          : `Request to ${path} failed: ${describeError(error)}`,
        { relay: this.baseUrl },
        timedOut ? 'Timeout' : 'ConnectionFailed',
      );
    } finally {
      timed.dispose();
    }
  }

  private async readJson<T>(response: Response, schema: z.ZodType<T>): Promise<T> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new TransportUnavailableError(
        `Malformed response from relay: ${describeError(error)}`,
        { status: response.status },
      );
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new TransportUnavailableError('Unexpected response shape from relay', {
        status: response.status,
      });
    }
    return parsed.data;
  }

  private requireToken(operation: string): string {
    if (!this.token) {
      throw new NotRegisteredError(operation);
    }
    return this.token;
  }
}
