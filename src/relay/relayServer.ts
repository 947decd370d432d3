/**
 * Relay Server
 * HTTP surface of the RelayHub: registration, message delivery, the
 * per-agent event stream and acknowledgments.
 */

import express from 'express';
import { z } from 'zod';
import logger from '../utils/logger';
import { AppError, errorHandler } from '../middleware/errorHandler';
import { createHealthRouter } from '../health';
import { InboxFullError } from './messageStore';
import { RelayHub, UnknownAgentError, WireDelivery } from './relayHub';
import {
  DEFAULT_RELAY_SETTINGS,
  RelaySettings,
} from '../config/relayConfig';

type AuthedRequest = express.Request & { agentId?: string };

function requiredString(message: string) {
  return z
    .string({ required_error: message, invalid_type_error: message })
    .trim()
    .min(1, message);
}

const RegisterBodySchema = z.object(
  {
    agent_id: requiredString('Missing agent_id'),
    info: z.record(z.unknown()).optional().catch(undefined),
  },
  { invalid_type_error: 'Missing agent_id' },
);

const MESSAGE_SHAPE = 'Message must be a JSON object with a type';

const MessageBodySchema = z
  .object({ type: requiredString(MESSAGE_SHAPE) }, { invalid_type_error: MESSAGE_SHAPE })
  .passthrough();

const AcknowledgeBodySchema = z.object(
  {
    agent_id: z.string().optional(),
    message_id: requiredString('Missing message_id'),
  },
  { invalid_type_error: 'Missing message_id' },
);

function sseFrame(delivery: WireDelivery): string {
  return `id: ${delivery.message_id}\nevent: message\ndata: ${JSON.stringify(delivery)}\n\n`;
}

/**
 * Resolve the bearer token to its agent or answer 401
 */
function requireAgentToken(hub: RelayHub) {
  return (
    req: AuthedRequest,
    res: express.Response,
    next: express.NextFunction,
  ) => {
    const header = req.headers.authorization ?? '';
    const match = /^Bearer\s+(.+)$/i.exec(header);
    const agentId = match ? hub.authenticate(match[1].trim()) : undefined;
    if (!agentId) {
      return res.status(401).json({ error: 'Invalid token' });
    }
    req.agentId = agentId;
    return next();
  };
}

function authedAgent(req: AuthedRequest): string {
  if (!req.agentId) {
    throw new AppError('Invalid token', 401);
  }
  return req.agentId;
}

export function createRelayApp(
  hub: RelayHub,
  settings: Pick<RelaySettings, 'keepAliveMs' | 'maxPollWaitMs'> = DEFAULT_RELAY_SETTINGS,
): express.Application {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));

  app.use(createHealthRouter(hub));

  const auth = requireAgentToken(hub);

  app.post('/register', (req, res, next) => {
    try {
      const { agent_id: agentId, info } = RegisterBodySchema.parse(req.body);
      const { token } = hub.register(agentId, info ?? {});
      res.json({ status: 'registered', agent_id: agentId, token });
    } catch (error) {
      next(error);
    }
  });

  app.post('/message/:target', auth, (req: AuthedRequest, res, next) => {
    try {
      const sender = authedAgent(req);
      const body = MessageBodySchema.parse(req.body);
      const held = hub.deliver(sender, req.params.target, body);
      res.json({ status: 'delivered', message_id: held.id });
    } catch (error) {
      if (error instanceof UnknownAgentError) {
        next(new AppError(error.message, 404));
      } else if (error instanceof InboxFullError) {
        next(new AppError(error.message, 503));
      } else {
        next(error);
      }
    }
  });

  app.post('/acknowledge', auth, (req: AuthedRequest, res, next) => {
    try {
      const agentId = authedAgent(req);
      const { agent_id: claimed, message_id: messageId } = AcknowledgeBodySchema.parse(
        req.body,
      );
      if (claimed && claimed !== agentId) {
        throw new AppError('Not authorized', 403);
      }
      const removed = hub.acknowledge(agentId, messageId);
      res.json({ status: 'acknowledged', message_id: messageId, removed });
    } catch (error) {
      next(error);
    }
  });

  app.get('/events', auth, (req: AuthedRequest, res, next) => {
    let agentId: string;
    try {
      agentId = authedAgent(req);
    } catch (error) {
      next(error);
      return;
    }

    // Fires when the response finishes or the client goes away
    const abort = new AbortController();
    res.on('close', () => abort.abort());

    if (req.query.mode === 'poll') {
      const requested = Number(req.query.wait ?? 0);
      const waitMs = Number.isFinite(requested)
        ? Math.min(Math.max(0, requested), settings.maxPollWaitMs)
        : 0;
      hub
        .waitForMessages(agentId, { timeoutMs: waitMs, signal: abort.signal })
        .then((messages) => {
          if (!abort.signal.aborted) {
            res.json({ messages });
          }
        })
        .catch(next);
      return;
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();
    logger.info('Event stream connected', { agentId });

    const pump = async () => {
      while (!abort.signal.aborted) {
        const deliveries = await hub.waitForMessages(agentId, {
          timeoutMs: settings.keepAliveMs,
          signal: abort.signal,
        });
        if (abort.signal.aborted) break;
        if (deliveries.length === 0) {
          res.write(': keep-alive\n\n');
          continue;
        }
        for (const delivery of deliveries) {
          res.write(sseFrame(delivery));
        }
      }
    };

    pump()
      .catch((error: unknown) => {
        logger.error('Event stream failed', {
          agentId,
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        logger.info('Event stream disconnected', { agentId });
        res.end();
      });
  });

  app.get('/agents', auth, (_req, res) => {
    const agents = hub.listAgents().map((agent) => ({
      agent_id: agent.agentId,
      info: agent.info,
      registered_at: agent.registeredAt.toISOString(),
      last_seen: agent.lastSeen.toISOString(),
    }));
    res.json({ agents });
  });

  app.use((_req, _res, next) => {
    next(new AppError('Not found', 404));
  });
  app.use(errorHandler);

  return app;
}
