/**
 * Standalone agent process
 *
 * Connects one named agent to the relay over HTTP and answers tasks with the
 * OpenAI executor. Usage: AGENT_NAME=researcher node dist/agents/start.js
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

import { initSentry } from '../sentry';
import logger from '../utils/logger';
import {
  handleUncaughtException,
  handleUnhandledRejection,
} from '../middleware/errorHandler';
import { HttpTransport } from '../transport/httpTransport';
import { describeError } from '../transport/errors';
import { AgentRuntime } from './agent-runtime';
import { OpenAIExecutor } from './executors/openai-executor';
import { getCoordinatorName } from '../config/relayConfig';

async function main(): Promise<void> {
  const name = process.env.AGENT_NAME;
  if (!name) {
    logger.error('AGENT_NAME is required');
    process.exit(1);
  }

  initSentry(`agent:${name}`);
  handleUncaughtException();
  handleUnhandledRejection();

  const capabilities = (process.env.AGENT_CAPABILITIES ?? '')
    .split(',')
    .map((capability) => capability.trim())
    .filter(Boolean);

  const runtime = new AgentRuntime({
    name,
    transport: new HttpTransport(),
    executor: new OpenAIExecutor({ role: process.env.AGENT_ROLE }),
    coordinator: getCoordinatorName(),
    capabilities,
  });

  try {
    await runtime.start();
  } catch (error) {
    logger.error('Agent failed to register with relay', {
      agent: name,
      error: describeError(error),
    });
    process.exit(1);
  }

  const shutdown = (signal: string) => {
    logger.info(`${signal} received: stopping agent`, { agent: name });
    runtime
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Agent shutdown failed', {
          agent: name,
          error: describeError(error),
        });
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

void main();
