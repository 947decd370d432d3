// Load environment variables FIRST - before any other imports
import * as dotenv from 'dotenv';
import * as path from 'path';

// __dirname is dist/ in production and src/ in development; both resolve to the project root
dotenv.config({ path: path.resolve(__dirname, '../.env') });

/**
 * Relay server entry point
 *
 * Holds messages for registered agents until they acknowledge them.
 */

// Initialize Sentry first so boot-time errors are captured
import { initSentry } from './sentry';
initSentry('relay');

import logger from './utils/logger';
import {
  handleUncaughtException,
  handleUnhandledRejection,
} from './middleware/errorHandler';
import { RelayHub } from './relay/relayHub';
import { createRelayApp } from './relay/relayServer';
import { loadRelaySettings } from './config/relayConfig';

handleUncaughtException();
handleUnhandledRejection();

const settings = loadRelaySettings();
const hub = new RelayHub(settings);
const app = createRelayApp(hub, settings);

const server = app.listen(settings.port, () => {
  logger.info(`Relay listening on port ${settings.port}`, {
    redeliveryTimeoutMs: settings.redeliveryTimeoutMs,
    maxHeldPerAgent: settings.maxHeldPerAgent,
  });
});

function shutdown(signal: string): void {
  logger.info(`${signal} received: closing relay server`);
  server.close(() => process.exit(0));
  // Open event streams keep connections alive; do not wait for them
  server.closeAllConnections();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
