import * as Sentry from '@sentry/node';
import logger from './utils/logger';

// Initialize Sentry for error tracking
export function initSentry(serviceName: string) {
  // Only initialize if DSN is provided
  if (!process.env.SENTRY_DSN) {
    logger.warn('Sentry DSN not found. Skipping Sentry initialization.', {
      service: serviceName,
    });
    return;
  }

  Sentry.init({
    dsn: process.env.SENTRY_DSN,

    // Set environment (production, development, staging)
    environment: process.env.NODE_ENV || 'development',

    // Release tracking for identifying which version has issues
    release: process.env.SENTRY_RELEASE || 'mcp-task-relay@unknown',

    serverName: serviceName,

    // Sample rate for tracing (lower in production to reduce overhead)
    tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0,

    integrations: [
      // Enable HTTP tracking
      new Sentry.Integrations.Http({ tracing: true }),
    ],

    // Filter out sensitive information
    beforeSend(event) {
      logger.info('Sending error to Sentry', {
        eventId: event.event_id,
        level: event.level,
      });

      // Bearer tokens must never leave the process
      if (event.request) {
        delete event.request.cookies;
        delete event.request.headers?.authorization;
        delete event.request.headers?.Authorization;
        delete event.request.headers?.cookie;
      }

      return event;
    },
  });

  logger.info('Sentry initialized successfully', {
    service: serviceName,
    environment: process.env.NODE_ENV,
    release: process.env.SENTRY_RELEASE,
  });
}

// Export Sentry for use in other files
export { Sentry };
