import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { Sentry } from '../sentry';
import logger from '../utils/logger';

/**
 * Error with an HTTP status that is safe to show to the calling agent
 */
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

interface ErrorReply {
  statusCode: number;
  message: string;
}

function hasType(err: Error, type: string): boolean {
  return 'type' in err && err.type === type;
}

function toReply(err: Error): ErrorReply {
  if (err instanceof AppError && err.isOperational) {
    return { statusCode: err.statusCode, message: err.message };
  }
  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      message: err.issues.map((issue) => issue.message).join('; '),
    };
  }
  // Raised by express.json() before any route runs
  if (hasType(err, 'entity.parse.failed')) {
    return { statusCode: 400, message: 'Malformed JSON body' };
  }
  if (hasType(err, 'entity.too.large')) {
    return { statusCode: 413, message: 'Message body too large' };
  }
  return { statusCode: 500, message: 'Internal Server Error' };
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
) {
  const { statusCode, message } = toReply(err);

  if (statusCode >= 500) {
    logger.error('Relay request failed', {
      message: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
    });
    Sentry.captureException(err, {
      contexts: {
        request: {
          method: req.method,
          url: req.url,
          headers: {
            'user-agent': req.get('user-agent'),
          },
        },
      },
    });
  } else {
    logger.warn('Relay request rejected', {
      message,
      statusCode,
      path: req.path,
      method: req.method,
      ip: req.ip,
    });
  }

  res.status(statusCode).json({
    status: 'error',
    statusCode,
    message,
    ...(process.env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
  });
}

export function handleUnhandledRejection() {
  process.on('unhandledRejection', (reason: unknown) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    logger.error('Unhandled Rejection:', {
      message: error.message,
      stack: error.stack,
    });

    Sentry.captureException(error);
  });
}

export function handleUncaughtException() {
  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception:', {
      message: error.message,
      stack: error.stack,
    });

    Sentry.captureException(error);
    process.exit(1);
  });
}
