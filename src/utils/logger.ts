import winston from 'winston';
import path from 'path';

// Log directory, relative to the project root unless LOG_DIR is set
const logDir = process.env.LOG_DIR || path.join(__dirname, '../../logs');

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Define colors for each level
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'blue',
};

winston.addColors(colors);

// Structured metadata is appended as JSON after the message
const format = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize({ all: true }),
  winston.format.printf((info) => {
    const { timestamp, level, message, ...meta } = info;
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${extra}`;
  }),
);

const isTest = process.env.NODE_ENV === 'test';

const transports: winston.transport[] = [new winston.transports.Console()];

if (!isTest) {
  transports.push(
    // File transport for error logs
    new winston.transports.File({
      filename: path.join(logDir, 'errors.log'),
      level: 'error',
    }),

    // File transport for all logs
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
    }),
  );
}

const logger = winston.createLogger({
  level:
    process.env.LOG_LEVEL ||
    (process.env.NODE_ENV === 'production' ? 'warn' : 'debug'),
  levels,
  format,
  transports,
  silent: isTest,
});

export default logger;
