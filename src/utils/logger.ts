import winston from 'winston';
import * as Sentry from '@sentry/node';

/**
 * Winston logger configuration for structured logging
 */
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        let msg = `${timestamp} [${level}]: ${message}`;
        if (Object.keys(meta).length > 0) {
          msg += ` ${JSON.stringify(meta)}`;
        }
        return msg;
      }),
    ),
  }),
];

// Only add file transport outside of tests
if (process.env.NODE_ENV !== 'test') {
  transports.push(new winston.transports.File({ filename: 'app.log' }));
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'error' : 'info'),
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: 'media-relay-bot' },
  transports,
});

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Log an error with stack trace and forward it to Sentry
 * (a no-op for Sentry when no DSN was configured)
 */
export function logError(
  error: unknown,
  context?: Record<string, unknown>,
): void {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error({
    message: err.message,
    stack: err.stack,
    ...context,
  });
  Sentry.captureException(err, { extra: context });
}
