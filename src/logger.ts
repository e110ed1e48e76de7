import pino from 'pino';

/**
 * Package logger. Failures are written at error level with the request path,
 * status and response body as fields.
 */
export const logger = pino({
  name: 'aspace-client',
  level: process.env.LOG_LEVEL ?? 'info',
});

export const silentLogger = pino({ level: 'silent' });
