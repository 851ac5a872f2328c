import pino from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

/**
 * Shared logger
 *
 * Handed to Fastify as its logger, so request logs and pipeline logs
 * end up in the same stream.
 */
export const logger = pino({
  name: 'envwatch',
  level: LOG_LEVEL,
});

export type Logger = pino.Logger;
