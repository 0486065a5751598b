import type { FastifyBaseLogger } from 'fastify';

/**
 * The slice of Fastify's pino logger that services log through.
 * Routes pass `request.log`; tests pass stubs.
 */
export type Logger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
