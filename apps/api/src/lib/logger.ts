import type { FastifyBaseLogger } from 'fastify';

/** The slice of Fastify's pino logger the services log through. */
export type Logger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
