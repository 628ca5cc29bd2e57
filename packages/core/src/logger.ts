import { pino, type Logger } from 'pino'

/**
 * The subset of a pino logger the core uses. Fastify's request and instance
 * loggers satisfy it, so the server can hand its own logger down.
 */
export type CoreLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>

export function silentLogger(): CoreLogger {
  return pino({ level: 'silent' })
}
