import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/mirror-config.js'

export type { Logger } from 'pino'

const STDERR = 2

/** Logs go to stderr so command output on stdout stays clean. */
export function createLogger(config: LoggingConfig): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  if (usePretty) {
    return pino({
      level: config.level,
      transport: { target: 'pino-pretty', options: { destination: STDERR } },
    })
  }

  return pino({ level: config.level }, pino.destination(STDERR))
}
