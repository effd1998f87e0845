import pino from 'pino'
import { env } from '../config/env.ts'
import type { Logger, LoggerFactory } from './types.ts'

export interface PinoLoggerOptions {
  /** Log level (default: `LOG_LEVEL`) */
  level?: string
  /** Pretty printing (default: unless `NODE_ENV` is `production`) */
  pretty?: boolean
}

/**
 * A factory of pino child loggers named `feedline`, each carrying `{ module }`.
 */
export function createPinoLoggerFactory(options: PinoLoggerOptions = {}): LoggerFactory {
  const { level = env.LOG_LEVEL, pretty = env.NODE_ENV !== 'production' } = options
  const root = pino({
    name: 'feedline',
    level,
    ...(pretty ? { transport: { target: 'pino-pretty', options: { colorize: true } } } : {}),
  })

  return (module: string): Logger => root.child({ module })
}
