import { createContext, type Operation } from 'effection'
import type { Logger, LoggerFactory } from './types.ts'

export const LoggerFactoryContext = createContext<LoggerFactory>('feedline.LoggerFactory')

const silent: Logger = {
  debug() {},
}

/**
 * The logger of `module` in the current scope, or a silent one when no
 * factory has been installed.
 *
 * @example
 * ```ts
 * const log = yield* useLogger('dataset:prefetch')
 * log.debug({ bufferSize }, 'worker started')
 * ```
 */
export function* useLogger(module: string): Operation<Logger> {
  const factory = yield* LoggerFactoryContext.get()
  return factory ? factory(module) : silent
}
