import type { Operation } from 'effection'
import { LoggerFactoryContext } from './context.ts'
import { createPinoLoggerFactory, type PinoLoggerOptions } from './pino-logger.ts'
import type { LoggerFactory } from './types.ts'

/**
 * Install a logger factory in the current scope: pino, configured by
 * `options`, or the given factory.
 *
 * @example
 * ```ts
 * await run(function* () {
 *   yield* setupLogger({ level: 'debug' })
 *   const rows = yield* collect(dataset)
 * })
 * ```
 */
export function* setupLogger(options: PinoLoggerOptions | LoggerFactory = {}): Operation<void> {
  const factory = typeof options === 'function' ? options : createPinoLoggerFactory(options)
  yield* LoggerFactoryContext.set(factory)
}
