/**
 * Debug logging of pipeline activity through a factory held in an effection
 * context. Nothing is logged until `setupLogger` runs.
 */
export type { LogFields, Logger, LoggerFactory } from './types.ts'
export { LoggerFactoryContext, useLogger } from './context.ts'
export { createPinoLoggerFactory, type PinoLoggerOptions } from './pino-logger.ts'
export { setupLogger } from './setup.ts'
