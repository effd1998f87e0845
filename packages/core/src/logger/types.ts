/** Structured fields attached to a log line. */
export type LogFields = Record<string, unknown>

/**
 * What pipelines log through. Pipeline activity is reported at debug level
 * only; a pino logger satisfies this interface.
 */
export interface Logger {
  debug(msg: string): void
  debug(fields: LogFields, msg: string): void
}

/** Creates the logger of a module such as `dataset:prefetch`. */
export type LoggerFactory = (module: string) => Logger
