import { z } from 'zod'
import { fromZodError } from './errors.ts'

/** A count where `-1` means "all" or "forever". */
export const CountSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .min(-1, 'must be -1 or a non-negative integer')

export const PositiveIntSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .min(1, 'must be at least 1')

export const NonNegativeIntSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .min(0, 'must not be negative')

export const CompressionSchema = z.enum(['', 'GZIP', 'ZLIB'], {
  errorMap: () => ({ message: 'must be one of "", "GZIP", "ZLIB"' }),
})

export type Compression = z.infer<typeof CompressionSchema>

/**
 * Parse a construction parameter, raising InvalidArgumentError on failure.
 */
export function parseArg<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  value: unknown
): z.output<S> {
  const result = schema.safeParse(value)
  if (!result.success) {
    throw fromZodError(name, result.error)
  }
  return result.data
}
