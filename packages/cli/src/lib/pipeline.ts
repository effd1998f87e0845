/**
 * Preview Pipeline
 *
 * Builds the pipeline behind `feedline preview`: list the files matching a
 * pattern, read them as text lines or fixed-length records, then apply the
 * requested transformations in a fixed order (shard, skip, shuffle, take,
 * batch, prefetch).
 */

import type { Operation } from 'effection'
import { z } from 'zod'
import {
  CompressionSchema,
  CountSchema,
  Dataset,
  InvalidArgumentError,
  NonNegativeIntSchema,
  PositiveIntSchema,
  forEachElement,
  formatSchema,
} from '@feedline/core'
import { formatElement } from './format.ts'

/**
 * Raw command line values, as strings.
 */
export interface RawPreviewArgs {
  pattern?: string
  format?: string
  recordBytes?: string
  headerBytes?: string
  footerBytes?: string
  compression?: string
  shard?: string
  skip?: string
  shuffle?: string
  seed?: string
  take?: string
  batch?: string
  prefetch?: string
}

// Empty flags are absent; anything else must parse as a number.
function numeric<S extends z.ZodTypeAny>(schema: S) {
  return z.preprocess(
    (value) => (value === undefined || value === '' ? undefined : Number(value)),
    schema.optional()
  )
}

const ShardSchema = z
  .string()
  .regex(/^\d+:\d+$/, 'expected <numShards>:<index>')
  .transform((value) => {
    const [numShards, index] = value.split(':').map(Number)
    return { numShards, index }
  })

export const PreviewArgsSchema = z
  .object({
    pattern: z
      .string({ required_error: 'a file pattern is required' })
      .min(1, 'a file pattern is required'),
    format: z
      .enum(['lines', 'records'], {
        errorMap: () => ({ message: 'expected "lines" or "records"' }),
      })
      .default('lines'),
    recordBytes: numeric(PositiveIntSchema),
    headerBytes: numeric(NonNegativeIntSchema),
    footerBytes: numeric(NonNegativeIntSchema),
    compression: z
      .preprocess((value) => (typeof value === 'string' ? value.toUpperCase() : value), CompressionSchema)
      .default(''),
    shard: ShardSchema.optional(),
    skip: numeric(CountSchema),
    shuffle: numeric(PositiveIntSchema),
    seed: numeric(z.number({ invalid_type_error: 'must be a number' }).int('must be an integer')),
    take: numeric(CountSchema).transform((value) => value ?? 10),
    batch: numeric(PositiveIntSchema),
    prefetch: numeric(PositiveIntSchema),
  })
  .refine((options) => options.format !== 'records' || options.recordBytes !== undefined, {
    message: '--record-bytes is required with --format records',
  })

export type PreviewOptions = z.output<typeof PreviewArgsSchema>
export type PreviewFormat = PreviewOptions['format']

function toFlag(key: string): string {
  return `--${key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)}`
}

function formatIssue(issue: z.ZodIssue): string {
  const [key] = issue.path
  if (typeof key !== 'string' || key === 'pattern') return issue.message
  return `${toFlag(key)}: ${issue.message}`
}

export function parsePreviewArgs(args: RawPreviewArgs): PreviewOptions {
  const result = PreviewArgsSchema.safeParse(args)
  if (!result.success) {
    throw new InvalidArgumentError(result.error.issues.map(formatIssue).join('; '))
  }
  return result.data
}

function readFiles(files: Dataset<string>, options: PreviewOptions): Dataset<string | Uint8Array> {
  if (options.format === 'lines') {
    const { compression } = options
    return files.flatMap((file) => Dataset.textLines(file, { compression }))
  }
  const { recordBytes = 1, headerBytes, footerBytes } = options
  return files.flatMap((file) =>
    Dataset.fixedLengthRecords(file, recordBytes, { headerBytes, footerBytes })
  )
}

export function buildPipeline(options: PreviewOptions): Dataset<unknown> {
  let files = Dataset.listFiles(options.pattern)
  if (options.shard) {
    files = files.shard(options.shard.numShards, options.shard.index)
  }

  let records: Dataset<unknown> = readFiles(files, options)
  if (options.skip !== undefined) records = records.skip(options.skip)
  if (options.shuffle !== undefined) records = records.shuffle(options.shuffle, options.seed)
  records = records.take(options.take)
  if (options.batch !== undefined) records = records.batch(options.batch)
  if (options.prefetch !== undefined) records = records.prefetch(options.prefetch)
  return records
}

/**
 * Write the pipeline schema, then one line per element. Returns the number
 * of elements written.
 */
export function* preview(
  options: PreviewOptions,
  write: (line: string) => void
): Operation<number> {
  const dataset = buildPipeline(options)
  write(`schema: ${formatSchema(dataset.schema)}`)
  return yield* forEachElement(dataset, (element, index) => {
    write(`${index}: ${formatElement(element)}`)
  })
}
