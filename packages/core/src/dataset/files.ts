/**
 * File-backed sources: text lines, fixed-length records and glob listings.
 */
import { createReadStream } from 'node:fs'
import { open, type FileHandle } from 'node:fs/promises'
import type { Readable } from 'node:stream'
import { StringDecoder } from 'node:string_decoder'
import { createGunzip, createInflate } from 'node:zlib'
import { call, resource, type Operation } from 'effection'
import fg from 'fast-glob'
import { z } from 'zod'
import { resolveDatasetConfig } from '../config/context.ts'
import { DONE, fromArray, yielded } from '../execution/cursor.ts'
import { useLogger } from '../logger/context.ts'
import { scalar } from '../schema/builders.ts'
import {
  NonNegativeIntSchema,
  PositiveIntSchema,
  parseArg,
  type Compression,
} from '../validation.ts'
import { defineNode, type DatasetNode } from './node.ts'

export const FilenamesSchema = z
  .union([z.string(), z.array(z.string())], {
    errorMap: () => ({ message: 'expected a filename or a list of filenames' }),
  })
  .transform((value) => (typeof value === 'string' ? [value] : value))

// =============================================================================
// Text lines
// =============================================================================

interface LineReader {
  /** Next line without its terminator, or `undefined` at end of file. */
  next(): Operation<string | undefined>
  close(): void
}

/**
 * A read stream of `filename`, decompressed when `compression` is set.
 * Destroying the returned stream closes the file.
 */
export function openInputStream(
  filename: string,
  compression: Compression,
  highWaterMark: number
): Readable {
  const file = createReadStream(filename, { highWaterMark })
  if (compression === '') return file
  const decompress = compression === 'GZIP' ? createGunzip() : createInflate()
  file.on('error', (error) => decompress.destroy(error))
  decompress.on('close', () => file.destroy())
  return file.pipe(decompress)
}

function openLineReader(
  filename: string,
  compression: Compression,
  highWaterMark: number
): LineReader {
  const input = openInputStream(filename, compression, highWaterMark)
  const chunks: AsyncIterator<Buffer> = input[Symbol.asyncIterator]()
  const decoder = new StringDecoder('utf8')
  // complete lines of the last chunk, consumed from `position`
  let lines: string[] = []
  let position = 0
  let pending = ''
  let finished = false

  return {
    *next() {
      while (position >= lines.length && !finished) {
        const chunk = yield* call(() => chunks.next())
        position = 0
        if (chunk.done) {
          finished = true
          const rest = pending + decoder.end()
          pending = ''
          lines = rest.length > 0 ? [rest] : []
        } else {
          lines = (pending + decoder.write(chunk.value)).split('\n')
          pending = lines.pop() ?? ''
        }
      }
      const line = position < lines.length ? lines[position++] : undefined
      return line?.endsWith('\r') ? line.slice(0, -1) : line
    },
    close() {
      input.destroy()
    },
  }
}

/**
 * One scalar string per line of each file, in order.
 */
export function createTextLineNode(
  filenames: readonly string[],
  compression: Compression
): DatasetNode {
  return defineNode({
    kind: 'TextLineDataset',
    schema: scalar('string'),
    open: () =>
      resource(function* (provide) {
        const config = yield* resolveDatasetConfig()
        const log = yield* useLogger('dataset:text-line')
        let fileIndex = 0
        let reader: LineReader | undefined

        try {
          yield* provide({
            *next() {
              while (true) {
                if (!reader) {
                  const filename = filenames[fileIndex++]
                  if (filename === undefined) return DONE
                  log.debug({ filename, compression }, 'opening file')
                  reader = openLineReader(filename, compression, config.readerBufferBytes)
                }
                const line = yield* reader.next()
                if (line !== undefined) return yielded(line)
                reader.close()
                reader = undefined
              }
            },
          })
        } finally {
          reader?.close()
        }
      }),
  })
}

// =============================================================================
// Fixed-length records
// =============================================================================

export interface FixedLengthRecordOptions {
  headerBytes?: number
  footerBytes?: number
}

interface RecordReader {
  next(): Operation<Uint8Array | undefined>
  close(): Operation<void>
}

function* openRecordReader(
  filename: string,
  recordBytes: number,
  headerBytes: number,
  footerBytes: number,
  bufferBytes: number
): Operation<RecordReader> {
  const handle: FileHandle = yield* call(() => open(filename, 'r'))
  const { size } = yield* call(() => handle.stat())
  const total = Math.max(0, Math.floor((size - headerBytes - footerBytes) / recordBytes))
  const perRead = Math.max(1, Math.floor(bufferBytes / recordBytes))
  const block = Buffer.alloc(perRead * recordBytes)
  let ready: Uint8Array[] = []
  let position = 0
  let index = 0

  return {
    *next() {
      if (position >= ready.length && index < total) {
        ready = []
        position = 0
        const count = Math.min(perRead, total - index)
        const offset = headerBytes + index * recordBytes
        const { bytesRead } = yield* call(() =>
          handle.read(block, 0, count * recordBytes, offset)
        )
        const whole = Math.floor(bytesRead / recordBytes)
        for (let i = 0; i < whole; i++) {
          ready.push(new Uint8Array(block.subarray(i * recordBytes, (i + 1) * recordBytes)))
        }
        index = whole === count ? index + count : total
      }
      return position < ready.length ? ready[position++] : undefined
    },
    *close() {
      yield* call(() => handle.close())
    },
  }
}

/**
 * Fixed-size byte records of each file, skipping a header and a footer.
 */
export function createFixedLengthRecordNode(
  filenames: readonly string[],
  recordBytes: number,
  options: FixedLengthRecordOptions = {}
): DatasetNode {
  const size = parseArg('fixedLengthRecords recordBytes', PositiveIntSchema, recordBytes)
  const headerBytes = parseArg(
    'fixedLengthRecords headerBytes',
    NonNegativeIntSchema,
    options.headerBytes ?? 0
  )
  const footerBytes = parseArg(
    'fixedLengthRecords footerBytes',
    NonNegativeIntSchema,
    options.footerBytes ?? 0
  )

  return defineNode({
    kind: 'FixedLengthRecordDataset',
    schema: scalar('bytes'),
    open: () =>
      resource(function* (provide) {
        const config = yield* resolveDatasetConfig()
        const log = yield* useLogger('dataset:fixed-length')
        let fileIndex = 0
        let reader: RecordReader | undefined

        try {
          yield* provide({
            *next() {
              while (true) {
                if (!reader) {
                  const filename = filenames[fileIndex++]
                  if (filename === undefined) return DONE
                  log.debug({ filename, recordBytes: size }, 'opening file')
                  reader = yield* openRecordReader(
                    filename,
                    size,
                    headerBytes,
                    footerBytes,
                    config.readerBufferBytes
                  )
                }
                const value = yield* reader.next()
                if (value !== undefined) return yielded(value)
                yield* reader.close()
                reader = undefined
              }
            },
          })
        } finally {
          if (reader) {
            yield* reader.close()
          }
        }
      }),
  })
}

// =============================================================================
// Listings
// =============================================================================

/**
 * Sorted absolute paths of the files matching `pattern`, listed at open time.
 */
export function createListFilesNode(pattern: string | readonly string[]): DatasetNode {
  const patterns = parseArg('listFiles', FilenamesSchema, pattern)
  return defineNode({
    kind: 'ListFilesDataset',
    schema: scalar('string'),
    open: () =>
      resource(function* (provide) {
        const log = yield* useLogger('dataset:list-files')
        const matches = yield* call(() => fg(patterns, { absolute: true, onlyFiles: true }))
        const sorted = [...matches].sort()
        log.debug({ patterns, count: sorted.length }, 'files listed')
        const cursor = yield* fromArray(sorted)
        yield* provide(cursor)
      }),
  })
}
