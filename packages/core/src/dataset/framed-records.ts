/**
 * Framed Records
 *
 * Files of length-framed binary records. Each record is laid out as
 *
 *   uint64 length | uint32 masked crc32c(length) | data | uint32 masked crc32c(data)
 *
 * with little-endian integers. Files may be GZIP or ZLIB compressed.
 */
import type { Readable } from 'node:stream'
import { call, resource, type Operation } from 'effection'
import { resolveDatasetConfig } from '../config/context.ts'
import { DataLossError } from '../errors.ts'
import { DONE, yielded } from '../execution/cursor.ts'
import { useLogger } from '../logger/context.ts'
import { scalar } from '../schema/builders.ts'
import type { Compression } from '../validation.ts'
import { openInputStream } from './files.ts'
import { defineNode, type DatasetNode } from './node.ts'

const HEADER_BYTES = 12
const FOOTER_BYTES = 4
const MASK_DELTA = 0xa282ead8

// Castagnoli polynomial, reflected
const CRC32C_TABLE = new Uint32Array(256)
for (let i = 0; i < 256; i++) {
  let c = i
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0x82f63b78 ^ (c >>> 1) : c >>> 1
  }
  CRC32C_TABLE[i] = c >>> 0
}

export function crc32c(data: Uint8Array): number {
  let crc = 0xffffffff
  for (const byte of data) {
    crc = CRC32C_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8)
  }
  return (crc ^ 0xffffffff) >>> 0
}

export function maskCrc(crc: number): number {
  const rotated = ((crc >>> 15) | (crc << 17)) >>> 0
  return (rotated + MASK_DELTA) >>> 0
}

/**
 * Frame one record. Concatenated frames form a readable file.
 */
export function encodeFramedRecord(data: Uint8Array): Uint8Array {
  const frame = new Uint8Array(HEADER_BYTES + data.length + FOOTER_BYTES)
  const view = new DataView(frame.buffer)
  view.setBigUint64(0, BigInt(data.length), true)
  view.setUint32(8, maskCrc(crc32c(frame.subarray(0, 8))), true)
  frame.set(data, HEADER_BYTES)
  view.setUint32(HEADER_BYTES + data.length, maskCrc(crc32c(data)), true)
  return frame
}

interface ByteReader {
  /** Exactly `size` bytes, or fewer at end of input. */
  read(size: number): Operation<Uint8Array>
  close(): void
}

function openByteReader(input: Readable): ByteReader {
  const chunks: AsyncIterator<Buffer> = input[Symbol.asyncIterator]()
  let parts: Buffer[] = []
  let available = 0
  let ended = false

  return {
    *read(size) {
      while (available < size && !ended) {
        const chunk = yield* call(() => chunks.next())
        if (chunk.done) {
          ended = true
        } else {
          parts.push(chunk.value)
          available += chunk.value.length
        }
      }
      const joined = parts.length === 1 ? parts[0] : Buffer.concat(parts)
      const bytes = joined.subarray(0, size)
      const rest = joined.subarray(bytes.length)
      parts = rest.length > 0 ? [rest] : []
      available = rest.length
      return bytes
    },
    close() {
      input.destroy()
    },
  }
}

interface FramedRecordReader {
  next(): Operation<Uint8Array | undefined>
  close(): void
}

function openFramedRecordReader(
  filename: string,
  compression: Compression,
  bufferBytes: number
): FramedRecordReader {
  const bytes = openByteReader(openInputStream(filename, compression, bufferBytes))
  let offset = 0

  return {
    *next() {
      const header = yield* bytes.read(HEADER_BYTES)
      if (header.length === 0) return undefined
      if (header.length < HEADER_BYTES) {
        throw new DataLossError(`${filename}: truncated record header at offset ${offset}`)
      }
      const view = new DataView(header.buffer, header.byteOffset, HEADER_BYTES)
      if (view.getUint32(8, true) !== maskCrc(crc32c(header.subarray(0, 8)))) {
        throw new DataLossError(`${filename}: corrupted record length at offset ${offset}`)
      }
      const length = Number(view.getBigUint64(0, true))

      const body = yield* bytes.read(length + FOOTER_BYTES)
      if (body.length < length + FOOTER_BYTES) {
        throw new DataLossError(`${filename}: truncated record at offset ${offset}`)
      }
      const data = body.subarray(0, length)
      const checksum = new DataView(body.buffer, body.byteOffset + length, FOOTER_BYTES)
      if (checksum.getUint32(0, true) !== maskCrc(crc32c(data))) {
        throw new DataLossError(`${filename}: corrupted record data at offset ${offset}`)
      }
      offset += HEADER_BYTES + length + FOOTER_BYTES
      return new Uint8Array(data)
    },
    close() {
      bytes.close()
    },
  }
}

/**
 * One bytes scalar per framed record of each file, in order. Checksums are
 * verified; a damaged or truncated frame raises DataLossError.
 */
export function createFramedRecordNode(
  filenames: readonly string[],
  compression: Compression
): DatasetNode {
  return defineNode({
    kind: 'FramedRecordDataset',
    schema: scalar('bytes'),
    open: () =>
      resource(function* (provide) {
        const config = yield* resolveDatasetConfig()
        const log = yield* useLogger('dataset:framed-records')
        let fileIndex = 0
        let reader: FramedRecordReader | undefined

        try {
          yield* provide({
            *next() {
              while (true) {
                if (!reader) {
                  const filename = filenames[fileIndex++]
                  if (filename === undefined) return DONE
                  log.debug({ filename, compression }, 'opening file')
                  reader = openFramedRecordReader(filename, compression, config.readerBufferBytes)
                }
                const record = yield* reader.next()
                if (record !== undefined) return yielded(record)
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
