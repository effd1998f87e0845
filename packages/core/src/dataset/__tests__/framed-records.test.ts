import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { gzipSync } from 'node:zlib'
import { call, type Operation } from 'effection'
import {
  describe,
  it,
  beforeEach,
  afterEach,
  expect,
} from '../../__tests__/vitest-effection.ts'
import { failure } from '../../__tests__/helpers.ts'
import { DatasetConfigContext } from '../../config/context.ts'
import { DataLossError } from '../../errors.ts'
import { collect } from '../../iterator/iterator.ts'
import { Dataset } from '../dataset.ts'
import { crc32c, encodeFramedRecord } from '../framed-records.ts'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

function framed(...records: string[]): Buffer {
  return Buffer.concat(records.map((record) => encodeFramedRecord(encoder.encode(record))))
}

let dir = ''

function* fixture(name: string, contents: Uint8Array): Operation<string> {
  const path = join(dir, name)
  yield* call(() => writeFile(path, contents))
  return path
}

function* readText(dataset: Dataset<Uint8Array>): Operation<string[]> {
  const records = yield* collect(dataset)
  return records.map((record) => decoder.decode(record))
}

describe('crc32c', () => {
  it('matches the check value of the Castagnoli polynomial', function* () {
    expect(crc32c(encoder.encode('123456789'))).toBe(0xe3069283)
    expect(crc32c(new Uint8Array(0))).toBe(0)
  })
})

describe('Dataset.framedRecords', () => {
  beforeEach(function* () {
    dir = yield* call(() => mkdtemp(join(tmpdir(), 'feedline-framed-')))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('yields each record, including empty ones', function* () {
    const path = yield* fixture('plain.rec', framed('alpha', '', 'gamma'))
    expect(yield* readText(Dataset.framedRecords(path))).toEqual(['alpha', '', 'gamma'])
  })

  it('reads files in order', function* () {
    const first = yield* fixture('a.rec', framed('1', '2'))
    const second = yield* fixture('b.rec', framed('3'))
    expect(yield* readText(Dataset.framedRecords([second, first]))).toEqual(['3', '1', '2'])
  })

  it('decompresses gzip files', function* () {
    const path = yield* fixture('zipped.rec.gz', gzipSync(framed('zipped', 'records')))
    expect(yield* readText(Dataset.framedRecords(path, { compression: 'GZIP' }))).toEqual([
      'zipped',
      'records',
    ])
  })

  it('reassembles frames split across small reads', function* () {
    yield* DatasetConfigContext.set({ readerBufferBytes: 3 })
    const path = yield* fixture('small.rec', framed('split', 'across', 'reads'))
    expect(yield* readText(Dataset.framedRecords(path))).toEqual(['split', 'across', 'reads'])
  })

  it('rejects a record whose data fails its checksum', function* () {
    const bytes = framed('alpha')
    bytes[12] = bytes[12] ^ 0xff
    const path = yield* fixture('corrupt.rec', bytes)
    const error = yield* failure(() => collect(Dataset.framedRecords(path)))
    expect(error).toBeInstanceOf(DataLossError)
    expect(error).toMatchObject({
      code: 'DATA_LOSS',
      message: `${path}: corrupted record data at offset 0`,
    })
  })

  it('rejects a truncated final record', function* () {
    const bytes = framed('ab', 'cd')
    const path = yield* fixture('truncated.rec', bytes.subarray(0, bytes.length - 2))
    const dataset = Dataset.framedRecords(path)
    const iterator = yield* dataset.makeOneShotIterator()
    expect(decoder.decode(yield* iterator.next())).toBe('ab')
    expect(yield* failure(() => iterator.next())).toMatchObject({
      message: `${path}: truncated record at offset 18`,
    })
  })
})
