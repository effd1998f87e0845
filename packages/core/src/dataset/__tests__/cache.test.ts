import { mkdtemp, readdir, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { call } from 'effection'
import {
  describe,
  it,
  beforeEach,
  afterEach,
  expect,
} from '../../__tests__/vitest-effection.ts'
import { DatasetConfigContext } from '../../config/context.ts'
import { collect } from '../../iterator/iterator.ts'
import { scalar } from '../../schema/builders.ts'
import { tensor } from '../../tensor/tensor.ts'
import { createFileCacheStore, createMemoryCacheStore } from '../cache-store.ts'
import { Dataset } from '../dataset.ts'

function counted(calls: { count: number }, size = 3): Dataset<number> {
  return Dataset.range(size).map(
    (x) => {
      calls.count++
      return x
    },
    { schema: scalar('number') }
  )
}

describe('cache in memory', () => {
  it('replays the first complete pass', function* () {
    const calls = { count: 0 }
    const cached = counted(calls).cache()

    expect(yield* collect(cached)).toEqual([0, 1, 2])
    expect(yield* collect(cached)).toEqual([0, 1, 2])
    expect(calls.count).toBe(3)
  })

  it('does not commit a partial pass', function* () {
    const calls = { count: 0 }
    const cached = counted(calls).cache()

    expect(yield* collect(cached, 2)).toEqual([0, 1])
    expect(yield* collect(cached)).toEqual([0, 1, 2])
    expect(yield* collect(cached)).toEqual([0, 1, 2])
    expect(calls.count).toBe(5)
  })

  it('keeps separate caches per pipeline', function* () {
    const calls = { count: 0 }
    const upstream = counted(calls)
    yield* collect(upstream.cache())
    yield* collect(upstream.cache())
    expect(calls.count).toBe(6)
  })
})

describe('cache on disk', () => {
  let dir = ''

  beforeEach(function* () {
    dir = yield* call(() => mkdtemp(join(tmpdir(), 'feedline-cache-')))
    yield* DatasetConfigContext.set({ cacheDir: dir })
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('writes a file named after the key', function* () {
    yield* collect(Dataset.range(3).cache('numbers'))
    const files = yield* call(() => readdir(dir))
    expect(files).toEqual(['numbers.cache'])
  })

  it('replays across pipelines sharing a key', function* () {
    const calls = { count: 0 }
    expect(yield* collect(counted(calls).cache('shared'))).toEqual([0, 1, 2])
    expect(yield* collect(counted(calls).cache('shared'))).toEqual([0, 1, 2])
    expect(calls.count).toBe(3)
  })

  it('restores tensors', function* () {
    yield* collect(Dataset.fromValues([tensor([1, 2]), tensor([3, 4])]).cache('tensors'))
    const replayed = yield* collect(
      Dataset.fromValues([tensor([9, 9]), tensor([9, 9])]).cache('tensors')
    )
    expect(replayed.map((value) => value.toNested())).toEqual([
      [1, 2],
      [3, 4],
    ])
  })

  it('accepts absolute keys', function* () {
    const key = join(dir, 'nested', 'absolute')
    yield* collect(Dataset.fromValues(['a', 'b']).cache(key))
    const files = yield* call(() => readdir(join(dir, 'nested')))
    expect(files).toEqual(['absolute.cache'])
  })
})

describe('cache stores', () => {
  it('keeps the first commit in memory', function* () {
    const store = createMemoryCacheStore()
    expect(yield* store.lookup('k')).toBeUndefined()
    yield* store.commit('k', [1])
    yield* store.commit('k', [2])
    expect(yield* store.lookup('k')).toEqual([1])
  })

  it('reports a missing file as not cached', function* () {
    const store = createFileCacheStore(scalar('number'))
    const missing = join(tmpdir(), 'feedline-cache-missing', 'nothing')
    expect(yield* store.lookup(missing)).toBeUndefined()
  })
})
