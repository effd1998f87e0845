import { describe, it, expect } from '../../__tests__/vitest-effection.ts'
import { DatasetConfigContext, env, resolveDatasetConfig } from '../index.ts'

describe('resolveDatasetConfig', () => {
  it('defaults to the environment', function* () {
    const config = yield* resolveDatasetConfig()
    expect(config).toEqual({
      cacheDir: env.FEEDLINE_CACHE_DIR,
      readerBufferBytes: env.FEEDLINE_READER_BUFFER_BYTES,
    })
  })

  it('prefers the context over the environment', function* () {
    yield* DatasetConfigContext.set({ cacheDir: '/tmp/from-context' })
    const config = yield* resolveDatasetConfig()
    expect(config.cacheDir).toBe('/tmp/from-context')
    expect(config.readerBufferBytes).toBe(env.FEEDLINE_READER_BUFFER_BYTES)
  })

  it('prefers explicit options over the context', function* () {
    yield* DatasetConfigContext.set({ cacheDir: '/tmp/from-context', readerBufferBytes: 16 })
    const config = yield* resolveDatasetConfig({ readerBufferBytes: 8 })
    expect(config).toEqual({ cacheDir: '/tmp/from-context', readerBufferBytes: 8 })
  })
})
