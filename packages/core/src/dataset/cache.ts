import { resource } from 'effection'
import { isAbsolute, resolve } from 'node:path'
import { resolveDatasetConfig } from '../config/context.ts'
import { fromArray } from '../execution/cursor.ts'
import { useLogger } from '../logger/context.ts'
import { createFileCacheStore, createMemoryCacheStore, type CacheStore } from './cache-store.ts'
import { defineNode, type DatasetNode } from './node.ts'

const MEMORY_KEY = 'memory'

/**
 * Record the first complete pass over `input` and replay it on every later
 * opening. An empty `key` keeps the pass in memory; otherwise it is written
 * to a file (relative keys resolve against the cache directory).
 */
export function createCacheNode(input: DatasetNode, key: string): DatasetNode {
  let memory: CacheStore | undefined

  const node: DatasetNode = defineNode({
    kind: 'CacheDataset',
    inputs: [input],
    schema: () => input.schema,
    open: () =>
      resource(function* (provide) {
        const log = yield* useLogger('dataset:cache')
        let store: CacheStore
        let path = MEMORY_KEY
        if (key === '') {
          memory ??= createMemoryCacheStore()
          store = memory
        } else {
          const config = yield* resolveDatasetConfig()
          path = isAbsolute(key) ? key : resolve(config.cacheDir, key)
          store = createFileCacheStore(node.schema)
        }

        const recorded = yield* store.lookup(path)
        if (recorded) {
          log.debug({ key: path, count: recorded.length }, 'cache replay')
          yield* provide(yield* fromArray(recorded))
          return
        }

        const upstream = yield* input.open()
        const pass: unknown[] = []
        let committed = false

        yield* provide({
          *next() {
            const next = yield* upstream.next()
            if (next.done) {
              if (!committed) {
                committed = true
                yield* store.commit(path, pass)
                log.debug({ key: path, count: pass.length }, 'cache committed')
              }
              return next
            }
            pass.push(next.value)
            return next
          },
        })
      }),
  })
  return node
}
