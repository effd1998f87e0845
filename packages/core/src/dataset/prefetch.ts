import { resource, spawn } from 'effection'
import { createBoundedBuffer } from '../execution/buffer.ts'
import { toError } from '../execution/invoke.ts'
import { useLogger } from '../logger/context.ts'
import { PositiveIntSchema, parseArg } from '../validation.ts'
import { defineNode, type DatasetNode } from './node.ts'

/**
 * Pull upstream ahead of the consumer into a buffer of `bufferSize`
 * elements. Order is preserved and upstream errors surface at the position
 * they occurred.
 */
export function createPrefetchNode(input: DatasetNode, bufferSize: number): DatasetNode {
  const capacity = parseArg('prefetch bufferSize', PositiveIntSchema, bufferSize)

  return defineNode({
    kind: 'PrefetchDataset',
    inputs: [input],
    schema: () => input.schema,
    open: () =>
      resource(function* (provide) {
        const log = yield* useLogger('dataset:prefetch')
        const upstream = yield* input.open()
        const buffer = createBoundedBuffer<unknown>(capacity)

        yield* spawn(function* () {
          log.debug({ bufferSize: capacity }, 'worker started')
          let produced = 0
          try {
            while (true) {
              const next = yield* upstream.next()
              if (next.done) break
              yield* buffer.put(next.value)
              produced++
            }
            buffer.close()
          } catch (error) {
            buffer.fail(toError(error))
          } finally {
            log.debug({ produced }, 'worker stopped')
          }
        })

        yield* provide({
          *next() {
            return yield* buffer.take()
          },
        })
      }),
  })
}
