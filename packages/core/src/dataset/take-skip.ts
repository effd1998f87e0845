import { resource } from 'effection'
import { DONE } from '../execution/cursor.ts'
import { CountSchema, parseArg } from '../validation.ts'
import { defineNode, type DatasetNode } from './node.ts'

/** The first `count` elements (`-1`: all). */
export function createTakeNode(input: DatasetNode, count: number): DatasetNode {
  const limit = parseArg('take count', CountSchema, count)

  return defineNode({
    kind: 'TakeDataset',
    inputs: [input],
    schema: () => input.schema,
    open: () =>
      resource(function* (provide) {
        const upstream = yield* input.open()
        let taken = 0

        yield* provide({
          *next() {
            if (limit !== -1 && taken >= limit) return DONE
            const next = yield* upstream.next()
            if (!next.done) taken++
            return next
          },
        })
      }),
  })
}

/** Everything after the first `count` elements (`-1`: nothing). */
export function createSkipNode(input: DatasetNode, count: number): DatasetNode {
  const limit = parseArg('skip count', CountSchema, count)

  return defineNode({
    kind: 'SkipDataset',
    inputs: [input],
    schema: () => input.schema,
    open: () =>
      resource(function* (provide) {
        const upstream = yield* input.open()
        let skipped = 0

        yield* provide({
          *next() {
            while (limit === -1 || skipped < limit) {
              const next = yield* upstream.next()
              if (next.done) return DONE
              skipped++
            }
            return yield* upstream.next()
          },
        })
      }),
  })
}
