import { resource } from 'effection'
import { z } from 'zod'
import { DONE, yielded } from '../execution/cursor.ts'
import { SeededRandom, randomSeed } from '../execution/random.ts'
import { useLogger } from '../logger/context.ts'
import { PositiveIntSchema, parseArg } from '../validation.ts'
import { defineNode, type DatasetNode } from './node.ts'

const SeedSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .optional()

/**
 * Emit elements in a random order drawn from a sliding buffer of
 * `bufferSize` elements. Each opening re-seeds with `seed` (a fresh random
 * seed when omitted).
 */
export function createShuffleNode(
  input: DatasetNode,
  bufferSize: number,
  seed?: number
): DatasetNode {
  const capacity = parseArg('shuffle bufferSize', PositiveIntSchema, bufferSize)
  const fixedSeed = parseArg('shuffle seed', SeedSchema, seed)

  return defineNode({
    kind: 'ShuffleDataset',
    inputs: [input],
    schema: () => input.schema,
    open: () =>
      resource(function* (provide) {
        const log = yield* useLogger('dataset:shuffle')
        const upstream = yield* input.open()
        const effectiveSeed = fixedSeed ?? randomSeed()
        const random = new SeededRandom(effectiveSeed)
        const buffer: unknown[] = []
        let endOfInput = false
        log.debug({ bufferSize: capacity, seed: effectiveSeed }, 'shuffle opened')

        yield* provide({
          *next() {
            while (!endOfInput && buffer.length < capacity) {
              const next = yield* upstream.next()
              if (next.done) {
                endOfInput = true
              } else {
                buffer.push(next.value)
              }
            }
            if (buffer.length === 0) return DONE

            const index = random.int(0, buffer.length - 1)
            const value = buffer[index]
            if (!endOfInput) {
              const refill = yield* upstream.next()
              if (!refill.done) {
                buffer[index] = refill.value
                return yielded(value)
              }
              endOfInput = true
            }
            const last = buffer.pop()
            if (index < buffer.length) buffer[index] = last
            return yielded(value)
          },
        })
      }),
  })
}
