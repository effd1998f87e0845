/**
 * Flat-map and interleave: each upstream element becomes a dataset whose
 * elements are emitted.
 */
import { resource, useScope } from 'effection'
import { DONE, openWithin, type Lease } from '../execution/cursor.ts'
import { PositiveIntSchema, parseArg } from '../validation.ts'
import { resolveFunctionSchema } from './map.ts'
import { defineNode, type DatasetNode } from './node.ts'

/** A user function lowered to return a node. */
export type NodeFn = (element: unknown) => DatasetNode

function resolveInnerSchema(name: string, input: DatasetNode, fn: NodeFn) {
  return () => resolveFunctionSchema(name, input, fn, (inner) => inner.schema)
}

/**
 * The elements of `fn(x)` for every upstream `x`, in order.
 */
export function createFlatMapNode(input: DatasetNode, fn: NodeFn): DatasetNode {
  return defineNode({
    kind: 'FlatMapDataset',
    inputs: [input],
    schema: resolveInnerSchema('flatMap', input, fn),
    open: () =>
      resource(function* (provide) {
        const scope = yield* useScope()
        const upstream = yield* input.open()
        let lease: Lease | undefined

        yield* provide({
          *next() {
            while (true) {
              if (!lease) {
                const outer = yield* upstream.next()
                if (outer.done) return DONE
                const inner = fn(outer.value)
                lease = yield* openWithin(scope, inner.open())
              }
              const next = yield* lease.cursor.next()
              if (!next.done) return next
              yield* lease.close()
              lease = undefined
            }
          },
        })
      }),
  })
}

/**
 * Round-robin over up to `cycleLength` open inner datasets, taking up to
 * `blockLength` consecutive elements from each. An exhausted slot is refilled
 * in place from the next upstream element.
 */
export function createInterleaveNode(
  input: DatasetNode,
  fn: NodeFn,
  cycleLength: number,
  blockLength: number
): DatasetNode {
  const cycle = parseArg('interleave cycleLength', PositiveIntSchema, cycleLength)
  const block = parseArg('interleave blockLength', PositiveIntSchema, blockLength)

  return defineNode({
    kind: 'InterleaveDataset',
    inputs: [input],
    schema: resolveInnerSchema('interleave', input, fn),
    open: () =>
      resource(function* (provide) {
        const scope = yield* useScope()
        const upstream = yield* input.open()
        const slots: Array<Lease | undefined> = Array.from({ length: cycle }, () => undefined)
        let cycleIndex = 0
        let blockIndex = 0
        let endOfInput = false
        let numOpen = 0

        const advanceToNextInCycle = () => {
          blockIndex = 0
          cycleIndex = (cycleIndex + 1) % cycle
        }

        yield* provide({
          *next() {
            while (!endOfInput || numOpen > 0) {
              const current = slots[cycleIndex]
              if (current) {
                const next = yield* current.cursor.next()
                if (!next.done) {
                  blockIndex++
                  if (blockIndex === block) advanceToNextInCycle()
                  return next
                }
                yield* current.close()
                slots[cycleIndex] = undefined
                numOpen--
                advanceToNextInCycle()
              } else if (!endOfInput) {
                const outer = yield* upstream.next()
                if (outer.done) {
                  endOfInput = true
                } else {
                  const inner = fn(outer.value)
                  slots[cycleIndex] = yield* openWithin(scope, inner.open())
                  numOpen++
                }
              } else {
                advanceToNextInCycle()
              }
            }
            return DONE
          },
        })
      }),
  })
}
