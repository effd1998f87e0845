import { resource, useScope } from 'effection'
import { InvalidArgumentError } from '../errors.ts'
import { DONE, openWithin, yielded, type Cursor, type Lease } from '../execution/cursor.ts'
import { useLogger } from '../logger/context.ts'
import { record, tuple } from '../schema/builders.ts'
import { assertSameTypes, generalizeSchema, isPlainRecord, recordKeys } from '../schema/structure.ts'
import type { Schema } from '../schema/types.ts'
import { CountSchema, parseArg } from '../validation.ts'
import { defineNode, isDatasetNode, type DatasetNode } from './node.ts'

// =============================================================================
// Zip
// =============================================================================

/** A tuple or record (possibly nested) whose leaves are nodes. */
export type NodeStructure =
  | DatasetNode
  | readonly NodeStructure[]
  | { readonly [key: string]: NodeStructure }

function isNodeList(value: NodeStructure): value is readonly NodeStructure[] {
  return Array.isArray(value)
}

function flattenNodes(structure: NodeStructure): DatasetNode[] {
  if (isDatasetNode(structure)) return [structure]
  if (isNodeList(structure)) return structure.flatMap(flattenNodes)
  if (!isPlainRecord(structure)) {
    throw new InvalidArgumentError('zip: expected datasets nested in tuples or records')
  }
  return recordKeys(structure).flatMap((key) => {
    const child = structure[key]
    return child === undefined ? [] : flattenNodes(child)
  })
}

/**
 * Replace each node of `structure` by `leafOf(node)`, keeping the nesting.
 */
function mapNodes<T>(
  structure: NodeStructure,
  leafOf: (node: DatasetNode) => T,
  tupleOf: (items: T[]) => T,
  recordOf: (fields: Record<string, T>) => T
): T {
  if (isDatasetNode(structure)) return leafOf(structure)
  if (isNodeList(structure)) {
    return tupleOf(structure.map((child) => mapNodes(child, leafOf, tupleOf, recordOf)))
  }
  const fields: Record<string, T> = {}
  for (const key of recordKeys(structure)) {
    const child = structure[key]
    if (child !== undefined) fields[key] = mapNodes(child, leafOf, tupleOf, recordOf)
  }
  return recordOf(fields)
}

/**
 * Lockstep combination of several datasets; ends with the shortest.
 */
export function createZipNode(structure: NodeStructure): DatasetNode {
  const inputs = flattenNodes(structure)
  if (inputs.length === 0) {
    throw new InvalidArgumentError('zip: requires at least one dataset')
  }

  return defineNode({
    kind: 'ZipDataset',
    inputs,
    schema: () =>
      mapNodes<Schema>(
        structure,
        (node) => node.schema,
        (items) => tuple(...items),
        (fields) => record(fields)
      ),
    open: () =>
      resource(function* (provide) {
        const cursors: Cursor[] = []
        for (const input of inputs) {
          cursors.push(yield* input.open())
        }
        let finished = false

        yield* provide({
          *next() {
            if (finished) return DONE
            const values: unknown[] = []
            for (const cursor of cursors) {
              const next = yield* cursor.next()
              if (next.done) {
                finished = true
                return DONE
              }
              values.push(next.value)
            }
            let position = 0
            const element = mapNodes<unknown>(
              structure,
              () => values[position++],
              (items) => items,
              (fields) => fields
            )
            return yielded(element)
          },
        })
      }),
  })
}

// =============================================================================
// Concatenate
// =============================================================================

/**
 * All elements of `first`, then all elements of `second`.
 */
export function createConcatenateNode(first: DatasetNode, second: DatasetNode): DatasetNode {
  assertSameTypes(first.schema, second.schema)
  const schema = generalizeSchema(first.schema, second.schema)

  return defineNode({
    kind: 'ConcatenateDataset',
    inputs: [first, second],
    schema,
    open: () =>
      resource(function* (provide) {
        const scope = yield* useScope()
        const pending = [first, second]
        let lease: Lease | undefined

        yield* provide({
          *next() {
            while (true) {
              if (!lease) {
                const input = pending.shift()
                if (!input) return DONE
                lease = yield* openWithin(scope, input.open())
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

// =============================================================================
// Repeat
// =============================================================================

/**
 * Re-open `input` `count` times (`-1`: forever). Stops early when a pass
 * produces nothing.
 */
export function createRepeatNode(input: DatasetNode, count: number): DatasetNode {
  const times = parseArg('repeat count', CountSchema, count)

  return defineNode({
    kind: 'RepeatDataset',
    inputs: [input],
    schema: () => input.schema,
    open: () =>
      resource(function* (provide) {
        const scope = yield* useScope()
        const log = yield* useLogger('dataset:repeat')
        let epoch = 0
        let produced = false
        let finished = false
        let lease: Lease | undefined

        yield* provide({
          *next() {
            while (!finished) {
              if (!lease) {
                if (times !== -1 && epoch >= times) break
                lease = yield* openWithin(scope, input.open())
                epoch++
                produced = false
              }
              const next = yield* lease.cursor.next()
              if (!next.done) {
                produced = true
                return next
              }
              yield* lease.close()
              lease = undefined
              if (!produced) {
                log.debug({ epoch }, 'upstream produced no elements; stopping')
                break
              }
            }
            finished = true
            return DONE
          },
        })
      }),
  })
}
