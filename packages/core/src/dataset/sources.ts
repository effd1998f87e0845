import { resource } from 'effection'
import { z } from 'zod'
import { InvalidArgumentError } from '../errors.ts'
import { DONE, fromArray, yielded, type CursorStream } from '../execution/cursor.ts'
import { leaf, scalar } from '../schema/builders.ts'
import { inferSchema } from '../schema/infer.ts'
import { flatten, generalizeSchema, leafPaths, mapSchema, pack } from '../schema/structure.ts'
import type { Schema } from '../schema/types.ts'
import { Tensor } from '../tensor/tensor.ts'
import { parseArg } from '../validation.ts'
import { defineNode, type DatasetNode } from './node.ts'

/**
 * A cursor producing `count` elements computed by index.
 */
function generate(count: number, at: (index: number) => unknown): CursorStream {
  return resource(function* (provide) {
    let index = 0
    yield* provide({
      *next() {
        if (index >= count) return DONE
        return yielded(at(index++))
      },
    })
  })
}

/** One element. */
export function createTensorsNode(element: unknown): DatasetNode {
  const schema = inferSchema(element)
  return defineNode({
    kind: 'TensorDataset',
    schema,
    open: () => fromArray([element]),
  })
}

/**
 * One element per entry along the leading dimension of every leaf.
 */
export function createSlicesNode(element: unknown): DatasetNode {
  const inferred = inferSchema(element)
  const paths = leafPaths(inferred)
  const tensors: Tensor[] = []
  let extent: number | undefined

  flatten(element, inferred).forEach((value, i) => {
    const path = paths[i] ?? 'element'
    if (!(value instanceof Tensor) || value.rank < 1) {
      throw new InvalidArgumentError(`${path}: slicing requires a tensor of rank >= 1`)
    }
    const [leading] = value.shape
    if (extent === undefined) {
      extent = leading
    } else if (leading !== extent) {
      throw new InvalidArgumentError(
        `${path}: leading dimension ${String(leading)} differs from ${extent}`
      )
    }
    tensors.push(value)
  })

  const schema = mapSchema(inferred, (node) =>
    leaf(node.dtype, node.shape === null ? null : node.shape.slice(1))
  )
  const count = extent ?? 0

  return defineNode({
    kind: 'TensorSliceDataset',
    schema,
    open: () =>
      generate(count, (index) =>
        pack(
          schema,
          tensors.map((tensor) => tensor.slice(index))
        )
      ),
  })
}

/**
 * One element per array entry; the schema is the widest one describing all of
 * them.
 */
export function createValuesNode(values: readonly unknown[]): DatasetNode {
  const snapshot = [...values]
  const schemas = snapshot.map((value) => inferSchema(value))
  const [first, ...rest] = schemas
  if (first === undefined) {
    throw new InvalidArgumentError('fromValues: cannot infer a schema from an empty list')
  }
  const schema: Schema = rest.reduce(generalizeSchema, first)
  return defineNode({
    kind: 'ValuesDataset',
    schema,
    open: () => fromArray(snapshot),
  })
}

const RangeBound = z
  .number({ invalid_type_error: 'must be a number' })
  .int('bounds and step must be integers')

const RangeArgs = z
  .object({ start: RangeBound, stop: RangeBound, step: RangeBound })
  .refine(({ step }) => step !== 0, { message: 'step must not be zero' })

/**
 * Half-open arithmetic sequence `[start, stop)`.
 */
export function createRangeNode(start: number, stop: number, step: number): DatasetNode {
  const args = parseArg('range', RangeArgs, { start, stop, step })
  const span = args.stop - args.start
  const count = span / args.step > 0 ? Math.ceil(span / args.step) : 0

  return defineNode({
    kind: 'RangeDataset',
    schema: scalar('number'),
    open: () => generate(count, (index) => args.start + index * args.step),
  })
}
