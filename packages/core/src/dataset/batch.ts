/**
 * Batching: stack consecutive elements leaf-wise, optionally padding each
 * leaf to a per-batch target shape.
 */
import { resource, type Operation } from 'effection'
import { z } from 'zod'
import {
  InvalidArgumentError,
  ShapeMismatchError,
  TypeMismatchError,
} from '../errors.ts'
import { DONE, yielded, type Cursor } from '../execution/cursor.ts'
import { leaf } from '../schema/builders.ts'
import { formatShape } from '../schema/shape.ts'
import { flatten, flattenSchema, leafPaths, mapSchema, pack } from '../schema/structure.ts'
import type { LeafSchema, Scalar, Schema } from '../schema/types.ts'
import { dtypeOf, isScalar, zeroOf } from '../tensor/dtype.ts'
import { Tensor, stack } from '../tensor/tensor.ts'
import { PositiveIntSchema, parseArg } from '../validation.ts'
import { defineNode, type DatasetNode } from './node.ts'

function batchedSchema(schema: Schema, targetOf?: (index: number) => readonly (number | null)[]): Schema {
  let index = 0
  return mapSchema(schema, (node) => {
    const target = targetOf ? targetOf(index++) : node.shape
    return leaf(node.dtype, target === null ? null : [null, ...target])
  })
}

function* pullBatch(upstream: Cursor, size: number): Operation<unknown[]> {
  const batch: unknown[] = []
  while (batch.length < size) {
    const next = yield* upstream.next()
    if (next.done) break
    batch.push(next.value)
  }
  return batch
}

/** Per-leaf columns of a batch, in flattening order. */
function columnsOf(batch: readonly unknown[], schema: Schema): unknown[][] {
  const columns: unknown[][] = flattenSchema(schema).map(() => [])
  for (const element of batch) {
    flatten(element, schema).forEach((value, i) => columns[i]?.push(value))
  }
  return columns
}

function asLeafValue(value: unknown, path: string): Tensor | Scalar {
  if (value instanceof Tensor || isScalar(value)) return value
  throw new TypeMismatchError(`${path}: ${typeof value} is not a leaf value`)
}

function stackColumn(values: readonly unknown[], path: string): Tensor {
  try {
    return stack(values.map((value) => asLeafValue(value, path)))
  } catch (error) {
    if (error instanceof ShapeMismatchError) {
      throw new ShapeMismatchError(`batch ${path}: ${error.message}`)
    }
    throw error
  }
}

/**
 * Stack `batchSize` consecutive elements; the final batch may be smaller.
 */
export function createBatchNode(input: DatasetNode, batchSize: number): DatasetNode {
  const size = parseArg('batch batchSize', PositiveIntSchema, batchSize)

  return defineNode({
    kind: 'BatchDataset',
    inputs: [input],
    schema: () => batchedSchema(input.schema),
    open: () =>
      resource(function* (provide) {
        const upstream = yield* input.open()
        const schema = input.schema
        const paths = leafPaths(schema)

        yield* provide({
          *next() {
            const batch = yield* pullBatch(upstream, size)
            if (batch.length === 0) return DONE
            const columns = columnsOf(batch, schema).map((column, i) =>
              stackColumn(column, paths[i] ?? 'element')
            )
            return yielded(pack(schema, columns))
          },
        })
      }),
  })
}

// =============================================================================
// Padded batch
// =============================================================================

const PaddedDimsSchema = z
  .array(
    z.union([
      z.null(),
      z.number().int('dimensions must be integers').min(-1, 'dimensions must be >= -1'),
    ]),
    { invalid_type_error: 'expected a list of dimensions' }
  )
  .transform((dims) => dims.map((dim) => (dim === -1 ? null : dim)))

interface PaddedLeaf {
  readonly path: string
  readonly schema: LeafSchema
  /** Target dims; `null` pads to the largest extent in the batch. */
  readonly target: readonly (number | null)[]
  readonly pad: Scalar
}

function planPaddedLeaves(
  schema: Schema,
  paddedShapes: unknown,
  paddingValues: unknown
): PaddedLeaf[] {
  const schemas = flattenSchema(schema)
  const paths = leafPaths(schema)
  const shapes = flatten(paddedShapes, schema)
  const pads =
    paddingValues === undefined ? schemas.map(() => undefined) : flatten(paddingValues, schema)

  return schemas.map((node, i): PaddedLeaf => {
    const path = paths[i] ?? 'element'
    const target = parseArg(`paddedBatch ${path}`, PaddedDimsSchema, shapes[i])

    if (node.shape !== null) {
      if (node.shape.length !== target.length) {
        throw new ShapeMismatchError(
          `paddedBatch ${path}: padded shape ${formatShape(target)} does not match rank of ${formatShape(node.shape)}`
        )
      }
      node.shape.forEach((dim, axis) => {
        const wanted = target[axis]
        if (dim !== null && wanted !== null && wanted !== undefined && wanted < dim) {
          throw new ShapeMismatchError(
            `paddedBatch ${path}: padded shape ${formatShape(target)} is smaller than ${formatShape(node.shape)}`
          )
        }
      })
    }

    const value = pads[i]
    let pad: Scalar
    if (value === undefined) {
      pad = zeroOf(node.dtype)
    } else if (value instanceof Tensor && value.rank === 0 && value.data[0] !== undefined) {
      pad = value.data[0]
    } else if (isScalar(value)) {
      pad = value
    } else {
      throw new InvalidArgumentError(`paddedBatch ${path}: padding value must be a scalar`)
    }
    const padType = dtypeOf(pad)
    if (padType !== node.dtype) {
      throw new TypeMismatchError(
        `paddedBatch ${path}: padding value of dtype ${padType ?? typeof pad} does not match ${node.dtype}`
      )
    }

    return { path, schema: node, target, pad }
  })
}

function padColumn(values: readonly unknown[], plan: PaddedLeaf): Tensor {
  const leaves = values.map((value) => {
    const item = asLeafValue(value, plan.path)
    return item instanceof Tensor ? item : Tensor.fromFlat([item], [], plan.schema.dtype)
  })

  const shape = plan.target.map((wanted, axis) => {
    let extent = 0
    for (const item of leaves) {
      if (item.rank !== plan.target.length) {
        throw new ShapeMismatchError(
          `paddedBatch ${plan.path}: element of shape ${formatShape(item.shape)} does not match padded rank ${plan.target.length}`
        )
      }
      const dim = item.shape[axis] ?? 0
      if (wanted !== null && dim > wanted) {
        throw new ShapeMismatchError(
          `paddedBatch ${plan.path}: element of shape ${formatShape(item.shape)} exceeds padded shape ${formatShape(plan.target)}`
        )
      }
      extent = Math.max(extent, dim)
    }
    return wanted ?? extent
  })

  if (plan.target.length === 0) {
    leaves.forEach((item) => {
      if (item.rank !== 0) {
        throw new ShapeMismatchError(
          `paddedBatch ${plan.path}: element of shape ${formatShape(item.shape)} does not match padded rank 0`
        )
      }
    })
  }

  return stack(leaves.map((item) => (item.rank === 0 ? item : item.padTo(shape, plan.pad))))
}

/**
 * Batch with per-leaf right padding. Output leaves have shape
 * `[null, ...paddedShape]`.
 */
export function createPaddedBatchNode(
  input: DatasetNode,
  batchSize: number,
  paddedShapes: unknown,
  paddingValues?: unknown
): DatasetNode {
  const size = parseArg('paddedBatch batchSize', PositiveIntSchema, batchSize)
  const schema = input.schema
  const plan = planPaddedLeaves(schema, paddedShapes, paddingValues)

  return defineNode({
    kind: 'PaddedBatchDataset',
    inputs: [input],
    schema: batchedSchema(schema, (index) => plan[index]?.target ?? []),
    open: () =>
      resource(function* (provide) {
        const upstream = yield* input.open()

        yield* provide({
          *next() {
            const batch = yield* pullBatch(upstream, size)
            if (batch.length === 0) return DONE
            const columns = columnsOf(batch, schema).map((column, i) => {
              const leafPlan = plan[i]
              if (!leafPlan) {
                throw new InvalidArgumentError(`paddedBatch: missing plan for leaf ${i}`)
              }
              return padColumn(column, leafPlan)
            })
            return yielded(pack(schema, columns))
          },
        })
      }),
  })
}
