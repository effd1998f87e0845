import {
  InvalidArgumentError,
  ShapeMismatchError,
  TypeMismatchError,
} from '../errors.ts'
import { dtypeOf, zeroOf } from '../tensor/dtype.ts'
import { Tensor } from '../tensor/tensor.ts'
import { leaf, record, tuple } from './builders.ts'
import { formatShape, isFullyDefined, isShapeCompatible } from './shape.ts'
import { flatten, flattenSchema, isPlainRecord, leafPaths, mapSchema, pack, recordKeys } from './structure.ts'
import type { Schema } from './types.ts'

/**
 * Schema of a concrete element. Every shape in the result is fully known.
 *
 * @throws InvalidArgumentError for values that are not elements.
 */
export function inferSchema(element: unknown, path = 'element'): Schema {
  if (element instanceof Tensor) {
    return leaf(element.dtype, element.shape)
  }
  const dtype = dtypeOf(element)
  if (dtype !== undefined) {
    return leaf(dtype, [])
  }
  if (Array.isArray(element)) {
    const items: readonly unknown[] = element
    return tuple(...items.map((item, i) => inferSchema(item, `${path}[${i}]`)))
  }
  if (isPlainRecord(element)) {
    const fields: Record<string, Schema> = {}
    for (const key of recordKeys(element)) {
      fields[key] = inferSchema(element[key], `${path}.${key}`)
    }
    return record(fields)
  }
  throw new InvalidArgumentError(
    `${path}: ${element === null ? 'null' : typeof element} is not a supported element value`
  )
}

/**
 * Check that a concrete element conforms to `schema`.
 */
export function validateElement(element: unknown, schema: Schema): void {
  const leaves = flatten(element, schema)
  const schemas = flattenSchema(schema)
  const paths = leafPaths(schema)
  leaves.forEach((value, i) => {
    const expected = schemas[i]
    if (!expected) return
    const path = paths[i] ?? 'element'
    const actual = value instanceof Tensor ? value.dtype : dtypeOf(value)
    if (actual !== expected.dtype) {
      throw new TypeMismatchError(
        `${path}: expected dtype ${expected.dtype}, received ${actual ?? typeof value}`
      )
    }
    const shape = value instanceof Tensor ? value.shape : []
    if (!isShapeCompatible(expected.shape, shape)) {
      throw new ShapeMismatchError(
        `${path}: expected shape ${formatShape(expected.shape)}, received ${formatShape(shape)}`
      )
    }
  })
}

/**
 * A representative element of `schema`: zero values, with unknown dimensions
 * given extent 1 and unknown ranks treated as scalars.
 */
export function sampleElement(schema: Schema): unknown {
  const leaves = flattenSchema(schema).map((node) => {
    const shape = node.shape ?? []
    if (shape.length === 0) return zeroOf(node.dtype)
    return Tensor.zeros(
      shape.map((dim) => dim ?? 1),
      node.dtype
    )
  })
  return pack(schema, leaves)
}

/** True when every leaf shape of `schema` is fully known. */
export function isSchemaFullyDefined(schema: Schema): boolean {
  return flattenSchema(schema).every((node) => isFullyDefined(node.shape))
}

/**
 * Schema of a value computed from a sample element. Tensor dimensions are
 * unknown (rank kept) since they may depend on the element.
 */
export function inferResultSchema(result: unknown): Schema {
  return generalizeDims(inferSchema(result))
}

function generalizeDims(schema: Schema): Schema {
  return mapSchema(schema, (node) =>
    leaf(node.dtype, node.shape === null ? null : node.shape.map(() => null))
  )
}
