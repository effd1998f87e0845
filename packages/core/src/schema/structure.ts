import {
  InvalidArgumentError,
  ShapeMismatchError,
  StructureMismatchError,
  TypeMismatchError,
} from '../errors.ts'
import { Tensor } from '../tensor/tensor.ts'
import { leaf, record, tuple } from './builders.ts'
import { formatShape, isShapeCompatible, mostSpecificCompatibleShape } from './shape.ts'
import type { LeafSchema, Schema, Shape, ShapeSpec, TypeSpec } from './types.ts'
import { DTypeSchema } from './types.ts'

const ROOT = 'element'

/**
 * True for plain objects, which are records in an element.
 */
export function isPlainRecord(value: unknown): value is { readonly [key: string]: unknown } {
  if (typeof value !== 'object' || value === null) return false
  if (Array.isArray(value) || value instanceof Tensor || value instanceof Uint8Array) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/** Record keys in flattening order. */
export function recordKeys(fields: object): string[] {
  return Object.keys(fields).sort()
}

function describe(value: unknown): string {
  if (Array.isArray(value)) return `a tuple of ${value.length}`
  if (value instanceof Tensor) return `a tensor`
  if (isPlainRecord(value)) return `a record {${recordKeys(value).join(', ')}}`
  return `a ${typeof value} value`
}

// =============================================================================
// Flatten / pack
// =============================================================================

export function flattenSchema(schema: Schema): LeafSchema[] {
  switch (schema.kind) {
    case 'leaf':
      return [schema]
    case 'tuple':
      return schema.items.flatMap(flattenSchema)
    case 'record':
      return recordKeys(schema.fields).flatMap((key) => {
        const field = schema.fields[key]
        return field ? flattenSchema(field) : []
      })
  }
}

/**
 * List the leaf values of `element` in pre-order, checking its nesting
 * against `schema` on the way.
 *
 * @throws StructureMismatchError naming the first path that differs.
 */
export function flatten(element: unknown, schema: Schema, path = ROOT): unknown[] {
  switch (schema.kind) {
    case 'leaf':
      return [element]
    case 'tuple': {
      if (!Array.isArray(element) || element.length !== schema.items.length) {
        throw new StructureMismatchError(
          `${path}: expected a tuple of ${schema.items.length}, received ${describe(element)}`
        )
      }
      const values: readonly unknown[] = element
      return schema.items.flatMap((item, i) => flatten(values[i], item, `${path}[${i}]`))
    }
    case 'record': {
      const keys = recordKeys(schema.fields)
      if (!isPlainRecord(element) || !sameKeys(recordKeys(element), keys)) {
        throw new StructureMismatchError(
          `${path}: expected a record {${keys.join(', ')}}, received ${describe(element)}`
        )
      }
      return keys.flatMap((key) => {
        const field = schema.fields[key]
        return field ? flatten(element[key], field, `${path}.${key}`) : []
      })
    }
  }
}

function sameKeys(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((key, i) => key === b[i])
}

/**
 * Rebuild a nested element from its leaves, following `schema`.
 */
export function pack(schema: Schema, leaves: readonly unknown[]): unknown {
  let cursor = 0
  const build = (node: Schema): unknown => {
    switch (node.kind) {
      case 'leaf':
        if (cursor >= leaves.length) {
          throw new InvalidArgumentError(
            `Cannot pack ${leaves.length} leaves into a structure of ${flattenSchema(schema).length}`
          )
        }
        return leaves[cursor++]
      case 'tuple':
        return node.items.map(build)
      case 'record': {
        const result: Record<string, unknown> = {}
        for (const key of recordKeys(node.fields)) {
          const field = node.fields[key]
          if (field) result[key] = build(field)
        }
        return result
      }
    }
  }
  const packed = build(schema)
  if (cursor !== leaves.length) {
    throw new InvalidArgumentError(
      `Cannot pack ${leaves.length} leaves into a structure of ${cursor}`
    )
  }
  return packed
}

export function mapSchema(
  schema: Schema,
  fn: (leaf: LeafSchema, path: string) => Schema,
  path = ROOT
): Schema {
  switch (schema.kind) {
    case 'leaf':
      return fn(schema, path)
    case 'tuple':
      return tuple(...schema.items.map((item, i) => mapSchema(item, fn, `${path}[${i}]`)))
    case 'record': {
      const fields: Record<string, Schema> = {}
      for (const key of recordKeys(schema.fields)) {
        const field = schema.fields[key]
        if (field) fields[key] = mapSchema(field, fn, `${path}.${key}`)
      }
      return record(fields)
    }
  }
}

/**
 * Leaf paths in flattening order (`element[0].label`, ...).
 */
export function leafPaths(schema: Schema): string[] {
  const paths: string[] = []
  mapSchema(schema, (node, path) => {
    paths.push(path)
    return node
  })
  return paths
}

// =============================================================================
// Compatibility
// =============================================================================

function assertSameStructure(
  a: Schema,
  b: Schema,
  onLeaf: (a: LeafSchema, b: LeafSchema, path: string) => void,
  path: string
): void {
  if (a.kind !== b.kind) {
    throw new StructureMismatchError(`${path}: ${a.kind} is not compatible with ${b.kind}`)
  }
  if (a.kind === 'leaf' && b.kind === 'leaf') {
    onLeaf(a, b, path)
    return
  }
  if (a.kind === 'tuple' && b.kind === 'tuple') {
    if (a.items.length !== b.items.length) {
      throw new StructureMismatchError(
        `${path}: tuple of ${a.items.length} is not compatible with tuple of ${b.items.length}`
      )
    }
    a.items.forEach((item, i) => {
      const other = b.items[i]
      if (other) assertSameStructure(item, other, onLeaf, `${path}[${i}]`)
    })
    return
  }
  if (a.kind === 'record' && b.kind === 'record') {
    const keys = recordKeys(a.fields)
    const otherKeys = recordKeys(b.fields)
    if (!sameKeys(keys, otherKeys)) {
      throw new StructureMismatchError(
        `${path}: record {${keys.join(', ')}} is not compatible with record {${otherKeys.join(', ')}}`
      )
    }
    for (const key of keys) {
      const field = a.fields[key]
      const other = b.fields[key]
      if (field && other) assertSameStructure(field, other, onLeaf, `${path}.${key}`)
    }
  }
}

function checkDType(a: LeafSchema, b: LeafSchema, path: string): void {
  if (a.dtype !== b.dtype) {
    throw new TypeMismatchError(`${path}: dtype ${a.dtype} is not compatible with ${b.dtype}`)
  }
}

/**
 * @throws StructureMismatchError, TypeMismatchError or ShapeMismatchError at
 * the first differing path.
 */
export function assertCompatible(a: Schema, b: Schema): void {
  assertSameStructure(
    a,
    b,
    (x, y, path) => {
      checkDType(x, y, path)
      if (!isShapeCompatible(x.shape, y.shape)) {
        throw new ShapeMismatchError(
          `${path}: shape ${formatShape(x.shape)} is not compatible with ${formatShape(y.shape)}`
        )
      }
    },
    ROOT
  )
}

export function isCompatible(a: Schema, b: Schema): boolean {
  try {
    assertCompatible(a, b)
    return true
  } catch (error) {
    if (
      error instanceof StructureMismatchError ||
      error instanceof TypeMismatchError ||
      error instanceof ShapeMismatchError
    ) {
      return false
    }
    throw error
  }
}

/**
 * Structure and dtypes must agree; shapes are ignored.
 */
export function assertSameTypes(a: Schema, b: Schema): void {
  assertSameStructure(a, b, checkDType, ROOT)
}

/**
 * The widest schema describing elements of both `a` and `b`.
 */
export function generalizeSchema(a: Schema, b: Schema): Schema {
  assertSameTypes(a, b)
  const others = flattenSchema(b)
  let i = 0
  return mapSchema(a, (node) => {
    const other = others[i++]
    return leaf(node.dtype, other ? mostSpecificCompatibleShape(node.shape, other.shape) : null)
  })
}

// =============================================================================
// Construction from type descriptions
// =============================================================================

function isShape(value: unknown): value is Shape {
  return (
    value === null ||
    (Array.isArray(value) &&
      value.every((dim) => dim === null || (Number.isInteger(dim) && dim >= 0)))
  )
}

function isTypeList(value: TypeSpec): value is readonly TypeSpec[] {
  return Array.isArray(value)
}

function isShapeList(value: ShapeSpec | undefined): value is readonly ShapeSpec[] {
  return Array.isArray(value)
}

function isShapeRecord(
  value: ShapeSpec | undefined
): value is { readonly [key: string]: ShapeSpec } {
  return isPlainRecord(value)
}

/**
 * Build a schema from nested dtypes and (optionally) a parallel structure of
 * shapes. Omitted shapes are unknown rank.
 *
 * @example
 * ```ts
 * schemaOf(['number', 'string'], [[2], []])
 * // tuple(leaf('number', [2]), scalar('string'))
 * ```
 */
export function schemaOf(types: TypeSpec, shapes?: ShapeSpec, path = ROOT): Schema {
  if (typeof types === 'string') {
    const dtype = DTypeSchema.safeParse(types)
    if (!dtype.success) {
      throw new InvalidArgumentError(`${path}: unknown dtype ${JSON.stringify(types)}`)
    }
    if (shapes === undefined) return leaf(dtype.data, null)
    if (!isShape(shapes)) {
      throw new InvalidArgumentError(`${path}: expected a list of dimensions`)
    }
    return leaf(dtype.data, shapes)
  }
  if (isTypeList(types)) {
    const itemShapes = isShapeList(shapes) ? shapes : undefined
    if (shapes !== undefined && shapes !== null && itemShapes?.length !== types.length) {
      throw new StructureMismatchError(
        `${path}: shapes do not follow the tuple of ${types.length} types`
      )
    }
    return tuple(...types.map((item, i) => schemaOf(item, itemShapes?.[i], `${path}[${i}]`)))
  }
  if (!isPlainRecord(types)) {
    throw new InvalidArgumentError(`${path}: unsupported type description`)
  }
  const shapeFields = isShapeRecord(shapes) ? shapes : undefined
  if (shapes !== undefined && shapes !== null && shapeFields === undefined) {
    throw new StructureMismatchError(`${path}: shapes do not follow the record of types`)
  }
  const fields: Record<string, Schema> = {}
  for (const key of recordKeys(types)) {
    const field = types[key]
    if (field === undefined) continue
    fields[key] = schemaOf(field, shapeFields?.[key], `${path}.${key}`)
  }
  return record(fields)
}
