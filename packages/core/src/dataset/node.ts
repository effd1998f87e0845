import type { CursorStream } from '../execution/cursor.ts'
import type { Schema } from '../schema/types.ts'
import { formatSchema } from '../schema/format.ts'

export const DATASET_NODE = Symbol('feedline.DatasetNode')

/**
 * One immutable step of a pipeline graph. Elements are untyped at this level;
 * `Dataset<T>` carries the element type.
 */
export interface DatasetNode {
  readonly [DATASET_NODE]: true
  /** Node variant, e.g. `MapDataset` */
  readonly kind: string
  readonly inputs: readonly DatasetNode[]
  /** Output schema. Dynamic nodes resolve it on first access. */
  readonly schema: Schema
  /** Materialize the node (and its upstream) as a cursor resource. */
  open(): CursorStream
}

/**
 * Resolution state of a dynamic output schema. Once resolved it never changes.
 */
export type SchemaResolution =
  | { readonly status: 'unresolved' }
  | { readonly status: 'resolved'; readonly schema: Schema }

export interface NodeSpec {
  kind: string
  inputs?: readonly DatasetNode[]
  /** A static schema, or a resolver invoked exactly once on first access. */
  schema: Schema | (() => Schema)
  open(): CursorStream
}

/**
 * Define an immutable node.
 */
export function defineNode(definition: NodeSpec): DatasetNode {
  const { kind, inputs = [], open } = definition
  const source = definition.schema
  let resolution: SchemaResolution =
    typeof source === 'function' ? { status: 'unresolved' } : { status: 'resolved', schema: source }

  return Object.freeze({
    [DATASET_NODE]: true as const,
    kind,
    inputs: Object.freeze([...inputs]),
    get schema(): Schema {
      if (resolution.status === 'resolved') return resolution.schema
      const schema = typeof source === 'function' ? source() : source
      resolution = { status: 'resolved', schema }
      return schema
    },
    open,
    toString(this: DatasetNode) {
      return describeNode(this)
    },
  })
}

export function isDatasetNode(value: unknown): value is DatasetNode {
  return typeof value === 'object' && value !== null && DATASET_NODE in value
}

export function describeNode(node: DatasetNode): string {
  return `<${node.kind} schema: ${formatSchema(node.schema)}>`
}
