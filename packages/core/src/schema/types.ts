import { z } from 'zod'
import type { Tensor } from '../tensor/tensor.ts'

export const DTypeSchema = z.enum(['number', 'bigint', 'boolean', 'string', 'bytes'])

/** Element type of a leaf value. */
export type DType = z.infer<typeof DTypeSchema>

/** A dimension extent, or `null` when unknown. */
export type Dim = number | null

/** Known-rank list of dimensions, or `null` for unknown rank. */
export type Shape = readonly Dim[] | null

export interface LeafSchema {
  readonly kind: 'leaf'
  readonly dtype: DType
  readonly shape: Shape
}

export interface TupleSchema {
  readonly kind: 'tuple'
  readonly items: readonly Schema[]
}

export interface RecordSchema {
  readonly kind: 'record'
  readonly fields: Readonly<Record<string, Schema>>
}

/**
 * Nested type and shape signature of a pipeline element.
 */
export type Schema = LeafSchema | TupleSchema | RecordSchema

export type Scalar = number | bigint | boolean | string | Uint8Array

/**
 * A pipeline element: a leaf value, a tuple of elements, or a record of elements.
 */
export type Element =
  | Scalar
  | Tensor
  | readonly Element[]
  | { readonly [key: string]: Element }

/**
 * Nested dtype description accepted by `schemaOf`: arrays are tuples and
 * plain objects are records.
 */
export type TypeSpec = DType | readonly TypeSpec[] | { readonly [key: string]: TypeSpec }

/**
 * Nested shape description read "up to" a {@link TypeSpec}: at each leaf a
 * dimension list (or `null` for unknown rank).
 */
export type ShapeSpec =
  | Shape
  | readonly ShapeSpec[]
  | { readonly [key: string]: ShapeSpec }
