import type { DType, LeafSchema, RecordSchema, Schema, Shape, TupleSchema } from './types.ts'

export function leaf(dtype: DType, shape: Shape = []): LeafSchema {
  return Object.freeze({
    kind: 'leaf',
    dtype,
    shape: shape === null ? null : Object.freeze([...shape]),
  })
}

export function scalar(dtype: DType): LeafSchema {
  return leaf(dtype, [])
}

export function tuple(...items: Schema[]): TupleSchema {
  return Object.freeze({ kind: 'tuple', items: Object.freeze(items) })
}

export function record(fields: Readonly<Record<string, Schema>>): RecordSchema {
  return Object.freeze({ kind: 'record', fields: Object.freeze({ ...fields }) })
}
