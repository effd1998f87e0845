import type { DType, Scalar } from '../schema/types.ts'

export function isScalar(value: unknown): value is Scalar {
  return dtypeOf(value) !== undefined
}

/**
 * The dtype of a scalar value, or `undefined` when the value is not a scalar.
 */
export function dtypeOf(value: unknown): DType | undefined {
  switch (typeof value) {
    case 'number':
      return 'number'
    case 'bigint':
      return 'bigint'
    case 'boolean':
      return 'boolean'
    case 'string':
      return 'string'
    default:
      return value instanceof Uint8Array ? 'bytes' : undefined
  }
}

export function zeroOf(dtype: DType): Scalar {
  switch (dtype) {
    case 'number':
      return 0
    case 'bigint':
      return 0n
    case 'boolean':
      return false
    case 'string':
      return ''
    case 'bytes':
      return new Uint8Array(0)
  }
}
