import { InvalidArgumentError, ShapeMismatchError, TypeMismatchError } from '../errors.ts'
import type { DType, Scalar } from '../schema/types.ts'
import { dtypeOf, zeroOf } from './dtype.ts'

/** Scalars nested in arrays, as accepted by {@link tensor}. */
export type Nested<T> = T | readonly Nested<T>[]

function isList(value: Nested<Scalar>): value is readonly Nested<Scalar>[] {
  return Array.isArray(value)
}

function sizeOf(shape: readonly number[]): number {
  return shape.reduce((total, dim) => total * dim, 1)
}

function stridesOf(shape: readonly number[]): number[] {
  const strides = new Array<number>(shape.length).fill(1)
  for (let i = shape.length - 2; i >= 0; i--) {
    strides[i] = (strides[i + 1] ?? 1) * (shape[i + 1] ?? 1)
  }
  return strides
}

function formatDims(shape: readonly number[]): string {
  return `[${shape.join(',')}]`
}

/**
 * Dense, row-major n-dimensional array of scalars sharing one dtype.
 *
 * Shapes are always fully known; a rank-0 tensor holds exactly one value.
 */
export class Tensor {
  private constructor(
    readonly dtype: DType,
    readonly shape: readonly number[],
    readonly data: readonly Scalar[]
  ) {}

  static fromFlat(data: readonly Scalar[], shape: readonly number[], dtype?: DType): Tensor {
    for (const dim of shape) {
      if (!Number.isInteger(dim) || dim < 0) {
        throw new InvalidArgumentError(`Invalid tensor shape ${formatDims(shape)}`)
      }
    }
    if (sizeOf(shape) !== data.length) {
      throw new ShapeMismatchError(
        `Cannot fill shape ${formatDims(shape)} with ${data.length} values`
      )
    }
    const first = data[0]
    const resolved = dtype ?? (first === undefined ? 'number' : dtypeOf(first))
    if (resolved === undefined) {
      throw new InvalidArgumentError(`Unsupported tensor value ${String(first)}`)
    }
    for (const value of data) {
      const actual = dtypeOf(value)
      if (actual !== resolved) {
        throw new TypeMismatchError(
          `Tensor of dtype ${resolved} cannot hold a value of dtype ${actual ?? typeof value}`
        )
      }
    }
    return new Tensor(resolved, Object.freeze([...shape]), Object.freeze([...data]))
  }

  static full(shape: readonly number[], dtype: DType, value: Scalar): Tensor {
    return Tensor.fromFlat(new Array<Scalar>(sizeOf(shape)).fill(value), shape, dtype)
  }

  static zeros(shape: readonly number[], dtype: DType): Tensor {
    return Tensor.full(shape, dtype, zeroOf(dtype))
  }

  get rank(): number {
    return this.shape.length
  }

  get size(): number {
    return this.data.length
  }

  /**
   * Read one value by its full index.
   */
  at(...index: number[]): Scalar {
    if (index.length !== this.rank) {
      throw new InvalidArgumentError(
        `Expected ${this.rank} indices, received ${index.length}`
      )
    }
    const strides = stridesOf(this.shape)
    let offset = 0
    index.forEach((i, axis) => {
      const extent = this.shape[axis] ?? 0
      if (!Number.isInteger(i) || i < 0 || i >= extent) {
        throw new InvalidArgumentError(`Index ${i} out of bounds for dimension ${axis} of size ${extent}`)
      }
      offset += i * (strides[axis] ?? 0)
    })
    const value = this.data[offset]
    if (value === undefined) {
      throw new InvalidArgumentError(`Index ${index.join(',')} out of bounds`)
    }
    return value
  }

  /**
   * Select one entry along the first dimension. A rank-1 tensor yields a scalar.
   */
  slice(index: number): Tensor | Scalar {
    const [extent, ...rest] = this.shape
    if (extent === undefined) {
      throw new InvalidArgumentError('Cannot slice a rank-0 tensor')
    }
    if (!Number.isInteger(index) || index < 0 || index >= extent) {
      throw new InvalidArgumentError(`Slice ${index} out of bounds for dimension of size ${extent}`)
    }
    const width = sizeOf(rest)
    const values = this.data.slice(index * width, (index + 1) * width)
    if (rest.length === 0) {
      const [value] = values
      if (value === undefined) {
        throw new InvalidArgumentError(`Slice ${index} out of bounds`)
      }
      return value
    }
    return new Tensor(this.dtype, Object.freeze(rest), Object.freeze(values))
  }

  toNested(): Nested<Scalar> {
    const build = (axis: number, offset: number): Nested<Scalar> => {
      if (axis === this.rank) {
        return this.data[offset] ?? zeroOf(this.dtype)
      }
      const extent = this.shape[axis] ?? 0
      const width = sizeOf(this.shape.slice(axis + 1))
      return Array.from({ length: extent }, (_, i) => build(axis + 1, offset + i * width))
    }
    return build(0, 0)
  }

  /**
   * Right-pad every dimension up to `shape`, filling with `value`.
   *
   * @throws ShapeMismatchError if the rank differs or a dimension would shrink.
   */
  padTo(shape: readonly number[], value: Scalar): Tensor {
    if (shape.length !== this.rank) {
      throw new ShapeMismatchError(
        `Cannot pad ${formatDims(this.shape)} to rank ${shape.length}`
      )
    }
    shape.forEach((dim, axis) => {
      const own = this.shape[axis] ?? 0
      if (dim < own) {
        throw new ShapeMismatchError(
          `Cannot pad ${formatDims(this.shape)} to ${formatDims(shape)}: dimension ${axis} is larger than the target`
        )
      }
    })
    const padded = new Array<Scalar>(sizeOf(shape)).fill(value)
    const target = stridesOf(shape)
    const source = stridesOf(this.shape)
    this.data.forEach((item, flat) => {
      let offset = 0
      let remainder = flat
      for (let axis = 0; axis < this.rank; axis++) {
        const stride = source[axis] ?? 1
        const coordinate = Math.floor(remainder / stride)
        remainder -= coordinate * stride
        offset += coordinate * (target[axis] ?? 0)
      }
      padded[offset] = item
    })
    return Tensor.fromFlat(padded, shape, this.dtype)
  }

  toString(): string {
    return `Tensor<${this.dtype}${formatDims(this.shape)}>`
  }
}

/**
 * Build a tensor from (rectangular) nested arrays of scalars.
 *
 * @example
 * ```ts
 * const t = tensor([[1, 2], [3, 4]])
 * t.shape; // [2, 2]
 * ```
 */
export function tensor(nested: Nested<Scalar>, dtype?: DType): Tensor {
  const shape: number[] = []
  let level: Nested<Scalar> | undefined = nested
  while (level !== undefined && isList(level)) {
    shape.push(level.length)
    level = level[0]
  }

  const data: Scalar[] = []
  const visit = (node: Nested<Scalar>, axis: number): void => {
    if (axis === shape.length) {
      if (isList(node)) {
        throw new InvalidArgumentError('Ragged nested array cannot form a tensor')
      }
      data.push(node)
      return
    }
    if (!isList(node) || node.length !== shape[axis]) {
      throw new InvalidArgumentError('Ragged nested array cannot form a tensor')
    }
    for (const child of node) visit(child, axis + 1)
  }
  visit(nested, 0)

  return Tensor.fromFlat(data, shape, dtype)
}

/**
 * Stack equally shaped values along a new leading dimension.
 */
export function stack(items: readonly (Tensor | Scalar)[]): Tensor {
  const [first] = items
  if (first === undefined) {
    throw new InvalidArgumentError('Cannot stack an empty list')
  }
  const head = first instanceof Tensor ? first : Tensor.fromFlat([first], [])
  const data: Scalar[] = []
  for (const item of items) {
    const value = item instanceof Tensor ? item : Tensor.fromFlat([item], [])
    if (value.dtype !== head.dtype) {
      throw new TypeMismatchError(`Cannot stack ${value.dtype} with ${head.dtype}`)
    }
    if (
      value.rank !== head.rank ||
      value.shape.some((dim, axis) => dim !== head.shape[axis])
    ) {
      throw new ShapeMismatchError(
        `Cannot stack values of shapes ${formatDims(head.shape)} and ${formatDims(value.shape)}`
      )
    }
    for (const scalar of value.data) data.push(scalar)
  }
  return Tensor.fromFlat(data, [items.length, ...head.shape], head.dtype)
}
