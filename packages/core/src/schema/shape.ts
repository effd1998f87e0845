import { ShapeMismatchError } from '../errors.ts'
import type { Dim, Shape } from './types.ts'

export function isFullyDefined(shape: Shape): shape is readonly number[] {
  return shape !== null && shape.every((dim) => dim !== null)
}

/**
 * Unknown rank is compatible with everything; otherwise ranks must agree and
 * each dimension pair must be equal or contain an unknown.
 */
export function isShapeCompatible(a: Shape, b: Shape): boolean {
  if (a === null || b === null) return true
  if (a.length !== b.length) return false
  return a.every((dim, i) => {
    const other = b[i] ?? null
    return dim === null || other === null || dim === other
  })
}

/**
 * Merge two compatible shapes into the most informative one.
 *
 * @throws ShapeMismatchError when ranks or known dimensions disagree.
 */
export function mergeShape(a: Shape, b: Shape): Shape {
  if (a === null) return b
  if (b === null) return a
  if (a.length !== b.length) {
    throw new ShapeMismatchError(
      `Shapes ${formatShape(a)} and ${formatShape(b)} have different ranks`
    )
  }
  return Object.freeze(
    a.map((dim, i): Dim => {
      const other = b[i] ?? null
      if (dim === null) return other
      if (other === null || other === dim) return dim
      throw new ShapeMismatchError(
        `Shapes ${formatShape(a)} and ${formatShape(b)} differ at dimension ${i}`
      )
    })
  )
}

/**
 * Widening merge: conflicting dimensions become unknown, and differing ranks
 * become unknown rank.
 */
export function mostSpecificCompatibleShape(a: Shape, b: Shape): Shape {
  if (a === null || b === null || a.length !== b.length) return null
  return Object.freeze(
    a.map((dim, i): Dim => (dim !== null && dim === b[i] ? dim : null))
  )
}

/**
 * Render a shape as `[2,?]`, or `<unknown>` for unknown rank.
 */
export function formatShape(shape: Shape): string {
  if (shape === null) return '<unknown>'
  return `[${shape.map((dim) => (dim === null ? '?' : String(dim))).join(',')}]`
}
