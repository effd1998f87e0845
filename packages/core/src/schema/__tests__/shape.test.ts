import { describe, it, expect } from 'vitest'
import { ShapeMismatchError } from '../../errors.ts'
import {
  formatShape,
  isFullyDefined,
  isShapeCompatible,
  mergeShape,
  mostSpecificCompatibleShape,
} from '../shape.ts'

describe('isShapeCompatible', () => {
  it('treats unknown rank as compatible with everything', () => {
    expect(isShapeCompatible(null, [2, 3])).toBe(true)
    expect(isShapeCompatible([], null)).toBe(true)
  })

  it('requires equal ranks', () => {
    expect(isShapeCompatible([2], [2, 1])).toBe(false)
  })

  it('matches unknown dimensions against anything', () => {
    expect(isShapeCompatible([null, 3], [7, 3])).toBe(true)
    expect(isShapeCompatible([2, 3], [2, 4])).toBe(false)
  })
})

describe('mergeShape', () => {
  it('fills unknown dimensions from either side', () => {
    expect(mergeShape([2, null], [null, 3])).toEqual([2, 3])
    expect(mergeShape([null, 3], [2, null])).toEqual([2, 3])
  })

  it('returns the other shape when one rank is unknown', () => {
    expect(mergeShape(null, [4])).toEqual([4])
    expect(mergeShape([4], null)).toEqual([4])
    expect(mergeShape(null, null)).toBeNull()
  })

  it('rejects conflicting dimensions', () => {
    expect(() => mergeShape([2], [3])).toThrow(ShapeMismatchError)
    expect(() => mergeShape([2], [3])).toThrow('Shapes [2] and [3] differ at dimension 0')
  })

  it('rejects different ranks', () => {
    expect(() => mergeShape([2], [2, 2])).toThrow('Shapes [2] and [2,2] have different ranks')
  })
})

describe('mostSpecificCompatibleShape', () => {
  it('keeps agreeing dimensions and forgets the rest', () => {
    expect(mostSpecificCompatibleShape([2, 3], [2, 4])).toEqual([2, null])
  })

  it('forgets the rank when ranks differ', () => {
    expect(mostSpecificCompatibleShape([1], [1, 2])).toBeNull()
  })
})

describe('formatShape', () => {
  it('renders known and unknown dimensions', () => {
    expect(formatShape([2, null])).toBe('[2,?]')
    expect(formatShape([])).toBe('[]')
    expect(formatShape(null)).toBe('<unknown>')
  })
})

describe('isFullyDefined', () => {
  it('is false for unknown ranks and dimensions', () => {
    expect(isFullyDefined([2, 3])).toBe(true)
    expect(isFullyDefined([2, null])).toBe(false)
    expect(isFullyDefined(null)).toBe(false)
  })
})
