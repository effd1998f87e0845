import { describe, it, expect } from 'vitest'
import {
  InvalidArgumentError,
  ShapeMismatchError,
  StructureMismatchError,
  TypeMismatchError,
} from '../../errors.ts'
import { leaf, record, scalar, tuple } from '../builders.ts'
import { formatSchema } from '../format.ts'
import {
  assertCompatible,
  flatten,
  flattenSchema,
  generalizeSchema,
  isCompatible,
  leafPaths,
  pack,
  schemaOf,
} from '../structure.ts'

const example = tuple(
  record({ label: scalar('number'), image: leaf('number', [28, 28]) }),
  scalar('string')
)

describe('flatten and pack', () => {
  it('lists record fields in sorted key order', () => {
    const schema = record({ b: scalar('number'), a: tuple(scalar('string'), scalar('boolean')) })
    expect(flatten({ b: 1, a: ['x', true] }, schema)).toEqual(['x', true, 1])
  })

  it('rebuilds the element from its leaves', () => {
    const schema = record({ b: scalar('number'), a: tuple(scalar('string'), scalar('boolean')) })
    expect(pack(schema, ['x', true, 1])).toEqual({ a: ['x', true], b: 1 })
  })

  it('names the path that differs', () => {
    const schema = tuple(scalar('number'), tuple(scalar('number'), scalar('number')))
    expect(() => flatten([1, [2]], schema)).toThrow(StructureMismatchError)
    expect(() => flatten([1, [2]], schema)).toThrow(
      'element[1]: expected a tuple of 2, received a tuple of 1'
    )
  })

  it('rejects records with other keys', () => {
    const schema = record({ x: scalar('number') })
    expect(() => flatten({ y: 1 }, schema)).toThrow(
      'element: expected a record {x}, received a record {y}'
    )
  })

  it('rejects a wrong number of leaves', () => {
    const schema = tuple(scalar('number'), scalar('number'))
    expect(() => pack(schema, [1])).toThrow(InvalidArgumentError)
    expect(() => pack(schema, [1])).toThrow('Cannot pack 1 leaves into a structure of 2')
    expect(() => pack(schema, [1, 2, 3])).toThrow('Cannot pack 3 leaves into a structure of 2')
  })

  it('reports leaf paths in flattening order', () => {
    expect(leafPaths(example)).toEqual(['element[0].image', 'element[0].label', 'element[1]'])
    expect(flattenSchema(example).map((node) => node.dtype)).toEqual(['number', 'number', 'string'])
  })
})

describe('assertCompatible', () => {
  it('accepts unknown dimensions and unknown ranks', () => {
    expect(isCompatible(leaf('number', [null, 3]), leaf('number', [5, 3]))).toBe(true)
    expect(isCompatible(leaf('number', null), leaf('number', [5, 3]))).toBe(true)
  })

  it('reports structure before dtype before shape', () => {
    expect(() => assertCompatible(tuple(scalar('number')), scalar('number'))).toThrow(
      StructureMismatchError
    )
    expect(() =>
      assertCompatible(tuple(leaf('string', [2])), tuple(leaf('number', [3])))
    ).toThrow(TypeMismatchError)
    expect(() => assertCompatible(leaf('number', [2]), leaf('number', [3]))).toThrow(
      ShapeMismatchError
    )
  })

  it('is symmetric', () => {
    const pairs = [
      [scalar('number'), scalar('string')],
      [leaf('number', [2]), leaf('number', [null])],
      [record({ a: scalar('number') }), record({ b: scalar('number') })],
      [tuple(scalar('number')), tuple(scalar('number'), scalar('number'))],
    ] as const
    for (const [a, b] of pairs) {
      expect(isCompatible(a, b)).toBe(isCompatible(b, a))
    }
  })

  it('names the mismatching path', () => {
    expect(() => assertCompatible(example, tuple(record({ label: scalar('number'), image: leaf('number', [28, 27]) }), scalar('string')))).toThrow(
      'element[0].image: shape [28,28] is not compatible with [28,27]'
    )
  })
})

describe('generalizeSchema', () => {
  it('widens conflicting dimensions', () => {
    expect(generalizeSchema(leaf('number', [2]), leaf('number', [3]))).toEqual(
      leaf('number', [null])
    )
    expect(generalizeSchema(leaf('number', [2]), leaf('number', [2, 2]))).toEqual(
      leaf('number', null)
    )
  })

  it('refuses different dtypes', () => {
    expect(() => generalizeSchema(scalar('number'), scalar('string'))).toThrow(TypeMismatchError)
  })
})

describe('schemaOf', () => {
  it('builds tuples with shapes', () => {
    expect(schemaOf(['number', 'string'], [[2], []])).toEqual(
      tuple(leaf('number', [2]), scalar('string'))
    )
  })

  it('leaves omitted shapes at unknown rank', () => {
    expect(schemaOf({ label: 'number' })).toEqual(record({ label: leaf('number', null) }))
  })

  it('requires shapes to follow the types', () => {
    expect(() => schemaOf(['number', 'number'], [[1]])).toThrow(
      'element: shapes do not follow the tuple of 2 types'
    )
  })
})

describe('formatSchema', () => {
  it('renders nested schemas', () => {
    expect(formatSchema(tuple(scalar('number'), leaf('string', [null])))).toBe(
      '(number, string[?])'
    )
    expect(formatSchema(record({ label: scalar('number'), image: leaf('number', [28, 28]) }))).toBe(
      '{image: number[28,28], label: number}'
    )
    expect(formatSchema(leaf('bytes', null))).toBe('bytes[...]')
  })
})
