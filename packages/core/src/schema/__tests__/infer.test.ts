import { describe, it, expect } from 'vitest'
import { InvalidArgumentError, ShapeMismatchError, TypeMismatchError } from '../../errors.ts'
import { Tensor, tensor } from '../../tensor/tensor.ts'
import { leaf, record, scalar, tuple } from '../builders.ts'
import {
  inferResultSchema,
  inferSchema,
  isSchemaFullyDefined,
  sampleElement,
  validateElement,
} from '../infer.ts'

describe('inferSchema', () => {
  it('describes scalars, tensors, tuples and records', () => {
    expect(inferSchema(1)).toEqual(scalar('number'))
    expect(inferSchema(2n)).toEqual(scalar('bigint'))
    expect(inferSchema(new Uint8Array([1, 2]))).toEqual(scalar('bytes'))
    expect(inferSchema(tensor([[1, 2, 3]]))).toEqual(leaf('number', [1, 3]))
    expect(inferSchema([true, { name: 'a' }])).toEqual(
      tuple(scalar('boolean'), record({ name: scalar('string') }))
    )
  })

  it('rejects values that are not elements', () => {
    expect(() => inferSchema(null)).toThrow(InvalidArgumentError)
    expect(() => inferSchema([1, null])).toThrow(
      'element[1]: null is not a supported element value'
    )
  })
})

describe('validateElement', () => {
  it('checks dtypes', () => {
    expect(() => validateElement('x', scalar('number'))).toThrow(TypeMismatchError)
    expect(() => validateElement('x', scalar('number'))).toThrow(
      'element: expected dtype number, received string'
    )
  })

  it('checks shapes against unknown dimensions', () => {
    expect(() => validateElement(tensor([1, 2]), leaf('number', [null]))).not.toThrow()
    expect(() => validateElement(tensor([1, 2]), leaf('number', [3]))).toThrow(ShapeMismatchError)
    expect(() => validateElement(tensor([1, 2]), leaf('number', [3]))).toThrow(
      'element: expected shape [3], received [2]'
    )
  })
})

describe('sampleElement', () => {
  it('uses zero values and unit unknown dimensions', () => {
    const sample = sampleElement(tuple(scalar('string'), leaf('number', [null, 2])))
    expect(Array.isArray(sample)).toBe(true)
    const [text, values] = Array.isArray(sample) ? sample : []
    expect(text).toBe('')
    expect(values).toBeInstanceOf(Tensor)
    expect(values instanceof Tensor ? values.shape : undefined).toEqual([1, 2])
  })

  it('treats unknown ranks as scalars', () => {
    expect(sampleElement(leaf('boolean', null))).toBe(false)
  })
})

describe('inferResultSchema', () => {
  it('keeps ranks but forgets tensor dimensions', () => {
    expect(inferResultSchema(tensor([1, 2]))).toEqual(leaf('number', [null]))
    expect(inferResultSchema(tensor([[1], [2]]))).toEqual(leaf('number', [null, null]))
    expect(inferResultSchema(3)).toEqual(scalar('number'))
  })

  it('reports whether every shape is known', () => {
    expect(isSchemaFullyDefined(tuple(scalar('number'), leaf('number', [2])))).toBe(true)
    expect(isSchemaFullyDefined(leaf('number', [null]))).toBe(false)
  })
})
