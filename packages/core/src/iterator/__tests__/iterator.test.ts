import { describe, it, expect } from '../../__tests__/vitest-effection.ts'
import { failure } from '../../__tests__/helpers.ts'
import {
  InvalidArgumentError,
  NotFoundError,
  OutOfRangeError,
  isOutOfRange,
  ShapeMismatchError,
  TypeMismatchError,
} from '../../errors.ts'
import { Dataset } from '../../dataset/dataset.ts'
import { leaf } from '../../schema/builders.ts'
import { tensor } from '../../tensor/tensor.ts'
import { DatasetIterator, collect, forEachElement } from '../iterator.ts'

describe('initializable iterator', () => {
  it('must be initialized before pulling', function* () {
    const iterator = yield* Dataset.range(3).makeInitializableIterator()
    expect(iterator.state).toBe('bound')

    const error = yield* failure(() => iterator.next())
    expect(error).toBeInstanceOf(InvalidArgumentError)
    expect(error).toMatchObject({
      message: 'Iterator is not initialized; run initialize() or the operation returned by bind()',
    })
  })

  it('signals the end on every pull after exhaustion', function* () {
    const iterator = yield* Dataset.range(2).makeInitializableIterator()
    yield* iterator.initialize()
    expect(iterator.state).toBe('running')

    expect(yield* iterator.next()).toBe(0)
    expect(yield* iterator.next()).toBe(1)
    expect(yield* failure(() => iterator.next())).toBeInstanceOf(OutOfRangeError)
    expect(iterator.state).toBe('exhausted')
    expect(yield* failure(() => iterator.next())).toBeInstanceOf(OutOfRangeError)
  })

  it('restarts from the beginning when re-initialized', function* () {
    const iterator = yield* Dataset.range(5).makeInitializableIterator()
    yield* iterator.initialize()
    yield* iterator.next()
    yield* iterator.next()

    yield* iterator.initialize()
    expect(yield* iterator.next()).toBe(0)
  })

  it('repeats a seeded shuffle on re-initialization', function* () {
    const iterator = yield* Dataset.range(10).shuffle(10, 5).makeInitializableIterator()
    const pass = function* () {
      yield* iterator.initialize()
      const values: number[] = []
      for (let i = 0; i < 10; i++) values.push(yield* iterator.next())
      return values
    }
    const first = yield* pass()
    const second = yield* pass()
    expect(second).toEqual(first)
  })
})

describe('iterator from a structure', () => {
  it('starts unbound', function* () {
    const iterator = yield* DatasetIterator.fromStructure<number>('number', [])
    expect(iterator.state).toBe('unbound')

    const error = yield* failure(() => iterator.initialize())
    expect(error).toMatchObject({
      message: 'Iterator is not bound to a dataset; use bind(dataset)',
    })
  })

  it('switches between compatible datasets', function* () {
    const iterator = yield* DatasetIterator.fromStructure<number>('number', [])

    yield* iterator.bind(Dataset.range(3))
    expect(yield* iterator.next()).toBe(0)
    expect(yield* iterator.next()).toBe(1)

    yield* iterator.bind(Dataset.range(10, 12))
    expect(yield* iterator.next()).toBe(10)

    yield* iterator.initialize()
    expect(yield* iterator.next()).toBe(10)
  })

  it('accepts datasets with more specific shapes', function* () {
    const iterator = yield* DatasetIterator.fromSchema(leaf('number', [null]))
    yield* iterator.bind(Dataset.fromTensors(tensor([1, 2, 3])))
    expect(iterator.state).toBe('running')
  })

  it('rejects incompatible datasets when binding', function* () {
    const words = yield* DatasetIterator.fromStructure('string')
    expect(() => words.bind(Dataset.range(3))).toThrow(TypeMismatchError)
    expect(() => words.bind(Dataset.range(3))).toThrow(
      'element: dtype string is not compatible with number'
    )

    const pairs = yield* DatasetIterator.fromStructure('number', [2])
    expect(() => pairs.bind(Dataset.fromTensors(tensor([1, 2, 3])))).toThrow(ShapeMismatchError)
  })
})

describe('one-shot iterator', () => {
  it('starts on the first pull', function* () {
    const iterator = yield* Dataset.range(3).makeOneShotIterator()
    expect(iterator.state).toBe('unbound')
    expect(yield* iterator.next()).toBe(0)
    expect(iterator.state).toBe('running')
  })

  it('cannot be initialized or rebound', function* () {
    const iterator = yield* Dataset.range(3).makeOneShotIterator()
    expect(yield* failure(() => iterator.initialize())).toMatchObject({
      message: 'A one-shot iterator has no initializer',
    })
    expect(() => iterator.bind(Dataset.range(3))).toThrow(
      'A one-shot iterator cannot be bound to another dataset'
    )
  })
})

describe('dispose', () => {
  it('makes the iterator unusable', function* () {
    const iterator = yield* Dataset.range(3).makeInitializableIterator()
    yield* iterator.initialize()
    yield* iterator.dispose()
    yield* iterator.dispose()

    expect(iterator.state).toBe('disposed')
    expect(yield* failure(() => iterator.next())).toMatchObject({
      message: 'Iterator has been disposed',
    })
    expect(() => iterator.bind(Dataset.range(3))).toThrow('Iterator has been disposed')
  })
})

describe('iterator handles', () => {
  it('pulls from the iterator a handle names', function* () {
    const training = yield* Dataset.range(0, 100).makeOneShotIterator()
    const validation = yield* Dataset.range(100, 200).makeInitializableIterator()
    yield* validation.initialize()
    expect(training.handle).not.toBe(validation.handle)

    const feed = DatasetIterator.fromHandle<number>('number')
    expect(yield* feed.next(training.handle)).toBe(0)
    expect(yield* feed.next(training.handle)).toBe(1)
    expect(yield* feed.next(validation.handle)).toBe(100)
    expect(yield* feed.next(training.handle)).toBe(2)

    yield* validation.initialize()
    expect(yield* feed.next(validation.handle)).toBe(100)
  })

  it('forgets disposed iterators', function* () {
    const iterator = yield* Dataset.range(3).makeOneShotIterator()
    yield* iterator.dispose()
    const error = yield* failure(() => DatasetIterator.fromHandle('number').next(iterator.handle))
    expect(error).toBeInstanceOf(NotFoundError)
    expect(error).toMatchObject({ message: `Iterator handle ${iterator.handle} not found` })
  })

  it('checks the named iterator against its structure', function* () {
    const numbers = yield* Dataset.range(3).makeOneShotIterator()
    const words = DatasetIterator.fromHandle<string>('string')
    const error = yield* failure(() => words.next(numbers.handle))
    expect(error).toBeInstanceOf(TypeMismatchError)
    expect(error).toMatchObject({
      message: 'element: dtype string is not compatible with number',
    })
  })
})

describe('independent iterators', () => {
  it('produce identical sequences over the same pipeline', function* () {
    const pipeline = Dataset.range(12)
      .shuffle(4, 11)
      .map((x) => x * 3)
      .batch(5)
    const first = yield* pipeline.makeOneShotIterator()
    const second = yield* pipeline.makeOneShotIterator()
    for (let i = 0; i < 3; i++) {
      const a = yield* first.next()
      const b = yield* second.next()
      expect(b.toNested()).toEqual(a.toNested())
    }
    expect(isOutOfRange(yield* failure(() => first.next()))).toBe(true)
  })
})

describe('collect and forEachElement', () => {
  it('collects at most the limit', function* () {
    expect(yield* collect(Dataset.range(100), 3)).toEqual([0, 1, 2])
  })

  it('visits every element and counts them', function* () {
    const seen: string[] = []
    const count = yield* forEachElement(Dataset.fromValues(['a', 'b', 'c']), (value, index) => {
      seen.push(`${index}:${value}`)
    })
    expect(count).toBe(3)
    expect(seen).toEqual(['0:a', '1:b', '2:c'])
  })
})
