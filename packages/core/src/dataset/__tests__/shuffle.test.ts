import { describe, it, expect } from '../../__tests__/vitest-effection.ts'
import { collect } from '../../iterator/iterator.ts'
import { Dataset } from '../dataset.ts'

const sorted = (values: number[]) => [...values].sort((a, b) => a - b)

describe('shuffle', () => {
  it('emits a permutation of its input', function* () {
    const values = yield* collect(Dataset.range(20).shuffle(8, 3))
    expect(values).toHaveLength(20)
    expect(sorted(values)).toEqual([...Array(20).keys()])
  })

  it('repeats its order for a fixed seed', function* () {
    const shuffled = Dataset.range(20).shuffle(20, 11)
    const first = yield* collect(shuffled)
    const second = yield* collect(shuffled)
    const rebuilt = yield* collect(Dataset.range(20).shuffle(20, 11))
    expect(second).toEqual(first)
    expect(rebuilt).toEqual(first)
  })

  it('changes its order with the seed', function* () {
    const first = yield* collect(Dataset.range(20).shuffle(20, 1))
    const second = yield* collect(Dataset.range(20).shuffle(20, 2))
    expect(sorted(second)).toEqual(sorted(first))
    expect(second).not.toEqual(first)
  })

  it('keeps input order with a buffer of one', function* () {
    expect(yield* collect(Dataset.range(5).shuffle(1, 4))).toEqual([0, 1, 2, 3, 4])
  })

  it('reorders within each repetition', function* () {
    const values = yield* collect(Dataset.range(4).shuffle(4, 9).repeat(2))
    expect(sorted(values.slice(0, 4))).toEqual([0, 1, 2, 3])
    expect(sorted(values.slice(4))).toEqual([0, 1, 2, 3])
  })

  it('rejects a zero buffer', function* () {
    expect(() => Dataset.range(3).shuffle(0)).toThrow('shuffle bufferSize: must be at least 1')
  })
})
