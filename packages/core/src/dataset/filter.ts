import { resource } from 'effection'
import { TypeMismatchError } from '../errors.ts'
import { DONE } from '../execution/cursor.ts'
import { invoke, type ElementFn } from '../execution/invoke.ts'
import { Tensor } from '../tensor/tensor.ts'
import { defineNode, type DatasetNode } from './node.ts'

function asPredicateResult(value: unknown): boolean {
  if (typeof value === 'boolean') return value
  if (value instanceof Tensor && value.rank === 0 && value.dtype === 'boolean') {
    return value.data[0] === true
  }
  throw new TypeMismatchError(
    `filter: predicate must return a scalar boolean, received ${
      value instanceof Tensor ? value.toString() : typeof value
    }`
  )
}

/**
 * Keep the elements for which `predicate` returns true.
 */
export function createFilterNode(input: DatasetNode, predicate: ElementFn): DatasetNode {
  return defineNode({
    kind: 'FilterDataset',
    inputs: [input],
    schema: () => input.schema,
    open: () =>
      resource(function* (provide) {
        const upstream = yield* input.open()

        yield* provide({
          *next() {
            while (true) {
              const next = yield* upstream.next()
              if (next.done) return DONE
              if (asPredicateResult(yield* invoke(predicate, next.value))) {
                return next
              }
            }
          },
        })
      }),
  })
}
