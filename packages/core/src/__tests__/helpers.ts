import type { Operation } from 'effection'

/**
 * Run `op` and return what it threw, or `undefined` when it completed.
 */
export function* failure(op: () => Operation<unknown>): Operation<unknown> {
  try {
    yield* op()
  } catch (error) {
    return error
  }
  return undefined
}
