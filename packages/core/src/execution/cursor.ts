/**
 * Cursors
 *
 * A cursor is the materialized, pull-able execution state of one pipeline
 * node: an effection Subscription whose lifetime is bound to the resource
 * scope that opened it.
 */
import { createScope, resource, suspend, withResolvers } from 'effection'
import type { Operation, Scope, Stream, Subscription } from 'effection'

export type Cursor<T = unknown> = Subscription<T, void>

/** Opening a cursor stream materializes the node as a resource. */
export type CursorStream<T = unknown> = Stream<T, void>

export const DONE: IteratorReturnResult<void> = Object.freeze({ done: true, value: undefined })

export function yielded<T>(value: T): IteratorYieldResult<T> {
  return { done: false, value }
}

/**
 * A cursor opened in its own child scope, so that it can be closed before the
 * scope that requested it ends.
 */
export interface Lease<T = unknown> {
  readonly cursor: Cursor<T>
  close(): Operation<void>
}

/**
 * Open `stream` in a fresh child scope of `parent`.
 *
 * Sub-streams that come and go while their owner keeps running (repeat
 * epochs, flat-map inners, interleave slots, iterator bindings) are leased
 * this way; closing the lease halts everything the sub-stream spawned.
 */
export function* openWithin<T>(parent: Scope, stream: Stream<T, void>): Operation<Lease<T>> {
  const [scope, destroy] = createScope(parent)
  const ready = withResolvers<Subscription<T, void>>()

  scope.run(function* () {
    try {
      const subscription = yield* stream
      ready.resolve(subscription)
    } catch (error) {
      ready.reject(error instanceof Error ? error : new Error(String(error)))
      return
    }
    yield* suspend()
  })

  try {
    const cursor = yield* ready.operation
    return {
      cursor,
      *close() {
        yield* destroy()
      },
    }
  } catch (error) {
    yield* destroy()
    throw error
  }
}

/**
 * A cursor over a fixed list of elements.
 */
export function fromArray<T>(values: readonly T[]): CursorStream<T> {
  return resource(function* (provide) {
    let index = 0
    yield* provide({
      *next() {
        if (index >= values.length) return DONE
        return yielded(values[index++])
      },
    })
  })
}

/**
 * Pull every remaining element of `cursor`.
 */
export function* drain<T>(cursor: Cursor<T>, limit = Infinity): Operation<T[]> {
  const values: T[] = []
  while (values.length < limit) {
    const next = yield* cursor.next()
    if (next.done) break
    values.push(next.value)
  }
  return values
}
