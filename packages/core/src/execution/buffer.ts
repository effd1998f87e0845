/**
 * Bounded Buffer
 *
 * Hand-off between a background producer and a pulling consumer. Producers
 * pause while the buffer is full; closing delivers the terminal signal after
 * the buffered values have drained, and a failure is raised to the consumer
 * at the position it occurred.
 */
import { withResolvers, type Operation } from 'effection'
import { DONE, yielded } from './cursor.ts'

export interface BoundedBuffer<T> {
  /** Append a value, waiting while the buffer is full. Ignored once closed. */
  put(value: T): Operation<void>
  /** Take the oldest value, waiting while the buffer is empty. */
  take(): Operation<IteratorResult<T, void>>
  close(): void
  fail(error: Error): void
  readonly size: number
  readonly closed: boolean
}

type Waiter = () => void

function* waitFor(waiters: Waiter[]): Operation<void> {
  const { operation, resolve } = withResolvers<void>()
  waiters.push(resolve)
  yield* operation
}

function notify(waiters: Waiter[]): void {
  for (const wake of waiters.splice(0)) {
    wake()
  }
}

export function createBoundedBuffer<T>(capacity: number): BoundedBuffer<T> {
  const items: T[] = []
  const readers: Waiter[] = []
  const writers: Waiter[] = []
  let closed = false
  let failure: Error | undefined

  return {
    *put(value) {
      while (items.length >= capacity && !closed) {
        yield* waitFor(writers)
      }
      if (closed) return
      items.push(value)
      notify(readers)
    },

    *take() {
      while (true) {
        if (items.length > 0) {
          const [value] = items.splice(0, 1)
          notify(writers)
          return yielded(value)
        }
        if (failure) throw failure
        if (closed) return DONE
        yield* waitFor(readers)
      }
    },

    close() {
      closed = true
      notify(readers)
      notify(writers)
    },

    fail(error) {
      failure = error
      closed = true
      notify(readers)
      notify(writers)
    },

    get size() {
      return items.length
    },

    get closed() {
      return closed
    },
  }
}
