import { call, type Operation } from 'effection'

/** A user function lowered to take one untyped element. */
export type ElementFn = (element: unknown) => unknown

/** An element transformation run as an operation. */
export type ElementOperation = (element: unknown) => Operation<unknown>

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  )
}

/**
 * Wait for `value` when it is a promise.
 */
export function* settle(value: unknown): Operation<unknown> {
  if (isPromiseLike(value)) {
    return yield* call(() => Promise.resolve(value))
  }
  return value
}

export function* invoke(fn: ElementFn, element: unknown): Operation<unknown> {
  return yield* settle(fn(element))
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
