/**
 * Generator Multiplexer
 *
 * Adapts one external, stateful producer into many independent sequences.
 * Each iteration is identified by an issued id and owns its own producer
 * invocation, created on first pull and removed when the producer completes.
 * Registry updates happen synchronously between yields, so no caller can
 * observe a half-applied change.
 */
import { call, resource, type Operation } from 'effection'
import { InvalidArgumentError, NotFoundError, OutOfRangeError } from '../errors.ts'
import { DONE, yielded } from '../execution/cursor.ts'
import { useLogger } from '../logger/context.ts'
import { scalar } from '../schema/builders.ts'
import { validateElement } from '../schema/infer.ts'
import type { Schema } from '../schema/types.ts'
import { createFlatMapNode } from './flat-map.ts'
import { createOperationMapNode } from './map.ts'
import { defineNode, type DatasetNode } from './node.ts'
import { createRepeatNode } from './structural.ts'
import { createTensorsNode } from './sources.ts'

export type GeneratorSource<T> = Iterable<T> | AsyncIterable<T>
export type GeneratorFactory<T> = () => GeneratorSource<T>

export interface GeneratorMultiplexer<T> {
  readonly schema: Schema
  /** A new iteration id. Never reused. */
  issue(): number
  /**
   * Next element of iteration `id`, creating its producer invocation on first
   * call.
   *
   * @throws NotFoundError when `id` was never issued, already completed or
   * was released.
   */
  pull(id: number): Operation<IteratorResult<T, void>>
  /** @throws TypeMismatchError or ShapeMismatchError */
  validate(element: unknown): void
  /** Drop an invocation before completion, calling the producer's `return()`. */
  release(id: number): Operation<void>
  /** Number of started, not yet completed invocations. */
  active(): number
}

type Invocation<T> =
  | { readonly mode: 'sync'; readonly iterator: Iterator<T> }
  | { readonly mode: 'async'; readonly iterator: AsyncIterator<T> }

function isAsyncIterable<T>(source: GeneratorSource<T>): source is AsyncIterable<T> {
  return typeof source === 'object' && source !== null && Symbol.asyncIterator in source
}

function startInvocation<T>(source: GeneratorSource<T>): Invocation<T> {
  if (isAsyncIterable(source)) {
    return { mode: 'async', iterator: source[Symbol.asyncIterator]() }
  }
  return { mode: 'sync', iterator: source[Symbol.iterator]() }
}

/** An issued id before its first pull, or its live invocation. */
type Entry<T> = { readonly status: 'pending' } | { readonly status: 'running'; readonly invocation: Invocation<T> }

const PENDING = Object.freeze({ status: 'pending' as const })

function* closeInvocation<T>(invocation: Invocation<T>): Operation<void> {
  if (invocation.mode === 'async') {
    const { iterator } = invocation
    if (iterator.return) {
      yield* call(async () => {
        await iterator.return?.()
      })
    }
  } else {
    invocation.iterator.return?.()
  }
}

export function createGeneratorMultiplexer<T>(
  factory: GeneratorFactory<T>,
  schema: Schema
): GeneratorMultiplexer<T> {
  // an id absent from `entries` was never issued, has completed or was released
  const entries = new Map<number, Entry<T>>()
  let counter = 0
  let running = 0

  function* advance(invocation: Invocation<T>): Operation<IteratorResult<T, unknown>> {
    if (invocation.mode === 'async') {
      const { iterator } = invocation
      return yield* call(() => iterator.next())
    }
    return invocation.iterator.next()
  }

  const multiplexer: GeneratorMultiplexer<T> = {
    schema,

    issue() {
      const id = counter++
      entries.set(id, PENDING)
      return id
    },

    *pull(id) {
      const entry = entries.get(id)
      if (!entry) {
        throw new NotFoundError(`Generator iteration ${id} not found`)
      }
      const log = yield* useLogger('dataset:generator')
      let invocation: Invocation<T>
      if (entry.status === 'running') {
        invocation = entry.invocation
      } else {
        invocation = startInvocation(factory())
        entries.set(id, { status: 'running', invocation })
        running++
        log.debug({ id }, 'generator invocation opened')
      }

      const next = yield* advance(invocation)
      if (next.done) {
        if (entries.get(id)?.status === 'running') {
          entries.delete(id)
          running--
          log.debug({ id }, 'generator invocation closed')
        }
        return DONE
      }
      multiplexer.validate(next.value)
      return yielded(next.value)
    },

    validate(element) {
      validateElement(element, schema)
    },

    *release(id) {
      const entry = entries.get(id)
      if (!entry) return
      entries.delete(id)
      if (entry.status === 'pending') return
      running--
      const log = yield* useLogger('dataset:generator')
      log.debug({ id }, 'generator invocation released')
      yield* closeInvocation(entry.invocation)
    },

    active() {
      return running
    },
  }
  return multiplexer
}

/**
 * Pass-through that runs `finalize` when the cursor is torn down.
 */
function withFinalizer(input: DatasetNode, finalize: () => Operation<void>): DatasetNode {
  return defineNode({
    kind: 'GeneratorIterationDataset',
    inputs: [input],
    schema: () => input.schema,
    open: () =>
      resource(function* (provide) {
        const upstream = yield* input.open()
        try {
          yield* provide(upstream)
        } finally {
          yield* finalize()
        }
      }),
  })
}

function asIterationId(value: unknown): number {
  if (typeof value !== 'number') {
    throw new InvalidArgumentError(`Generator iteration id must be a number, received ${typeof value}`)
  }
  return value
}

/**
 * A pipeline over a producer factory: one id per opening, then repeated
 * pulls of that id until the producer completes.
 */
export function createGeneratorNode<T>(factory: GeneratorFactory<T>, schema: Schema): DatasetNode {
  const multiplexer = createGeneratorMultiplexer(factory, schema)

  const ids = createOperationMapNode(
    createTensorsNode(0),
    function* () {
      return multiplexer.issue()
    },
    scalar('number')
  )

  return createFlatMapNode(ids, (value) => {
    const id = asIterationId(value)
    const pulls = createOperationMapNode(
      createRepeatNode(createTensorsNode(id), -1),
      function* () {
        const next = yield* multiplexer.pull(id)
        if (next.done) throw new OutOfRangeError()
        return next.value
      },
      schema
    )
    return withFinalizer(pulls, () => multiplexer.release(id))
  })
}
