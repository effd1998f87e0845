/**
 * Dataset Iterator
 *
 * A stateful cursor bound to a pipeline graph, or to a bare schema that a
 * compatible dataset is bound to later. Iterators are effection resources:
 * leaving the scope that created one disposes it.
 */
import { resource, scoped, useScope, type Operation, type Scope } from 'effection'
import { InvalidArgumentError, NotFoundError, OutOfRangeError, isOutOfRange } from '../errors.ts'
import { openWithin, type Lease } from '../execution/cursor.ts'
import { useLogger, type Logger } from '../logger/index.ts'
import { formatSchema } from '../schema/format.ts'
import { assertCompatible, schemaOf } from '../schema/structure.ts'
import type { Schema, ShapeSpec, TypeSpec } from '../schema/types.ts'
import type { DatasetNode } from '../dataset/node.ts'
import type { Dataset } from '../dataset/dataset.ts'

export type IteratorState = 'unbound' | 'bound' | 'running' | 'exhausted' | 'disposed'

interface IteratorInit {
  schema: Schema
  binding?: DatasetNode
  oneShot: boolean
}

// live iterators by handle; an iterator leaves on dispose
const live = new Map<string, DatasetIterator<unknown>>()
let handleCounter = 0

export class DatasetIterator<T> {
  /** Names this iterator to a {@link HandleIterator} while it is alive. */
  readonly handle = `iterator-${handleCounter++}`
  private current: IteratorState
  private binding: DatasetNode | undefined
  private lease: Lease | undefined

  private constructor(
    private readonly scope: Scope,
    private readonly log: Logger,
    readonly schema: Schema,
    private readonly oneShot: boolean,
    binding: DatasetNode | undefined
  ) {
    this.binding = binding
    this.current = binding && !oneShot ? 'bound' : 'unbound'
  }

  private static open<T>(init: IteratorInit): Operation<DatasetIterator<T>> {
    return resource(function* (provide) {
      const scope = yield* useScope()
      const log = yield* useLogger('iterator')
      const iterator = new DatasetIterator<T>(scope, log, init.schema, init.oneShot, init.binding)
      live.set(iterator.handle, iterator)
      log.debug(
        { schema: formatSchema(init.schema), oneShot: init.oneShot, state: iterator.state },
        'iterator created'
      )
      try {
        yield* provide(iterator)
      } finally {
        yield* iterator.dispose()
      }
    })
  }

  /** Bound to `dataset`; pulls fail until `initialize()` runs. */
  static fromDataset<T>(dataset: Dataset<T>): Operation<DatasetIterator<T>> {
    return DatasetIterator.open<T>({ schema: dataset.schema, binding: dataset.node, oneShot: false })
  }

  /** Bound to `dataset`, starting on first pull. Cannot be re-initialized. */
  static oneShot<T>(dataset: Dataset<T>): Operation<DatasetIterator<T>> {
    return DatasetIterator.open<T>({ schema: dataset.schema, binding: dataset.node, oneShot: true })
  }

  /** Unbound, typed by nested dtypes and optional shapes. */
  static fromStructure<T = unknown>(
    types: TypeSpec,
    shapes?: ShapeSpec
  ): Operation<DatasetIterator<T>> {
    return DatasetIterator.open<T>({ schema: schemaOf(types, shapes), oneShot: false })
  }

  static fromSchema<T = unknown>(schema: Schema): Operation<DatasetIterator<T>> {
    return DatasetIterator.open<T>({ schema, oneShot: false })
  }

  /**
   * An iterator that pulls from whichever live iterator the handle passed to
   * `next` names, so one consumer can switch between pipelines.
   */
  static fromHandle<T = unknown>(types: TypeSpec, shapes?: ShapeSpec): HandleIterator<T> {
    return new HandleIterator<T>(schemaOf(types, shapes))
  }

  get state(): IteratorState {
    return this.current
  }

  /**
   * Check that `dataset` is compatible and return the operation that
   * (re)starts this iterator on it.
   *
   * @throws StructureMismatchError, TypeMismatchError or ShapeMismatchError
   */
  bind(dataset: Dataset<T>): Operation<void> {
    this.assertUsable()
    if (this.oneShot) {
      throw new InvalidArgumentError('A one-shot iterator cannot be bound to another dataset')
    }
    assertCompatible(this.schema, dataset.schema)
    const node = dataset.node
    const iterator = this
    return {
      *[Symbol.iterator]() {
        iterator.assertUsable()
        yield* iterator.start(node)
      },
    }
  }

  /**
   * (Re)start the currently bound dataset.
   */
  *initialize(): Operation<void> {
    this.assertUsable()
    if (this.oneShot) {
      throw new InvalidArgumentError('A one-shot iterator has no initializer')
    }
    if (!this.binding) {
      throw new InvalidArgumentError('Iterator is not bound to a dataset; use bind(dataset)')
    }
    yield* this.start(this.binding)
  }

  /**
   * The next element.
   *
   * @throws OutOfRangeError once the sequence is exhausted (and on every later pull)
   * @throws InvalidArgumentError when not initialized or disposed
   */
  *next(): Operation<T> {
    this.assertUsable()
    if (this.current === 'unbound' && this.oneShot && this.binding) {
      yield* this.start(this.binding)
    }
    if (this.current === 'exhausted') {
      throw new OutOfRangeError()
    }
    const lease = this.lease
    if (this.current !== 'running' || !lease) {
      throw new InvalidArgumentError(
        'Iterator is not initialized; run initialize() or the operation returned by bind()'
      )
    }
    const next = yield* lease.cursor.next()
    if (next.done) {
      yield* this.release()
      this.current = 'exhausted'
      this.log.debug('iterator exhausted')
      throw new OutOfRangeError()
    }
    return next.value as T
  }

  /**
   * Halt all background work of the current binding. The iterator cannot be
   * used afterwards.
   */
  *dispose(): Operation<void> {
    if (this.current === 'disposed') return
    live.delete(this.handle)
    yield* this.release()
    this.current = 'disposed'
    this.log.debug('iterator disposed')
  }

  private *start(node: DatasetNode): Operation<void> {
    yield* this.release()
    this.binding = node
    this.lease = yield* openWithin(this.scope, node.open())
    this.current = 'running'
    this.log.debug({ dataset: node.kind }, 'iterator initialized')
  }

  private *release(): Operation<void> {
    const lease = this.lease
    this.lease = undefined
    if (lease) {
      yield* lease.close()
    }
  }

  private assertUsable(): void {
    if (this.current === 'disposed') {
      throw new InvalidArgumentError('Iterator has been disposed')
    }
  }
}

export class HandleIterator<T> {
  constructor(readonly schema: Schema) {}

  /**
   * The next element of the iterator named by `handle`.
   *
   * @throws NotFoundError when no live iterator has that handle
   * @throws StructureMismatchError, TypeMismatchError or ShapeMismatchError
   */
  *next(handle: string): Operation<T> {
    const target = live.get(handle)
    if (!target) {
      throw new NotFoundError(`Iterator handle ${handle} not found`)
    }
    assertCompatible(this.schema, target.schema)
    return (yield* target.next()) as T
  }
}

/**
 * Gather the elements of `dataset` (at most `limit`).
 */
export function* collect<T>(dataset: Dataset<T>, limit = Infinity): Operation<T[]> {
  return yield* scoped(function* () {
    const iterator = yield* DatasetIterator.oneShot(dataset)
    const values: T[] = []
    while (values.length < limit) {
      try {
        values.push(yield* iterator.next())
      } catch (error) {
        if (isOutOfRange(error)) break
        throw error
      }
    }
    return values
  })
}

/**
 * Run `fn` on every element of `dataset`, in order.
 */
export function* forEachElement<T>(
  dataset: Dataset<T>,
  fn: (element: T, index: number) => Operation<void> | void
): Operation<number> {
  return yield* scoped(function* () {
    const iterator = yield* DatasetIterator.oneShot(dataset)
    let count = 0
    while (true) {
      let element: T
      try {
        element = yield* iterator.next()
      } catch (error) {
        if (isOutOfRange(error)) return count
        throw error
      }
      const result = fn(element, count++)
      if (result) {
        yield* result
      }
    }
  })
}
