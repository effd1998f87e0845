/**
 * Element-wise transformation, sequential or with bounded parallelism.
 */
import { resource, spawn, useScope, withResolvers, type Operation } from 'effection'
import { InvalidArgumentError, isOutOfRange } from '../errors.ts'
import { createBoundedBuffer } from '../execution/buffer.ts'
import { DONE, yielded, type CursorStream } from '../execution/cursor.ts'
import {
  invoke,
  isPromiseLike,
  toError,
  type ElementFn,
  type ElementOperation,
} from '../execution/invoke.ts'
import { useLogger } from '../logger/context.ts'
import { inferResultSchema, sampleElement, validateElement } from '../schema/infer.ts'
import type { Schema } from '../schema/types.ts'
import { PositiveIntSchema, parseArg } from '../validation.ts'
import { defineNode, type DatasetNode } from './node.ts'

export interface MapNodeOptions {
  /** Concurrent invocations (default 1). Output order is input order. */
  numParallelCalls?: number
  /** Output schema; skips the sample invocation. Required for async functions. */
  schema?: Schema
}

/**
 * Invoke `fn` once on a sample element of `input` and derive its output schema.
 */
export function resolveFunctionSchema<R>(
  name: string,
  input: DatasetNode,
  fn: (element: unknown) => R,
  toSchema: (result: R) => Schema
): Schema {
  const result = fn(sampleElement(input.schema))
  if (isPromiseLike(result)) {
    // the sample result is discarded
    result.then(undefined, () => undefined)
    throw new InvalidArgumentError(
      `${name}: an asynchronous function requires an explicit output schema`
    )
  }
  return toSchema(result)
}

function sequentialMap(
  input: DatasetNode,
  apply: ElementOperation,
  schema: () => Schema
): CursorStream {
  return resource(function* (provide) {
    const upstream = yield* input.open()
    let finished = false

    yield* provide({
      *next() {
        if (finished) return DONE
        const next = yield* upstream.next()
        if (next.done) {
          finished = true
          return DONE
        }
        try {
          const value = yield* apply(next.value)
          validateElement(value, schema())
          return yielded(value)
        } catch (error) {
          if (isOutOfRange(error)) {
            finished = true
            return DONE
          }
          throw error
        }
      },
    })
  })
}

function parallelMap(
  input: DatasetNode,
  apply: ElementOperation,
  schema: () => Schema,
  numParallelCalls: number
): CursorStream {
  return resource(function* (provide) {
    const scope = yield* useScope()
    const log = yield* useLogger('dataset:parallel-map')
    const upstream = yield* input.open()
    const slots = createBoundedBuffer<Operation<unknown>>(numParallelCalls)
    const idle: Array<() => void> = []
    let running = 0
    let finished = false

    function* acquire(): Operation<void> {
      while (running >= numParallelCalls) {
        const { operation, resolve } = withResolvers<void>()
        idle.push(resolve)
        yield* operation
      }
      running++
    }

    function release(): void {
      running--
      for (const wake of idle.splice(0)) wake()
    }

    yield* spawn(function* () {
      log.debug({ numParallelCalls }, 'dispatcher started')
      try {
        while (true) {
          const next = yield* upstream.next()
          if (next.done) break
          yield* acquire()
          const slot = withResolvers<unknown>()
          yield* slots.put(slot.operation)
          scope.run(function* () {
            try {
              const value = yield* apply(next.value)
              validateElement(value, schema())
              slot.resolve(value)
            } catch (error) {
              slot.reject(toError(error))
            } finally {
              release()
            }
          })
        }
        slots.close()
      } catch (error) {
        slots.fail(toError(error))
      } finally {
        log.debug('dispatcher stopped')
      }
    })

    yield* provide({
      *next() {
        if (finished) return DONE
        const slot = yield* slots.take()
        if (slot.done) {
          finished = true
          return DONE
        }
        try {
          return yielded(yield* slot.value)
        } catch (error) {
          if (isOutOfRange(error)) {
            finished = true
            return DONE
          }
          throw error
        }
      },
    })
  })
}

function openMap(
  input: DatasetNode,
  apply: ElementOperation,
  schema: () => Schema,
  numParallelCalls: number
): CursorStream {
  return numParallelCalls > 1
    ? parallelMap(input, apply, schema, numParallelCalls)
    : sequentialMap(input, apply, schema)
}

/**
 * Apply `fn` to every element. When `fn` throws OutOfRangeError the sequence
 * ends there.
 */
export function createMapNode(
  input: DatasetNode,
  fn: ElementFn,
  options: MapNodeOptions = {}
): DatasetNode {
  const numParallelCalls = parseArg(
    'map numParallelCalls',
    PositiveIntSchema,
    options.numParallelCalls ?? 1
  )
  const node: DatasetNode = defineNode({
    kind: numParallelCalls > 1 ? 'ParallelMapDataset' : 'MapDataset',
    inputs: [input],
    schema: options.schema ?? (() => resolveFunctionSchema('map', input, fn, inferResultSchema)),
    open: () => openMap(input, (element) => invoke(fn, element), () => node.schema, numParallelCalls),
  })
  return node
}

/**
 * Map with an operation instead of a plain function. The output schema must
 * be given.
 */
export function createOperationMapNode(
  input: DatasetNode,
  apply: ElementOperation,
  schema: Schema,
  numParallelCalls = 1
): DatasetNode {
  const parallel = parseArg('map numParallelCalls', PositiveIntSchema, numParallelCalls)
  return defineNode({
    kind: parallel > 1 ? 'ParallelMapDataset' : 'MapDataset',
    inputs: [input],
    schema,
    open: () => openMap(input, apply, () => schema, parallel),
  })
}
