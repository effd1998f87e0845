/**
 * Dataset
 *
 * The typed, immutable face of a pipeline node. Static methods build
 * sources; instance methods chain transformations. Nothing runs until an
 * iterator pulls from the result.
 *
 * @example
 * ```ts
 * const batches = Dataset.range(100)
 *   .map((x) => x * 2, { numParallelCalls: 4 })
 *   .shuffle(10, 7)
 *   .batch(8)
 *   .prefetch(2)
 *
 * const rows = yield* collect(batches)
 * ```
 */
import type { Operation } from 'effection'
import { z } from 'zod'
import { InvalidArgumentError, TypeMismatchError } from '../errors.ts'
import { DatasetIterator } from '../iterator/iterator.ts'
import { schemaOf } from '../schema/structure.ts'
import type { Scalar, Schema, ShapeSpec, TypeSpec } from '../schema/types.ts'
import type { Tensor } from '../tensor/tensor.ts'
import {
  CompressionSchema,
  NonNegativeIntSchema,
  PositiveIntSchema,
  parseArg,
  type Compression,
} from '../validation.ts'
import { createBatchNode, createPaddedBatchNode } from './batch.ts'
import { createCacheNode } from './cache.ts'
import {
  FilenamesSchema,
  createFixedLengthRecordNode,
  createListFilesNode,
  createTextLineNode,
  type FixedLengthRecordOptions,
} from './files.ts'
import { createFilterNode } from './filter.ts'
import { createFramedRecordNode } from './framed-records.ts'
import { createFlatMapNode, createInterleaveNode } from './flat-map.ts'
import { createGeneratorNode, type GeneratorFactory } from './generator.ts'
import { createMapNode } from './map.ts'
import { describeNode, type DatasetNode } from './node.ts'
import { createPrefetchNode } from './prefetch.ts'
import { createShuffleNode } from './shuffle.ts'
import {
  createRangeNode,
  createSlicesNode,
  createTensorsNode,
  createValuesNode,
} from './sources.ts'
import {
  createConcatenateNode,
  createRepeatNode,
  createZipNode,
  type NodeStructure,
} from './structural.ts'
import { createSkipNode, createTakeNode } from './take-skip.ts'

// =============================================================================
// Element typing
// =============================================================================

/** Arguments a user function receives: tuple elements are spread. */
export type ElementArgs<T> = T extends readonly unknown[] ? T : [T]

/** Element type after `batch`: every leaf becomes a tensor. */
export type Batched<T> = T extends Scalar | Tensor
  ? Tensor
  : T extends readonly unknown[]
    ? { -readonly [K in keyof T]: Batched<T[K]> }
    : T extends object
      ? { [K in keyof T]: Batched<T[K]> }
      : Tensor

/** Element type after slicing along the first dimension. */
export type Sliced<T> = T extends Tensor
  ? Tensor | Scalar
  : T extends readonly unknown[]
    ? { -readonly [K in keyof T]: Sliced<T[K]> }
    : T extends object
      ? { [K in keyof T]: Sliced<T[K]> }
      : never

/** Datasets nested in tuples or records, as accepted by `zip`. */
export type DatasetStructure =
  | Dataset<unknown>
  | readonly DatasetStructure[]
  | { readonly [key: string]: DatasetStructure }

export type ZipElement<S> = S extends Dataset<infer T>
  ? T
  : S extends readonly unknown[]
    ? { -readonly [K in keyof S]: ZipElement<S[K]> }
    : { [K in keyof S]: ZipElement<S[K]> }

export interface MapOptions {
  /** Concurrent invocations (default 1). Output order is input order. */
  numParallelCalls?: number
  /** Output schema; required when `fn` is asynchronous. */
  schema?: Schema
}

export interface TextLineOptions {
  compression?: Compression
}

export interface FramedRecordOptions {
  compression?: Compression
}

function unpack(element: unknown): unknown[] {
  return Array.isArray(element) ? element : [element]
}

/**
 * Lower a typed user function to one taking an untyped element.
 */
function lower<T, R>(fn: (...args: ElementArgs<T>) => R): (element: unknown) => R {
  return (element) => fn(...(unpack(element) as ElementArgs<T>))
}

function toNode(value: unknown, name: string): DatasetNode {
  if (value instanceof Dataset) return value.node
  throw new TypeMismatchError(
    `${name}: function must return a Dataset, received ${value === null ? 'null' : typeof value}`
  )
}

function isDatasetList(value: DatasetStructure): value is readonly DatasetStructure[] {
  return Array.isArray(value)
}

function toNodeStructure(structure: DatasetStructure): NodeStructure {
  if (structure instanceof Dataset) return structure.node
  if (isDatasetList(structure)) return structure.map(toNodeStructure)
  if (typeof structure !== 'object' || structure === null) {
    throw new InvalidArgumentError('zip: expected datasets nested in tuples or records')
  }
  const fields: Record<string, NodeStructure> = {}
  for (const key of Object.keys(structure)) {
    const value = structure[key]
    if (value !== undefined) fields[key] = toNodeStructure(value)
  }
  return fields
}

const ShardArgs = z
  .object({ numShards: PositiveIntSchema, index: NonNegativeIntSchema })
  .refine(({ numShards, index }) => index < numShards, {
    message: 'index must be less than numShards',
  })

// =============================================================================
// Dataset
// =============================================================================

export class Dataset<T> {
  constructor(readonly node: DatasetNode) {}

  // ---------------------------------------------------------------------------
  // Sources
  // ---------------------------------------------------------------------------

  /** A dataset of exactly one element. */
  static fromTensors<T>(element: T): Dataset<T> {
    return new Dataset<T>(createTensorsNode(element))
  }

  /** One element per entry along the first dimension of every tensor leaf. */
  static fromTensorSlices<T>(element: T): Dataset<Sliced<T>> {
    return new Dataset<Sliced<T>>(createSlicesNode(element))
  }

  static fromValues<T>(values: readonly T[]): Dataset<T> {
    return new Dataset<T>(createValuesNode(values))
  }

  /**
   * `range(stop)` or `range(start, stop, step = 1)`: half-open `[start, stop)`.
   */
  static range(stop: number): Dataset<number>
  static range(start: number, stop: number, step?: number): Dataset<number>
  static range(first: number, stop?: number, step = 1): Dataset<number> {
    return stop === undefined
      ? new Dataset<number>(createRangeNode(0, first, 1))
      : new Dataset<number>(createRangeNode(first, stop, step))
  }

  /** One string per line of each file. */
  static textLines(filenames: string | readonly string[], options: TextLineOptions = {}): Dataset<string> {
    const files = parseArg('textLines filenames', FilenamesSchema, filenames)
    const compression = parseArg('textLines compression', CompressionSchema, options.compression ?? '')
    return new Dataset<string>(createTextLineNode(files, compression))
  }

  /** Length-framed, checksummed byte records of each file. */
  static framedRecords(
    filenames: string | readonly string[],
    options: FramedRecordOptions = {}
  ): Dataset<Uint8Array> {
    const files = parseArg('framedRecords filenames', FilenamesSchema, filenames)
    const compression = parseArg('framedRecords compression', CompressionSchema, options.compression ?? '')
    return new Dataset<Uint8Array>(createFramedRecordNode(files, compression))
  }

  /** Fixed-size byte records of each file. */
  static fixedLengthRecords(
    filenames: string | readonly string[],
    recordBytes: number,
    options: FixedLengthRecordOptions = {}
  ): Dataset<Uint8Array> {
    const files = parseArg('fixedLengthRecords filenames', FilenamesSchema, filenames)
    return new Dataset<Uint8Array>(createFixedLengthRecordNode(files, recordBytes, options))
  }

  /** Sorted absolute paths of the files matching a glob pattern. */
  static listFiles(pattern: string | readonly string[]): Dataset<string> {
    return new Dataset<string>(createListFilesNode(pattern))
  }

  /**
   * Elements produced by `generator`, invoked once per iterator. Every
   * element is checked against `types` and `shapes`.
   */
  static fromGenerator<T>(
    generator: GeneratorFactory<T>,
    types: TypeSpec,
    shapes?: ShapeSpec
  ): Dataset<T> {
    return new Dataset<T>(createGeneratorNode(generator, schemaOf(types, shapes)))
  }

  /** Combine datasets in lockstep; ends with the shortest. */
  static zip<S extends DatasetStructure>(datasets: S): Dataset<ZipElement<S>> {
    return new Dataset<ZipElement<S>>(createZipNode(toNodeStructure(datasets)))
  }

  // ---------------------------------------------------------------------------
  // Introspection
  // ---------------------------------------------------------------------------

  get schema(): Schema {
    return this.node.schema
  }

  get inputs(): readonly Dataset<unknown>[] {
    return this.node.inputs.map((input) => new Dataset<unknown>(input))
  }

  toString(): string {
    return describeNode(this.node)
  }

  // ---------------------------------------------------------------------------
  // Structural
  // ---------------------------------------------------------------------------

  concatenate(other: Dataset<T>): Dataset<T> {
    return new Dataset<T>(createConcatenateNode(this.node, other.node))
  }

  /** Repeat `count` times; forever when omitted or `-1`. */
  repeat(count = -1): Dataset<T> {
    return new Dataset<T>(createRepeatNode(this.node, count))
  }

  // ---------------------------------------------------------------------------
  // Element-wise
  // ---------------------------------------------------------------------------

  map<R>(fn: (...args: ElementArgs<T>) => R | Promise<R>, options: MapOptions = {}): Dataset<R> {
    return new Dataset<R>(createMapNode(this.node, lower<T, R | Promise<R>>(fn), options))
  }

  filter(predicate: (...args: ElementArgs<T>) => boolean | Tensor | Promise<boolean>): Dataset<T> {
    return new Dataset<T>(
      createFilterNode(this.node, lower<T, boolean | Tensor | Promise<boolean>>(predicate))
    )
  }

  flatMap<R>(fn: (...args: ElementArgs<T>) => Dataset<R>): Dataset<R> {
    const apply = lower<T, Dataset<R>>(fn)
    return new Dataset<R>(createFlatMapNode(this.node, (element) => toNode(apply(element), 'flatMap')))
  }

  interleave<R>(
    fn: (...args: ElementArgs<T>) => Dataset<R>,
    cycleLength: number,
    blockLength = 1
  ): Dataset<R> {
    const apply = lower<T, Dataset<R>>(fn)
    return new Dataset<R>(
      createInterleaveNode(
        this.node,
        (element) => toNode(apply(element), 'interleave'),
        cycleLength,
        blockLength
      )
    )
  }

  /** Chain a reusable transformation. */
  apply<R>(transformation: (dataset: Dataset<T>) => Dataset<R>): Dataset<R> {
    const result: unknown = transformation(this)
    return new Dataset<R>(toNode(result, 'apply'))
  }

  // ---------------------------------------------------------------------------
  // Windowing
  // ---------------------------------------------------------------------------

  batch(batchSize: number): Dataset<Batched<T>> {
    return new Dataset<Batched<T>>(createBatchNode(this.node, batchSize))
  }

  /**
   * Batch with per-leaf right padding. `paddedShapes` follows the element
   * structure with a dimension list at every leaf (`null` or `-1` pads to the
   * largest extent in the batch); `paddingValues` gives a scalar per leaf.
   */
  paddedBatch(batchSize: number, paddedShapes: unknown, paddingValues?: unknown): Dataset<Batched<T>> {
    return new Dataset<Batched<T>>(
      createPaddedBatchNode(this.node, batchSize, paddedShapes, paddingValues)
    )
  }

  shuffle(bufferSize: number, seed?: number): Dataset<T> {
    return new Dataset<T>(createShuffleNode(this.node, bufferSize, seed))
  }

  /** Record the first complete pass; replay it afterwards. */
  cache(key = ''): Dataset<T> {
    return new Dataset<T>(createCacheNode(this.node, key))
  }

  take(count: number): Dataset<T> {
    return new Dataset<T>(createTakeNode(this.node, count))
  }

  skip(count: number): Dataset<T> {
    return new Dataset<T>(createSkipNode(this.node, count))
  }

  /** Pair each element with its position. */
  enumerate(start = 0): Dataset<[number, T]> {
    const positions = createRangeNode(start, Number.MAX_SAFE_INTEGER, 1)
    return new Dataset<[number, T]>(createZipNode([positions, this.node]))
  }

  /** Keep every `numShards`-th element, starting at `index`. */
  shard(numShards: number, index: number): Dataset<T> {
    const args = parseArg('shard', ShardArgs, { numShards, index })
    return this.enumerate()
      .filter((position) => position % args.numShards === args.index)
      .map((_position, element) => element, { schema: this.schema })
  }

  // ---------------------------------------------------------------------------
  // Sink adapters
  // ---------------------------------------------------------------------------

  prefetch(bufferSize: number): Dataset<T> {
    return new Dataset<T>(createPrefetchNode(this.node, bufferSize))
  }

  // ---------------------------------------------------------------------------
  // Iterators
  // ---------------------------------------------------------------------------

  makeInitializableIterator(): Operation<DatasetIterator<T>> {
    return DatasetIterator.fromDataset(this)
  }

  makeOneShotIterator(): Operation<DatasetIterator<T>> {
    return DatasetIterator.oneShot(this)
  }
}
