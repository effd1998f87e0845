// Re-export pipeline construction
export {
  Dataset,
  createGeneratorMultiplexer,
  createFileCacheStore,
  createMemoryCacheStore,
  encodeFramedRecord,
  type Batched,
  type CacheStore,
  type DatasetNode,
  type DatasetStructure,
  type ElementArgs,
  type FixedLengthRecordOptions,
  type FramedRecordOptions,
  type GeneratorFactory,
  type GeneratorMultiplexer,
  type GeneratorSource,
  type MapOptions,
  type Sliced,
  type TextLineOptions,
  type ZipElement,
} from './dataset/index.ts'

// Re-export building blocks for custom sources
export {
  defineNode,
  describeNode,
  isDatasetNode,
  type NodeSpec,
  type SchemaResolution,
} from './dataset/index.ts'
export * from './execution/index.ts'

// Re-export iterators
export {
  DatasetIterator,
  HandleIterator,
  collect,
  forEachElement,
  type IteratorState,
} from './iterator/index.ts'

// Re-export schemas and values
export * from './schema/index.ts'
export * from './tensor/index.ts'

// Re-export errors
export {
  DataLossError,
  DatasetError,
  InvalidArgumentError,
  NotFoundError,
  OutOfRangeError,
  ShapeMismatchError,
  StructureMismatchError,
  TypeMismatchError,
  isOutOfRange,
  type DatasetErrorCode,
} from './errors.ts'

// Re-export logging and configuration
export * from './logger/index.ts'
export {
  DatasetConfigContext,
  resolveDatasetConfig,
  type DatasetConfig,
} from './config/index.ts'
export {
  CompressionSchema,
  CountSchema,
  NonNegativeIntSchema,
  PositiveIntSchema,
  parseArg,
  type Compression,
} from './validation.ts'
