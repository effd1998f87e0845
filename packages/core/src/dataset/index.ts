export {
  Dataset,
  type Batched,
  type DatasetStructure,
  type ElementArgs,
  type FramedRecordOptions,
  type MapOptions,
  type Sliced,
  type TextLineOptions,
  type ZipElement,
} from './dataset.ts'
export { defineNode, describeNode, isDatasetNode, type DatasetNode, type NodeSpec, type SchemaResolution } from './node.ts'
export {
  createGeneratorMultiplexer,
  type GeneratorFactory,
  type GeneratorMultiplexer,
  type GeneratorSource,
} from './generator.ts'
export { createFileCacheStore, createMemoryCacheStore, type CacheStore } from './cache-store.ts'
export type { FixedLengthRecordOptions } from './files.ts'
export { crc32c, encodeFramedRecord, maskCrc } from './framed-records.ts'
