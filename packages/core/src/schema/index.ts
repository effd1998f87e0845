export type {
  DType,
  Dim,
  Element,
  LeafSchema,
  RecordSchema,
  Scalar,
  Schema,
  Shape,
  ShapeSpec,
  TupleSchema,
  TypeSpec,
} from './types.ts'
export { DTypeSchema } from './types.ts'
export { leaf, record, scalar, tuple } from './builders.ts'
export {
  formatShape,
  isFullyDefined,
  isShapeCompatible,
  mergeShape,
  mostSpecificCompatibleShape,
} from './shape.ts'
export {
  assertCompatible,
  assertSameTypes,
  flatten,
  flattenSchema,
  generalizeSchema,
  isCompatible,
  isPlainRecord,
  leafPaths,
  mapSchema,
  pack,
  recordKeys,
  schemaOf,
} from './structure.ts'
export {
  inferResultSchema,
  inferSchema,
  isSchemaFullyDefined,
  sampleElement,
  validateElement,
} from './infer.ts'
export { formatSchema } from './format.ts'
