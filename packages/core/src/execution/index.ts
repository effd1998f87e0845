export {
  DONE,
  drain,
  fromArray,
  openWithin,
  yielded,
  type Cursor,
  type CursorStream,
  type Lease,
} from './cursor.ts'
export { createBoundedBuffer, type BoundedBuffer } from './buffer.ts'
export { invoke, isPromiseLike, settle, toError, type ElementFn, type ElementOperation } from './invoke.ts'
export { SeededRandom, randomSeed } from './random.ts'
