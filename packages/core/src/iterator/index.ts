export {
  DatasetIterator,
  HandleIterator,
  collect,
  forEachElement,
  type IteratorState,
} from './iterator.ts'
