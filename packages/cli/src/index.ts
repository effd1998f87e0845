export { formatElement, toHex } from './lib/format.ts'
export {
  buildPipeline,
  parsePreviewArgs,
  preview,
  type PreviewFormat,
  type PreviewOptions,
  type RawPreviewArgs,
} from './lib/pipeline.ts'
