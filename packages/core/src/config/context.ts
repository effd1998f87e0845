import { createContext, type Operation } from 'effection'
import { env } from './env.ts'

export interface DatasetConfig {
  /** Directory that relative cache keys resolve against */
  cacheDir: string
  /** Chunk size, in bytes, used by file readers */
  readerBufferBytes: number
}

/**
 * Per-scope overrides of the environment configuration.
 */
export const DatasetConfigContext = createContext<Partial<DatasetConfig>>(
  'feedline.DatasetConfig'
)

/**
 * Resolve configuration by merging (in order):
 * 1) explicit options
 * 2) context-provided config (DatasetConfigContext)
 * 3) the environment
 */
export function* resolveDatasetConfig(
  options?: Partial<DatasetConfig>
): Operation<DatasetConfig> {
  const ctxConfig = yield* DatasetConfigContext.get()

  return {
    cacheDir: options?.cacheDir ?? ctxConfig?.cacheDir ?? env.FEEDLINE_CACHE_DIR,
    readerBufferBytes:
      options?.readerBufferBytes ??
      ctxConfig?.readerBufferBytes ??
      env.FEEDLINE_READER_BUFFER_BYTES,
  }
}
