/**
 * Cache Stores
 *
 * Where a cache node records its first complete pass. The in-memory store
 * lives as long as the pipeline; the file store writes one file per key
 * under the configured cache directory.
 */
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { deserialize, serialize } from 'node:v8'
import { call, type Operation } from 'effection'
import { flatten, flattenSchema, pack } from '../schema/structure.ts'
import type { DType, Scalar, Schema } from '../schema/types.ts'
import { Tensor } from '../tensor/tensor.ts'
import { InvalidArgumentError } from '../errors.ts'

export interface CacheStore {
  /** The recorded elements for `key`, if a complete pass was committed. */
  lookup(key: string): Operation<readonly unknown[] | undefined>
  /** Record a complete pass. The first commit for a key wins. */
  commit(key: string, elements: readonly unknown[]): Operation<void>
}

export function createMemoryCacheStore(): CacheStore {
  const entries = new Map<string, readonly unknown[]>()

  return {
    *lookup(key) {
      return entries.get(key)
    },
    *commit(key, elements) {
      if (!entries.has(key)) {
        entries.set(key, Object.freeze([...elements]))
      }
    },
  }
}

// =============================================================================
// File store
// =============================================================================

type EncodedLeaf =
  | { t: 'scalar'; v: Scalar }
  | { t: 'tensor'; dtype: DType; shape: number[]; data: Scalar[] }

function encode(element: unknown, schema: Schema): EncodedLeaf[] {
  return flatten(element, schema).map((value): EncodedLeaf => {
    if (value instanceof Tensor) {
      return { t: 'tensor', dtype: value.dtype, shape: [...value.shape], data: [...value.data] }
    }
    if (
      typeof value === 'number' ||
      typeof value === 'bigint' ||
      typeof value === 'boolean' ||
      typeof value === 'string' ||
      value instanceof Uint8Array
    ) {
      return { t: 'scalar', v: value }
    }
    throw new InvalidArgumentError(`cache: cannot store a ${typeof value} value`)
  })
}

function isEncodedLeaf(value: unknown): value is EncodedLeaf {
  return typeof value === 'object' && value !== null && 't' in value
}

function decode(encoded: unknown, schema: Schema): unknown {
  if (!Array.isArray(encoded) || encoded.length !== flattenSchema(schema).length) {
    throw new InvalidArgumentError('cache: stored element does not match the dataset schema')
  }
  const leaves = encoded.map((item: unknown) => {
    if (!isEncodedLeaf(item)) {
      throw new InvalidArgumentError('cache: malformed stored element')
    }
    return item.t === 'tensor' ? Tensor.fromFlat(item.data, item.shape, item.dtype) : item.v
  })
  return pack(schema, leaves)
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * A store writing each committed pass to `<path>.cache` with v8 serialization.
 */
export function createFileCacheStore(schema: Schema): CacheStore {
  return {
    *lookup(path) {
      const file = `${path}.cache`
      const contents = yield* call(async () => {
        try {
          return await readFile(file)
        } catch (error) {
          if (isMissing(error)) return undefined
          throw error
        }
      })
      if (contents === undefined) return undefined
      const stored: unknown = deserialize(contents)
      if (!Array.isArray(stored)) {
        throw new InvalidArgumentError(`cache: ${file} is not a cache file`)
      }
      return stored.map((element: unknown) => decode(element, schema))
    },

    *commit(path, elements) {
      const file = `${path}.cache`
      const temporary = `${file}.${process.pid}.tmp`
      const payload = serialize(elements.map((element) => encode(element, schema)))
      yield* call(async () => {
        await mkdir(dirname(file), { recursive: true })
        await writeFile(temporary, payload)
        await rename(temporary, file)
      })
    },
  }
}
