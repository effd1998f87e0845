import { recordKeys } from './structure.ts'
import type { Schema } from './types.ts'

/**
 * Human-readable schema: `number`, `string[?]`, `(number, bytes[...])`,
 * `{image: number[28,28], label: number}`.
 */
export function formatSchema(schema: Schema): string {
  switch (schema.kind) {
    case 'leaf':
      if (schema.shape === null) return `${schema.dtype}[...]`
      if (schema.shape.length === 0) return schema.dtype
      return `${schema.dtype}[${schema.shape.map((dim) => (dim === null ? '?' : String(dim))).join(',')}]`
    case 'tuple':
      return `(${schema.items.map(formatSchema).join(', ')})`
    case 'record':
      return `{${recordKeys(schema.fields)
        .map((key) => {
          const field = schema.fields[key]
          return `${key}: ${field ? formatSchema(field) : '?'}`
        })
        .join(', ')}}`
  }
}
