/**
 * Element Formatting
 *
 * Renders pipeline elements as single preview lines. Bytes are shown as
 * hex, strings quoted, tensors as nested lists.
 */

import { Tensor, isPlainRecord, recordKeys } from '@feedline/core'

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (byte) => byte.toString(16).padStart(2, '0')).join('')
}

function formatValue(value: unknown): string {
  if (value instanceof Uint8Array) return toHex(value)
  if (typeof value === 'string') return JSON.stringify(value)
  if (typeof value === 'bigint') return `${value}n`
  if (value instanceof Tensor) return formatValue(value.toNested())
  if (Array.isArray(value)) {
    const items: readonly unknown[] = value
    return `[${items.map(formatValue).join(', ')}]`
  }
  if (isPlainRecord(value)) {
    return `{${recordKeys(value)
      .map((key) => `${key}: ${formatValue(value[key])}`)
      .join(', ')}}`
  }
  return String(value)
}

export function formatElement(element: unknown): string {
  return formatValue(element)
}
