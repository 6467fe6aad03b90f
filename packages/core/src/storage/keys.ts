import type { CellValue, KeyTuple, Row } from '@vecsync/shared'
import { DataValidationError } from '../errors'

// Loaders hand back strings and backends may hand back numbers; compare as text.
function normalize(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null
  return Array.isArray(value) ? JSON.stringify(value) : String(value)
}

export function keyTupleOf(row: Row, primaryKeys: string[]): KeyTuple {
  return primaryKeys.map(k => row[k] ?? null)
}

/** Stable string form of a key tuple, usable as a Map key. */
export function encodeKey(tuple: KeyTuple): string {
  return JSON.stringify(tuple.map(normalize))
}

export function rowKey(row: Row, primaryKeys: string[]): string {
  return encodeKey(keyTupleOf(row, primaryKeys))
}

/** Throws unless every row carries every primary-key column. */
export function assertPrimaryKeys(rows: Row[], primaryKeys: string[]): void {
  for (const row of rows) {
    const missing = primaryKeys.filter(k => !(k in row))
    if (missing.length > 0) {
      throw new DataValidationError(`Primary keys [${missing.join(', ')}] missing in input rows`)
    }
  }
}
