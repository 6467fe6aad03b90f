import type { CellValue, ColumnType } from '@vecsync/shared'
import { isVectorType, parseVectorDimension } from '../schema/SchemaSynthesizer'

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`
}

export function sqlType(type: ColumnType): string {
  switch (type) {
    case 'text': return 'TEXT'
    case 'text[]': return 'TEXT[]'
    case 'boolean': return 'BOOLEAN'
    default: return type
  }
}

/** Maps a `format_type()` string back to a column type; anything unrecognised reads as text. */
export function columnTypeOf(formatted: string): ColumnType {
  if (formatted === 'text[]' || formatted === 'boolean') return formatted
  const dim = parseVectorDimension(formatted)
  return dim !== null ? `vector(${dim})` : 'text'
}

/** Placeholder with the cast the column needs, e.g. `$3::vector`. */
export function placeholder(index: number, type: ColumnType): string {
  if (isVectorType(type)) return `$${index}::vector`
  if (type === 'text[]') return `$${index}::text[]`
  if (type === 'boolean') return `$${index}::boolean`
  return `$${index}`
}

/** pgvector takes vectors as `[1,2,3]` text. */
export function encodeParam(type: ColumnType, value: CellValue): unknown {
  if (value === null) return null
  if (isVectorType(type)) return Array.isArray(value) ? `[${value.join(',')}]` : String(value)
  if (type === 'text[]') return Array.isArray(value) ? value.map(String) : [String(value)]
  if (type === 'boolean') return typeof value === 'boolean' ? value : String(value) === 'true'
  return Array.isArray(value) ? JSON.stringify(value) : String(value)
}

export function decodeCell(type: ColumnType | undefined, value: unknown): CellValue {
  if (value === null || value === undefined) return null
  if (type !== undefined && isVectorType(type) && typeof value === 'string') {
    const parsed: unknown = JSON.parse(value)
    return Array.isArray(parsed) ? parsed.map(Number) : null
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value
  if (Array.isArray(value)) return value.map(String)
  return String(value)
}
