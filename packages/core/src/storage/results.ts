import { EMBED_COLUMNS_VALUE } from '@vecsync/shared'
import type { CellValue, Row, SearchResult, TableSchema } from '@vecsync/shared'
import { DataValidationError } from '../errors'
import { defaultSearchColumn, isVectorType, parseVectorDimension, sourceColumnOf } from '../schema/SchemaSynthesizer'

/** Primary-key values joined with `:`, the id every backend reports. */
export function resultId(row: Row, primaryKeys: string[]): string {
  return primaryKeys.map(k => cellText(row[k])).join(':')
}

export function cellText(value: CellValue | undefined): string {
  if (value === null || value === undefined) return ''
  return Array.isArray(value) ? value.join(',') : String(value)
}

/** Resolves the vector column a search runs against. */
export function resolveSearchColumn(table: string, schema: TableSchema, embedColumn?: string): string {
  const column = embedColumn ?? defaultSearchColumn(schema)
  if (column === null) {
    throw new DataValidationError(`Table ${table} has no embedding column`)
  }
  const type = schema.columns[column]
  if (type === undefined || !isVectorType(type)) {
    throw new DataValidationError(`Column ${column} is not an embedding column of ${table}`)
  }
  return column
}

/** Text a search hit stands for: the combined value, or the column the vector encodes. */
export function documentOf(row: Row, embedColumn: string): string {
  const source = sourceColumnOf(embedColumn)
  return cellText(row[source ?? EMBED_COLUMNS_VALUE])
}

export function metadataOf(row: Row, schema: TableSchema): Record<string, CellValue> {
  const metadata: Record<string, CellValue> = {}
  for (const [col, value] of Object.entries(row)) {
    const type = schema.columns[col]
    if (type !== undefined && isVectorType(type)) continue
    metadata[col] = value
  }
  return metadata
}

export function toSearchResult(
  row: Row,
  schema: TableSchema,
  primaryKeys: string[],
  embedColumn: string,
  distance: number,
): SearchResult {
  return {
    id: resultId(row, primaryKeys),
    document: documentOf(row, embedColumn),
    distance,
    metadata: metadataOf(row, schema),
  }
}

export function isVector(value: CellValue | undefined): value is number[] {
  if (!Array.isArray(value) || value.length === 0) return false
  for (const v of value) {
    if (typeof v !== 'number') return false
  }
  return true
}

/** Rejects vectors whose length differs from their column's declared dimension. */
export function assertVectorDims(table: string, schema: TableSchema, rows: Row[]): void {
  for (const [column, type] of Object.entries(schema.columns)) {
    const dim = parseVectorDimension(type)
    if (dim === null) continue
    for (const row of rows) {
      const value = row[column]
      if (isVector(value) && value.length !== dim) {
        throw new DataValidationError(
          `Column ${column} of ${table} expects vectors of dimension ${dim}, got ${value.length}`,
        )
      }
    }
  }
}
