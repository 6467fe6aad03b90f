import {
  COMBINED_VECTOR,
  EMBED_COLUMNS_NAMES,
  EMBED_COLUMNS_VALUE,
  ENCODED_SUFFIX,
  IS_ACTIVE,
} from '@vecsync/shared'
import type { ColumnType, EmbeddingMode, TableSchema, VectorColumnType } from '@vecsync/shared'

/** Default vector size; matches the 768-dim Google and nomic-embed-text models. */
export const DEFAULT_DIMENSION = 768

export interface SynthesizeInput {
  /** Columns of the input table, in load order. */
  columns: string[]
  primaryKeys: string[]
  mode: EmbeddingMode
  embedColumns: string[]
  dimension: number
}

export function vectorType(dimension: number): VectorColumnType {
  return `vector(${dimension})`
}

/** Returns N for a `vector(N)` type, null for any other type. */
export function parseVectorDimension(type: string): number | null {
  const match = /^vector\((\d+)\)$/.exec(type)
  return match ? Number(match[1]) : null
}

export function isVectorType(type: string): type is VectorColumnType {
  return parseVectorDimension(type) !== null
}

export function isEmbeddingColumn(name: string): boolean {
  return name === COMBINED_VECTOR || name.endsWith(ENCODED_SUFFIX)
}

export function encodedColumnName(column: string): string {
  return `${column}${ENCODED_SUFFIX}`
}

/** `description_enc` → `description`; null for the combined vector column. */
export function sourceColumnOf(vectorColumn: string): string | null {
  if (!vectorColumn.endsWith(ENCODED_SUFFIX)) return null
  return vectorColumn.slice(0, -ENCODED_SUFFIX.length)
}

/**
 * Derives the column map of a new logical table.
 *
 * Every input column is stored as text. The embedding mode decides the vector
 * columns: one `embeddings` column next to the concatenated `embed_columns_value`
 * in combined mode, or one `<col>_enc` column per source column in separated mode.
 * Callers validate the inputs; this never throws.
 */
export function synthesizeSchema(input: SynthesizeInput): TableSchema {
  const columns: Record<string, ColumnType> = {}
  for (const col of input.columns) columns[col] = 'text'
  columns[EMBED_COLUMNS_NAMES] = 'text[]'

  if (input.mode === 'combined') {
    columns[EMBED_COLUMNS_VALUE] = 'text'
    columns[COMBINED_VECTOR] = vectorType(input.dimension)
  } else {
    for (const col of input.embedColumns) {
      columns[encodedColumnName(col)] = vectorType(input.dimension)
    }
  }

  columns[IS_ACTIVE] = 'boolean'

  const nullables: Record<string, boolean> = {}
  for (const col of Object.keys(columns)) nullables[col] = true
  return { columns, nullables }
}

/** Columns of sample rows in first-seen order, ignoring reserved and vector columns. */
export function inputColumnsOf(rows: Array<Record<string, unknown>>): string[] {
  const seen = new Set<string>()
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (key === IS_ACTIVE || key === EMBED_COLUMNS_NAMES || key === EMBED_COLUMNS_VALUE) continue
      if (isEmbeddingColumn(key)) continue
      seen.add(key)
    }
  }
  return [...seen]
}

export function embeddingColumnsOf(schema: TableSchema): string[] {
  return Object.keys(schema.columns).filter(c => isEmbeddingColumn(c))
}

/** Column searched when the caller names none: `embeddings`, else the first `_enc` column. */
export function defaultSearchColumn(schema: TableSchema): string | null {
  if (schema.columns[COMBINED_VECTOR]) return COMBINED_VECTOR
  return embeddingColumnsOf(schema)[0] ?? null
}

export function cloneSchema(schema: TableSchema): TableSchema {
  return { columns: { ...schema.columns }, nullables: { ...schema.nullables } }
}
