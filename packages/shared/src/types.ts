export const EMBEDDING_MODES = ['combined', 'separated'] as const
export type EmbeddingMode = (typeof EMBEDDING_MODES)[number]

export type VectorColumnType = `vector(${number})`
export type ColumnType = 'text' | 'text[]' | 'boolean' | VectorColumnType

export type CellValue = string | number | boolean | null | string[] | number[]

/** One record of a logical table, keyed by column name. */
export type Row = Record<string, CellValue>

export interface TableSchema {
  columns: Record<string, ColumnType>
  nullables: Record<string, boolean>
}

/** Tabular input produced by a loader. */
export interface Table {
  columns: string[]
  rows: Row[]
}

/** Values of the primary-key columns of one row, in primary-key order. */
export type KeyTuple = CellValue[]

export interface SearchResult {
  id: string
  document: string
  distance: number
  metadata: Record<string, CellValue>
}

export interface ReconcileReport {
  table: string
  inserted: number
  updated: number
  deactivated: number
}

export interface IngestProgress {
  step: 'loading' | 'embedding' | 'reconciling' | 'done'
  table: string
  progress?: number
  total?: number
  durationMs?: number
}

// Reserved column names
export const IS_ACTIVE = 'is_active'
export const EMBED_COLUMNS_NAMES = 'embed_columns_names'
export const EMBED_COLUMNS_VALUE = 'embed_columns_value'
export const COMBINED_VECTOR = 'embeddings'
export const ENCODED_SUFFIX = '_enc'
