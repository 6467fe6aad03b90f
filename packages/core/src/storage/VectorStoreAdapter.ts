import type {
  ColumnType,
  EmbeddingMode,
  KeyTuple,
  Row,
  SearchResult,
  TableSchema,
} from '@vecsync/shared'

/**
 * Uniform contract over vector-capable backends.
 *
 * Every backend implements the full set, simulating what it lacks natively.
 * Calls against the same table must be serialized by the caller; adapters do
 * no internal locking.
 */
export interface VectorStoreAdapter {
  /** Creates backend storage for the table, or returns the existing schema unchanged. */
  createTable(
    table: string,
    sampleRows: Row[],
    primaryKeys: string[],
    mode: EmbeddingMode,
    embedColumns: string[],
  ): Promise<TableSchema>
  /** Appends rows; vectors are indexed in batch order. */
  insert(table: string, rows: Row[], primaryKeys: string[]): Promise<void>
  /** Replaces the active row with an equal key tuple, or appends. */
  update(table: string, rows: Row[], primaryKeys: string[]): Promise<void>
  /** Sets `is_active = false` on every row whose key tuple is in `keys`. */
  markInactive(table: string, keys: KeyTuple[]): Promise<void>
  listActive(table: string): Promise<Row[]>
  listColumns(table: string): Promise<string[]>
  listEmbeddingColumns(table: string): Promise<string[]>
  addColumn(table: string, column: string, type: ColumnType): Promise<void>
  /** Nearest first. Inactive rows are never returned. */
  search(table: string, vector: number[], topK: number, embedColumn?: string): Promise<SearchResult[]>
  close(): Promise<void>
}
