import fs from 'fs/promises'
import path from 'path'
import type {
  ColumnType,
  EmbeddingMode,
  KeyTuple,
  Row,
  SearchResult,
  TableSchema,
} from '@vecsync/shared'
import type { VectorStoreAdapter } from './VectorStoreAdapter'
import type { Logger } from '../logger'
import { FlatL2Index } from '../vector/FlatL2Index'
import { RowTable, isActive } from './RowTable'
import type { RowEntry, RowTableSnapshot } from './RowTable'
import { TableRegistry } from './TableRegistry'
import { assertPrimaryKeys } from './keys'
import { assertVectorDims, isVector, resolveSearchColumn, toSearchResult } from './results'
import {
  DEFAULT_DIMENSION,
  cloneSchema,
  embeddingColumnsOf,
  inputColumnsOf,
  parseVectorDimension,
  synthesizeSchema,
} from '../schema/SchemaSynthesizer'

export interface FlatIndexStoreConfig {
  dimension?: number
  /** Directory for per-table JSON snapshots. Omit for a purely in-memory store. */
  persistDir?: string
  logger?: Logger
}

interface ColumnIndex {
  index: FlatL2Index
  /** Row id for each index position. */
  entryIds: string[]
}

interface FlatTable {
  rows: RowTable
  indexes: Map<string, ColumnIndex>
}

/**
 * In-memory exact-search backend.
 *
 * Distances are squared L2 over every indexed vector. The index can only grow,
 * so the row table next to it is the source of truth: inactive rows are
 * filtered after the index search, and an in-place update rebuilds the index
 * from the rows.
 */
export class FlatIndexVectorStore implements VectorStoreAdapter {
  private readonly dimension: number
  private readonly persistDir: string | null
  private readonly logger: Logger
  private readonly registry = new TableRegistry<FlatTable>()

  constructor(config: FlatIndexStoreConfig = {}) {
    this.dimension = config.dimension ?? DEFAULT_DIMENSION
    this.persistDir = config.persistDir ?? null
    this.logger = config.logger ?? console
  }

  async createTable(
    table: string,
    sampleRows: Row[],
    primaryKeys: string[],
    mode: EmbeddingMode,
    embedColumns: string[],
  ): Promise<TableSchema> {
    const existing = await this.load(table)
    if (existing) return cloneSchema(existing.rows.schema)

    const schema = synthesizeSchema({
      columns: inputColumnsOf(sampleRows),
      primaryKeys,
      mode,
      embedColumns,
      dimension: this.dimension,
    })
    const state = { rows: new RowTable(schema, primaryKeys), indexes: new Map<string, ColumnIndex>() }
    rebuildIndexes(state)
    this.registry.set(table, state)
    await this.persist(table, state)
    this.logger.info(`[FlatIndexVectorStore] Created table ${table} (${mode}, dim=${this.dimension})`)
    return cloneSchema(schema)
  }

  async insert(table: string, rows: Row[], primaryKeys: string[]): Promise<void> {
    const state = await this.require(table)
    assertPrimaryKeys(rows, primaryKeys)
    assertVectorDims(table, state.rows.schema, rows)
    const added = state.rows.append(rows)
    addToIndexes(state, added)
    await this.persist(table, state)
  }

  async update(table: string, rows: Row[], primaryKeys: string[]): Promise<void> {
    const state = await this.require(table)
    assertVectorDims(table, state.rows.schema, rows)
    const { replaced, appended } = state.rows.replaceActive(rows, primaryKeys)
    if (replaced.length > 0) {
      // Positions of replaced vectors cannot be overwritten; rebuild in row order
      rebuildIndexes(state)
    } else {
      addToIndexes(state, appended)
    }
    await this.persist(table, state)
  }

  async markInactive(table: string, keys: KeyTuple[]): Promise<void> {
    if (keys.length === 0) return
    const state = await this.load(table)
    if (!state) return
    const changed = state.rows.markInactive(keys)
    if (changed.length > 0) await this.persist(table, state)
  }

  async listActive(table: string): Promise<Row[]> {
    const state = await this.load(table)
    if (!state) return []
    return state.rows.active().map(e => ({ ...e.row }))
  }

  async listColumns(table: string): Promise<string[]> {
    const state = await this.load(table)
    return state ? Object.keys(state.rows.schema.columns) : []
  }

  async listEmbeddingColumns(table: string): Promise<string[]> {
    const state = await this.load(table)
    return state ? embeddingColumnsOf(state.rows.schema) : []
  }

  async addColumn(table: string, column: string, type: ColumnType): Promise<void> {
    const state = await this.require(table)
    state.rows.addColumn(column, type)
    if (parseVectorDimension(type) !== null) rebuildIndexes(state)
    await this.persist(table, state)
  }

  async search(table: string, vector: number[], topK: number, embedColumn?: string): Promise<SearchResult[]> {
    const state = await this.require(table)
    const { schema, primaryKeys } = state.rows
    const column = resolveSearchColumn(table, schema, embedColumn)
    const columnIndex = state.indexes.get(column)
    if (!columnIndex || topK <= 0) return []

    const byId = new Map<string, RowEntry>()
    for (const entry of state.rows.all()) byId.set(entry.id, entry)

    // Inactive rows stay in the index; search everything and filter afterwards.
    const results: SearchResult[] = []
    for (const hit of columnIndex.index.search(vector, columnIndex.index.ntotal)) {
      const entry = byId.get(columnIndex.entryIds[hit.position])
      if (!entry || !isActive(entry.row)) continue
      results.push(toSearchResult(entry.row, schema, primaryKeys, column, hit.distance))
      if (results.length >= topK) break
    }
    return results
  }

  async close(): Promise<void> {
    for (const table of this.registry.names()) {
      const state = this.registry.get(table)
      if (state) await this.persist(table, state)
    }
    this.registry.clear()
  }

  private async require(table: string): Promise<FlatTable> {
    await this.load(table)
    return this.registry.require(table)
  }

  /** Registry lookup, falling back to the table's snapshot on disk. */
  private async load(table: string): Promise<FlatTable | undefined> {
    const cached = this.registry.get(table)
    if (cached || !this.persistDir) return cached

    let content: string
    try {
      content = await fs.readFile(this.snapshotPath(table), 'utf-8')
    } catch (err) {
      if (isNotFound(err)) return undefined
      throw err
    }
    const snapshot: RowTableSnapshot = JSON.parse(content)
    const state = { rows: RowTable.restore(snapshot), indexes: new Map<string, ColumnIndex>() }
    rebuildIndexes(state)
    this.registry.set(table, state)
    this.logger.info(`[FlatIndexVectorStore] Loaded ${table} from ${this.persistDir} (${state.rows.size} rows)`)
    return state
  }

  private async persist(table: string, state: FlatTable): Promise<void> {
    if (!this.persistDir) return
    await fs.mkdir(this.persistDir, { recursive: true })
    await fs.writeFile(this.snapshotPath(table), JSON.stringify(state.rows.snapshot()))
  }

  private snapshotPath(table: string): string {
    return path.join(this.persistDir ?? '.', `${encodeURIComponent(table)}.json`)
  }
}

function rebuildIndexes(state: FlatTable): void {
  state.indexes.clear()
  for (const [column, type] of Object.entries(state.rows.schema.columns)) {
    const dim = parseVectorDimension(type)
    if (dim !== null) state.indexes.set(column, { index: new FlatL2Index(dim), entryIds: [] })
  }
  addToIndexes(state, state.rows.all())
}

/** Adds populated vectors in row order, so index positions follow batch order. */
function addToIndexes(state: FlatTable, entries: readonly RowEntry[]): void {
  for (const [column, columnIndex] of state.indexes) {
    for (const entry of entries) {
      const value = entry.row[column]
      if (!isVector(value)) continue
      columnIndex.index.add([value])
      columnIndex.entryIds.push(entry.id)
    }
  }
}

/** Node fs errors may come from another realm (Jest's sandbox), so match on `code` alone. */
function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT'
}
