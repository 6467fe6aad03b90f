import { ChromaClient, IncludeEnum } from 'chromadb'
import { COMBINED_VECTOR } from '@vecsync/shared'
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
import { RowTable, conformRow, isActive } from './RowTable'
import type { RowEntry } from './RowTable'
import { TableRegistry } from './TableRegistry'
import { assertPrimaryKeys } from './keys'
import {
  assertVectorDims,
  documentOf,
  isVector,
  resolveSearchColumn,
  toSearchResult,
} from './results'
import {
  DEFAULT_DIMENSION,
  cloneSchema,
  embeddingColumnsOf,
  inputColumnsOf,
  isVectorType,
  synthesizeSchema,
} from '../schema/SchemaSynthesizer'

export type ChromaClientParams = NonNullable<ConstructorParameters<typeof ChromaClient>[0]>
type Collection = Awaited<ReturnType<ChromaClient['getOrCreateCollection']>>
type ChromaMetadata = Record<string, string | number | boolean>

export interface ChromaVectorStoreOptions {
  dimension?: number
  logger?: Logger
}

interface ChromaTable {
  rows: RowTable
  /** One collection per vector column. */
  collections: Map<string, Collection>
  catalog: Collection
}

/** Stored as the single document of `<table>__catalog`. */
interface TableCatalog {
  schema: TableSchema
  primaryKeys: string[]
}

const CATALOG_ID = 'schema'

/**
 * Document/vector hybrid backend on ChromaDB.
 *
 * Collections hold vectors, documents and flat metadata but no schema. The
 * schema and primary keys go to a `<table>__catalog` collection, and the row
 * table is rebuilt from the vector collections' metadata the first time a
 * process touches the table. Vector ids are row ids, stable across updates.
 * Deactivation rewrites the `is_active` metadata; search filters on it.
 * Collections use `hnsw:space = l2`: squared L2 over an approximate HNSW index.
 */
export class ChromaVectorStore implements VectorStoreAdapter {
  private client: ChromaClient
  private readonly dimension: number
  private readonly logger: Logger
  private readonly registry = new TableRegistry<ChromaTable>()

  constructor(config: ChromaClient | ChromaClientParams = {}, options: ChromaVectorStoreOptions = {}) {
    this.client = config instanceof ChromaClient ? config : new ChromaClient(config)
    this.dimension = options.dimension ?? DEFAULT_DIMENSION
    this.logger = options.logger ?? console
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
    const collections = new Map<string, Collection>()
    for (const column of embeddingColumnsOf(schema)) {
      collections.set(column, await this.openCollection(table, column))
    }
    const state = { rows: new RowTable(schema, primaryKeys), collections, catalog: await this.openCatalog(table) }
    await saveCatalog(state)
    this.registry.set(table, state)
    this.logger.info(`[ChromaVectorStore] Created table ${table} (${mode}, ${collections.size} collection(s))`)
    return cloneSchema(schema)
  }

  async insert(table: string, rows: Row[], primaryKeys: string[]): Promise<void> {
    const state = await this.require(table)
    assertPrimaryKeys(rows, primaryKeys)
    assertVectorDims(table, state.rows.schema, rows)
    const added = state.rows.append(rows)

    for (const [column, collection] of state.collections) {
      const entries = added.filter(e => isVector(e.row[column]))
      if (entries.length === 0) continue
      await collection.add({
        ids: entries.map(e => e.id),
        embeddings: entries.map(e => vectorOf(e, column)),
        documents: entries.map(e => documentOf(e.row, column)),
        metadatas: entries.map(e => toMetadata(e.row, state.rows.schema)),
      })
    }
  }

  async update(table: string, rows: Row[], primaryKeys: string[]): Promise<void> {
    const state = await this.require(table)
    assertVectorDims(table, state.rows.schema, rows)
    const { replaced, appended } = state.rows.replaceActive(rows, primaryKeys)
    const touched = [...replaced, ...appended]

    for (const [column, collection] of state.collections) {
      const entries = touched.filter(e => isVector(e.row[column]))
      if (entries.length === 0) continue
      await collection.upsert({
        ids: entries.map(e => e.id),
        embeddings: entries.map(e => vectorOf(e, column)),
        documents: entries.map(e => documentOf(e.row, column)),
        metadatas: entries.map(e => toMetadata(e.row, state.rows.schema)),
      })
    }
  }

  async markInactive(table: string, keys: KeyTuple[]): Promise<void> {
    if (keys.length === 0) return
    const state = await this.load(table)
    if (!state) return
    const changed = state.rows.markInactive(keys)

    for (const [column, collection] of state.collections) {
      const entries = changed.filter(e => isVector(e.row[column]))
      if (entries.length === 0) continue
      await collection.update({
        ids: entries.map(e => e.id),
        metadatas: entries.map(e => toMetadata(e.row, state.rows.schema)),
      })
    }
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
    if (isVectorType(type) && !state.collections.has(column)) {
      state.collections.set(column, await this.openCollection(table, column))
    }
    await saveCatalog(state)
  }

  async search(table: string, vector: number[], topK: number, embedColumn?: string): Promise<SearchResult[]> {
    const state = await this.require(table)
    const { schema, primaryKeys } = state.rows
    const column = resolveSearchColumn(table, schema, embedColumn)
    const collection = state.collections.get(column)
    if (!collection || topK <= 0) return []

    const byId = new Map<string, RowEntry>()
    let available = 0
    for (const entry of state.rows.all()) {
      byId.set(entry.id, entry)
      if (isActive(entry.row) && isVector(entry.row[column])) available++
    }
    if (available === 0) return []

    const res = await collection.query({
      queryEmbeddings: [vector],
      nResults: Math.min(topK, available),
      where: { is_active: true },
    })

    const ids = res.ids[0] ?? []
    const distances = res.distances?.[0] ?? []
    const results: SearchResult[] = []
    for (let i = 0; i < ids.length; i++) {
      const entry = byId.get(ids[i])
      if (!entry || !isActive(entry.row)) continue
      results.push(toSearchResult(entry.row, schema, primaryKeys, column, distances[i] ?? 0))
    }
    return results
  }

  async close(): Promise<void> {
    this.registry.clear()
  }

  private async require(table: string): Promise<ChromaTable> {
    await this.load(table)
    return this.registry.require(table)
  }

  /** Registry lookup, falling back to the table's catalog and collections on the server. */
  private async load(table: string): Promise<ChromaTable | undefined> {
    const cached = this.registry.get(table)
    if (cached) return cached

    const catalog = await this.findCatalog(table)
    if (!catalog) return undefined
    const stored = await catalog.get({ ids: [CATALOG_ID], include: [IncludeEnum.Documents] })
    const document = stored.documents[0]
    if (typeof document !== 'string') return undefined
    const { schema, primaryKeys }: TableCatalog = JSON.parse(document)

    const rows = new Map<string, Row>()
    const collections = new Map<string, Collection>()
    for (const column of embeddingColumnsOf(schema)) {
      const collection = await this.openCollection(table, column)
      collections.set(column, collection)
      const records = await collection.get({ include: [IncludeEnum.Metadatas, IncludeEnum.Embeddings] })
      records.ids.forEach((id, i) => {
        const row = rows.get(id) ?? fromMetadata(records.metadatas[i] ?? {}, schema)
        row[column] = records.embeddings?.[i] ?? null
        rows.set(id, row)
      })
    }

    const entries = [...rows]
      .map(([id, row]) => ({ id, row: conformRow(schema, row) }))
      .sort((a, b) => Number(a.id) - Number(b.id))
    const nextId = entries.reduce((max, e) => Math.max(max, Number(e.id) + 1), 0)
    const state = { rows: RowTable.restore({ schema, primaryKeys, nextId, entries }), collections, catalog }
    this.registry.set(table, state)
    this.logger.info(`[ChromaVectorStore] Restored ${table} (${entries.length} rows) from the server`)
    return state
  }

  private async findCatalog(table: string): Promise<Collection | undefined> {
    try {
      return await this.client.getCollection({ name: catalogName(table) })
    } catch (err) {
      if (err instanceof Error && /does not exist/i.test(err.message)) return undefined
      throw err
    }
  }

  private async openCatalog(table: string): Promise<Collection> {
    return this.client.getOrCreateCollection({
      name: catalogName(table),
      metadata: { description: `Schema of ${table}` },
    })
  }

  private async openCollection(table: string, column: string): Promise<Collection> {
    return this.client.getOrCreateCollection({
      name: collectionName(table, column),
      metadata: {
        'hnsw:space': 'l2',
        description: `Vectors of ${table}.${column}`,
        created_at: new Date().toISOString(),
      },
    })
  }
}

/** The combined vector lives in a collection named after the table. */
export function collectionName(table: string, column: string): string {
  return column === COMBINED_VECTOR ? table : `${table}__${column}`
}

export function catalogName(table: string): string {
  return `${table}__catalog`
}

async function saveCatalog(state: ChromaTable): Promise<void> {
  const catalog: TableCatalog = { schema: state.rows.schema, primaryKeys: state.rows.primaryKeys }
  // The catalog collection needs an embedding per record; one placeholder dimension suffices
  await state.catalog.upsert({ ids: [CATALOG_ID], embeddings: [[0]], documents: [JSON.stringify(catalog)] })
}

function vectorOf(entry: RowEntry, column: string): number[] {
  const value = entry.row[column]
  return isVector(value) ? value : []
}

/** Chroma metadata is flat scalars: vectors are dropped, arrays stored as JSON, nulls omitted. */
function toMetadata(row: Row, schema: TableSchema): ChromaMetadata {
  const metadata: ChromaMetadata = {}
  for (const [col, value] of Object.entries(row)) {
    const type = schema.columns[col]
    if (value === null || (type !== undefined && isVectorType(type))) continue
    metadata[col] = Array.isArray(value) ? JSON.stringify(value) : value
  }
  return metadata
}

function fromMetadata(metadata: Record<string, unknown>, schema: TableSchema): Row {
  const row: Row = {}
  for (const [col, type] of Object.entries(schema.columns)) {
    const value = metadata[col]
    if (type === 'text[]' && typeof value === 'string') row[col] = parseTextArray(value)
    else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') row[col] = value
  }
  return row
}

function parseTextArray(text: string): string[] {
  const parsed: unknown = JSON.parse(text)
  return Array.isArray(parsed) ? parsed.map(v => String(v)) : [text]
}
