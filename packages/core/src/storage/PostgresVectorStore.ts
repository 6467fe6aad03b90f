import { Pool, PoolClient, PoolConfig } from 'pg'
import { IS_ACTIVE } from '@vecsync/shared'
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
import { DataValidationError, tableNotFound } from '../errors'
import { TableRegistry } from './TableRegistry'
import { conformRow } from './RowTable'
import { assertPrimaryKeys } from './keys'
import { assertVectorDims, resolveSearchColumn, toSearchResult } from './results'
import {
  columnTypeOf,
  decodeCell,
  encodeParam,
  placeholder,
  quoteIdent,
  quoteLiteral,
  sqlType,
} from './sql'
import {
  DEFAULT_DIMENSION,
  cloneSchema,
  embeddingColumnsOf,
  inputColumnsOf,
  synthesizeSchema,
} from '../schema/SchemaSynthesizer'

/** Keeps a deactivation statement well under the 65535 bind-parameter limit. */
const MARK_INACTIVE_CHUNK = 1000

const DISTANCE_ALIAS = 'vecsync_distance'

export interface PostgresVectorStoreOptions {
  dimension?: number
  logger?: Logger
}

interface PgTable {
  schema: TableSchema
  primaryKeys: string[]
}

interface TableComment {
  primaryKeys?: string[]
}

/**
 * Relational + vector backend on PostgreSQL with pgvector.
 *
 * Each logical table is a real table with `vector(N)` columns. Primary keys
 * are kept in the table comment rather than as a constraint, since a
 * deactivated row and its reloaded successor share a key. Search uses `<->`:
 * exact Euclidean distance by sequential scan.
 */
export class PostgresVectorStore implements VectorStoreAdapter {
  private pool: Pool
  private readonly dimension: number
  private readonly logger: Logger
  private readonly registry = new TableRegistry<PgTable>()

  constructor(config: Pool | PoolConfig | string, options: PostgresVectorStoreOptions = {}) {
    if (config instanceof Pool) {
      this.pool = config
    } else {
      this.pool = new Pool(typeof config === 'string' ? { connectionString: config } : config)
    }
    this.dimension = options.dimension ?? DEFAULT_DIMENSION
    this.logger = options.logger ?? console
  }

  /**
   * Creates the table, a non-unique index on its key columns, and the comment
   * recording the keys. Returns the live schema unchanged if the table exists.
   */
  async createTable(
    table: string,
    sampleRows: Row[],
    primaryKeys: string[],
    mode: EmbeddingMode,
    embedColumns: string[],
  ): Promise<TableSchema> {
    const existing = await this.describe(table)
    if (existing) return cloneSchema(existing.schema)

    const schema = synthesizeSchema({
      columns: inputColumnsOf(sampleRows),
      primaryKeys,
      mode,
      embedColumns,
      dimension: this.dimension,
    })
    const columnDefs = Object.entries(schema.columns).map(([col, type]) =>
      `  ${quoteIdent(col)} ${sqlType(type)}${col === IS_ACTIVE ? ' DEFAULT TRUE' : ''}`,
    )
    const comment: TableComment = { primaryKeys }

    await this.pool.query('CREATE EXTENSION IF NOT EXISTS vector')
    await this.transaction(async client => {
      await client.query(`CREATE TABLE IF NOT EXISTS ${quoteIdent(table)} (\n${columnDefs.join(',\n')}\n)`)
      await client.query(
        `CREATE INDEX IF NOT EXISTS ${quoteIdent(`${table}_pk_idx`)} ON ${quoteIdent(table)} (${primaryKeys.map(quoteIdent).join(', ')})`,
      )
      await client.query(`COMMENT ON TABLE ${quoteIdent(table)} IS ${quoteLiteral(JSON.stringify(comment))}`)
    })

    this.registry.set(table, { schema, primaryKeys })
    this.logger.info(`[PostgresVectorStore] Created table ${table} (${mode}, dim=${this.dimension})`)
    return cloneSchema(schema)
  }

  async insert(table: string, rows: Row[], primaryKeys: string[]): Promise<void> {
    const { schema } = await this.require(table)
    assertPrimaryKeys(rows, primaryKeys)
    assertVectorDims(table, schema, rows)
    if (rows.length === 0) return
    const conformed = rows.map(r => conformRow(schema, r))

    // One statement per row keeps the batch order of the inserted rows
    await this.transaction(async client => {
      for (const row of conformed) {
        const { sql, params } = insertStatement(table, schema, row)
        await client.query(sql, params)
      }
    })
  }

  async update(table: string, rows: Row[], primaryKeys: string[]): Promise<void> {
    const { schema } = await this.require(table)
    assertVectorDims(table, schema, rows)
    if (rows.length === 0) return
    const conformed = rows.map(r => conformRow(schema, r))

    await this.transaction(async client => {
      for (const row of conformed) {
        const columns = Object.keys(schema.columns)
        const params: unknown[] = []
        const assignments = columns.map(col => {
          params.push(encodeParam(schema.columns[col], row[col]))
          return `${quoteIdent(col)} = ${placeholder(params.length, schema.columns[col])}`
        })
        const conditions = primaryKeys.map(k => {
          params.push(keyParam(row[k]))
          return `${quoteIdent(k)} IS NOT DISTINCT FROM $${params.length}`
        })
        const res = await client.query(
          `UPDATE ${quoteIdent(table)} SET ${assignments.join(', ')}
           WHERE ${conditions.join(' AND ')} AND ${quoteIdent(IS_ACTIVE)} IS DISTINCT FROM FALSE`,
          params,
        )
        if (!res.rowCount) {
          const insert = insertStatement(table, schema, row)
          await client.query(insert.sql, insert.params)
        }
      }
    })
  }

  async markInactive(table: string, keys: KeyTuple[]): Promise<void> {
    if (keys.length === 0) return
    const meta = await this.describe(table)
    if (!meta) return
    const { primaryKeys } = meta

    for (const tuple of keys) {
      if (tuple.length !== primaryKeys.length) {
        throw new DataValidationError(
          `Key tuple has ${tuple.length} values but ${table} has ${primaryKeys.length} primary-key columns`,
        )
      }
    }

    for (let i = 0; i < keys.length; i += MARK_INACTIVE_CHUNK) {
      const chunk = keys.slice(i, i + MARK_INACTIVE_CHUNK)
      const params: unknown[] = []
      const matches = chunk.map(tuple => {
        const parts = primaryKeys.map((k, j) => {
          params.push(keyParam(tuple[j]))
          return `${quoteIdent(k)} IS NOT DISTINCT FROM $${params.length}`
        })
        return `(${parts.join(' AND ')})`
      })
      await this.pool.query(
        `UPDATE ${quoteIdent(table)} SET ${quoteIdent(IS_ACTIVE)} = FALSE
         WHERE ${quoteIdent(IS_ACTIVE)} IS DISTINCT FROM FALSE AND (${matches.join(' OR ')})`,
        params,
      )
    }
  }

  async listActive(table: string): Promise<Row[]> {
    const meta = await this.describe(table)
    if (!meta) return []
    const res = await this.pool.query<Record<string, unknown>>(
      `SELECT * FROM ${quoteIdent(table)} WHERE ${quoteIdent(IS_ACTIVE)} IS DISTINCT FROM FALSE`,
    )
    return res.rows.map(r => decodeRow(meta.schema, r))
  }

  async listColumns(table: string): Promise<string[]> {
    const meta = await this.describe(table)
    return meta ? Object.keys(meta.schema.columns) : []
  }

  async listEmbeddingColumns(table: string): Promise<string[]> {
    const meta = await this.describe(table)
    return meta ? embeddingColumnsOf(meta.schema) : []
  }

  async addColumn(table: string, column: string, type: ColumnType): Promise<void> {
    const meta = await this.require(table)
    await this.pool.query(
      `ALTER TABLE ${quoteIdent(table)} ADD COLUMN IF NOT EXISTS ${quoteIdent(column)} ${sqlType(type)}`,
    )
    meta.schema.columns[column] = type
    meta.schema.nullables[column] = true
  }

  async search(table: string, vector: number[], topK: number, embedColumn?: string): Promise<SearchResult[]> {
    const meta = await this.require(table)
    const column = resolveSearchColumn(table, meta.schema, embedColumn)
    if (topK <= 0) return []

    const res = await this.pool.query<Record<string, unknown>>(
      `SELECT *, ${quoteIdent(column)} <-> $1::vector AS ${DISTANCE_ALIAS}
       FROM ${quoteIdent(table)}
       WHERE ${quoteIdent(IS_ACTIVE)} IS DISTINCT FROM FALSE AND ${quoteIdent(column)} IS NOT NULL
       ORDER BY ${DISTANCE_ALIAS}
       LIMIT $2`,
      [`[${vector.join(',')}]`, topK],
    )
    return res.rows.map(r =>
      toSearchResult(decodeRow(meta.schema, r), meta.schema, meta.primaryKeys, column, Number(r[DISTANCE_ALIAS])),
    )
  }

  async end(): Promise<void> {
    await this.pool.end()
  }

  async close(): Promise<void> {
    this.registry.clear()
    await this.end()
  }

  private async require(table: string): Promise<PgTable> {
    const meta = await this.describe(table)
    if (!meta) throw tableNotFound(table)
    return meta
  }

  /** Cached schema, or the live one read from the catalog; undefined if the table is absent. */
  private async describe(table: string): Promise<PgTable | undefined> {
    const cached = this.registry.get(table)
    if (cached) return cached

    const tableRes = await this.pool.query<{ comment: string | null }>(
      `SELECT obj_description(c.oid, 'pg_class') AS comment
       FROM pg_class c
       JOIN pg_namespace n ON n.oid = c.relnamespace
       WHERE c.relname = $1 AND n.nspname = current_schema() AND c.relkind = 'r'`,
      [table],
    )
    if (tableRes.rows.length === 0) return undefined

    const colRes = await this.pool.query<{ column_name: string; column_type: string; nullable: boolean }>(
      `SELECT a.attname AS column_name,
              format_type(a.atttypid, a.atttypmod) AS column_type,
              NOT a.attnotnull AS nullable
       FROM pg_attribute a
       JOIN pg_class c ON c.oid = a.attrelid
       JOIN pg_namespace n ON n.oid = c.relnamespace
       WHERE c.relname = $1 AND n.nspname = current_schema()
         AND a.attnum > 0 AND NOT a.attisdropped
       ORDER BY a.attnum`,
      [table],
    )
    const schema: TableSchema = { columns: {}, nullables: {} }
    for (const col of colRes.rows) {
      schema.columns[col.column_name] = columnTypeOf(col.column_type)
      schema.nullables[col.column_name] = col.nullable
    }

    const meta = { schema, primaryKeys: this.primaryKeysFrom(table, tableRes.rows[0].comment, schema) }
    this.registry.set(table, meta)
    return meta
  }

  private primaryKeysFrom(table: string, comment: string | null, schema: TableSchema): string[] {
    if (comment) {
      try {
        const parsed: TableComment = JSON.parse(comment)
        if (Array.isArray(parsed.primaryKeys) && parsed.primaryKeys.length > 0) return parsed.primaryKeys
      } catch (err) {
        this.logger.warn(`[PostgresVectorStore] Ignoring comment on ${table}: ${err instanceof Error ? err.message : String(err)}`)
      }
    }
    const first = Object.keys(schema.columns)[0]
    this.logger.warn(
      `[PostgresVectorStore] ${table} has no recorded primary keys; using its first column "${first}"`,
    )
    return first ? [first] : []
  }

  private async transaction(fn: (client: PoolClient) => Promise<void>): Promise<void> {
    const client = await this.pool.connect()
    try {
      await client.query('BEGIN')
      await fn(client)
      await client.query('COMMIT')
    } catch (err) {
      await client.query('ROLLBACK')
      throw err
    } finally {
      client.release()
    }
  }
}

function insertStatement(table: string, schema: TableSchema, row: Row): { sql: string; params: unknown[] } {
  const columns = Object.keys(schema.columns)
  const params = columns.map(col => encodeParam(schema.columns[col], row[col]))
  const values = columns.map((col, i) => placeholder(i + 1, schema.columns[col]))
  return {
    sql: `INSERT INTO ${quoteIdent(table)} (${columns.map(quoteIdent).join(', ')}) VALUES (${values.join(', ')})`,
    params,
  }
}

function keyParam(value: Row[string] | undefined): string | null {
  if (value === null || value === undefined) return null
  return Array.isArray(value) ? JSON.stringify(value) : String(value)
}

function decodeRow(schema: TableSchema, raw: Record<string, unknown>): Row {
  const row: Row = {}
  for (const [col, type] of Object.entries(schema.columns)) {
    row[col] = decodeCell(type, raw[col])
  }
  return row
}
