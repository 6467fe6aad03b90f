import type { EmbeddingMode, KeyTuple, ReconcileReport, Row } from '@vecsync/shared'
import type { VectorStoreAdapter } from '../storage/VectorStoreAdapter'
import type { Logger } from '../logger'
import { DataValidationError, DBOperationError } from '../errors'
import { assertPrimaryKeys, keyTupleOf, rowKey } from '../storage/keys'
import { inputColumnsOf } from '../schema/SchemaSynthesizer'

export interface ReconcileOptions {
  primaryKeys: string[]
  mode: EmbeddingMode
  embedColumns: string[]
  /** When false, an absent table is an error instead of being created. */
  createIfMissing: boolean
  /** Source columns; lets a batch with no rows still create the table. */
  columns?: string[]
}

export interface ReconcilePlan {
  toUpdate: Row[]
  toInsert: Row[]
  toDeactivate: KeyTuple[]
}

/**
 * Diffs an incoming batch against the table's active rows and applies the
 * result as update → insert → markInactive.
 *
 * Rows are partitioned against the active set read before the batch, never
 * against rows written earlier in the same run. A previously active key that
 * is missing from the batch is deactivated, not deleted. Adapter failures
 * abort the remaining steps and propagate unchanged.
 */
export class Reconciler {
  constructor(
    private readonly store: VectorStoreAdapter,
    private readonly logger: Logger = console,
  ) {}

  async reconcile(table: string, rows: Row[], options: ReconcileOptions): Promise<ReconcileReport> {
    validateBatch(rows, options)

    if (options.createIfMissing) {
      const sample = options.columns ? [Object.fromEntries(options.columns.map(c => [c, null])), ...rows] : rows
      if (inputColumnsOf(sample).length === 0 && (await this.store.listColumns(table)).length === 0) {
        throw new DataValidationError(`Cannot create table ${table} from a batch with no columns`)
      }
      await this.store.createTable(table, sample, options.primaryKeys, options.mode, options.embedColumns)
    } else if ((await this.store.listColumns(table)).length === 0) {
      throw new DBOperationError(`Table ${table} does not exist and createIfMissing is off`, table)
    }

    const active = await this.store.listActive(table)
    const plan = planReconcile(active, rows, options.primaryKeys)

    if (plan.toUpdate.length > 0) await this.store.update(table, plan.toUpdate, options.primaryKeys)
    if (plan.toInsert.length > 0) await this.store.insert(table, plan.toInsert, options.primaryKeys)
    if (plan.toDeactivate.length > 0) await this.store.markInactive(table, plan.toDeactivate)

    const report: ReconcileReport = {
      table,
      inserted: plan.toInsert.length,
      updated: plan.toUpdate.length,
      deactivated: plan.toDeactivate.length,
    }
    this.logger.info(
      `[Reconciler] ${table}: ${report.inserted} inserted, ${report.updated} updated, ${report.deactivated} deactivated`,
    )
    return report
  }
}

export function validateBatch(rows: Row[], options: Pick<ReconcileOptions, 'primaryKeys' | 'mode' | 'embedColumns'>): void {
  if (options.primaryKeys.length === 0) {
    throw new DataValidationError('At least one primary-key column is required')
  }
  if (options.mode === 'separated' && options.embedColumns.length === 0) {
    throw new DataValidationError('Separated embedding mode needs at least one embedding column')
  }
  assertPrimaryKeys(rows, options.primaryKeys)
}

/**
 * Pure diff of a batch against the pre-batch active rows. Duplicate keys in
 * the batch collapse to their last occurrence.
 */
export function planReconcile(active: Row[], batch: Row[], primaryKeys: string[]): ReconcilePlan {
  const activeKeys = new Map<string, KeyTuple>()
  for (const row of active) activeKeys.set(rowKey(row, primaryKeys), keyTupleOf(row, primaryKeys))

  const incoming = new Map<string, Row>()
  for (const row of batch) {
    const key = rowKey(row, primaryKeys)
    incoming.delete(key)
    incoming.set(key, row)
  }

  const toUpdate: Row[] = []
  const toInsert: Row[] = []
  for (const [key, row] of incoming) {
    if (activeKeys.has(key)) toUpdate.push(row)
    else toInsert.push(row)
  }

  const toDeactivate: KeyTuple[] = []
  for (const [key, tuple] of activeKeys) {
    if (!incoming.has(key)) toDeactivate.push(tuple)
  }
  return { toUpdate, toInsert, toDeactivate }
}
