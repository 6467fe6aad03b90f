import { IS_ACTIVE } from '@vecsync/shared'
import type { ColumnType, KeyTuple, Row, TableSchema } from '@vecsync/shared'
import { DataValidationError } from '../errors'
import { encodeKey, rowKey } from './keys'

export interface RowEntry {
  /** Row id local to the table; stable across in-place updates. */
  id: string
  row: Row
}

export interface RowTableSnapshot {
  schema: TableSchema
  primaryKeys: string[]
  nextId: number
  entries: RowEntry[]
}

export function isActive(row: Row): boolean {
  return row[IS_ACTIVE] !== false
}

/**
 * Row storage for backends whose native index cannot hold or update rows.
 *
 * Rows keep insertion order. Updates go through a map keyed by primary-key
 * tuple, so `replaceActive` is O(existing + batch) rather than a scan per row.
 */
export class RowTable {
  private entries: RowEntry[] = []
  private nextId = 0

  constructor(
    readonly schema: TableSchema,
    readonly primaryKeys: string[],
  ) {}

  static restore(snapshot: RowTableSnapshot): RowTable {
    const table = new RowTable(snapshot.schema, snapshot.primaryKeys)
    table.entries = snapshot.entries
    table.nextId = snapshot.nextId
    return table
  }

  get size(): number {
    return this.entries.length
  }

  all(): readonly RowEntry[] {
    return this.entries
  }

  active(): RowEntry[] {
    return this.entries.filter(e => isActive(e.row))
  }

  append(rows: Row[]): RowEntry[] {
    return this.push(rows.map(row => conformRow(this.schema, row)))
  }

  /**
   * Replaces, in place, the active row whose key tuple matches each input row;
   * rows with no active match are appended.
   */
  replaceActive(rows: Row[], primaryKeys: string[]): { replaced: RowEntry[]; appended: RowEntry[] } {
    const byKey = new Map<string, RowEntry>()
    for (const entry of this.entries) {
      if (isActive(entry.row)) byKey.set(rowKey(entry.row, primaryKeys), entry)
    }

    const replaced: RowEntry[] = []
    const appended: RowEntry[] = []
    for (const row of rows.map(r => conformRow(this.schema, r))) {
      const key = rowKey(row, primaryKeys)
      const existing = byKey.get(key)
      if (existing) {
        existing.row = row
        replaced.push(existing)
      } else {
        const [entry] = this.push([row])
        byKey.set(key, entry)
        appended.push(entry)
      }
    }
    return { replaced, appended }
  }

  /** Deactivates rows whose key tuple is in `keys`; returns the rows that changed. */
  markInactive(keys: KeyTuple[]): RowEntry[] {
    const wanted = new Set(keys.map(encodeKey))
    const changed: RowEntry[] = []
    for (const entry of this.entries) {
      if (!isActive(entry.row)) continue
      if (!wanted.has(rowKey(entry.row, this.primaryKeys))) continue
      entry.row = { ...entry.row, [IS_ACTIVE]: false }
      changed.push(entry)
    }
    return changed
  }

  addColumn(column: string, type: ColumnType): void {
    this.schema.columns[column] = type
    this.schema.nullables[column] = true
    for (const entry of this.entries) {
      if (!(column in entry.row)) entry.row = { ...entry.row, [column]: null }
    }
  }

  snapshot(): RowTableSnapshot {
    return {
      schema: this.schema,
      primaryKeys: this.primaryKeys,
      nextId: this.nextId,
      entries: this.entries,
    }
  }

  private push(rows: Row[]): RowEntry[] {
    const added = rows.map(row => ({ id: String(this.nextId++), row }))
    this.entries.push(...added)
    return added
  }
}

/** Fills absent schema columns with null (`is_active` with true); rejects unknown columns. */
export function conformRow(schema: TableSchema, row: Row): Row {
  const unknown = Object.keys(row).filter(c => !(c in schema.columns))
  if (unknown.length > 0) {
    throw new DataValidationError(`Columns [${unknown.join(', ')}] are not in the table schema`)
  }
  const out: Row = {}
  for (const col of Object.keys(schema.columns)) {
    out[col] = row[col] ?? (col === IS_ACTIVE ? true : null)
  }
  return out
}
