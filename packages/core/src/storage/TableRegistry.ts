import { tableNotFound } from '../errors'

/** Per-adapter state keyed by logical table name. One registry per adapter instance. */
export class TableRegistry<T> {
  private tables = new Map<string, T>()

  has(table: string): boolean {
    return this.tables.has(table)
  }

  get(table: string): T | undefined {
    return this.tables.get(table)
  }

  /** Like `get`, but throws DBOperationError for an unknown table. */
  require(table: string): T {
    const state = this.tables.get(table)
    if (state === undefined) throw tableNotFound(table)
    return state
  }

  set(table: string, state: T): void {
    this.tables.set(table, state)
  }

  names(): string[] {
    return [...this.tables.keys()]
  }

  clear(): void {
    this.tables.clear()
  }
}
