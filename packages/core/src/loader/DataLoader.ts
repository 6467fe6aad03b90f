import type { Table } from '@vecsync/shared'

export interface DataLoader {
  load(source: string): Promise<Table>
}
