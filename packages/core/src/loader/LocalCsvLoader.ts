import fs from 'fs/promises'
import { parse } from 'csv-parse'
import type { Row, Table } from '@vecsync/shared'
import type { DataLoader } from './DataLoader'

export interface CsvLoaderOptions {
  delimiter?: string
}

/**
 * Reads a headed CSV file from local disk. Every cell stays text; empty cells
 * become null.
 */
export class LocalCsvLoader implements DataLoader {
  constructor(private readonly options: CsvLoaderOptions = {}) {}

  async load(source: string): Promise<Table> {
    const content = await fs.readFile(source, 'utf-8')
    return parseCsv(content, this.options)
  }
}

export async function parseCsv(content: string, options: CsvLoaderOptions = {}): Promise<Table> {
  let columns: string[] = []
  const records = await new Promise<Array<Record<string, string>>>((resolve, reject) => {
    parse(
      content,
      {
        bom: true,
        delimiter: options.delimiter ?? ',',
        skip_empty_lines: true,
        trim: true,
        columns: (header: string[]) => {
          columns = header
          return header
        },
      },
      (err, out: Array<Record<string, string>>) => (err ? reject(err) : resolve(out)),
    )
  })

  const rows = records.map(record => {
    const row: Row = {}
    for (const col of columns) {
      const value = record[col]
      row[col] = value === undefined || value === '' ? null : value
    }
    return row
  })
  return { columns, rows }
}
