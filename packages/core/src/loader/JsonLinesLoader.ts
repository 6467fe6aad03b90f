import fs from 'fs/promises'
import type { CellValue, Row, Table } from '@vecsync/shared'
import type { DataLoader } from './DataLoader'

/** One JSON object per line. Scalars are kept as text, like CSV cells. */
export class JsonLinesLoader implements DataLoader {
  async load(source: string): Promise<Table> {
    const content = await fs.readFile(source, 'utf-8')
    return parseJsonLines(content)
  }
}

export function parseJsonLines(content: string): Table {
  const columns: string[] = []
  const seen = new Set<string>()
  const rows: Row[] = []

  content.split('\n').forEach((line, i) => {
    if (line.trim().length === 0) return
    const parsed: unknown = JSON.parse(line)
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Line ${i + 1} is not a JSON object`)
    }
    const row: Row = {}
    for (const [key, value] of Object.entries(parsed)) {
      if (!seen.has(key)) {
        seen.add(key)
        columns.push(key)
      }
      row[key] = toCell(value)
    }
    rows.push(row)
  })

  for (const row of rows) {
    for (const col of columns) if (!(col in row)) row[col] = null
  }
  return { columns, rows }
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null
  if (typeof value === 'object') return JSON.stringify(value)
  return String(value)
}
