import path from 'path'
import type { DataLoader } from './DataLoader'
import { LocalCsvLoader } from './LocalCsvLoader'
import { JsonLinesLoader } from './JsonLinesLoader'

/** Picks a loader from the file extension; CSV unless the file is `.jsonl` / `.ndjson`. */
export function createLoader(source: string): DataLoader {
  const ext = path.extname(source).toLowerCase()
  if (ext === '.jsonl' || ext === '.ndjson') return new JsonLinesLoader()
  return new LocalCsvLoader({ delimiter: ext === '.tsv' ? '\t' : ',' })
}

export type { DataLoader } from './DataLoader'
export { LocalCsvLoader, parseCsv } from './LocalCsvLoader'
export { JsonLinesLoader, parseJsonLines } from './JsonLinesLoader'
