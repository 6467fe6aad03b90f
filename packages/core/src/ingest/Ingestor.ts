import {
  COMBINED_VECTOR,
  EMBED_COLUMNS_NAMES,
  EMBED_COLUMNS_VALUE,
} from '@vecsync/shared'
import type { EmbeddingMode, IngestProgress, ReconcileReport, Row } from '@vecsync/shared'
import type { VectorStoreAdapter } from '../storage/VectorStoreAdapter'
import type { EmbeddingProvider } from '../embeddings/EmbeddingProvider'
import { checkedVectors } from '../embeddings/EmbeddingProvider'
import type { DataLoader } from '../loader/DataLoader'
import type { Logger } from '../logger'
import { DataValidationError } from '../errors'
import { Reconciler } from '../reconcile/Reconciler'
import { encodedColumnName } from '../schema/SchemaSynthesizer'
import { cellText } from '../storage/results'

/** Number of texts per embedding request (avoid overwhelming the embedding server) */
const EMBED_BATCH_SIZE = 32

export interface IngestOptions {
  sourcePath: string
  table: string
  embedColumns: string[]
  primaryKeys: string[]
  createTableIfNotExists: boolean
  embedType: EmbeddingMode
}

export interface IngestorConfig {
  batchSize?: number
  logger?: Logger
}

/**
 * Load → embed → reconcile, one awaited step at a time.
 */
export class Ingestor {
  private readonly reconciler: Reconciler
  private readonly batchSize: number
  private readonly logger: Logger

  constructor(
    store: VectorStoreAdapter,
    private readonly embeddings: EmbeddingProvider,
    private readonly loader: DataLoader,
    config: IngestorConfig = {},
  ) {
    this.batchSize = config.batchSize ?? EMBED_BATCH_SIZE
    this.logger = config.logger ?? console
    this.reconciler = new Reconciler(store, this.logger)
  }

  async execute(options: IngestOptions, onProgress?: (p: IngestProgress) => void): Promise<ReconcileReport> {
    const start = Date.now()
    const { table } = options

    onProgress?.({ step: 'loading', table })
    const loaded = await this.loader.load(options.sourcePath)
    const missing = options.embedColumns.filter(c => !loaded.columns.includes(c))
    if (missing.length > 0) {
      throw new DataValidationError(`Embedding columns [${missing.join(', ')}] not found in ${options.sourcePath}`)
    }
    this.logger.info(`[Ingestor] Loaded ${loaded.rows.length} rows from ${options.sourcePath}`)

    const rows = await this.attachEmbeddings(loaded.rows, options.embedType, options.embedColumns, (done, total) => {
      onProgress?.({ step: 'embedding', table, progress: done, total })
    })

    onProgress?.({ step: 'reconciling', table })
    const report = await this.reconciler.reconcile(table, rows, {
      primaryKeys: options.primaryKeys,
      mode: options.embedType,
      embedColumns: options.embedColumns,
      createIfMissing: options.createTableIfNotExists,
      columns: loaded.columns,
    })

    onProgress?.({ step: 'done', table, durationMs: Date.now() - start })
    return report
  }

  /**
   * Returns copies of `rows` carrying `embed_columns_names` and the vector
   * columns the mode calls for.
   */
  async attachEmbeddings(
    rows: Row[],
    mode: EmbeddingMode,
    embedColumns: string[],
    onProgress?: (done: number, total: number) => void,
  ): Promise<Row[]> {
    const out: Row[] = rows.map(r => ({ ...r, [EMBED_COLUMNS_NAMES]: [...embedColumns] }))

    if (mode === 'combined') {
      const texts = out.map(r => combinedText(r, embedColumns))
      const vectors = await this.embedAll(texts, 0, texts.length, onProgress)
      out.forEach((r, i) => {
        r[EMBED_COLUMNS_VALUE] = texts[i]
        r[COMBINED_VECTOR] = vectors[i]
      })
      return out
    }

    const total = out.length * embedColumns.length
    let done = 0
    for (const col of embedColumns) {
      const texts = out.map(r => cellText(r[col]))
      const vectors = await this.embedAll(texts, done, total, onProgress)
      out.forEach((r, i) => {
        r[encodedColumnName(col)] = vectors[i]
      })
      done += texts.length
    }
    return out
  }

  private async embedAll(
    texts: string[],
    offset: number,
    total: number,
    onProgress?: (done: number, total: number) => void,
  ): Promise<number[][]> {
    const vectors: number[][] = []
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize)
      const result = checkedVectors('Embedding provider', batch.length, await this.embeddings.embed(batch), this.embeddings.dim)
      vectors.push(...result)
      onProgress?.(offset + vectors.length, total)
    }
    return vectors
  }
}

/** `name: Widget; description: Small blue widget` */
export function combinedText(row: Row, embedColumns: string[]): string {
  return embedColumns.map(col => `${col}: ${cellText(row[col])}`).join('; ')
}
