import type { SearchResult } from '@vecsync/shared'
import type { VectorStoreAdapter } from '../storage/VectorStoreAdapter'
import type { EmbeddingProvider } from '../embeddings/EmbeddingProvider'

export interface RetrieverQuery {
  table: string
  /** Query text; embedded with the configured provider when `vector` is absent. */
  query?: string
  vector?: number[]
  topK?: number
  embedColumn?: string
}

/**
 * Query flow: text → embedding → adapter search.
 */
export class Retriever {
  constructor(
    private readonly store: VectorStoreAdapter,
    private readonly embeddings: EmbeddingProvider | null = null,
  ) {}

  async search(q: RetrieverQuery): Promise<SearchResult[]> {
    const topK = q.topK ?? 5
    const vector = q.vector ?? await this.embedQuery(q.query)
    return this.store.search(q.table, vector, topK, q.embedColumn)
  }

  private async embedQuery(query: string | undefined): Promise<number[]> {
    if (query === undefined) throw new Error('Either a query text or a query vector is required')
    if (!this.embeddings) throw new Error('No embedding provider configured to embed the query text')
    const [vector] = await this.embeddings.embed([query])
    if (vector === undefined) throw new Error('Embedding provider returned no vector for the query')
    return vector
  }
}
