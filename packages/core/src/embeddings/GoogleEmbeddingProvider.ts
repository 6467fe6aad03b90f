import type { EmbeddingProvider } from './EmbeddingProvider'
import { checkedVectors } from './EmbeddingProvider'

/**
 * Google text-embedding-004 via the Generative Language API.
 * Dimensions: 768 (fixed for text-embedding-004).
 */
export interface GoogleEmbeddingConfig {
  apiKey: string
  model?: string    // default: text-embedding-004 (768-dim)
  dim?: number      // default: 768
  taskType?: string // default: RETRIEVAL_DOCUMENT
}

interface GoogleBatchEmbedResponse {
  embeddings: Array<{ values: number[] }>
}

export class GoogleEmbeddingProvider implements EmbeddingProvider {
  readonly dim: number
  private apiKey: string
  private model: string
  private taskType: string

  constructor(config: GoogleEmbeddingConfig) {
    this.apiKey = config.apiKey
    this.model = config.model ?? 'text-embedding-004'
    this.dim = config.dim ?? 768
    this.taskType = config.taskType ?? 'RETRIEVAL_DOCUMENT'
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return []
    const res = await fetch(
      `https://generativelanguage.googleapis.com/v1beta/models/${this.model}:batchEmbedContents?key=${this.apiKey}`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          requests: texts.map(text => ({
            model: `models/${this.model}`,
            content: { parts: [{ text }] },
            taskType: this.taskType,
          })),
        }),
      },
    )
    if (!res.ok) {
      throw new Error(`Google embeddings failed: ${res.status} ${await res.text()}`)
    }
    const data = await res.json() as GoogleBatchEmbedResponse
    return checkedVectors(`Google embeddings (${this.model})`, texts.length, data.embeddings.map(e => e.values), this.dim)
  }
}
