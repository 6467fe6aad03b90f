import type { EmbeddingProvider } from './EmbeddingProvider'
import { checkedVectors, chunked } from './EmbeddingProvider'

export interface OllamaEmbeddingConfig {
  baseUrl?: string        // default: http://localhost:11434
  model?: string          // default: nomic-embed-text
  dim?: number            // default: 768
  maxInputs?: number      // texts per /api/embed request (default: 64)
}

interface OllamaEmbedResponse {
  embeddings: number[][]
}

/** Local embeddings through Ollama's batch `/api/embed` endpoint. */
export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly dim: number
  private baseUrl: string
  private model: string
  private maxInputs: number

  constructor(config: OllamaEmbeddingConfig = {}) {
    this.baseUrl = config.baseUrl ?? 'http://localhost:11434'
    this.model = config.model ?? 'nomic-embed-text'
    // nomic-embed-text=768, mxbai-embed-large=1024, snowflake-arctic-embed=1024
    this.dim = config.dim ?? 768
    this.maxInputs = config.maxInputs ?? 64
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = []
    for (const input of chunked(texts, this.maxInputs)) {
      const res = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, input }),
      })
      if (!res.ok) {
        throw new Error(`Ollama embeddings failed: ${res.status} ${await res.text()}`)
      }
      const data = await res.json() as OllamaEmbedResponse
      vectors.push(...data.embeddings)
    }
    return checkedVectors(`Ollama embeddings (${this.model})`, texts.length, vectors, this.dim)
  }
}
