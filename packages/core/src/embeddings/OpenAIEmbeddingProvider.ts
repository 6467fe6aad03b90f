import type { EmbeddingProvider } from './EmbeddingProvider'
import { checkedVectors, chunked } from './EmbeddingProvider'

export interface OpenAIEmbeddingConfig {
  apiKey: string
  model?: string          // default: text-embedding-3-small (1536-dim)
  baseUrl?: string        // default: https://api.openai.com/v1
  dim?: number            // default: 1536
  maxInputs?: number      // inputs per request; the API accepts up to 2048
}

interface OpenAIEmbeddingResponse {
  data: Array<{ embedding: number[]; index: number }>
  model: string
  usage: { prompt_tokens: number; total_tokens: number }
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly dim: number
  private apiKey: string
  private model: string
  private baseUrl: string
  private maxInputs: number

  constructor(config: OpenAIEmbeddingConfig) {
    this.apiKey = config.apiKey
    this.model = config.model ?? 'text-embedding-3-small'
    this.baseUrl = config.baseUrl ?? 'https://api.openai.com/v1'
    // text-embedding-3-small=1536, text-embedding-3-large=3072, text-embedding-ada-002=1536
    this.dim = config.dim ?? 1536
    this.maxInputs = config.maxInputs ?? 2048
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = []
    for (const batch of chunked(texts, this.maxInputs)) {
      vectors.push(...await this.request(batch))
    }
    return checkedVectors(`OpenAI embeddings (${this.model})`, texts.length, vectors, this.dim)
  }

  private async request(input: string[]): Promise<number[][]> {
    const res = await fetch(`${this.baseUrl}/embeddings`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      // Empty strings are rejected by the API; a single space embeds the same "no content"
      body: JSON.stringify({ model: this.model, input: input.map(t => t || ' ') }),
    })
    if (!res.ok) {
      throw new Error(`OpenAI embeddings failed: ${res.status} ${await res.text()}`)
    }
    const data = await res.json() as OpenAIEmbeddingResponse
    return data.data.sort((a, b) => a.index - b.index).map(d => d.embedding)
  }
}
