import type { EmbeddingProvider } from './EmbeddingProvider'
import { checkedVectors, chunked } from './EmbeddingProvider'

/**
 * Generic OpenAI-compatible embedding provider.
 * Works with any endpoint that exposes POST /embeddings with a { model, input } body:
 *   Cohere:   https://api.cohere.com/compatibility/v1
 *   Together: https://api.together.xyz/v1
 *   Voyage:   https://api.voyageai.com/v1
 *   Azure:    https://<resource>.openai.azure.com/openai/deployments/<deployment>
 */
export interface HttpEmbeddingConfig {
  baseUrl: string
  apiKey?: string       // Bearer token (omit for unauthenticated local endpoints)
  model: string
  dim?: number          // default: 1536
  headers?: Record<string, string>     // extra headers (e.g. api-key for Azure)
  queryParams?: Record<string, string> // extra query params (e.g. api-version for Azure)
  maxInputs?: number    // inputs per request (default: 96, the lowest common limit)
}

interface OAIEmbeddingResponse {
  data: Array<{ embedding: number[]; index: number }>
}

export class HttpEmbeddingProvider implements EmbeddingProvider {
  readonly dim: number
  private readonly url: string
  private readonly headers: Record<string, string>

  constructor(private readonly config: HttpEmbeddingConfig) {
    this.dim = config.dim ?? 1536

    const url = new URL(`${config.baseUrl.replace(/\/$/, '')}/embeddings`)
    for (const [k, v] of Object.entries(config.queryParams ?? {})) url.searchParams.set(k, v)
    this.url = url.toString()

    this.headers = { 'Content-Type': 'application/json', ...config.headers }
    if (config.apiKey) this.headers['Authorization'] = `Bearer ${config.apiKey}`
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = []
    for (const batch of chunked(texts, this.config.maxInputs ?? 96)) {
      const res = await fetch(this.url, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify({ model: this.config.model, input: batch }),
      })
      if (!res.ok) {
        throw new Error(`HTTP embedding failed [${this.config.baseUrl}]: ${res.status} ${await res.text()}`)
      }
      const data = await res.json() as OAIEmbeddingResponse
      vectors.push(...data.data.sort((a, b) => a.index - b.index).map(d => d.embedding))
    }
    return checkedVectors(`HTTP embeddings (${this.config.model})`, texts.length, vectors, this.dim)
  }
}
