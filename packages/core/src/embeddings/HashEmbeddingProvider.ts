import type { EmbeddingProvider } from './EmbeddingProvider'

/**
 * Deterministic bag-of-characters hashing (FNV-1a), L2-normalized.
 * Not semantic: identical texts map to identical vectors and nothing more.
 * Needs no network, so it backs offline runs and tests.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
  constructor(readonly dim = 256) {}

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(t => hashEmbed(t, this.dim))
  }
}

export function hashEmbed(text: string, dim: number): number[] {
  const v = new Array<number>(dim).fill(0)
  let h = 2166136261 >>> 0
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i)
    h = Math.imul(h, 16777619) >>> 0
    v[h % dim] += 1
  }
  const norm = Math.sqrt(v.reduce((a, b) => a + b * b, 0)) || 1
  return v.map(x => x / norm)
}
