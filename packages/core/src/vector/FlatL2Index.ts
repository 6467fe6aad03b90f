export interface IndexHit {
  /** Position of the vector in insertion order. */
  position: number
  /** Squared Euclidean distance. */
  distance: number
}

export function squaredL2(a: number[], b: number[]): number {
  let s = 0
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i]
    s += d * d
  }
  return s
}

/**
 * Exact brute-force index with the same surface as a flat L2 index: vectors
 * can be added and the whole index reset, but never updated or removed.
 */
export class FlatL2Index {
  private vectors: number[][] = []

  constructor(readonly dim: number) {}

  get ntotal(): number {
    return this.vectors.length
  }

  add(vectors: number[][]): void {
    for (const v of vectors) {
      if (v.length !== this.dim) {
        throw new Error(`Vector dimension mismatch: expected ${this.dim}, got ${v.length}`)
      }
      this.vectors.push(v.slice())
    }
  }

  reset(): void {
    this.vectors = []
  }

  /** The `k` nearest vectors, nearest first; ties keep insertion order. */
  search(query: number[], k: number): IndexHit[] {
    if (query.length !== this.dim) {
      throw new Error(`Vector dimension mismatch: expected ${this.dim}, got ${query.length}`)
    }
    const hits = this.vectors.map((v, position) => ({ position, distance: squaredL2(v, query) }))
    hits.sort((a, b) => a.distance - b.distance || a.position - b.position)
    return hits.slice(0, Math.max(0, k))
  }
}
