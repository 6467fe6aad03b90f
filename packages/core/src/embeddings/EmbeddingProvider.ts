import { DataValidationError } from '../errors'

export interface EmbeddingProvider {
  /** Vector dimension produced by this provider's model. */
  readonly dim: number
  /** Embed a batch of text strings. Returns one float[] per input string, in input order. */
  embed(texts: string[]): Promise<number[][]>
}

/**
 * Returns `vectors` after checking there is one per text and each has `dim`
 * values. `source` names the provider in the error message.
 */
export function checkedVectors(source: string, textCount: number, vectors: number[][], dim: number): number[][] {
  if (vectors.length !== textCount) {
    throw new DataValidationError(`${source} returned ${vectors.length} vectors for ${textCount} texts`)
  }
  for (const v of vectors) {
    if (v.length !== dim) {
      throw new DataValidationError(`${source} returned a ${v.length}-dim vector; expected ${dim}`)
    }
  }
  return vectors
}

/** Splits `items` into consecutive slices of at most `size`. */
export function chunked<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) chunks.push(items.slice(i, i + size))
  return chunks
}
