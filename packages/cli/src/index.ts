export * from './config';
export { createEmbeddingProvider } from './embedding-factory';
export { createVectorStore } from './store-factory';
export { withRetry } from './retry';
export type { RetryOptions } from './retry';
export { formatResults } from './format';
