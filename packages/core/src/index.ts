export * from './errors'
export * from './logger'

export * from './schema/SchemaSynthesizer'

export type { VectorStoreAdapter } from './storage/VectorStoreAdapter'
export { PostgresVectorStore } from './storage/PostgresVectorStore'
export type { PostgresVectorStoreOptions } from './storage/PostgresVectorStore'
export { FlatIndexVectorStore } from './storage/FlatIndexVectorStore'
export type { FlatIndexStoreConfig } from './storage/FlatIndexVectorStore'
export { ChromaVectorStore, catalogName, collectionName } from './storage/ChromaVectorStore'
export type { ChromaClientParams, ChromaVectorStoreOptions } from './storage/ChromaVectorStore'
export { RowTable } from './storage/RowTable'
export { TableRegistry } from './storage/TableRegistry'
export { encodeKey, keyTupleOf } from './storage/keys'
export { FlatL2Index } from './vector/FlatL2Index'

export { Reconciler, planReconcile, validateBatch } from './reconcile/Reconciler'
export type { ReconcileOptions, ReconcilePlan } from './reconcile/Reconciler'
export { Ingestor, combinedText } from './ingest/Ingestor'
export type { IngestOptions, IngestorConfig } from './ingest/Ingestor'
export { Retriever } from './retriever/Retriever'
export type { RetrieverQuery } from './retriever/Retriever'

export type { EmbeddingProvider } from './embeddings/EmbeddingProvider'
export { checkedVectors } from './embeddings/EmbeddingProvider'
export { OpenAIEmbeddingProvider } from './embeddings/OpenAIEmbeddingProvider'
export { OllamaEmbeddingProvider } from './embeddings/OllamaEmbeddingProvider'
export { GoogleEmbeddingProvider } from './embeddings/GoogleEmbeddingProvider'
export { HttpEmbeddingProvider } from './embeddings/HttpEmbeddingProvider'
export { HashEmbeddingProvider } from './embeddings/HashEmbeddingProvider'

export * from './loader'
