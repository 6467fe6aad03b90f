import { ChromaVectorStore, FlatIndexVectorStore, PostgresVectorStore } from '@vecsync/core';
import type { Logger, VectorStoreAdapter } from '@vecsync/core';
import type { Config } from './config';

/** Builds the adapter named by `store.kind`; vector columns are sized to `dimension`. */
export function createVectorStore(
  config: Config['store'],
  dimension?: number,
  logger: Logger = console,
): VectorStoreAdapter {
  switch (config.kind) {
    case 'postgres':
      if (!config.databaseUrl) throw new Error('store.kind=postgres requires DATABASE_URL');
      return new PostgresVectorStore(config.databaseUrl, { dimension, logger });

    case 'chroma':
      return new ChromaVectorStore(
        { path: config.chromaUrl ?? 'http://localhost:8000' },
        { dimension, logger },
      );

    case 'flat':
      return new FlatIndexVectorStore({ dimension, persistDir: config.flatIndexDir, logger });
  }
}
