import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';

export const STORE_KINDS = ['postgres', 'flat', 'chroma'] as const;
export type StoreKind = (typeof STORE_KINDS)[number];

export interface Config {
  store: {
    kind: StoreKind;
    databaseUrl?: string;
    chromaUrl?: string;
    flatIndexDir?: string;
  };
  embedding: {
    provider: string;
    model?: string;
    apiKey?: string;
    baseUrl?: string;
    dim?: number;
  };
  ingest: {
    batchSize: number;
    retries: number;
  };
}

export const DEFAULT_CONFIG_PATH = path.join(process.cwd(), 'vecsync.yaml');

export function defaultConfig(): Config {
  return {
    store: {
      kind: 'flat',
      flatIndexDir: path.join(process.cwd(), '.vecsync'),
    },
    embedding: {
      provider: 'hash',
    },
    ingest: {
      batchSize: 32,
      retries: 3,
    },
  };
}

/**
 * Defaults, then the YAML file (if present), then environment variables.
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): Config {
  const config = defaultConfig();

  if (fs.existsSync(configPath)) {
    const content = fs.readFileSync(configPath, 'utf-8');
    const userConfig = (yaml.load(content) ?? {}) as Partial<Config>;
    config.store = { ...config.store, ...userConfig.store };
    config.embedding = { ...config.embedding, ...userConfig.embedding };
    config.ingest = { ...config.ingest, ...userConfig.ingest };
  }

  if (env.VECSYNC_STORE) config.store.kind = parseStoreKind(env.VECSYNC_STORE);
  if (env.DATABASE_URL) config.store.databaseUrl = env.DATABASE_URL;
  if (env.CHROMA_URL) config.store.chromaUrl = env.CHROMA_URL;
  if (env.FLAT_INDEX_DIR) config.store.flatIndexDir = env.FLAT_INDEX_DIR;
  if (env.EMBEDDING_PROVIDER) config.embedding.provider = env.EMBEDDING_PROVIDER.toLowerCase();
  if (env.EMBEDDING_MODEL) config.embedding.model = env.EMBEDDING_MODEL;
  if (env.EMBEDDING_API_KEY) config.embedding.apiKey = env.EMBEDDING_API_KEY;
  if (env.EMBEDDING_BASE_URL) config.embedding.baseUrl = env.EMBEDDING_BASE_URL;
  if (env.EMBEDDING_DIM) config.embedding.dim = parsePositiveInt('EMBEDDING_DIM', env.EMBEDDING_DIM);

  config.store.kind = parseStoreKind(config.store.kind);
  return config;
}

export function parseStoreKind(value: string): StoreKind {
  const kind = STORE_KINDS.find(k => k === value.toLowerCase());
  if (!kind) {
    throw new Error(`Unknown store "${value}". Expected one of: ${STORE_KINDS.join(', ')}`);
  }
  return kind;
}

function parsePositiveInt(name: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`${name} must be a positive integer, got "${value}"`);
  return n;
}
