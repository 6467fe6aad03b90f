import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadConfig, parseStoreKind } from '../src/config';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vecsync-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to defaults when the file is missing', () => {
    const config = loadConfig(path.join(dir, 'missing.yaml'), {});
    expect(config.store.kind).toBe('flat');
    expect(config.embedding.provider).toBe('hash');
    expect(config.ingest).toEqual({ batchSize: 32, retries: 3 });
  });

  it('merges the YAML file over the defaults', () => {
    const file = path.join(dir, 'vecsync.yaml');
    fs.writeFileSync(file, [
      'store:',
      '  kind: postgres',
      '  databaseUrl: postgres://localhost/vecsync',
      'embedding:',
      '  provider: ollama',
      '  dim: 768',
      'ingest:',
      '  retries: 0',
    ].join('\n'));

    const config = loadConfig(file, {});

    expect(config.store.kind).toBe('postgres');
    expect(config.store.databaseUrl).toBe('postgres://localhost/vecsync');
    expect(config.embedding).toEqual({ provider: 'ollama', dim: 768 });
    expect(config.ingest).toEqual({ batchSize: 32, retries: 0 });
  });

  it('lets environment variables override the file', () => {
    const file = path.join(dir, 'vecsync.yaml');
    fs.writeFileSync(file, 'store:\n  kind: postgres\n');

    const config = loadConfig(file, {
      VECSYNC_STORE: 'Chroma',
      CHROMA_URL: 'http://chroma.test:8000',
      EMBEDDING_PROVIDER: 'OpenAI',
      EMBEDDING_API_KEY: 'test-secret',
      EMBEDDING_DIM: '1536',
    });

    expect(config.store.kind).toBe('chroma');
    expect(config.store.chromaUrl).toBe('http://chroma.test:8000');
    expect(config.embedding).toEqual({ provider: 'openai', apiKey: 'test-secret', dim: 1536 });
  });

  it('rejects a bad dimension', () => {
    expect(() => loadConfig(path.join(dir, 'missing.yaml'), { EMBEDDING_DIM: 'wide' }))
      .toThrow('EMBEDDING_DIM must be a positive integer, got "wide"');
  });
});

describe('parseStoreKind', () => {
  it('rejects unknown stores', () => {
    expect(() => parseStoreKind('redis')).toThrow('Unknown store "redis". Expected one of: postgres, flat, chroma');
  });
});
