#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';

import { EMBEDDING_MODES } from '@vecsync/shared';
import type { EmbeddingMode, IngestProgress, SearchResult } from '@vecsync/shared';
import { Ingestor, Retriever, createLoader } from '@vecsync/core';
import type { VectorStoreAdapter } from '@vecsync/core';
import { DEFAULT_CONFIG_PATH, loadConfig } from './config';
import { createEmbeddingProvider } from './embedding-factory';
import { createVectorStore } from './store-factory';
import { withRetry } from './retry';
import { formatResults } from './format';

dotenv.config();

const program = new Command();

program
  .name('vecsync')
  .description('Ingest tabular data, embed it and keep a vector store in sync')
  .version('0.1.0');

program
  .command('ingest')
  .description('Load a CSV / TSV / JSON Lines file, embed it and reconcile it into a table')
  .argument('<source>', 'Path to the source file')
  .requiredOption('--table <name>', 'Target table')
  .requiredOption('--primary-keys <cols>', 'Comma-separated primary-key columns', parseList)
  .requiredOption('--embed-columns <cols>', 'Comma-separated columns to embed', parseList)
  .option('--mode <mode>', `Embedding mode: ${EMBEDDING_MODES.join(' | ')}`, parseMode, 'combined')
  .option('--no-create-table', 'Fail instead of creating the table when it does not exist')
  .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
  .action(async (source: string, options) => {
    try {
      const config = loadConfig(options.config);
      const embeddings = createEmbeddingProvider(config.embedding);
      const store = createVectorStore(config.store, embeddings.dim);
      const ingestor = new Ingestor(store, embeddings, createLoader(source), {
        batchSize: config.ingest.batchSize,
      });

      await closing(store, async () => {
        const report = await withRetry(
          () => ingestor.execute({
            sourcePath: source,
            table: options.table,
            primaryKeys: options.primaryKeys,
            embedColumns: options.embedColumns,
            embedType: options.mode,
            createTableIfNotExists: options.createTable,
          }, printProgress),
          {
            retries: config.ingest.retries,
            onRetry: (attempt, error) => console.warn(`[vecsync] Attempt ${attempt} failed: ${error.message}; retrying`),
          },
        );
        console.log(
          `\n✅ ${report.table}: ${report.inserted} inserted, ${report.updated} updated, ${report.deactivated} deactivated`,
        );
      });
    } catch (error) {
      fail(error);
    }
  });

program
  .command('search')
  .description('Nearest-neighbour search over the active rows of a table')
  .argument('<table>', 'Table to search')
  .argument('<query>', 'Query text')
  .option('--top-k <n>', 'Number of results', parsePositiveInt, 5)
  .option('--embed-column <col>', 'Vector column to search (default: the combined vector or the first one)')
  .option('--output <format>', 'Output format: json | text', 'text')
  .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
  .action(async (table: string, query: string, options) => {
    try {
      const config = loadConfig(options.config);
      const embeddings = createEmbeddingProvider(config.embedding);
      const store = createVectorStore(config.store, embeddings.dim);
      const retriever = new Retriever(store, embeddings);

      await closing(store, async () => {
        const results = await retriever.search({
          table,
          query,
          topK: options.topK,
          embedColumn: options.embedColumn,
        });
        if (options.output === 'json') {
          console.log(JSON.stringify(results, null, 2));
        } else {
          console.log(formatResults(results));
        }
      });
    } catch (error) {
      fail(error);
    }
  });

program
  .command('columns')
  .description('List the columns and embedding columns of a table')
  .argument('<table>', 'Table name')
  .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
  .action(async (table: string, options) => {
    try {
      const config = loadConfig(options.config);
      const store = createVectorStore(config.store, config.embedding.dim);

      await closing(store, async () => {
        const columns = await store.listColumns(table);
        if (columns.length === 0) {
          console.log(`Table ${table} does not exist.`);
          return;
        }
        const embedding = new Set(await store.listEmbeddingColumns(table));
        for (const column of columns) {
          console.log(embedding.has(column) ? `${column} (embedding)` : column);
        }
      });
    } catch (error) {
      fail(error);
    }
  });

program.parse();

function printProgress(p: IngestProgress): void {
  switch (p.step) {
    case 'loading':
      console.log(`[vecsync] Loading ${p.table}...`);
      break;
    case 'embedding':
      process.stdout.write(`\r[vecsync] Embedding ${p.progress ?? 0}/${p.total ?? 0}`);
      break;
    case 'reconciling':
      console.log(`\n[vecsync] Reconciling ${p.table}...`);
      break;
    case 'done':
      console.log(`[vecsync] Done in ${p.durationMs ?? 0}ms`);
      break;
  }
}

async function closing(store: VectorStoreAdapter, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } finally {
    await store.close();
  }
}

function fail(error: unknown): void {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
}

function parseList(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

function parseMode(value: string): EmbeddingMode {
  const mode = EMBEDDING_MODES.find(m => m === value);
  if (!mode) throw new InvalidArgumentError(`Expected one of: ${EMBEDDING_MODES.join(', ')}`);
  return mode;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('Expected a positive integer');
  return n;
}
