import type { IngestProgress, Table } from '@vecsync/shared'
import type { DataLoader } from '../src/loader/DataLoader'
import type { EmbeddingProvider } from '../src/embeddings/EmbeddingProvider'
import { FlatIndexVectorStore } from '../src/storage/FlatIndexVectorStore'
import { HashEmbeddingProvider, hashEmbed } from '../src/embeddings/HashEmbeddingProvider'
import { Ingestor, combinedText } from '../src/ingest/Ingestor'
import type { IngestOptions } from '../src/ingest/Ingestor'
import { Retriever } from '../src/retriever/Retriever'
import { DataValidationError } from '../src/errors'
import { silentLogger } from '../src/logger'

const PRODUCTS: Table = {
  columns: ['id', 'name', 'description'],
  rows: [
    { id: '1', name: 'Widget', description: 'Small blue widget' },
    { id: '2', name: 'Gadget', description: 'Large red gadget' },
    { id: '3', name: 'Doohickey', description: null },
  ],
}

function loaderOf(table: Table): DataLoader {
  return { load: async () => table }
}

const OPTIONS: IngestOptions = {
  sourcePath: 'memory://products',
  table: 'products',
  embedColumns: ['name', 'description'],
  primaryKeys: ['id'],
  createTableIfNotExists: true,
  embedType: 'combined',
}

function setup(table: Table = PRODUCTS, embeddings: EmbeddingProvider = new HashEmbeddingProvider(8)) {
  const store = new FlatIndexVectorStore({ dimension: embeddings.dim, logger: silentLogger })
  const ingestor = new Ingestor(store, embeddings, loaderOf(table), { batchSize: 2, logger: silentLogger })
  return { store, ingestor }
}

describe('combinedText', () => {
  it('joins column/value pairs', () => {
    expect(combinedText(PRODUCTS.rows[0], ['name', 'description'])).toBe('name: Widget; description: Small blue widget')
    expect(combinedText(PRODUCTS.rows[2], ['name', 'description'])).toBe('name: Doohickey; description: ')
  })
})

describe('Ingestor', () => {
  it('embeds the combined text of every row in combined mode', async () => {
    const { store, ingestor } = setup()
    const report = await ingestor.execute(OPTIONS)

    expect(report).toEqual({ table: 'products', inserted: 3, updated: 0, deactivated: 0 })
    const [first] = await store.listActive('products')
    expect(first.embed_columns_names).toEqual(['name', 'description'])
    expect(first.embed_columns_value).toBe('name: Widget; description: Small blue widget')
    expect(first.embeddings).toEqual(hashEmbed('name: Widget; description: Small blue widget', 8))
  })

  it('embeds each column on its own in separated mode', async () => {
    const { store, ingestor } = setup()
    await ingestor.execute({ ...OPTIONS, embedType: 'separated' })

    expect(await store.listEmbeddingColumns('products')).toEqual(['name_enc', 'description_enc'])

    const results = await new Retriever(store).search({
      table: 'products',
      vector: hashEmbed('Large red gadget', 8),
      topK: 1,
      embedColumn: 'description_enc',
    })
    expect(results).toHaveLength(1)
    expect(results[0].id).toBe('2')
    expect(results[0].document).toBe('Large red gadget')
    expect(results[0].distance).toBeCloseTo(0)
  })

  it('reconciles a second load against the first', async () => {
    const first = setup()
    await first.ingestor.execute(OPTIONS)

    const changed: Table = {
      columns: PRODUCTS.columns,
      rows: [
        { id: '1', name: 'Widget', description: 'Small green widget' },
        { id: '4', name: 'Gizmo', description: 'New' },
      ],
    }
    const second = new Ingestor(first.store, new HashEmbeddingProvider(8), loaderOf(changed), { logger: silentLogger })
    const report = await second.execute(OPTIONS)

    expect(report).toEqual({ table: 'products', inserted: 1, updated: 1, deactivated: 2 })
    expect((await first.store.listActive('products')).map(r => r.id)).toEqual(['1', '4'])
  })

  it('reports progress from loading to done', async () => {
    const { ingestor } = setup()
    const events: IngestProgress[] = []
    await ingestor.execute(OPTIONS, p => events.push(p))

    expect(events.map(e => e.step)).toEqual(['loading', 'embedding', 'embedding', 'reconciling', 'done'])
    expect(events.filter(e => e.step === 'embedding').map(e => [e.progress, e.total])).toEqual([[2, 3], [3, 3]])
  })

  it('creates the table from a header-only source and loads into it later', async () => {
    const { store, ingestor } = setup({ columns: PRODUCTS.columns, rows: [] })
    const empty = await ingestor.execute(OPTIONS)

    expect(empty).toEqual({ table: 'products', inserted: 0, updated: 0, deactivated: 0 })
    expect(await store.listColumns('products')).toContain('description')

    const full = new Ingestor(store, new HashEmbeddingProvider(8), loaderOf(PRODUCTS), { logger: silentLogger })
    expect(await full.execute(OPTIONS)).toEqual({ table: 'products', inserted: 3, updated: 0, deactivated: 0 })
  })

  it('rejects embedding columns absent from the source', async () => {
    const { ingestor } = setup()
    await expect(ingestor.execute({ ...OPTIONS, embedColumns: ['price'] })).rejects.toThrow(
      new DataValidationError('Embedding columns [price] not found in memory://products'),
    )
  })

  it('rejects vectors of the wrong size from the provider', async () => {
    const broken: EmbeddingProvider = { dim: 4, embed: async texts => texts.map(() => [1, 2]) }
    const { ingestor } = setup(PRODUCTS, broken)
    await expect(ingestor.execute(OPTIONS)).rejects.toThrow(
      new DataValidationError('Embedding provider returned a 2-dim vector; expected 4'),
    )
  })
})

describe('Retriever', () => {
  it('embeds the query text with the provider', async () => {
    const { store, ingestor } = setup()
    await ingestor.execute(OPTIONS)

    const results = await new Retriever(store, new HashEmbeddingProvider(8)).search({
      table: 'products',
      query: 'name: Gadget; description: Large red gadget',
      topK: 2,
    })
    expect(results[0].id).toBe('2')
    expect(results[0].distance).toBeCloseTo(0)
    expect(results).toHaveLength(2)
  })

  it('fails when the provider returns no vector for the query', async () => {
    const { store } = setup()
    const empty: EmbeddingProvider = { dim: 8, embed: async () => [] }

    await expect(new Retriever(store, empty).search({ table: 'products', query: 'x' })).rejects.toThrow(
      'Embedding provider returned no vector for the query',
    )
  })

  it('needs a provider to search by text', async () => {
    const { store } = setup()
    await expect(new Retriever(store).search({ table: 'products', query: 'x' })).rejects.toThrow(
      'No embedding provider configured to embed the query text',
    )
  })
})
