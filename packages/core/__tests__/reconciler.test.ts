import type { Row } from '@vecsync/shared'
import type { VectorStoreAdapter } from '../src/storage/VectorStoreAdapter'
import { FlatIndexVectorStore } from '../src/storage/FlatIndexVectorStore'
import { Reconciler, planReconcile } from '../src/reconcile/Reconciler'
import type { ReconcileOptions } from '../src/reconcile/Reconciler'
import { DataValidationError, DBOperationError } from '../src/errors'
import { silentLogger } from '../src/logger'

const OPTS: ReconcileOptions = {
  primaryKeys: ['id'],
  mode: 'combined',
  embedColumns: ['name'],
  createIfMissing: true,
}

function item(id: string, name: string, x = 0): Row {
  return { id, name, embed_columns_names: ['name'], embed_columns_value: `name: ${name}`, embeddings: [x, 0] }
}

function setup() {
  const store = new FlatIndexVectorStore({ dimension: 2, logger: silentLogger })
  return { store, reconciler: new Reconciler(store, silentLogger) }
}

/** Adapter whose methods are all jest mocks over an empty table. */
function makeStore(): jest.Mocked<VectorStoreAdapter> {
  return {
    createTable: jest.fn().mockResolvedValue({ columns: {}, nullables: {} }),
    insert: jest.fn().mockResolvedValue(undefined),
    update: jest.fn().mockResolvedValue(undefined),
    markInactive: jest.fn().mockResolvedValue(undefined),
    listActive: jest.fn().mockResolvedValue([]),
    listColumns: jest.fn().mockResolvedValue([]),
    listEmbeddingColumns: jest.fn().mockResolvedValue([]),
    addColumn: jest.fn().mockResolvedValue(undefined),
    search: jest.fn().mockResolvedValue([]),
    close: jest.fn().mockResolvedValue(undefined),
  } as unknown as jest.Mocked<VectorStoreAdapter>
}

describe('Reconciler', () => {
  it('inserts every row of the first batch', async () => {
    const { store, reconciler } = setup()
    const report = await reconciler.reconcile('items', [item('1', 'a'), item('2', 'b')], OPTS)

    expect(report).toEqual({ table: 'items', inserted: 2, updated: 0, deactivated: 0 })
    expect((await store.listActive('items')).map(r => r.id)).toEqual(['1', '2'])
  })

  it('updates present keys, inserts new ones and deactivates missing ones', async () => {
    const { store, reconciler } = setup()
    await reconciler.reconcile('items', [item('1', 'a'), item('2', 'b')], OPTS)

    const report = await reconciler.reconcile('items', [item('2', 'b2'), item('3', 'c')], OPTS)

    expect(report).toEqual({ table: 'items', inserted: 1, updated: 1, deactivated: 1 })
    const active = await store.listActive('items')
    expect(active.map(r => [r.id, r.name])).toEqual([['2', 'b2'], ['3', 'c']])
  })

  it('re-inserts a key that was deactivated by an earlier run', async () => {
    const { store, reconciler } = setup()
    await reconciler.reconcile('items', [item('1', 'a'), item('2', 'b')], OPTS)
    await reconciler.reconcile('items', [item('2', 'b')], OPTS)

    const report = await reconciler.reconcile('items', [item('1', 'a'), item('2', 'b')], OPTS)

    expect(report).toEqual({ table: 'items', inserted: 1, updated: 1, deactivated: 0 })
    expect((await store.listActive('items')).map(r => r.id)).toEqual(['2', '1'])
  })

  it('matches on every column of a composite key', async () => {
    const { store, reconciler } = setup()
    const opts = { ...OPTS, primaryKeys: ['region', 'sku'] }
    const row = (region: string, sku: string): Row => ({ region, sku, name: `${region}-${sku}` })

    await reconciler.reconcile('stock', [row('eu', 'a'), row('us', 'a')], opts)
    const report = await reconciler.reconcile('stock', [row('eu', 'a')], opts)

    expect(report).toEqual({ table: 'stock', inserted: 0, updated: 1, deactivated: 1 })
    expect((await store.listActive('stock')).map(r => [r.region, r.sku])).toEqual([['eu', 'a']])
  })

  it('rejects a batch missing a primary key before writing', async () => {
    const store = makeStore()
    const reconciler = new Reconciler(store, silentLogger)

    await expect(reconciler.reconcile('items', [{ name: 'x' }], OPTS)).rejects.toThrow(
      new DataValidationError('Primary keys [id] missing in input rows'),
    )
    expect(store.createTable).not.toHaveBeenCalled()
  })

  it('rejects an empty primary-key list', async () => {
    const { reconciler } = setup()
    await expect(reconciler.reconcile('items', [], { ...OPTS, primaryKeys: [] })).rejects.toThrow(DataValidationError)
  })

  it('creates the table from the source columns when the first batch is empty', async () => {
    const { store, reconciler } = setup()
    const empty = await reconciler.reconcile('items', [], { ...OPTS, columns: ['id', 'name'] })

    expect(empty).toEqual({ table: 'items', inserted: 0, updated: 0, deactivated: 0 })
    expect(await store.listColumns('items')).toEqual([
      'id',
      'name',
      'embed_columns_names',
      'embed_columns_value',
      'embeddings',
      'is_active',
    ])

    const report = await reconciler.reconcile('items', [item('1', 'a')], OPTS)
    expect(report).toEqual({ table: 'items', inserted: 1, updated: 0, deactivated: 0 })
  })

  it('refuses to create a table from a batch with no columns', async () => {
    const store = makeStore()
    const reconciler = new Reconciler(store, silentLogger)

    await expect(reconciler.reconcile('items', [], OPTS)).rejects.toThrow(
      new DataValidationError('Cannot create table items from a batch with no columns'),
    )
    expect(store.createTable).not.toHaveBeenCalled()
  })

  it('accepts an empty batch for a table that already exists', async () => {
    const { store, reconciler } = setup()
    await reconciler.reconcile('items', [item('1', 'a')], OPTS)

    const report = await reconciler.reconcile('items', [], OPTS)

    expect(report).toEqual({ table: 'items', inserted: 0, updated: 0, deactivated: 1 })
    expect(await store.listActive('items')).toEqual([])
  })

  it('fails on a missing table when creation is off', async () => {
    const store = makeStore()
    const reconciler = new Reconciler(store, silentLogger)

    await expect(reconciler.reconcile('items', [item('1', 'a')], { ...OPTS, createIfMissing: false })).rejects.toThrow(
      new DBOperationError('Table items does not exist and createIfMissing is off'),
    )
    expect(store.insert).not.toHaveBeenCalled()
  })

  it('stops at the first failing step', async () => {
    const store = makeStore()
    store.listActive.mockResolvedValue([item('1', 'a'), item('2', 'b')])
    store.update.mockRejectedValue(new Error('connection reset'))
    const reconciler = new Reconciler(store, silentLogger)

    await expect(reconciler.reconcile('items', [item('1', 'a'), item('3', 'c')], OPTS)).rejects.toThrow('connection reset')
    expect(store.insert).not.toHaveBeenCalled()
    expect(store.markInactive).not.toHaveBeenCalled()
  })

  it('writes in update, insert, markInactive order', async () => {
    const store = makeStore()
    const calls: string[] = []
    store.listActive.mockResolvedValue([item('1', 'a'), item('2', 'b')])
    store.update.mockImplementation(async () => { calls.push('update') })
    store.insert.mockImplementation(async () => { calls.push('insert') })
    store.markInactive.mockImplementation(async () => { calls.push('markInactive') })

    await new Reconciler(store, silentLogger).reconcile('items', [item('1', 'a'), item('3', 'c')], OPTS)

    expect(calls).toEqual(['update', 'insert', 'markInactive'])
    expect(store.markInactive).toHaveBeenCalledWith('items', [['2']])
  })
})

describe('planReconcile', () => {
  it('keeps the last occurrence of a duplicated key', () => {
    const plan = planReconcile([], [{ id: '1', name: 'a' }, { id: '1', name: 'b' }], ['id'])
    expect(plan.toInsert).toEqual([{ id: '1', name: 'b' }])
  })

  it('matches numeric and textual keys', () => {
    const plan = planReconcile([{ id: '7' }], [{ id: 7 }], ['id'])
    expect(plan).toEqual({ toUpdate: [{ id: 7 }], toInsert: [], toDeactivate: [] })
  })
})
