import type { Document, Filter, ReplaceOptions, UpdateResult } from 'mongodb'
import { describe, expect, it } from 'vitest'
import { PersistenceError } from '../src/core/errors.js'
import { silentLogger } from '../src/core/logger.js'
import { MemoryStore } from '../src/store/memory-store.js'
import { MongoStore, type StoreCollection } from '../src/store/mongo-store.js'
import type { OptionsSnapshot } from '../src/store/types.js'
import type { CompositeRecord, Filing } from '../src/types.js'
import { appleInfo, chainOf, contract } from './helpers.js'

const filing: Filing = {
	ticker: 'AAPL',
	cik: '0000320193',
	formType: '8-K',
	accessionNumber: '0000320193-24-000001',
	filingDate: '2024-05-02',
	primaryDocument: 'a.htm',
}

describe('MemoryStore', () => {
	it('upserts filings by accession number', async () => {
		const store = new MemoryStore()
		expect(await store.saveFiling(filing)).toBe(true)
		expect(await store.saveFiling({ ...filing, primaryDocument: 'amended.htm' })).toBe(true)

		expect(store.size.filings).toBe(1)
		expect((await store.findFiling(filing.accessionNumber))?.primaryDocument).toBe('amended.htm')
		expect(await store.findFiling('missing')).toBeNull()
	})

	it('upserts composite records by symbol', async () => {
		const store = new MemoryStore()
		const record = {
			symbol: 'AAPL',
			basicInfo: appleInfo,
			impliedVolatility: null,
			secData: { recent10K: null, recent8K: [], keyFinancials: null },
			lastUpdated: '2024-05-06T00:00:00.000Z',
		}
		await store.saveCompositeRecord(record)
		await store.saveCompositeRecord({ ...record, lastUpdated: '2024-05-07T00:00:00.000Z' })

		expect(store.size.records).toBe(1)
		expect((await store.findCompositeRecord('AAPL'))?.lastUpdated).toBe('2024-05-07T00:00:00.000Z')
	})

	it('stamps option snapshots', async () => {
		const store = new MemoryStore(() => new Date('2024-05-06T00:00:00Z'))
		const chain = chainOf('AAPL', { '2024-06-21': { calls: [contract('call', 0.3)], puts: [] } })
		await store.saveOptionsSnapshot('AAPL', chain)
		expect(await store.findOptionsSnapshot('AAPL')).toEqual({
			symbol: 'AAPL',
			chain,
			savedAt: '2024-05-06T00:00:00.000Z',
		})
	})

	it('returns copies, not live references', async () => {
		const store = new MemoryStore()
		await store.saveFiling(filing)
		const found = await store.findFiling(filing.accessionNumber)
		if (found) found.primaryDocument = 'mutated.htm'
		expect((await store.findFiling(filing.accessionNumber))?.primaryDocument).toBe('a.htm')
	})
})

describe('MongoStore before open', () => {
	const store = new MongoStore({ uri: 'mongodb://localhost:27017', dbName: 'test', logger: silentLogger() })

	it('reports writes as failed', async () => {
		expect(await store.saveFiling(filing)).toBe(false)
	})

	it('rejects reads', async () => {
		await expect(store.findFiling(filing.accessionNumber)).rejects.toThrow(PersistenceError)
	})
})

/** Keeps one document per filter, the way a unique natural key does. */
class FakeCollection<T extends Document> implements StoreCollection<T> {
	readonly replaced: { filter: Filter<T>; replacement: T; options: ReplaceOptions }[] = []
	readonly indexes: unknown[] = []
	private readonly docs = new Map<string, T>()

	async createIndex(spec: unknown): Promise<string> {
		this.indexes.push(spec)
		return 'index'
	}

	async replaceOne(filter: Filter<T>, replacement: T, options: ReplaceOptions): Promise<UpdateResult<T>> {
		this.replaced.push({ filter, replacement, options })
		const key = JSON.stringify(filter)
		const matched = this.docs.has(key) ? 1 : 0
		if (matched || options.upsert) this.docs.set(key, replacement)
		return {
			acknowledged: true,
			matchedCount: matched,
			modifiedCount: matched,
			upsertedCount: matched || !options.upsert ? 0 : 1,
			upsertedId: null,
		}
	}

	async findOne(filter: Filter<T>): Promise<T | null> {
		return this.docs.get(JSON.stringify(filter)) ?? null
	}
}

describe('MongoStore writes', () => {
	function openStore() {
		const collections = {
			records: new FakeCollection<CompositeRecord>(),
			filings: new FakeCollection<Filing>(),
			snapshots: new FakeCollection<OptionsSnapshot>(),
		}
		const store = new MongoStore({
			uri: 'mongodb://localhost:27017',
			dbName: 'test',
			logger: silentLogger(),
			collections,
			now: () => new Date('2024-05-06T00:00:00Z'),
		})
		return { store, collections }
	}

	it('creates the unique indexes on open', async () => {
		const { store, collections } = openStore()
		await store.open()
		expect(collections.records.indexes).toEqual([{ symbol: 1 }])
		expect(collections.filings.indexes).toEqual([{ accessionNumber: 1 }])
		expect(collections.snapshots.indexes).toEqual([{ symbol: 1 }])
	})

	it('replaces the whole composite record instead of merging fields', async () => {
		const { store, collections } = openStore()
		await store.open()
		const record: CompositeRecord = {
			symbol: 'AAPL',
			basicInfo: appleInfo,
			impliedVolatility: null,
			optionsData: chainOf('AAPL', { '2024-06-21': { calls: [contract('call', 0.3)], puts: [] } }),
			secData: { recent10K: null, recent8K: [], keyFinancials: null },
			lastUpdated: '2024-05-06T00:00:00.000Z',
		}
		const { optionsData, ...refreshed } = record
		expect(optionsData).toBeDefined()

		expect(await store.saveCompositeRecord(record)).toBe(true)
		expect(await store.saveCompositeRecord({ ...refreshed, lastUpdated: '2024-05-07T00:00:00.000Z' })).toBe(true)

		expect(collections.records.replaced.map((c) => [c.filter, c.options])).toEqual([
			[{ symbol: 'AAPL' }, { upsert: true }],
			[{ symbol: 'AAPL' }, { upsert: true }],
		])
		const stored = await store.findCompositeRecord('AAPL')
		expect(stored?.lastUpdated).toBe('2024-05-07T00:00:00.000Z')
		expect(stored?.optionsData).toBeUndefined()
	})

	it('upserts filings and snapshots by their natural keys', async () => {
		const { store, collections } = openStore()
		await store.open()
		expect(await store.saveFiling(filing)).toBe(true)
		const chain = chainOf('AAPL', { '2024-06-21': { calls: [contract('call', 0.3)], puts: [] } })
		expect(await store.saveOptionsSnapshot('AAPL', chain)).toBe(true)

		expect(collections.filings.replaced[0]?.filter).toEqual({ accessionNumber: filing.accessionNumber })
		expect(await store.findOptionsSnapshot('AAPL')).toEqual({
			symbol: 'AAPL',
			chain,
			savedAt: '2024-05-06T00:00:00.000Z',
		})
	})
})
