import {
	type CreateIndexesOptions,
	type Document,
	type Filter,
	type FindOptions,
	type IndexSpecification,
	MongoClient,
	type ReplaceOptions,
	type UpdateResult,
} from 'mongodb'
import { PersistenceError, errorMessage } from '../core/errors.js'
import type { Logger } from '../core/logger.js'
import type { CompositeRecord, Filing, OptionsChain } from '../types.js'
import type { OptionsSnapshot, Store } from './types.js'

export const COLLECTIONS = {
	records: 'composite_records',
	filings: 'filings',
	snapshots: 'options_snapshots',
} as const

/** The part of a driver `Collection` the store calls. */
export interface StoreCollection<T extends Document> {
	createIndex(spec: IndexSpecification, options: CreateIndexesOptions): Promise<string>
	replaceOne(filter: Filter<T>, replacement: T, options: ReplaceOptions): Promise<UpdateResult<T>>
	findOne(filter: Filter<T>, options: FindOptions): Promise<T | null>
}

export interface StoreCollections {
	records: StoreCollection<CompositeRecord>
	filings: StoreCollection<Filing>
	snapshots: StoreCollection<OptionsSnapshot>
}

export interface MongoStoreOptions {
	uri: string
	dbName: string
	logger: Logger
	/** Injected for tests; otherwise built from `uri`. */
	client?: MongoClient
	/** Used as-is instead of connecting; indexes are still created on open. */
	collections?: StoreCollections
	now?: () => Date
}

export class MongoStore implements Store {
	private readonly client: MongoClient
	private readonly dbName: string
	private readonly logger: Logger
	private readonly now: () => Date
	private readonly injected: StoreCollections | undefined
	private collections: StoreCollections | null = null

	constructor(options: MongoStoreOptions) {
		this.client = options.client ?? new MongoClient(options.uri, { serverSelectionTimeoutMS: 5_000 })
		this.dbName = options.dbName
		this.logger = options.logger.child({ component: 'mongo' })
		this.now = options.now ?? (() => new Date())
		this.injected = options.collections
	}

	private async connect(): Promise<StoreCollections> {
		if (this.injected) return this.injected
		await this.client.connect()
		const db = this.client.db(this.dbName)
		return {
			records: db.collection<CompositeRecord>(COLLECTIONS.records),
			filings: db.collection<Filing>(COLLECTIONS.filings),
			snapshots: db.collection<OptionsSnapshot>(COLLECTIONS.snapshots),
		}
	}

	async open(): Promise<void> {
		if (this.collections) return
		try {
			const collections = await this.connect()
			await Promise.all([
				collections.records.createIndex({ symbol: 1 }, { unique: true }),
				collections.filings.createIndex({ accessionNumber: 1 }, { unique: true }),
				collections.snapshots.createIndex({ symbol: 1 }, { unique: true }),
			])
			this.collections = collections
			this.logger.info(`Connected to database ${this.dbName}`)
		} catch (err) {
			throw new PersistenceError(`Could not open database ${this.dbName}: ${errorMessage(err)}`, { cause: err })
		}
	}

	async close(): Promise<void> {
		this.collections = null
		if (!this.injected) await this.client.close()
	}

	private get db(): StoreCollections {
		if (!this.collections) throw new PersistenceError('Store is not open')
		return this.collections
	}

	/** Whole-document replace keyed on the natural key; stored records are overwritten, not merged. */
	private async upsert(what: string, run: (c: StoreCollections) => Promise<UpdateResult>): Promise<boolean> {
		try {
			const result = await run(this.db)
			const ok = result.acknowledged && result.matchedCount + result.upsertedCount > 0
			if (ok) this.logger.debug(`Saved ${what}`)
			else this.logger.warn(`Save of ${what} matched no document`)
			return ok
		} catch (err) {
			this.logger.error(`Error saving ${what}: ${errorMessage(err)}`)
			return false
		}
	}

	saveCompositeRecord(record: CompositeRecord): Promise<boolean> {
		return this.upsert(`composite record for ${record.symbol}`, (c) =>
			c.records.replaceOne({ symbol: record.symbol }, record, { upsert: true }),
		)
	}

	saveFiling(filing: Filing): Promise<boolean> {
		return this.upsert(`filing ${filing.accessionNumber}`, (c) =>
			c.filings.replaceOne({ accessionNumber: filing.accessionNumber }, filing, { upsert: true }),
		)
	}

	saveOptionsSnapshot(symbol: string, chain: OptionsChain): Promise<boolean> {
		const snapshot: OptionsSnapshot = { symbol, chain, savedAt: this.now().toISOString() }
		return this.upsert(`options snapshot for ${symbol}`, (c) =>
			c.snapshots.replaceOne({ symbol }, snapshot, { upsert: true }),
		)
	}

	async findCompositeRecord(symbol: string): Promise<CompositeRecord | null> {
		return this.db.records.findOne({ symbol }, { projection: { _id: 0 } })
	}

	async findFiling(accessionNumber: string): Promise<Filing | null> {
		return this.db.filings.findOne({ accessionNumber }, { projection: { _id: 0 } })
	}

	async findOptionsSnapshot(symbol: string): Promise<OptionsSnapshot | null> {
		return this.db.snapshots.findOne({ symbol }, { projection: { _id: 0 } })
	}
}
