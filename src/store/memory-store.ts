import type { CompositeRecord, Filing, OptionsChain } from '../types.js'
import type { OptionsSnapshot, Store } from './types.js'

/** Process-local store. Values are cloned on the way in and out. */
export class MemoryStore implements Store {
	private readonly records = new Map<string, CompositeRecord>()
	private readonly filings = new Map<string, Filing>()
	private readonly snapshots = new Map<string, OptionsSnapshot>()

	constructor(private readonly now: () => Date = () => new Date()) {}

	async open(): Promise<void> {}

	async close(): Promise<void> {}

	async saveCompositeRecord(record: CompositeRecord): Promise<boolean> {
		this.records.set(record.symbol, structuredClone(record))
		return true
	}

	async saveFiling(filing: Filing): Promise<boolean> {
		this.filings.set(filing.accessionNumber, structuredClone(filing))
		return true
	}

	async saveOptionsSnapshot(symbol: string, chain: OptionsChain): Promise<boolean> {
		this.snapshots.set(symbol, { symbol, chain: structuredClone(chain), savedAt: this.now().toISOString() })
		return true
	}

	async findCompositeRecord(symbol: string): Promise<CompositeRecord | null> {
		const record = this.records.get(symbol)
		return record ? structuredClone(record) : null
	}

	async findFiling(accessionNumber: string): Promise<Filing | null> {
		const filing = this.filings.get(accessionNumber)
		return filing ? structuredClone(filing) : null
	}

	async findOptionsSnapshot(symbol: string): Promise<OptionsSnapshot | null> {
		const snapshot = this.snapshots.get(symbol)
		return snapshot ? structuredClone(snapshot) : null
	}

	get size(): { records: number; filings: number; snapshots: number } {
		return { records: this.records.size, filings: this.filings.size, snapshots: this.snapshots.size }
	}
}
