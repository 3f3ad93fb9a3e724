import type { CompositeRecord, Filing, OptionsChain } from '../types.js'

export interface OptionsSnapshot {
	symbol: string
	chain: OptionsChain
	savedAt: string
}

/**
 * Persistence for assembled records. Every save is an upsert on the record's natural
 * key (symbol for composites and option snapshots, accession number for filings) and
 * resolves to whether a document was matched or inserted. Saves never reject.
 */
export interface Store {
	open(): Promise<void>
	close(): Promise<void>
	saveCompositeRecord(record: CompositeRecord): Promise<boolean>
	saveFiling(filing: Filing): Promise<boolean>
	saveOptionsSnapshot(symbol: string, chain: OptionsChain): Promise<boolean>
	findCompositeRecord(symbol: string): Promise<CompositeRecord | null>
	findFiling(accessionNumber: string): Promise<Filing | null>
	findOptionsSnapshot(symbol: string): Promise<OptionsSnapshot | null>
}
