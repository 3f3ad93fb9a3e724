import type { FilingsSource, MarketDataSource } from '../providers/types.js'
import type { Store } from '../store/types.js'
import type { CompositeRecord, Period } from '../types.js'
import { errorMessage } from './errors.js'
import { deriveImpliedVolatility } from './implied-volatility.js'
import type { Logger } from './logger.js'
import { validateTicker } from './validator.js'

export interface AggregatorOptions {
	market: MarketDataSource
	filings: FilingsSource
	logger: Logger
	/** Without a store nothing is persisted. */
	store?: Store
	recent8KCount?: number
	historicalPeriod?: Period
	now?: () => Date
}

export function emptyRecord(symbol: string, now: Date): CompositeRecord {
	return {
		symbol,
		basicInfo: null,
		impliedVolatility: null,
		secData: { recent10K: null, recent8K: [], keyFinancials: null },
		lastUpdated: now.toISOString(),
	}
}

/**
 * Builds a composite record from both sources, one step at a time. A failing step
 * leaves its field empty and the rest still run; `getCompositeRecord` never rejects.
 */
export class Aggregator {
	private readonly market: MarketDataSource
	private readonly filings: FilingsSource
	private readonly store: Store | undefined
	private readonly logger: Logger
	private readonly recent8KCount: number
	private readonly historicalPeriod: Period
	private readonly now: () => Date

	constructor(options: AggregatorOptions) {
		this.market = options.market
		this.filings = options.filings
		this.store = options.store
		this.logger = options.logger.child({ component: 'aggregator' })
		this.recent8KCount = options.recent8KCount ?? 5
		this.historicalPeriod = options.historicalPeriod ?? '1y'
		this.now = options.now ?? (() => new Date())
	}

	private async step<T>(name: string, symbol: string, run: () => Promise<T>): Promise<T | undefined> {
		try {
			return await run()
		} catch (err) {
			this.logger.error(`Error getting ${name} for ${symbol}: ${errorMessage(err)}`)
			return undefined
		}
	}

	async getCompositeRecord(ticker: string, options: { persist?: boolean } = {}): Promise<CompositeRecord> {
		let symbol: string
		try {
			symbol = validateTicker(ticker)
		} catch (err) {
			this.logger.error(errorMessage(err))
			return emptyRecord(ticker, this.now())
		}

		const persist = (options.persist ?? true) && this.store !== undefined
		const record = emptyRecord(symbol, this.now())
		this.logger.info(`Collecting composite data for ${symbol}`)

		record.basicInfo = (await this.step('basic info', symbol, () => this.market.getTickerInfo(symbol))) ?? null

		const history = await this.step('historical data', symbol, () =>
			this.market.getHistoricalSeries(symbol, { period: this.historicalPeriod }),
		)
		if (history) record.historicalData = history

		const chain = await this.step('options data', symbol, () => this.market.getOptionsChain(symbol))
		if (chain) {
			record.optionsData = chain
			if (persist) await this.step('options snapshot', symbol, () => this.save().saveOptionsSnapshot(symbol, chain))
			record.impliedVolatility =
				(await this.step('implied volatility', symbol, async () => deriveImpliedVolatility(chain, this.now()))) ??
				null
		}

		const tenK = await this.step('10-K filing', symbol, () => this.filings.getRecent10K(symbol))
		if (tenK) {
			record.secData.recent10K = tenK
			if (persist) await this.step('10-K filing save', symbol, () => this.save().saveFiling(tenK))
		}

		const eightKs = await this.step('8-K filings', symbol, () => this.filings.getRecent8K(symbol, this.recent8KCount))
		if (eightKs) {
			record.secData.recent8K = eightKs
			if (persist) {
				for (const filing of eightKs) {
					await this.step('8-K filing save', symbol, () => this.save().saveFiling(filing))
				}
			}
		}

		record.secData.keyFinancials =
			(await this.step('key financials', symbol, () => this.filings.getKeyFinancials(symbol))) ?? null

		record.lastUpdated = this.now().toISOString()

		if (!record.basicInfo) {
			this.logger.warn(`No basic info for ${symbol}; composite record not persisted`)
		} else if (persist) {
			const saved = await this.step('composite save', symbol, () => this.save().saveCompositeRecord(record))
			if (saved) this.logger.info(`Saved composite record for ${symbol}`)
		}

		return record
	}

	private save(): Store {
		if (!this.store) throw new Error('No store configured')
		return this.store
	}
}
