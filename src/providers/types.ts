import type {
	CompanyFacts,
	Filing,
	HistoricalSeries,
	ImpliedVolatility,
	Interval,
	KeyFinancials,
	OptionsChain,
	Period,
	TickerInfo,
} from '../types.js'

export interface HistoricalQuery {
	start?: string | Date
	end?: string | Date
	/** Ignored when either bound is given. */
	period?: Period
	interval?: Interval
}

/**
 * Every method validates its input (throwing InvalidInputError), answers from cache
 * when it can, and otherwise goes through the source's rate limiter. Upstream failures
 * come back as null or an empty list.
 */
export interface MarketDataSource {
	readonly name: string
	getTickerInfo(ticker: string): Promise<TickerInfo | null>
	getHistoricalSeries(ticker: string, query?: HistoricalQuery): Promise<HistoricalSeries | null>
	getOptionsChain(ticker: string, expiration?: string): Promise<OptionsChain | null>
	getImpliedVolatility(ticker: string): Promise<ImpliedVolatility | null>
}

export interface FilingsSource {
	readonly name: string
	getCik(ticker: string): Promise<string | null>
	getFilingsMetadata(ticker: string, formType: string, count?: number): Promise<Filing[]>
	getRecent10K(ticker: string): Promise<Filing | null>
	getRecent8K(ticker: string, count?: number): Promise<Filing[]>
	getCompanyFacts(ticker: string): Promise<CompanyFacts | null>
	getKeyFinancials(ticker: string): Promise<KeyFinancials | null>
}
