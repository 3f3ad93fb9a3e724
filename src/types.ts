import { z } from 'zod'

export type OutputFormat = 'markdown' | 'json' | 'plain'

export interface GlobalOptions {
	format: OutputFormat
	verbose: boolean
	cache: boolean
}

/** A zod schema whose parsed output is `T`, whatever its input looks like. */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

export const periods = ['1d', '5d', '1mo', '3mo', '6mo', '1y', '2y', '5y', '10y', 'ytd', 'max'] as const
export type Period = (typeof periods)[number]

export const intervals = ['1d', '5d', '1wk', '1mo', '3mo'] as const
export type Interval = (typeof intervals)[number]

export const tickerInfoSchema = z.object({
	symbol: z.string(),
	name: z.string(),
	sector: z.string(),
	industry: z.string(),
	price: z.number(),
	marketCap: z.number(),
	peRatio: z.number(),
	dividendYield: z.number(),
	beta: z.number(),
	fiftyTwoWeekHigh: z.number(),
	fiftyTwoWeekLow: z.number(),
	avgVolume: z.number(),
	lastUpdated: z.string(),
})
export type TickerInfo = z.infer<typeof tickerInfoSchema>

export const historicalBarSchema = z.object({
	date: z.string(),
	open: z.number(),
	high: z.number(),
	low: z.number(),
	close: z.number(),
	volume: z.number(),
	adjClose: z.number().optional(),
})
export type HistoricalBar = z.infer<typeof historicalBarSchema>

export const historicalSeriesSchema = z.object({
	symbol: z.string(),
	interval: z.enum(intervals),
	start: z.string().optional(),
	end: z.string().optional(),
	period: z.enum(periods).optional(),
	bars: z.array(historicalBarSchema),
	lastUpdated: z.string(),
})
export type HistoricalSeries = z.infer<typeof historicalSeriesSchema>

export const optionContractSchema = z.object({
	contractSymbol: z.string(),
	strike: z.number(),
	expiration: z.string(),
	type: z.enum(['call', 'put']),
	lastPrice: z.number(),
	bid: z.number(),
	ask: z.number(),
	change: z.number(),
	percentChange: z.number(),
	volume: z.number(),
	openInterest: z.number(),
	impliedVolatility: z.number(),
	inTheMoney: z.boolean(),
})
export type OptionContract = z.infer<typeof optionContractSchema>

export const optionsExpirationSchema = z.object({
	calls: z.array(optionContractSchema),
	puts: z.array(optionContractSchema),
})
export type OptionsExpiration = z.infer<typeof optionsExpirationSchema>

export const optionsChainSchema = z.object({
	symbol: z.string(),
	expirations: z.record(optionsExpirationSchema),
	lastUpdated: z.string(),
})
export type OptionsChain = z.infer<typeof optionsChainSchema>

export const expirationIvSchema = z.object({
	callsIv: z.number().nullable(),
	putsIv: z.number().nullable(),
	averageIv: z.number().nullable(),
})
export type ExpirationIv = z.infer<typeof expirationIvSchema>

export const impliedVolatilitySchema = z.object({
	symbol: z.string(),
	averageIv: z.number(),
	expirations: z.record(expirationIvSchema),
	lastUpdated: z.string(),
})
export type ImpliedVolatility = z.infer<typeof impliedVolatilitySchema>

export const filingSchema = z.object({
	ticker: z.string(),
	cik: z.string(),
	formType: z.string(),
	accessionNumber: z.string(),
	filingDate: z.string(),
	primaryDocument: z.string(),
})
export type Filing = z.infer<typeof filingSchema>

export const financialPointSchema = z.object({
	value: z.number(),
	endDate: z.string(),
	filingDate: z.string(),
})
export type FinancialPoint = z.infer<typeof financialPointSchema>

export const keyFinancialsSchema = z.object({
	ticker: z.string(),
	revenue: z.array(financialPointSchema),
	netIncome: z.array(financialPointSchema),
	eps: z.array(financialPointSchema),
})
export type KeyFinancials = z.infer<typeof keyFinancialsSchema>

// XBRL company facts, reduced to what key-financials extraction reads
export const factEntrySchema = z.object({
	val: z.number().optional(),
	end: z.string().optional(),
	filed: z.string().optional(),
	form: z.string().optional(),
})
export type FactEntry = z.infer<typeof factEntrySchema>

export const companyFactsSchema = z.object({
	cik: z.union([z.number(), z.string()]).optional(),
	entityName: z.string().optional(),
	facts: z
		.record(z.record(z.object({ units: z.record(z.array(factEntrySchema)) })))
		.optional(),
})
export type CompanyFacts = z.infer<typeof companyFactsSchema>

export interface SecData {
	recent10K: Filing | null
	recent8K: Filing[]
	keyFinancials: KeyFinancials | null
}

export interface CompositeRecord {
	symbol: string
	basicInfo: TickerInfo | null
	impliedVolatility: ImpliedVolatility | null
	historicalData?: HistoricalSeries
	optionsData?: OptionsChain
	secData: SecData
	lastUpdated: string
}
