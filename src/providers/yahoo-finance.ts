import { z } from 'zod'
import { type Cache, makeKey } from '../core/cache.js'
import { errorMessage } from '../core/errors.js'
import { deriveImpliedVolatility } from '../core/implied-volatility.js'
import type { Logger } from '../core/logger.js'
import type { RateLimiter } from '../core/rate-limiter.js'
import {
	type RawBar,
	type RawExpiration,
	missingFields,
	toIsoDate,
	validateDate,
	validateDateRange,
	validateHistoricalSeries,
	validateOptionsChain,
	validateTicker,
} from '../core/validator.js'
import {
	type HistoricalSeries,
	type ImpliedVolatility,
	type OptionContract,
	type OptionsChain,
	type Period,
	type Schema,
	type TickerInfo,
	historicalSeriesSchema,
	impliedVolatilitySchema,
	optionsChainSchema,
	tickerInfoSchema,
} from '../types.js'
import type { YahooClient } from './yahoo-client.js'
import type { HistoricalQuery, MarketDataSource } from './types.js'

const SOURCE = 'yahoo'

// yahoo-finance2 hands back numbers, but occasionally null or a non-finite value
const num = z.unknown().transform((v) => (typeof v === 'number' && Number.isFinite(v) ? v : undefined))
const text = z.unknown().transform((v) => (typeof v === 'string' ? v : undefined))

const summarySchema = z.object({
	price: z
		.object({
			symbol: text,
			shortName: text,
			longName: text,
			regularMarketPrice: num,
			marketCap: num,
		})
		.optional(),
	summaryProfile: z.object({ sector: text, industry: text }).optional(),
	summaryDetail: z
		.object({
			trailingPE: num,
			dividendYield: num,
			beta: num,
			fiftyTwoWeekHigh: num,
			fiftyTwoWeekLow: num,
			averageVolume: num,
		})
		.optional(),
	defaultKeyStatistics: z.object({ beta: num }).optional(),
})

const nullableNumber = z.number().nullish()

const chartSchema = z.object({
	quotes: z
		.array(
			z.object({
				date: z.coerce.date(),
				open: nullableNumber,
				high: nullableNumber,
				low: nullableNumber,
				close: nullableNumber,
				volume: nullableNumber,
				adjclose: nullableNumber,
			}),
		)
		.default([]),
})

const contractSchema = z.object({
	contractSymbol: z.string(),
	strike: z.number(),
	expiration: z.coerce.date().optional(),
	lastPrice: num,
	bid: num,
	ask: num,
	change: num,
	percentChange: num,
	volume: num,
	openInterest: num,
	impliedVolatility: num,
	inTheMoney: z.boolean().optional(),
})
type YahooContract = z.infer<typeof contractSchema>

const optionsSchema = z.object({
	expirationDates: z.array(z.coerce.date()).default([]),
	options: z
		.array(
			z.object({
				expirationDate: z.coerce.date(),
				calls: z.array(contractSchema).default([]),
				puts: z.array(contractSchema).default([]),
			}),
		)
		.default([]),
})

export function periodStart(period: Period, now: Date): Date {
	const d = new Date(now.getTime())
	switch (period) {
		case '1d':
			d.setUTCDate(d.getUTCDate() - 1)
			return d
		case '5d':
			d.setUTCDate(d.getUTCDate() - 5)
			return d
		case '1mo':
		case '3mo':
		case '6mo':
			d.setUTCMonth(d.getUTCMonth() - Number.parseInt(period, 10))
			return d
		case '1y':
		case '2y':
		case '5y':
		case '10y':
			d.setUTCFullYear(d.getUTCFullYear() - Number.parseInt(period, 10))
			return d
		case 'ytd':
			return new Date(Date.UTC(now.getUTCFullYear(), 0, 1))
		case 'max':
			return new Date(0)
	}
}

function mapContract(c: YahooContract, type: 'call' | 'put', expiry: string): OptionContract {
	return {
		contractSymbol: c.contractSymbol,
		strike: c.strike,
		expiration: c.expiration ? toIsoDate(c.expiration) : expiry,
		type,
		lastPrice: c.lastPrice ?? 0,
		bid: c.bid ?? 0,
		ask: c.ask ?? 0,
		change: c.change ?? 0,
		percentChange: c.percentChange ?? 0,
		volume: c.volume ?? 0,
		openInterest: c.openInterest ?? 0,
		impliedVolatility: c.impliedVolatility ?? 0,
		inTheMoney: c.inTheMoney ?? false,
	}
}

export interface YahooFinanceSourceOptions {
	client: YahooClient
	cache: Cache
	limiter: RateLimiter
	logger: Logger
	now?: () => Date
}

export class YahooFinanceSource implements MarketDataSource {
	readonly name = SOURCE
	private readonly client: YahooClient
	private readonly cache: Cache
	private readonly limiter: RateLimiter
	private readonly logger: Logger
	private readonly now: () => Date

	constructor(options: YahooFinanceSourceOptions) {
		this.client = options.client
		this.cache = options.cache
		this.limiter = options.limiter
		this.logger = options.logger.child({ component: SOURCE })
		this.now = options.now ?? (() => new Date())
	}

	/** Rate-limited upstream call. Any failure is logged and comes back as null. */
	private async request<T>(
		what: string,
		symbol: string,
		schema: Schema<T>,
		call: () => Promise<unknown>,
	): Promise<T | null> {
		await this.limiter.acquire()
		this.logger.info(`Fetching ${what} for ${symbol}`)

		let raw: unknown
		try {
			raw = await call()
		} catch (err) {
			this.logger.warn(`Could not fetch ${what} for ${symbol}: ${errorMessage(err)}`)
			return null
		}

		const parsed = schema.safeParse(raw)
		if (!parsed.success) {
			this.logger.warn(`Malformed ${what} payload for ${symbol}`, {
				issues: parsed.error.issues.slice(0, 3).map((i) => `${i.path.join('.')}: ${i.message}`),
			})
			return null
		}
		return parsed.data
	}

	async getTickerInfo(ticker: string): Promise<TickerInfo | null> {
		const symbol = validateTicker(ticker)
		const key = makeKey(SOURCE, 'info', { symbol })

		const cached = this.cache.get(key, 'PRICE', tickerInfoSchema)
		if (cached) {
			this.logger.debug(`Using cached ticker info for ${symbol}`)
			return cached
		}

		const summary = await this.request('ticker info', symbol, summarySchema, () =>
			this.client.summary(symbol),
		)
		const price = summary?.price
		if (!summary || !price) {
			this.logger.warn(`Received empty or invalid info for ${symbol}`)
			return null
		}

		const detail = summary.summaryDetail
		const info: TickerInfo = {
			symbol,
			name: price.shortName ?? price.longName ?? '',
			sector: summary.summaryProfile?.sector ?? '',
			industry: summary.summaryProfile?.industry ?? '',
			price: price.regularMarketPrice ?? 0,
			marketCap: price.marketCap ?? 0,
			peRatio: detail?.trailingPE ?? 0,
			dividendYield: detail?.dividendYield ?? 0,
			beta: detail?.beta ?? summary.defaultKeyStatistics?.beta ?? 0,
			fiftyTwoWeekHigh: detail?.fiftyTwoWeekHigh ?? 0,
			fiftyTwoWeekLow: detail?.fiftyTwoWeekLow ?? 0,
			avgVolume: detail?.averageVolume ?? 0,
			lastUpdated: this.now().toISOString(),
		}

		this.cache.set(key, info, 'PRICE')
		return info
	}

	async getHistoricalSeries(ticker: string, query: HistoricalQuery = {}): Promise<HistoricalSeries | null> {
		const symbol = validateTicker(ticker)
		const interval = query.interval ?? '1d'
		const now = this.now()

		let span: { start?: string; end?: string; period?: Period }
		let period1: Date
		let period2: Date
		if (query.start !== undefined || query.end !== undefined) {
			const range = validateDateRange(query.start, query.end, now)
			if (range.swapped) this.logger.warn('Start date is after end date. Swapping dates.')
			span = { start: range.start, end: range.end }
			period1 = new Date(range.start)
			period2 = new Date(range.end)
		} else {
			const period = query.period ?? '1y'
			span = { period }
			period1 = periodStart(period, now)
			period2 = now
		}

		const key = makeKey(SOURCE, 'history', { symbol, interval, ...span })
		const cached = this.cache.get(key, 'HISTORICAL', historicalSeriesSchema)
		if (cached) {
			this.logger.debug(`Using cached historical data for ${symbol}`)
			return cached
		}

		const chart = await this.request('historical data', symbol, chartSchema, () =>
			this.client.chart(symbol, period1, period2, interval),
		)
		if (!chart) return null

		const raw: RawBar[] = chart.quotes.map((q) => ({
			date: toIsoDate(q.date),
			open: q.open,
			high: q.high,
			low: q.low,
			close: q.close,
			volume: q.volume,
			adjClose: q.adjclose,
		}))

		const bars = validateHistoricalSeries(raw)
		if (!bars) {
			const missing = raw.length > 0 ? missingFields(raw) : []
			this.logger.warn(
				missing.length > 0
					? `Missing required columns in historical data for ${symbol}: ${missing.join(', ')}`
					: `No historical data returned for ${symbol}`,
			)
			return null
		}

		const series: HistoricalSeries = {
			symbol,
			interval,
			...span,
			bars,
			lastUpdated: now.toISOString(),
		}
		this.cache.set(key, series, 'HISTORICAL')
		return series
	}

	async getOptionsChain(ticker: string, expiration?: string): Promise<OptionsChain | null> {
		const symbol = validateTicker(ticker)
		const expiry = expiration === undefined ? undefined : validateDate(expiration, 'expiration')

		const key = makeKey(SOURCE, 'options', { symbol, expiration: expiry })
		const cached = this.cache.get(key, 'PRICE', optionsChainSchema)
		if (cached) {
			this.logger.debug(`Using cached options data for ${symbol}`)
			return cached
		}

		// Without an expiration Yahoo answers with the nearest one only
		const result = await this.request('options data', symbol, optionsSchema, () =>
			this.client.options(symbol, expiry ? new Date(expiry) : undefined),
		)
		if (!result) return null

		if (expiry && !result.expirationDates.some((d) => toIsoDate(d) === expiry)) {
			this.logger.warn(`Expiration date ${expiry} not available for ${symbol}`)
			return null
		}

		const raw: Record<string, RawExpiration<OptionContract>> = {}
		for (const entry of result.options) {
			const date = toIsoDate(entry.expirationDate)
			raw[date] = {
				calls: entry.calls.map((c) => mapContract(c, 'call', date)),
				puts: entry.puts.map((p) => mapContract(p, 'put', date)),
			}
		}

		const expirations = validateOptionsChain(raw)
		if (!expirations) {
			this.logger.warn(`No valid options data found for ${symbol}`)
			return null
		}

		const chain: OptionsChain = { symbol, expirations, lastUpdated: this.now().toISOString() }
		this.cache.set(key, chain, 'PRICE')
		return chain
	}

	async getImpliedVolatility(ticker: string): Promise<ImpliedVolatility | null> {
		const symbol = validateTicker(ticker)
		const key = makeKey(SOURCE, 'iv', { symbol })

		const cached = this.cache.get(key, 'PRICE', impliedVolatilitySchema)
		if (cached) {
			this.logger.debug(`Using cached IV data for ${symbol}`)
			return cached
		}

		const chain = await this.getOptionsChain(symbol)
		if (!chain) {
			this.logger.warn(`No options data available to calculate IV for ${symbol}`)
			return null
		}

		const iv = deriveImpliedVolatility(chain, this.now())
		this.cache.set(key, iv, 'PRICE')
		return iv
	}
}
