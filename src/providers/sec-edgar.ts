import { z } from 'zod'
import { type Cache, makeKey } from '../core/cache.js'
import { DEFAULTS } from '../core/config.js'
import { InvalidInputError, UpstreamUnavailableError, errorMessage } from '../core/errors.js'
import type { Logger } from '../core/logger.js'
import type { RateLimiter } from '../core/rate-limiter.js'
import { validateFiling, validateTicker } from '../core/validator.js'
import {
	type CompanyFacts,
	type Filing,
	type KeyFinancials,
	type Schema,
	companyFactsSchema,
	filingSchema,
} from '../types.js'
import { extractKeyFinancials } from './key-financials.js'
import type { FilingsSource } from './types.js'

const SOURCE = 'sec-edgar'
const TICKERS_URL = 'https://www.sec.gov/files/company_tickers.json'
const DATA_BASE = 'https://data.sec.gov'
export const DEFAULT_USER_AGENT = DEFAULTS.edgarUserAgent

const tickerDirectorySchema = z.record(
	z.object({
		cik_str: z.number(),
		ticker: z.string(),
		title: z.string().optional(),
	}),
)

const column = z.array(z.string()).default([])

const submissionsSchema = z.object({
	filings: z
		.object({
			recent: z
				.object({
					accessionNumber: column,
					filingDate: column,
					form: column,
					primaryDocument: column,
				})
				.optional(),
		})
		.optional(),
})

const cikSchema = z.string()
const filingListSchema = z.array(filingSchema)

export function padCik(cik: number | string): string {
	return String(cik).padStart(10, '0')
}

export interface SecEdgarSourceOptions {
	cache: Cache
	limiter: RateLimiter
	logger: Logger
	userAgent?: string
	timeoutMs?: number
	fetch?: typeof fetch
}

export class SecEdgarSource implements FilingsSource {
	readonly name = SOURCE
	private readonly cache: Cache
	private readonly limiter: RateLimiter
	private readonly logger: Logger
	private readonly userAgent: string
	private readonly timeoutMs: number
	private readonly fetchFn: typeof fetch
	private userAgentWarned = false

	constructor(options: SecEdgarSourceOptions) {
		this.cache = options.cache
		this.limiter = options.limiter
		this.logger = options.logger.child({ component: SOURCE })
		this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
		this.timeoutMs = options.timeoutMs ?? 15_000
		this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
	}

	private headers(): Record<string, string> {
		if (this.userAgent === DEFAULT_USER_AGENT && !this.userAgentWarned) {
			this.userAgentWarned = true
			this.logger.warn(
				'Using default User-Agent. Set EDGAR_USER_AGENT or run: eqc config set edgarUserAgent "YourApp/1.0 (you@example.com)"',
			)
		}
		return { 'User-Agent': this.userAgent, Accept: 'application/json' }
	}

	/**
	 * Rate-limited GET. 404 and every other failure come back as null after logging;
	 * nothing is retried.
	 */
	private async getJson<T>(url: string, what: string, schema: Schema<T>): Promise<T | null> {
		await this.limiter.acquire()
		this.logger.info(`Fetching ${what}`, { url })

		try {
			const res = await this.fetchFn(url, {
				headers: this.headers(),
				signal: AbortSignal.timeout(this.timeoutMs),
			})
			if (res.status === 404) {
				this.logger.warn(`No ${what} found (404)`, { url })
				return null
			}
			if (!res.ok) {
				throw new UpstreamUnavailableError(SOURCE, `${res.status} ${res.statusText}`, res.status)
			}
			const parsed = schema.safeParse(await res.json())
			if (!parsed.success) {
				throw new UpstreamUnavailableError(SOURCE, `malformed ${what} payload`)
			}
			return parsed.data
		} catch (err) {
			this.logger.error(`Failed to get ${what}: ${errorMessage(err)}`, { url })
			return null
		}
	}

	async getCik(ticker: string): Promise<string | null> {
		const symbol = validateTicker(ticker)
		const key = makeKey(SOURCE, 'cik', { symbol })

		const cached = this.cache.get(key, 'FILING', cikSchema)
		if (cached) {
			this.logger.debug(`Using cached CIK for ${symbol}`)
			return cached
		}

		const directory = await this.getJson(TICKERS_URL, 'company tickers', tickerDirectorySchema)
		if (!directory) return null

		const match = Object.values(directory).find((c) => c.ticker.toUpperCase() === symbol)
		if (!match) {
			this.logger.warn(`No CIK found for ticker ${symbol}`)
			return null
		}

		const cik = padCik(match.cik_str)
		this.logger.info(`Found CIK for ${symbol}: ${cik}`)
		this.cache.set(key, cik, 'FILING')
		return cik
	}

	async getFilingsMetadata(ticker: string, formType: string, count = 10): Promise<Filing[]> {
		const symbol = validateTicker(ticker)
		const form = formType.trim().toUpperCase()
		if (!form) throw new InvalidInputError('Form type must be a non-empty string')
		if (!Number.isInteger(count) || count < 1) {
			throw new InvalidInputError(`Filing count must be a positive integer, got ${count}`)
		}

		const cik = await this.getCik(symbol)
		if (!cik) {
			this.logger.warn(`Unable to get filings: no CIK for ${symbol}`)
			return []
		}

		const key = makeKey(SOURCE, 'filings', { symbol, formType: form, count })
		const cached = this.cache.get(key, 'FILING', filingListSchema)
		if (cached) {
			this.logger.debug(`Using cached filings metadata for ${symbol}`)
			return cached
		}

		const body = await this.getJson(
			`${DATA_BASE}/submissions/CIK${cik}.json`,
			`${form} filings for ${symbol}`,
			submissionsSchema,
		)
		const recent = body?.filings?.recent
		if (!recent) {
			if (body) this.logger.warn(`No recent filings found for ${symbol}`)
			return []
		}

		const filings: Filing[] = []
		const rows = Math.min(recent.form.length, recent.accessionNumber.length, recent.filingDate.length)
		for (let i = 0; i < rows && filings.length < count; i++) {
			if (recent.form[i] !== form) continue
			const valid = validateFiling({
				form: recent.form[i],
				accessionNumber: recent.accessionNumber[i],
				filingDate: recent.filingDate[i],
				primaryDocument: recent.primaryDocument[i],
			})
			if (!valid) {
				this.logger.warn(`Skipping incomplete ${form} filing for ${symbol}`, {
					accessionNumber: recent.accessionNumber[i],
				})
				continue
			}
			filings.push({
				ticker: symbol,
				cik,
				formType: valid.form,
				accessionNumber: valid.accessionNumber,
				filingDate: valid.filingDate,
				primaryDocument: valid.primaryDocument,
			})
		}

		this.cache.set(key, filings, 'FILING')
		if (filings.length === 0) this.logger.warn(`No ${form} filings found for ${symbol}`)
		else this.logger.info(`Found ${filings.length} ${form} filings for ${symbol}`)
		return filings
	}

	async getRecent10K(ticker: string): Promise<Filing | null> {
		const [latest] = await this.getFilingsMetadata(ticker, '10-K', 1)
		return latest ?? null
	}

	async getRecent8K(ticker: string, count = 5): Promise<Filing[]> {
		return this.getFilingsMetadata(ticker, '8-K', count)
	}

	async getCompanyFacts(ticker: string): Promise<CompanyFacts | null> {
		const symbol = validateTicker(ticker)
		const cik = await this.getCik(symbol)
		if (!cik) {
			this.logger.warn(`Unable to get company facts: no CIK for ${symbol}`)
			return null
		}

		const key = makeKey(SOURCE, 'facts', { symbol })
		const cached = this.cache.get(key, 'FILING', companyFactsSchema)
		if (cached) {
			this.logger.debug(`Using cached company facts for ${symbol}`)
			return cached
		}

		const facts = await this.getJson(
			`${DATA_BASE}/api/xbrl/companyfacts/CIK${cik}.json`,
			`company facts for ${symbol}`,
			companyFactsSchema,
		)
		if (!facts) return null

		this.cache.set(key, facts, 'FILING')
		return facts
	}

	async getKeyFinancials(ticker: string): Promise<KeyFinancials | null> {
		const symbol = validateTicker(ticker)
		const facts = await this.getCompanyFacts(symbol)
		if (!facts) {
			this.logger.warn(`No company facts available for ${symbol}`)
			return null
		}
		return extractKeyFinancials(symbol, facts)
	}
}
