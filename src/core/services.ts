import { SecEdgarSource } from '../providers/sec-edgar.js'
import { type YahooClient, createYahooClient } from '../providers/yahoo-client.js'
import { YahooFinanceSource } from '../providers/yahoo-finance.js'
import { MongoStore } from '../store/mongo-store.js'
import type { Store } from '../store/types.js'
import { Aggregator } from './aggregator.js'
import { FileCacheStore, MemoryCacheStore } from './cache-store.js'
import { Cache, type CacheCategory, DEFAULT_TTL_MS, cacheCategories } from './cache.js'
import { type AppConfig, DEFAULTS } from './config.js'
import { type Logger, createLogger } from './logger.js'
import { FixedIntervalRateLimiter, WindowedBackoffRateLimiter, systemClock, type Clock } from './rate-limiter.js'

export interface Services {
	logger: Logger
	cache: Cache
	market: YahooFinanceSource
	filings: SecEdgarSource
	store: Store | undefined
	aggregator: Aggregator
	close(): Promise<void>
}

export interface ServiceOptions {
	/** False turns the cache off for this run. */
	cache?: boolean
	verbose?: boolean
	logger?: Logger
	yahooClient?: YahooClient
	fetch?: typeof fetch
	clock?: Clock
	store?: Store
}

function ttlOverrides(config: AppConfig): Partial<Record<CacheCategory, number>> {
	const ttl: Partial<Record<CacheCategory, number>> = {}
	for (const category of cacheCategories) {
		const seconds = config.cacheTtlSeconds?.[category]
		if (seconds !== undefined) ttl[category] = seconds * 1000
	}
	return ttl
}

/**
 * Wires the pipeline from configuration. The store is opened here when a Mongo URI is
 * configured; call `close()` when done.
 */
export async function createServices(config: AppConfig, options: ServiceOptions = {}): Promise<Services> {
	const logger =
		options.logger ??
		createLogger({ level: options.verbose ? 'debug' : (config.logLevel ?? DEFAULTS.logLevel), filePath: config.logFile })
	const clock = options.clock ?? systemClock

	let cache: Cache
	if (options.cache === false) {
		cache = Cache.disabled(logger)
	} else {
		const backend = config.cacheBackend ?? DEFAULTS.cacheBackend
		const dir = config.cacheDir ?? DEFAULTS.cacheDir
		cache = new Cache(() => (backend === 'memory' ? new MemoryCacheStore() : new FileCacheStore(dir)), logger, {
			ttlMs: { ...DEFAULT_TTL_MS, ...ttlOverrides(config) },
			now: () => clock.now(),
		})
	}

	const market = new YahooFinanceSource({
		client: options.yahooClient ?? createYahooClient(),
		cache,
		limiter: new WindowedBackoffRateLimiter('yahoo', {}, clock, logger),
		logger,
	})

	const filings = new SecEdgarSource({
		cache,
		limiter: new FixedIntervalRateLimiter(
			'sec-edgar',
			{ requestsPerSecond: config.secRequestsPerSecond ?? DEFAULTS.secRequestsPerSecond },
			clock,
			logger,
		),
		logger,
		userAgent: config.edgarUserAgent,
		timeoutMs: config.requestTimeoutMs ?? DEFAULTS.requestTimeoutMs,
		fetch: options.fetch,
	})

	let store = options.store
	if (!store && config.mongoUri) {
		store = new MongoStore({
			uri: config.mongoUri,
			dbName: config.mongoDbName ?? DEFAULTS.mongoDbName,
			logger,
		})
	}
	if (store) await store.open()

	const aggregator = new Aggregator({ market, filings, store, logger })

	return {
		logger,
		cache,
		market,
		filings,
		store,
		aggregator,
		close: async () => {
			await store?.close()
		},
	}
}
