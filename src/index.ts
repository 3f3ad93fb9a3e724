export type {
	OutputFormat,
	GlobalOptions,
	Period,
	Interval,
	TickerInfo,
	HistoricalBar,
	HistoricalSeries,
	OptionContract,
	OptionsChain,
	ImpliedVolatility,
	ExpirationIv,
	Filing,
	FinancialPoint,
	KeyFinancials,
	CompanyFacts,
	SecData,
	CompositeRecord,
} from './types.js'

export type { FilingsSource, HistoricalQuery, MarketDataSource } from './providers/types.js'
export type { Store, OptionsSnapshot } from './store/types.js'

export { Aggregator, emptyRecord } from './core/aggregator.js'
export { Cache, makeKey, DEFAULT_TTL_MS, type CacheCategory } from './core/cache.js'
export { FileCacheStore, MemoryCacheStore, type CacheStore } from './core/cache-store.js'
export {
	FixedIntervalRateLimiter,
	WindowedBackoffRateLimiter,
	systemClock,
	type Clock,
	type RateLimiter,
} from './core/rate-limiter.js'
export { deriveImpliedVolatility, expirationIv } from './core/implied-volatility.js'
export * from './core/errors.js'
export * as validator from './core/validator.js'
export { createLogger, type Logger } from './core/logger.js'
export { loadConfig, saveConfig, getConfigPath, type AppConfig } from './core/config.js'
export { createServices, type Services } from './core/services.js'
export { YahooFinanceSource } from './providers/yahoo-finance.js'
export { createYahooClient, type YahooClient } from './providers/yahoo-client.js'
export { SecEdgarSource } from './providers/sec-edgar.js'
export { extractKeyFinancials } from './providers/key-financials.js'
export { MemoryStore } from './store/memory-store.js'
export { MongoStore } from './store/mongo-store.js'
