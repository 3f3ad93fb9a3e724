import type { Schema } from '../types.js'
import type { CacheStore } from './cache-store.js'
import { errorMessage } from './errors.js'
import type { Logger } from './logger.js'

export const cacheCategories = ['PRICE', 'HISTORICAL', 'FILING'] as const
export type CacheCategory = (typeof cacheCategories)[number]

export const DEFAULT_TTL_MS: Record<CacheCategory, number> = {
	PRICE: 3_600_000, // 1h
	HISTORICAL: 86_400_000, // 24h
	FILING: 604_800_000, // 7d
}

export interface CacheOptions {
	ttlMs?: Partial<Record<CacheCategory, number>>
	/** Used for any category the TTL map leaves out. */
	defaultTtlMs?: number
	now?: () => number
}

export function makeKey(source: string, action: string, args: Record<string, unknown>): string {
	const sorted = Object.keys(args)
		.filter((k) => args[k] !== undefined)
		.sort()
		.map((k) => `${k}=${JSON.stringify(args[k])}`)
		.join('&')
	return `${source}:${action}:${sorted}`
}

/**
 * Expiry is decided at read time against the category's TTL; stale entries stay in
 * the backing store until read or cleared. A store that fails to open leaves the
 * cache disabled: every get misses and every set reports false.
 */
export class Cache {
	private readonly store: CacheStore | null
	private readonly ttlMs: Partial<Record<CacheCategory, number>>
	private readonly defaultTtlMs: number
	private readonly now: () => number

	constructor(
		openStore: () => CacheStore,
		private readonly logger: Logger,
		options: CacheOptions = {},
	) {
		this.ttlMs = { ...DEFAULT_TTL_MS, ...options.ttlMs }
		this.defaultTtlMs = options.defaultTtlMs ?? 3_600_000
		this.now = options.now ?? Date.now

		let store: CacheStore | null = null
		try {
			store = openStore()
			logger.debug('Cache initialized')
		} catch (err) {
			logger.error(`Cache disabled: ${errorMessage(err)}`)
		}
		this.store = store
	}

	static disabled(logger: Logger): Cache {
		return new Cache(
			() => {
				throw new Error('caching turned off')
			},
			logger,
		)
	}

	get enabled(): boolean {
		return this.store !== null
	}

	ttlFor(category: CacheCategory): number {
		return this.ttlMs[category] ?? this.defaultTtlMs
	}

	get<T>(key: string, category: CacheCategory, schema: Schema<T>): T | undefined {
		if (!this.store) return undefined
		try {
			const entry = this.store.read(key)
			if (!entry) return undefined
			if (this.now() - entry.storedAt > this.ttlFor(category)) {
				this.logger.debug(`Cache expired for ${key}`)
				return undefined
			}
			const parsed = schema.safeParse(entry.value)
			if (!parsed.success) {
				this.logger.warn(`Cache entry for ${key} no longer matches its shape`)
				return undefined
			}
			this.logger.debug(`Cache hit for ${key}`)
			return parsed.data
		} catch (err) {
			this.logger.error(`Error reading cache entry ${key}: ${errorMessage(err)}`)
			return undefined
		}
	}

	set(key: string, value: unknown, category: CacheCategory): boolean {
		if (!this.store) return false
		try {
			this.store.write(key, { value, storedAt: this.now() })
			this.logger.debug(`Cache set for ${key}`, { category })
			return true
		} catch (err) {
			this.logger.error(`Error writing cache entry ${key}: ${errorMessage(err)}`)
			return false
		}
	}

	/** Substring match on the literal key; no pattern wipes everything. */
	clear(pattern?: string): number {
		if (!this.store) return 0
		try {
			if (!pattern) {
				const count = this.store.clear()
				this.logger.info(`Cleared entire cache (${count} entries)`)
				return count
			}
			let count = 0
			for (const key of this.store.keys()) {
				if (key.includes(pattern) && this.store.delete(key)) count++
			}
			this.logger.info(`Cleared ${count} cache entries matching '${pattern}'`)
			return count
		} catch (err) {
			this.logger.error(`Error clearing cache: ${errorMessage(err)}`)
			return 0
		}
	}
}
