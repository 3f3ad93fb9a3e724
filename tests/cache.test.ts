import { mkdtempSync, readdirSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { z } from 'zod'
import { FileCacheStore, MemoryCacheStore } from '../src/core/cache-store.js'
import { Cache, DEFAULT_TTL_MS, makeKey } from '../src/core/cache.js'
import { CacheUnavailableError } from '../src/core/errors.js'
import { silentLogger } from '../src/core/logger.js'

const priceSchema = z.object({ price: z.number() })
const logger = silentLogger()

describe('makeKey', () => {
	it('sorts arguments and drops undefined ones', () => {
		expect(makeKey('yahoo', 'history', { symbol: 'AAPL', interval: '1d', period: undefined })).toBe(
			'yahoo:history:interval="1d"&symbol="AAPL"',
		)
		expect(makeKey('test', 'quote', { b: 2, a: 1 })).toBe(makeKey('test', 'quote', { a: 1, b: 2 }))
	})
})

describe('Cache', () => {
	let time: number
	let cache: Cache

	beforeEach(() => {
		time = 1_000_000
		cache = new Cache(() => new MemoryCacheStore(), logger, { now: () => time })
	})

	it('round-trips values', () => {
		expect(cache.set('k', { price: 100 }, 'PRICE')).toBe(true)
		expect(cache.get('k', 'PRICE', priceSchema)).toEqual({ price: 100 })
		expect(cache.get('missing', 'PRICE', priceSchema)).toBeUndefined()
	})

	it('expires lazily by category ttl', () => {
		cache.set('k', { price: 100 }, 'PRICE')
		time += DEFAULT_TTL_MS.PRICE
		expect(cache.get('k', 'PRICE', priceSchema)).toEqual({ price: 100 })
		time += 1
		expect(cache.get('k', 'PRICE', priceSchema)).toBeUndefined()
		// the same entry read under a longer ttl is still fresh
		expect(cache.get('k', 'HISTORICAL', priceSchema)).toEqual({ price: 100 })
	})

	it('uses the filing ttl of seven days', () => {
		cache.set('f', { price: 1 }, 'FILING')
		time += 6 * 86_400_000
		expect(cache.get('f', 'FILING', priceSchema)).toEqual({ price: 1 })
		time += 86_400_001
		expect(cache.get('f', 'FILING', priceSchema)).toBeUndefined()
	})

	it('treats a value of the wrong shape as a miss', () => {
		cache.set('k', { price: 'a lot' }, 'PRICE')
		expect(cache.get('k', 'PRICE', priceSchema)).toBeUndefined()
	})

	it('clears by substring or entirely', () => {
		cache.set('yahoo:info:symbol="AAPL"', { price: 1 }, 'PRICE')
		cache.set('yahoo:info:symbol="MSFT"', { price: 2 }, 'PRICE')
		cache.set('sec-edgar:cik:symbol="AAPL"', { price: 3 }, 'FILING')
		expect(cache.clear('AAPL')).toBe(2)
		expect(cache.get('yahoo:info:symbol="MSFT"', 'PRICE', priceSchema)).toEqual({ price: 2 })
		expect(cache.clear()).toBe(1)
		expect(cache.get('yahoo:info:symbol="MSFT"', 'PRICE', priceSchema)).toBeUndefined()
	})

	it('honors ttl overrides', () => {
		const short = new Cache(() => new MemoryCacheStore(), logger, { ttlMs: { PRICE: 10 }, now: () => time })
		short.set('k', { price: 1 }, 'PRICE')
		time += 11
		expect(short.get('k', 'PRICE', priceSchema)).toBeUndefined()
		expect(short.ttlFor('HISTORICAL')).toBe(86_400_000)
		expect(short.ttlFor('FILING')).toBe(604_800_000)
	})

	it('keeps the default ttl for categories a partial override leaves out', () => {
		const short = new Cache(() => new MemoryCacheStore(), logger, { ttlMs: { PRICE: 10 }, now: () => time })
		short.set('h', { price: 1 }, 'HISTORICAL')
		time += 2 * 3_600_000
		expect(short.get('h', 'HISTORICAL', priceSchema)).toEqual({ price: 1 })
	})
})

describe('disabled cache', () => {
	it('misses, refuses writes and clears nothing', () => {
		const cache = new Cache(
			() => {
				throw new CacheUnavailableError('no disk')
			},
			logger,
		)
		expect(cache.enabled).toBe(false)
		expect(cache.set('k', { price: 1 }, 'PRICE')).toBe(false)
		expect(cache.get('k', 'PRICE', priceSchema)).toBeUndefined()
		expect(cache.clear()).toBe(0)
	})

	it('is what Cache.disabled returns', () => {
		expect(Cache.disabled(logger).enabled).toBe(false)
	})
})

describe('FileCacheStore', () => {
	let dir: string

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'eqc-cache-'))
	})

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	it('persists entries across cache instances', () => {
		const first = new Cache(() => new FileCacheStore(dir), logger)
		first.set('yahoo:info:symbol="AAPL"', { price: 190 }, 'PRICE')

		const second = new Cache(() => new FileCacheStore(dir), logger)
		expect(second.get('yahoo:info:symbol="AAPL"', 'PRICE', priceSchema)).toEqual({ price: 190 })
		expect(new FileCacheStore(dir).keys()).toEqual(['yahoo:info:symbol="AAPL"'])
	})

	it('clears matching files and reports the count', () => {
		const cache = new Cache(() => new FileCacheStore(dir), logger)
		cache.set('a:AAPL', { price: 1 }, 'PRICE')
		cache.set('b:AAPL', { price: 2 }, 'PRICE')
		cache.set('c:MSFT', { price: 3 }, 'PRICE')
		expect(cache.clear('AAPL')).toBe(2)
		expect(cache.clear()).toBe(1)
	})

	it('fails to open on a path that is not a directory', () => {
		const file = join(dir, 'occupied')
		writeFileSync(file, 'x')
		expect(() => new FileCacheStore(file)).toThrow(CacheUnavailableError)
		expect(new Cache(() => new FileCacheStore(file), logger).enabled).toBe(false)
	})
	it('leaves files it did not write alone when clearing everything', () => {
		writeFileSync(join(dir, 'settings.json'), JSON.stringify({ cacheBackend: 'file' }))
		const cache = new Cache(() => new FileCacheStore(dir), logger)
		cache.set('a:AAPL', { price: 1 }, 'PRICE')
		expect(cache.clear()).toBe(1)
		expect(readdirSync(dir)).toEqual(['settings.json'])
	})

	it('skips unparseable files when clearing by pattern', () => {
		writeFileSync(join(dir, 'broken.cache.json'), '{not json')
		writeFileSync(join(dir, 'broken.json'), '{not json')
		const cache = new Cache(() => new FileCacheStore(dir), logger)
		cache.set('a:AAPL', { price: 1 }, 'PRICE')
		expect(cache.clear('AAPL')).toBe(1)
		expect(cache.get('a:AAPL', 'PRICE', priceSchema)).toBeUndefined()
		expect(new FileCacheStore(dir).keys()).toEqual([])
	})
})
