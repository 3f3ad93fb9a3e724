import type { Clock, RateLimiter, RateLimiterState } from '../src/core/rate-limiter.js'
import type { OptionContract, OptionsChain, TickerInfo } from '../src/types.js'

/** Virtual time: `sleep` returns at once and moves the clock forward. */
export class ManualClock implements Clock {
	readonly sleeps: number[] = []

	constructor(public time = 0) {}

	now(): number {
		return this.time
	}

	async sleep(ms: number): Promise<void> {
		this.sleeps.push(ms)
		this.time += ms
	}
}

export class CountingLimiter implements RateLimiter {
	readonly source = 'test'
	calls = 0

	async acquire(): Promise<void> {
		this.calls++
	}

	snapshot(): RateLimiterState {
		return { requestCount: this.calls, windowStart: 0, lastRequestTime: 0 }
	}
}

export function contract(
	type: 'call' | 'put',
	impliedVolatility: number,
	overrides: Partial<OptionContract> = {},
): OptionContract {
	return {
		contractSymbol: `TEST${type === 'call' ? 'C' : 'P'}${impliedVolatility}`,
		strike: 100,
		expiration: '2024-06-21',
		type,
		lastPrice: 1,
		bid: 0.9,
		ask: 1.1,
		change: 0,
		percentChange: 0,
		volume: 10,
		openInterest: 100,
		impliedVolatility,
		inTheMoney: false,
		...overrides,
	}
}

export function chainOf(symbol: string, expirations: OptionsChain['expirations']): OptionsChain {
	return { symbol, expirations, lastUpdated: '2024-05-06T00:00:00.000Z' }
}

export const appleInfo: TickerInfo = {
	symbol: 'AAPL',
	name: 'Apple Inc.',
	sector: 'Technology',
	industry: 'Consumer Electronics',
	price: 190.5,
	marketCap: 3e12,
	peRatio: 29.1,
	dividendYield: 0.005,
	beta: 1.2,
	fiftyTwoWeekHigh: 199.6,
	fiftyTwoWeekLow: 164.1,
	avgVolume: 55_000_000,
	lastUpdated: '2024-05-06T00:00:00.000Z',
}
