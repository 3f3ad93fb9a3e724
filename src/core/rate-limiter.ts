import { setTimeout as delay } from 'node:timers/promises'
import PQueue from 'p-queue'
import type { Logger } from './logger.js'

export interface Clock {
	now(): number
	sleep(ms: number): Promise<void>
}

export const systemClock: Clock = {
	now: () => Date.now(),
	sleep: async (ms) => {
		if (ms > 0) await delay(ms)
	},
}

export interface RateLimiterState {
	requestCount: number
	windowStart: number
	lastRequestTime: number
}

export interface RateLimiter {
	readonly source: string
	/** Resolves once the caller may issue its request. Never rejects. */
	acquire(): Promise<void>
	snapshot(): RateLimiterState
}

/**
 * Shared plumbing: a single-slot queue around `throttle()` so the counters are read
 * and written by one acquirer at a time, however many callers are waiting.
 */
abstract class QueuedRateLimiter implements RateLimiter {
	private readonly queue = new PQueue({ concurrency: 1 })
	protected state: RateLimiterState

	constructor(
		readonly source: string,
		protected readonly clock: Clock,
		protected readonly logger?: Logger,
	) {
		this.state = { requestCount: 0, windowStart: clock.now(), lastRequestTime: 0 }
	}

	async acquire(): Promise<void> {
		await this.queue.add(() => this.throttle())
	}

	snapshot(): RateLimiterState {
		return { ...this.state }
	}

	protected abstract throttle(): Promise<void>
}

export interface FixedIntervalOptions {
	requestsPerSecond: number
	safetyMarginMs?: number
}

/** No two requests closer together than `1 / requestsPerSecond` plus the margin. */
export class FixedIntervalRateLimiter extends QueuedRateLimiter {
	readonly minIntervalMs: number
	readonly safetyMarginMs: number

	constructor(source: string, options: FixedIntervalOptions, clock: Clock = systemClock, logger?: Logger) {
		super(source, clock, logger)
		if (!(options.requestsPerSecond > 0)) {
			throw new RangeError(`requestsPerSecond must be positive, got ${options.requestsPerSecond}`)
		}
		this.minIntervalMs = 1000 / options.requestsPerSecond
		this.safetyMarginMs = options.safetyMarginMs ?? 100
	}

	protected async throttle(): Promise<void> {
		const elapsed = this.clock.now() - this.state.lastRequestTime
		const wait = Math.max(0, this.minIntervalMs - elapsed)
		await this.clock.sleep(wait + this.safetyMarginMs)
		this.state.requestCount++
		this.state.lastRequestTime = this.clock.now()
	}
}

export interface WindowedBackoffOptions {
	windowMs?: number
	minSpacingMs?: number
	backoffThreshold?: number
	backoffStep?: number
	maxDelayMs?: number
}

/**
 * Counts requests in a rolling window (1h by default) and always keeps a minimum
 * spacing between calls. Past the threshold every call also waits
 * `min(maxDelay, 2^floor(count / step))` seconds.
 */
export class WindowedBackoffRateLimiter extends QueuedRateLimiter {
	private readonly windowMs: number
	private readonly minSpacingMs: number
	private readonly backoffThreshold: number
	private readonly backoffStep: number
	private readonly maxDelayMs: number

	constructor(source: string, options: WindowedBackoffOptions = {}, clock: Clock = systemClock, logger?: Logger) {
		super(source, clock, logger)
		this.windowMs = options.windowMs ?? 3_600_000
		this.minSpacingMs = options.minSpacingMs ?? 1000
		this.backoffThreshold = options.backoffThreshold ?? 5
		this.backoffStep = options.backoffStep ?? 5
		this.maxDelayMs = options.maxDelayMs ?? 30_000
	}

	/** Backoff a call would wait at the given count, before the count is bumped. */
	backoffDelayMs(requestCount: number): number {
		if (requestCount <= this.backoffThreshold) return 0
		return Math.min(this.maxDelayMs, 2 ** Math.floor(requestCount / this.backoffStep) * 1000)
	}

	protected async throttle(): Promise<void> {
		const now = this.clock.now()
		if (now - this.state.windowStart >= this.windowMs) {
			this.state.requestCount = 0
			this.state.windowStart = now
		}

		const elapsed = now - this.state.lastRequestTime
		if (elapsed < this.minSpacingMs) {
			await this.clock.sleep(this.minSpacingMs - elapsed)
		}

		const backoff = this.backoffDelayMs(this.state.requestCount)
		if (backoff > 0) {
			this.logger?.info(`Rate limiting: waiting ${backoff / 1000}s before next request`, {
				source: this.source,
				requestCount: this.state.requestCount,
			})
			await this.clock.sleep(backoff)
		}

		this.state.requestCount++
		this.state.lastRequestTime = this.clock.now()
	}
}
