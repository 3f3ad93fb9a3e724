import { z } from 'zod'
import type { HistoricalBar } from '../types.js'
import { InvalidInputError } from './errors.js'

export const DEFAULT_START_DATE = '2000-01-01'

export function validateTicker(value: unknown): string {
	if (typeof value !== 'string' || value.trim() === '') {
		throw new InvalidInputError('Ticker must be a non-empty string')
	}
	return value.trim().toUpperCase()
}

export interface DateRange {
	start: string
	end: string
	/** True when the caller passed the bounds in reverse order. */
	swapped: boolean
}

function parseDate(value: string | Date, label: string): Date {
	const date = value instanceof Date ? value : new Date(value)
	if (Number.isNaN(date.getTime())) {
		throw new InvalidInputError(`Invalid ${label} date: ${String(value)}`)
	}
	return date
}

export function toIsoDate(date: Date): string {
	return date.toISOString().slice(0, 10)
}

export function validateDate(value: string | Date, label = 'given'): string {
	return toIsoDate(parseDate(value, label))
}

export function validateDateRange(
	start?: string | Date,
	end?: string | Date,
	now: Date = new Date(),
): DateRange {
	const from = parseDate(start ?? DEFAULT_START_DATE, 'start')
	const to = end === undefined ? now : parseDate(end, 'end')
	if (from.getTime() > to.getTime()) {
		return { start: toIsoDate(to), end: toIsoDate(from), swapped: true }
	}
	return { start: toIsoDate(from), end: toIsoDate(to), swapped: false }
}

// --- Historical series ---

export interface RawBar {
	date: string
	open?: number | null
	high?: number | null
	low?: number | null
	close?: number | null
	volume?: number | null
	adjClose?: number | null
}

const REQUIRED_FIELDS = ['open', 'high', 'low', 'close', 'volume'] as const

function finite(v: number | null | undefined): number | undefined {
	return typeof v === 'number' && Number.isFinite(v) ? v : undefined
}

export function missingFields(bars: readonly RawBar[]): string[] {
	return REQUIRED_FIELDS.filter((field) => bars.every((bar) => bar[field] === undefined))
}

/**
 * Returns null for an empty series or one lacking a whole OHLCV column. Gaps inside a
 * column are repaired: close is forward-filled, open falls back to close, high/low to
 * the max/min of open and close, volume to zero. Leading bars with neither a close nor
 * an open have nothing to repair from and are left out.
 */
export function validateHistoricalSeries(bars: readonly RawBar[] | null | undefined): HistoricalBar[] | null {
	if (!bars || bars.length === 0) return null
	if (missingFields(bars).length > 0) return null

	const repaired: HistoricalBar[] = []
	let lastClose: number | undefined

	for (const raw of bars) {
		const rawOpen = finite(raw.open)
		const close = finite(raw.close) ?? lastClose ?? rawOpen
		if (close === undefined) continue
		lastClose = close

		const open = rawOpen ?? close
		const bar: HistoricalBar = {
			date: raw.date,
			open,
			high: finite(raw.high) ?? Math.max(open, close),
			low: finite(raw.low) ?? Math.min(open, close),
			close,
			volume: finite(raw.volume) ?? 0,
		}
		const adjClose = finite(raw.adjClose)
		if (adjClose !== undefined) bar.adjClose = adjClose
		repaired.push(bar)
	}

	return repaired.length > 0 ? repaired : null
}

// --- Options chain ---

export interface RawExpiration<C> {
	calls?: readonly C[] | null
	puts?: readonly C[] | null
}

export interface ValidExpiration<C> {
	calls: C[]
	puts: C[]
}

export function validateOptionsChain<C>(
	chain: Record<string, RawExpiration<C>> | null | undefined,
): Record<string, ValidExpiration<C>> | null {
	if (!chain) return null

	const valid: Record<string, ValidExpiration<C>> = {}
	for (const [expiration, entry] of Object.entries(chain)) {
		const calls = entry.calls ?? []
		const puts = entry.puts ?? []
		if (calls.length > 0 || puts.length > 0) {
			valid[expiration] = { calls: [...calls], puts: [...puts] }
		}
	}

	return Object.keys(valid).length > 0 ? valid : null
}

// --- Filings ---

const rawFilingSchema = z.object({
	accessionNumber: z.string(),
	filingDate: z.string(),
	form: z.string(),
	primaryDocument: z.string(),
})
export type RawFiling = z.infer<typeof rawFilingSchema>

export function validateFiling(value: unknown): RawFiling | null {
	const parsed = rawFilingSchema.safeParse(value)
	return parsed.success ? parsed.data : null
}
