import YahooFinance from 'yahoo-finance2'
import type { Interval } from '../types.js'

/** The slice of Yahoo Finance this project reads. Results are parsed by the caller. */
export interface YahooClient {
	summary(symbol: string): Promise<unknown>
	chart(symbol: string, period1: Date, period2: Date, interval: Interval): Promise<unknown>
	options(symbol: string, date?: Date): Promise<unknown>
}

export function createYahooClient(): YahooClient {
	const yf = new YahooFinance({ suppressNotices: ['yahooSurvey'] })

	return {
		summary: (symbol) =>
			yf.quoteSummary(symbol, {
				modules: ['price', 'summaryProfile', 'summaryDetail', 'defaultKeyStatistics'],
			}),
		chart: (symbol, period1, period2, interval) => yf.chart(symbol, { period1, period2, interval }),
		options: (symbol, date) => yf.options(symbol, date ? { date } : {}),
	}
}
