import type { Command } from 'commander'
import { formatCurrency, formatNumber, formatTable } from '../core/formatter.js'
import type { HistoricalQuery } from '../providers/types.js'
import { intervals, periods } from '../types.js'
import { noData, parseChoice, withServices } from './shared.js'

interface HistoryOptions {
	start?: string
	end?: string
	period?: string
	interval: string
}

export function registerHistoryCommand(program: Command): void {
	program
		.command('history <symbol>')
		.description('Get historical price data (OHLCV)')
		.option('--start <date>', 'start date (YYYY-MM-DD)')
		.option('--end <date>', 'end date (YYYY-MM-DD), defaults to today')
		.option('-p, --period <period>', `lookback when no dates are given (${periods.join(', ')})`)
		.option('-i, --interval <interval>', `bar interval (${intervals.join(', ')})`, '1d')
		.action((symbol: string, cmdOpts: HistoryOptions) =>
			withServices(program, async ({ market }, opts) => {
				const query: HistoricalQuery = {
					start: cmdOpts.start,
					end: cmdOpts.end,
					interval: parseChoice(intervals, cmdOpts.interval, 'interval'),
				}
				if (cmdOpts.period) query.period = parseChoice(periods, cmdOpts.period, 'period')

				const series = await market.getHistoricalSeries(symbol, query)
				if (!series) return noData(`No historical data available for ${symbol}`)

				if (opts.format === 'json') {
					console.log(JSON.stringify(series, null, 2))
					return
				}
				const rows = series.bars.map((b) => [
					b.date,
					formatCurrency(b.open),
					formatCurrency(b.high),
					formatCurrency(b.low),
					formatCurrency(b.close),
					formatNumber(b.volume, 0),
				])
				console.log(formatTable(['Date', 'Open', 'High', 'Low', 'Close', 'Volume'], rows, opts.format))
			}),
		)
}
