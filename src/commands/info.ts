import type { Command } from 'commander'
import { formatCurrency, formatKeyValue, formatNumber, formatRatio } from '../core/formatter.js'
import type { OutputFormat, TickerInfo } from '../types.js'
import { noData, withServices } from './shared.js'

export function tickerInfoLines(info: TickerInfo, format: OutputFormat): string {
	if (format === 'json') return JSON.stringify(info, null, 2)
	return formatKeyValue(
		{
			Symbol: info.symbol,
			Name: info.name,
			Sector: info.sector,
			Industry: info.industry,
			Price: formatCurrency(info.price),
			'Market Cap': info.marketCap ? formatNumber(info.marketCap) : undefined,
			'P/E': info.peRatio ? info.peRatio.toFixed(2) : undefined,
			'Dividend Yield': info.dividendYield ? formatRatio(info.dividendYield) : undefined,
			Beta: info.beta ? info.beta.toFixed(2) : undefined,
			'52w Range':
				info.fiftyTwoWeekLow && info.fiftyTwoWeekHigh
					? `${formatCurrency(info.fiftyTwoWeekLow)} - ${formatCurrency(info.fiftyTwoWeekHigh)}`
					: undefined,
			'Avg Volume': info.avgVolume ? formatNumber(info.avgVolume, 0) : undefined,
			Updated: info.lastUpdated,
		},
		format,
	)
}

export function registerInfoCommand(program: Command): void {
	program
		.command('info <symbol>')
		.description('Show company profile and quote summary')
		.action((symbol: string) =>
			withServices(program, async ({ market }, opts) => {
				const info = await market.getTickerInfo(symbol)
				if (!info) return noData(`No ticker info available for ${symbol}`)
				console.log(tickerInfoLines(info, opts.format))
			}),
		)
}
