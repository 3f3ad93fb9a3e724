import type { Command } from 'commander'
import { formatRatio, formatTable } from '../core/formatter.js'
import type { ImpliedVolatility, OutputFormat } from '../types.js'
import { noData, withServices } from './shared.js'

export function impliedVolatilityTable(iv: ImpliedVolatility, format: OutputFormat): string {
	const rows = Object.entries(iv.expirations).map(([expiry, e]) => [
		expiry,
		formatRatio(e.callsIv),
		formatRatio(e.putsIv),
		formatRatio(e.averageIv),
	])
	rows.push(['All', '', '', formatRatio(iv.averageIv)])
	return formatTable(['Expiry', 'Calls IV', 'Puts IV', 'Average'], rows, format)
}

export function registerIvCommand(program: Command): void {
	program
		.command('iv <symbol>')
		.description('Average implied volatility from the nearest options chain')
		.action((symbol: string) =>
			withServices(program, async ({ market }, opts) => {
				const iv = await market.getImpliedVolatility(symbol)
				if (!iv) return noData(`Could not derive implied volatility for ${symbol}`)
				console.log(opts.format === 'json' ? JSON.stringify(iv, null, 2) : impliedVolatilityTable(iv, opts.format))
			}),
		)
}
