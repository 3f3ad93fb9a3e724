import type { Command } from 'commander'
import { formatCurrency, formatNumber, formatRatio, formatTable } from '../core/formatter.js'
import type { OptionContract } from '../types.js'
import { noData, parseChoice, withServices } from './shared.js'

export function registerOptionsCommand(program: Command): void {
	program
		.command('options <symbol>')
		.description('Get an options chain (nearest expiration unless one is given)')
		.option('-e, --expiration <date>', 'expiration date (YYYY-MM-DD)')
		.option('-t, --type <type>', 'filter by call or put')
		.action((symbol: string, cmdOpts: { expiration?: string; type?: string }) =>
			withServices(program, async ({ market }, opts) => {
				const type = cmdOpts.type ? parseChoice(['call', 'put'], cmdOpts.type, 'option type') : undefined
				const chain = await market.getOptionsChain(symbol, cmdOpts.expiration)
				if (!chain) return noData(`No options data available for ${symbol}`)

				let contracts: OptionContract[] = Object.values(chain.expirations).flatMap((e) => [...e.calls, ...e.puts])
				if (type) contracts = contracts.filter((c) => c.type === type)

				if (opts.format === 'json') {
					console.log(JSON.stringify({ ...chain, contracts }, null, 2))
					return
				}
				const rows = contracts.map((c) => [
					c.type.toUpperCase(),
					c.expiration,
					formatCurrency(c.strike),
					formatCurrency(c.lastPrice),
					formatCurrency(c.bid),
					formatCurrency(c.ask),
					formatNumber(c.volume, 0),
					formatNumber(c.openInterest, 0),
					formatRatio(c.impliedVolatility, 1),
				])
				console.log(
					formatTable(['Type', 'Expiry', 'Strike', 'Last', 'Bid', 'Ask', 'Vol', 'OI', 'IV'], rows, opts.format),
				)
			}),
		)
}
