import type { Command } from 'commander'
import { formatNumber, formatTable } from '../core/formatter.js'
import type { FinancialPoint, KeyFinancials, OutputFormat } from '../types.js'
import { noData, parseCount, withServices } from './shared.js'

/** One row per fiscal period end, newest filing first. */
export function keyFinancialsTable(financials: KeyFinancials, format: OutputFormat, limit = 5): string {
	const byEnd = new Map<string, { filed: string; revenue?: number; netIncome?: number; eps?: number }>()
	const add = (points: FinancialPoint[], field: 'revenue' | 'netIncome' | 'eps') => {
		for (const p of points) {
			const row = byEnd.get(p.endDate) ?? { filed: p.filingDate }
			// points are newest-filed first; keep the latest restatement
			if (row[field] === undefined) row[field] = p.value
			byEnd.set(p.endDate, row)
		}
	}
	add(financials.revenue, 'revenue')
	add(financials.netIncome, 'netIncome')
	add(financials.eps, 'eps')

	const rows = [...byEnd.entries()]
		.sort(([a], [b]) => (a < b ? 1 : a > b ? -1 : 0))
		.slice(0, limit)
		.map(([end, r]) => [
			end,
			r.filed,
			r.revenue === undefined ? '' : formatNumber(r.revenue),
			r.netIncome === undefined ? '' : formatNumber(r.netIncome),
			r.eps === undefined ? '' : r.eps.toFixed(2),
		])
	return formatTable(['Period End', 'Filed', 'Revenue', 'Net Income', 'EPS'], rows, format)
}

export function registerFinancialsCommand(program: Command): void {
	program
		.command('financials <symbol>')
		.description('Annual revenue, net income and diluted EPS from 10-K XBRL facts')
		.option('-l, --limit <n>', 'number of periods', '5')
		.action((symbol: string, cmdOpts: { limit: string }) =>
			withServices(program, async ({ filings }, opts) => {
				const limit = parseCount(cmdOpts.limit, 'limit')
				const financials = await filings.getKeyFinancials(symbol)
				if (!financials) return noData(`No financial data available for ${symbol}`)
				console.log(
					opts.format === 'json'
						? JSON.stringify(financials, null, 2)
						: keyFinancialsTable(financials, opts.format, limit),
				)
			}),
		)
}
