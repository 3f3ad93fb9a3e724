import type { Command } from 'commander'
import { formatTable } from '../core/formatter.js'
import type { Filing, OutputFormat } from '../types.js'
import { noData, parseCount, withServices } from './shared.js'

export function filingsTable(filings: readonly Filing[], format: OutputFormat): string {
	const rows = filings.map((f) => [f.formType, f.filingDate, f.accessionNumber, f.primaryDocument])
	return formatTable(['Form', 'Filed', 'Accession #', 'Document'], rows, format)
}

export function registerFilingCommand(program: Command): void {
	program
		.command('filing <symbol>')
		.description('List recent SEC filings for a company')
		.option('-t, --type <type>', 'filing type (10-K, 10-Q, 8-K, etc.)', '10-K')
		.option('-l, --limit <n>', 'number of filings', '5')
		.action((symbol: string, cmdOpts: { type: string; limit: string }) =>
			withServices(program, async ({ filings }, opts) => {
				const results = await filings.getFilingsMetadata(symbol, cmdOpts.type, parseCount(cmdOpts.limit, 'limit'))
				if (results.length === 0) return noData(`No ${cmdOpts.type} filings found for ${symbol}`)
				console.log(filingsTable(results, opts.format))
			}),
		)
}
