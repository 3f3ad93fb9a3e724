import type { Command } from 'commander'
import { formatKeyValue, formatRatio, heading } from '../core/formatter.js'
import type { CompositeRecord, OutputFormat } from '../types.js'
import { filingsTable } from './filing.js'
import { keyFinancialsTable } from './financials.js'
import { tickerInfoLines } from './info.js'
import { withServices } from './shared.js'

function renderComposite(record: CompositeRecord, format: OutputFormat): string {
	if (format === 'json') return JSON.stringify(record, null, 2)

	const sections: (string | null)[] = [
		formatKeyValue(
			{
				Symbol: record.symbol,
				'Price bars': record.historicalData?.bars.length ?? 0,
				'Option expirations': record.optionsData ? Object.keys(record.optionsData.expirations).length : 0,
				'Average IV': record.impliedVolatility ? formatRatio(record.impliedVolatility.averageIv) : 'n/a',
				Updated: record.lastUpdated,
			},
			format,
		),
	]

	if (record.basicInfo) sections.push(heading('Profile', format), tickerInfoLines(record.basicInfo, format))

	const { recent10K, recent8K, keyFinancials } = record.secData
	const filings = recent10K ? [recent10K, ...recent8K] : recent8K
	if (filings.length > 0) sections.push(heading('Filings', format), filingsTable(filings, format))
	if (keyFinancials) sections.push(heading('Key financials', format), keyFinancialsTable(keyFinancials, format))

	return sections.filter((s): s is string => s !== null).join('\n')
}

export function registerCompositeCommand(program: Command): void {
	program
		.command('composite <symbol>')
		.description('Collect market data, options, filings and financials into one record')
		.option('--no-persist', 'do not write the record to the database')
		.action((symbol: string, cmdOpts: { persist: boolean }) =>
			withServices(program, async ({ aggregator, store, logger }, opts) => {
				if (cmdOpts.persist && !store) logger.info('No database configured; record will not be persisted')
				const record = await aggregator.getCompositeRecord(symbol, { persist: cmdOpts.persist })
				if (!record.basicInfo) process.exitCode = 1
				console.log(renderComposite(record, opts.format))
			}),
		)
}
