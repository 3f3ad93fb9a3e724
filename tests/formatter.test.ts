import { describe, expect, it } from 'vitest'
import {
	formatCurrency,
	formatKeyValue,
	formatNumber,
	formatRatio,
	formatTable,
	heading,
} from '../src/core/formatter.js'

describe('formatTable', () => {
	const headers = ['Symbol', 'Price']
	const rows = [
		['AAPL', 190.5],
		['MSFT', 410],
	]

	it('renders markdown with numeric columns right-aligned', () => {
		expect(formatTable(headers, rows, 'markdown')).toBe(
			['| Symbol | Price |', '| ------ | ----: |', '| AAPL   | 190.5 |', '| MSFT   |   410 |'].join('\n'),
		)
	})

	it('renders JSON objects keyed by header', () => {
		expect(JSON.parse(formatTable(headers, rows, 'json'))).toEqual([
			{ Symbol: 'AAPL', Price: 190.5 },
			{ Symbol: 'MSFT', Price: 410 },
		])
	})

	it('renders tab-separated lines', () => {
		expect(formatTable(headers, rows, 'plain')).toBe('Symbol\tPrice\nAAPL\t190.5\nMSFT\t410')
	})

	it('says so when there are no rows', () => {
		expect(formatTable(headers, [], 'markdown')).toBe('_No rows_')
		expect(formatTable(headers, [], 'json')).toBe('[]')
	})
})

describe('formatKeyValue', () => {
	const data = { Symbol: 'AAPL', Sector: '', Beta: 1.2, Missing: undefined }

	it('aligns markdown values and drops empty ones', () => {
		expect(formatKeyValue(data, 'markdown')).toBe('**Symbol**: AAPL\n**Beta**:   1.2')
	})

	it('renders plain pairs', () => {
		expect(formatKeyValue(data, 'plain')).toBe('Symbol\tAAPL\nBeta\t1.2')
	})
})

describe('number helpers', () => {
	it('abbreviates magnitudes', () => {
		expect(formatNumber(3e12)).toBe('3.00T')
		expect(formatNumber(-2.5e9)).toBe('-2.50B')
		expect(formatNumber(1234)).toBe('1.23K')
		expect(formatNumber(999)).toBe('999.00')
		expect(formatNumber(55_000_000, 0)).toBe('55M')
	})

	it('formats currency and ratios', () => {
		expect(formatCurrency(1234.5)).toBe('$1,234.50')
		expect(formatRatio(0.1234)).toBe('12.34%')
		expect(formatRatio(0.25, 1)).toBe('25.0%')
		expect(formatRatio(null)).toBe('')
	})

	it('emits headings only for markdown', () => {
		expect(heading('Filings', 'markdown')).toBe('\n## Filings\n')
		expect(heading('Filings', 'plain')).toBeNull()
	})
})
