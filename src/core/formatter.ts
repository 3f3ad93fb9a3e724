import type { OutputFormat } from '../types.js'

export type Cell = string | number | boolean | null | undefined

function text(v: Cell): string {
	return v == null ? '' : String(v)
}

export function formatTable(headers: readonly string[], rows: readonly Cell[][], format: OutputFormat): string {
	if (format === 'json') {
		const objects = rows.map((row) =>
			Object.fromEntries(headers.map((h, i) => [h, row[i] ?? null])),
		)
		return JSON.stringify(objects, null, 2)
	}

	if (format === 'plain') {
		return [headers.join('\t'), ...rows.map((row) => row.map(text).join('\t'))].join('\n')
	}

	if (rows.length === 0) return '_No rows_'

	const widths = headers.map((h, i) => rows.reduce((max, row) => Math.max(max, text(row[i]).length), h.length))
	// Numbers read better right-aligned
	const numeric = headers.map((_, i) => rows.every((row) => row[i] == null || typeof row[i] === 'number'))
	const cell = (v: string, i: number) => (numeric[i] ? v.padStart(widths[i]) : v.padEnd(widths[i]))

	return [
		`| ${headers.map(cell).join(' | ')} |`,
		`| ${widths.map((w, i) => (numeric[i] ? `${'-'.repeat(w - 1)}:` : '-'.repeat(w))).join(' | ')} |`,
		...rows.map((row) => `| ${headers.map((_, i) => cell(text(row[i]), i)).join(' | ')} |`),
	].join('\n')
}

export function formatKeyValue(data: Record<string, Cell>, format: OutputFormat): string {
	if (format === 'json') return JSON.stringify(data, null, 2)

	const entries = Object.entries(data).filter(([, v]) => v != null && v !== '')
	if (format === 'plain') return entries.map(([k, v]) => `${k}\t${text(v)}`).join('\n')

	const keyWidth = entries.reduce((max, [k]) => Math.max(max, k.length), 0)
	return entries.map(([k, v]) => `**${k}**:${' '.repeat(keyWidth - k.length + 1)}${text(v)}`).join('\n')
}

/** Compact magnitude: 1.23T, 4.56B, 7.89M, 1.00K. */
export function formatNumber(n: number, decimals = 2): string {
	const abs = Math.abs(n)
	for (const [limit, suffix] of [
		[1e12, 'T'],
		[1e9, 'B'],
		[1e6, 'M'],
		[1e3, 'K'],
	] as const) {
		if (abs >= limit) return `${(n / limit).toFixed(decimals)}${suffix}`
	}
	return n.toFixed(decimals)
}

export function formatCurrency(n: number, currency = 'USD'): string {
	return new Intl.NumberFormat('en-US', { style: 'currency', currency }).format(n)
}

/** A fraction shown as a percentage: 0.1234 → 12.34%. Null renders empty. */
export function formatRatio(n: number | null | undefined, decimals = 2): string {
	return n == null ? '' : `${(n * 100).toFixed(decimals)}%`
}

/** Section heading for markdown output; other formats print nothing. */
export function heading(title: string, format: OutputFormat): string | null {
	return format === 'markdown' ? `\n## ${title}\n` : null
}
