import type { CompanyFacts, FactEntry, FinancialPoint, KeyFinancials } from '../types.js'

export const TAXONOMY = 'us-gaap'

// Synonyms in priority order: the first tag the filer reports is used, the rest ignored
export const REVENUE_TAGS = ['Revenue', 'Revenues', 'SalesRevenueNet'] as const
export const NET_INCOME_TAGS = ['NetIncomeLoss'] as const
export const EPS_TAGS = ['EarningsPerShareDiluted'] as const

type Taxonomy = Record<string, { units: Record<string, FactEntry[]> }>

function annualSeries(taxonomy: Taxonomy | undefined, tags: readonly string[]): FinancialPoint[] {
	if (!taxonomy) return []
	const tag = tags.find((t) => taxonomy[t] !== undefined)
	const concept = tag === undefined ? undefined : taxonomy[tag]
	if (!concept) return []

	const points: FinancialPoint[] = []
	for (const entries of Object.values(concept.units)) {
		for (const entry of entries) {
			if (entry.form !== '10-K') continue
			points.push({
				value: entry.val ?? 0,
				endDate: entry.end ?? '',
				filingDate: entry.filed ?? '',
			})
		}
	}

	// Most recent filing first
	return points.sort((a, b) => (a.filingDate < b.filingDate ? 1 : a.filingDate > b.filingDate ? -1 : 0))
}

export function extractKeyFinancials(ticker: string, facts: CompanyFacts): KeyFinancials {
	const taxonomy = facts.facts?.[TAXONOMY]
	return {
		ticker,
		revenue: annualSeries(taxonomy, REVENUE_TAGS),
		netIncome: annualSeries(taxonomy, NET_INCOME_TAGS),
		eps: annualSeries(taxonomy, EPS_TAGS),
	}
}
