import type { ExpirationIv, ImpliedVolatility, OptionContract, OptionsChain } from '../types.js'

function mean(values: readonly number[]): number | null {
	if (values.length === 0) return null
	return values.reduce((sum, v) => sum + v, 0) / values.length
}

function positiveIvs(contracts: readonly OptionContract[]): number[] {
	return contracts
		.map((c) => c.impliedVolatility)
		.filter((iv) => Number.isFinite(iv) && iv > 0)
}

export function expirationIv(calls: readonly OptionContract[], puts: readonly OptionContract[]): ExpirationIv {
	const callsIv = mean(positiveIvs(calls))
	const putsIv = mean(positiveIvs(puts))
	const sides = [callsIv, putsIv].filter((v): v is number => v !== null)
	return { callsIv, putsIv, averageIv: mean(sides) }
}

/**
 * Calls and puts are averaged separately, then the sides that have data are averaged
 * together. The overall figure is the mean over expirations that produced one; an
 * expiration without any positive IV stays in the breakdown but not in the mean.
 */
export function deriveImpliedVolatility(chain: OptionsChain, now: Date = new Date()): ImpliedVolatility {
	const expirations: Record<string, ExpirationIv> = {}
	const averages: number[] = []

	for (const [expiry, { calls, puts }] of Object.entries(chain.expirations)) {
		const iv = expirationIv(calls, puts)
		expirations[expiry] = iv
		if (iv.averageIv !== null) averages.push(iv.averageIv)
	}

	return {
		symbol: chain.symbol,
		averageIv: mean(averages) ?? 0,
		expirations,
		lastUpdated: now.toISOString(),
	}
}
