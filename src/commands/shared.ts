import type { Command } from 'commander'
import { loadConfig } from '../core/config.js'
import { InvalidInputError } from '../core/errors.js'
import { type Services, createServices } from '../core/services.js'
import type { GlobalOptions } from '../types.js'

/** Builds the pipeline for one command and tears it down afterwards. */
export async function withServices(
	program: Command,
	run: (services: Services, opts: GlobalOptions) => Promise<void>,
): Promise<void> {
	const opts = program.opts<GlobalOptions>()
	const services = await createServices(loadConfig(), { cache: opts.cache, verbose: opts.verbose })
	try {
		await run(services, opts)
	} finally {
		await services.close()
	}
}

export function parseChoice<T extends string>(choices: readonly T[], value: string, label: string): T {
	const match = choices.find((c) => c === value)
	if (match === undefined) {
		throw new InvalidInputError(`Invalid ${label}: ${value}. Expected one of ${choices.join(', ')}`)
	}
	return match
}

export function parseCount(value: string, label: string): number {
	const n = Number(value)
	if (!Number.isInteger(n) || n < 1) throw new InvalidInputError(`${label} must be a positive integer, got ${value}`)
	return n
}

/** Prints to stderr and marks the run as failed without throwing. */
export function noData(message: string): void {
	console.error(message)
	process.exitCode = 1
}
