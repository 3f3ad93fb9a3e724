import type { Command } from 'commander'
import { withServices } from './shared.js'

export function registerCacheCommand(program: Command): void {
	const cache = program.command('cache').description('Manage the response cache')

	cache
		.command('clear [pattern]')
		.description('Remove cached entries whose key contains pattern (all when omitted)')
		.action((pattern: string | undefined) =>
			withServices(program, async (services) => {
				if (!services.cache.enabled) {
					console.error('Cache is disabled; nothing to clear')
					return
				}
				const count = services.cache.clear(pattern)
				console.log(`Cleared ${count} cache ${count === 1 ? 'entry' : 'entries'}`)
			}),
		)
}
