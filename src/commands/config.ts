import type { Command } from 'commander'
import { type AppConfig, DEFAULTS, configSchema, getConfigPath, loadConfig, saveConfig } from '../core/config.js'
import { InvalidInputError } from '../core/errors.js'

const settableKeys = [
	'edgarUserAgent',
	'secRequestsPerSecond',
	'cacheDir',
	'cacheBackend',
	'mongoUri',
	'mongoDbName',
	'logLevel',
	'logFile',
	'requestTimeoutMs',
	'defaultFormat',
] as const

function redactUri(uri: string): string {
	return uri.replace(/\/\/([^:@/]+):([^@/]+)@/, '//$1:***@')
}

/** Parses `value` for `key` through the config schema; numbers are coerced. */
export function parseConfigValue(key: string, value: string): AppConfig {
	if (!settableKeys.some((k) => k === key)) {
		throw new InvalidInputError(`Invalid key: ${key}. Valid keys: ${settableKeys.join(', ')}`)
	}
	const numeric = value.trim() !== '' && Number.isFinite(Number(value))
	const parsed = configSchema.safeParse({ [key]: value })
	if (parsed.success) return parsed.data
	const asNumber = numeric ? configSchema.safeParse({ [key]: Number(value) }) : undefined
	if (asNumber?.success) return asNumber.data
	throw new InvalidInputError(`Invalid value for ${key}: ${parsed.error.issues[0]?.message ?? value}`)
}

export function registerConfigCommand(program: Command): void {
	const config = program.command('config').description('Manage configuration')

	config
		.command('show')
		.description('Show effective configuration')
		.action(() => {
			const cfg = loadConfig()
			console.log(`Config file: ${getConfigPath()}\n`)
			console.log(
				JSON.stringify(
					{
						...DEFAULTS,
						...cfg,
						mongoUri: cfg.mongoUri ? redactUri(cfg.mongoUri) : undefined,
					},
					null,
					2,
				),
			)
		})

	config
		.command('set <key> <value>')
		.description('Set a configuration value')
		.action((key: string, value: string) => {
			saveConfig(parseConfigValue(key, value))
			console.log(`Set ${key} = ${key === 'mongoUri' ? redactUri(value) : value}`)
		})

	config
		.command('path')
		.description('Show config file path')
		.action(() => {
			console.log(getConfigPath())
		})
}
