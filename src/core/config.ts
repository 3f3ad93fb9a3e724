import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { dirname, join, resolve } from 'node:path'
import { z } from 'zod'

// Minimal .env support: KEY=value lines, quotes stripped, existing env wins
export function loadEnvFile(path = resolve(process.cwd(), '.env')): void {
	if (!existsSync(path)) return
	for (const line of readFileSync(path, 'utf-8').split('\n')) {
		const trimmed = line.trim()
		if (!trimmed || trimmed.startsWith('#')) continue
		const eqIdx = trimmed.indexOf('=')
		if (eqIdx === -1) continue
		const key = trimmed.slice(0, eqIdx).trim()
		let val = trimmed.slice(eqIdx + 1).trim()
		if (
			(val.startsWith('"') && val.endsWith('"')) ||
			(val.startsWith("'") && val.endsWith("'"))
		) {
			val = val.slice(1, -1)
		}
		if (process.env[key] === undefined) {
			process.env[key] = val
		}
	}
}

const CONFIG_DIR = join(homedir(), '.equity-composite')
const CONFIG_FILE = join(CONFIG_DIR, 'config.json')

const ttlSchema = z.object({
	PRICE: z.number().positive().optional(),
	HISTORICAL: z.number().positive().optional(),
	FILING: z.number().positive().optional(),
})

export const configSchema = z.object({
	edgarUserAgent: z.string().min(1).optional(),
	secRequestsPerSecond: z.number().positive().optional(),
	cacheDir: z.string().min(1).optional(),
	cacheBackend: z.enum(['file', 'memory']).optional(),
	/** Per-category TTL overrides, in seconds. */
	cacheTtlSeconds: ttlSchema.optional(),
	mongoUri: z.string().min(1).optional(),
	mongoDbName: z.string().min(1).optional(),
	logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
	logFile: z.string().min(1).optional(),
	requestTimeoutMs: z.number().int().positive().optional(),
	defaultFormat: z.enum(['markdown', 'json', 'plain']).optional(),
})

export type AppConfig = z.infer<typeof configSchema>

export const DEFAULTS = {
	edgarUserAgent: 'equity-composite/0.1.0 (ops@example.com)',
	secRequestsPerSecond: 5,
	cacheDir: join(CONFIG_DIR, 'cache'),
	cacheBackend: 'file',
	mongoDbName: 'equity_composite',
	logLevel: 'warn',
	requestTimeoutMs: 15_000,
} as const

let cached: AppConfig | null = null

function readConfigFile(path: string): AppConfig {
	if (!existsSync(path)) return {}
	let raw: unknown
	try {
		raw = JSON.parse(readFileSync(path, 'utf-8'))
	} catch (err) {
		throw new Error(`Config file ${path} is not valid JSON`, { cause: err })
	}
	const parsed = configSchema.safeParse(raw)
	if (!parsed.success) {
		const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
		throw new Error(`Config file ${path} is invalid: ${issues.join('; ')}`)
	}
	return parsed.data
}

function readEnv(env: NodeJS.ProcessEnv): AppConfig {
	const pairs: [keyof AppConfig, string | undefined][] = [
		['edgarUserAgent', env.EDGAR_USER_AGENT ?? env.SEC_EDGAR_USER_AGENT],
		['cacheDir', env.CACHE_DIR],
		['mongoUri', env.MONGO_URI],
		['mongoDbName', env.MONGO_DB_NAME],
		['logLevel', env.LOG_LEVEL],
		['logFile', env.LOG_FILE],
	]
	const raw: Record<string, string> = {}
	for (const [key, value] of pairs) {
		if (value) raw[key] = value
	}
	const parsed = configSchema.safeParse(raw)
	if (!parsed.success) {
		const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
		throw new Error(`Invalid environment configuration: ${issues.join('; ')}`)
	}
	return parsed.data
}

/** Env vars override the config file. Defaults are applied where config is consumed. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, path = CONFIG_FILE): AppConfig {
	if (cached) return cached
	cached = { ...readConfigFile(path), ...readEnv(env) }
	return cached
}

export function saveConfig(config: AppConfig, path = CONFIG_FILE): void {
	const merged = { ...readConfigFile(path), ...config }
	const dir = dirname(path)
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true })
	}
	writeFileSync(path, JSON.stringify(merged, null, 2), { mode: 0o600 })
	cached = null
}

export function resetConfigCache(): void {
	cached = null
}

export function getConfigPath(): string {
	return CONFIG_FILE
}
