import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { parseConfigValue } from '../src/commands/config.js'
import { loadConfig, resetConfigCache, saveConfig } from '../src/core/config.js'
import { InvalidInputError } from '../src/core/errors.js'

describe('config', () => {
	let dir: string
	let path: string

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'eqc-config-'))
		path = join(dir, 'config.json')
		resetConfigCache()
	})

	afterEach(() => {
		resetConfigCache()
		rmSync(dir, { recursive: true, force: true })
	})

	it('is empty without a file or env vars', () => {
		expect(loadConfig({}, path)).toEqual({})
	})

	it('lets env vars override the file', () => {
		writeFileSync(path, JSON.stringify({ secRequestsPerSecond: 3, logLevel: 'info' }))
		const config = loadConfig({ LOG_LEVEL: 'debug', SEC_EDGAR_USER_AGENT: 'test-app/1.0 (test@example.com)' }, path)
		expect(config).toEqual({
			secRequestsPerSecond: 3,
			logLevel: 'debug',
			edgarUserAgent: 'test-app/1.0 (test@example.com)',
		})
	})

	it('prefers EDGAR_USER_AGENT over the SEC_ prefixed name', () => {
		const config = loadConfig({ EDGAR_USER_AGENT: 'first/1.0', SEC_EDGAR_USER_AGENT: 'second/1.0' }, path)
		expect(config.edgarUserAgent).toBe('first/1.0')
	})

	it('rejects malformed files', () => {
		writeFileSync(path, '{ not json')
		expect(() => loadConfig({}, path)).toThrow('is not valid JSON')

		resetConfigCache()
		writeFileSync(path, JSON.stringify({ cacheBackend: 'redis' }))
		expect(() => loadConfig({}, path)).toThrow(`Config file ${path} is invalid`)
	})

	it('rejects an unknown log level from the environment', () => {
		expect(() => loadConfig({ LOG_LEVEL: 'loud' }, path)).toThrow('Invalid environment configuration')
	})

	it('merges saved values and keeps the file private', () => {
		saveConfig({ mongoDbName: 'research' }, path)
		saveConfig({ logLevel: 'info' }, path)

		expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual({ mongoDbName: 'research', logLevel: 'info' })
		expect(statSync(path).mode & 0o777).toBe(0o600)
		expect(loadConfig({}, path)).toEqual({ mongoDbName: 'research', logLevel: 'info' })
	})
})

describe('parseConfigValue', () => {
	it('coerces numeric settings', () => {
		expect(parseConfigValue('secRequestsPerSecond', '2')).toEqual({ secRequestsPerSecond: 2 })
		expect(parseConfigValue('requestTimeoutMs', '5000')).toEqual({ requestTimeoutMs: 5000 })
	})

	it('keeps string settings as strings', () => {
		expect(parseConfigValue('mongoDbName', '42')).toEqual({ mongoDbName: '42' })
	})

	it('rejects unknown keys and invalid values', () => {
		expect(() => parseConfigValue('apiKey', 'x')).toThrow(InvalidInputError)
		expect(() => parseConfigValue('cacheBackend', 'redis')).toThrow('Invalid value for cacheBackend')
		expect(() => parseConfigValue('secRequestsPerSecond', '-1')).toThrow('Invalid value for secRequestsPerSecond')
	})
})
