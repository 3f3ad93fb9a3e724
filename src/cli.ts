#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command } from 'commander'
import { z } from 'zod'
import { registerCacheCommand } from './commands/cache.js'
import { registerCompositeCommand } from './commands/composite.js'
import { registerConfigCommand } from './commands/config.js'
import { registerFilingCommand } from './commands/filing.js'
import { registerFinancialsCommand } from './commands/financials.js'
import { registerHistoryCommand } from './commands/history.js'
import { registerInfoCommand } from './commands/info.js'
import { registerIvCommand } from './commands/iv.js'
import { registerOptionsCommand } from './commands/options.js'
import { loadConfig, loadEnvFile } from './core/config.js'
import { errorMessage } from './core/errors.js'
import type { OutputFormat } from './types.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const pkg = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')))

loadEnvFile()

const program = new Command()

program
	.name('eqc')
	.description('Composite equity records from Yahoo Finance and SEC EDGAR')
	.version(pkg.version)
	.option('--json', 'output as JSON')
	.option('--plain', 'output as tab-separated values')
	.option('-v, --verbose', 'debug logging')
	.option('--no-cache', 'bypass cache')
	.hook('preAction', () => {
		const rawOpts = program.opts<{ json?: boolean; plain?: boolean }>()
		let format: OutputFormat = loadConfig().defaultFormat ?? 'markdown'
		if (rawOpts.json) format = 'json'
		else if (rawOpts.plain) format = 'plain'
		program.setOptionValue('format', format)
	})

registerCompositeCommand(program)
registerInfoCommand(program)
registerHistoryCommand(program)
registerOptionsCommand(program)
registerIvCommand(program)
registerFilingCommand(program)
registerFinancialsCommand(program)
registerCacheCommand(program)
registerConfigCommand(program)

program.parseAsync(process.argv).catch((err: unknown) => {
	console.error(`Error: ${errorMessage(err)}`)
	process.exit(1)
})
