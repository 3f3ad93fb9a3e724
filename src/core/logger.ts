import winston, { format } from 'winston'

export type Logger = winston.Logger
export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

export interface LoggerOptions {
	level: LogLevel
	json?: boolean
	filePath?: string
	silent?: boolean
}

const pretty = format.printf(({ timestamp, level, message, component, ...meta }) => {
	const scope = typeof component === 'string' ? ` [${component}]` : ''
	const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ''
	return `${String(timestamp)} ${level}${scope}: ${String(message)}${rest}`
})

/**
 * Console output goes to stderr at every level, so command output on stdout stays
 * pipeable. The file transport, when configured, always writes JSON lines.
 */
export function createLogger(options: LoggerOptions): Logger {
	const { level, json = false, filePath, silent = false } = options
	const base = format.combine(format.timestamp(), format.errors({ stack: true }))

	const transports: winston.transport[] = [
		new winston.transports.Console({
			level,
			stderrLevels: ['error', 'warn', 'info', 'debug'],
			format: format.combine(base, json ? format.json() : pretty),
		}),
	]

	if (filePath) {
		transports.push(
			new winston.transports.File({
				filename: filePath,
				level,
				format: format.combine(base, format.json()),
			}),
		)
	}

	return winston.createLogger({ level, silent, transports, exitOnError: false })
}

export function silentLogger(): Logger {
	return createLogger({ level: 'error', silent: true })
}
