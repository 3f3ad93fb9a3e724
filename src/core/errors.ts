export type DataErrorKind =
	| 'invalid_input'
	| 'upstream_unavailable'
	| 'cache_unavailable'
	| 'persistence_failure'

export abstract class DataError extends Error {
	abstract readonly kind: DataErrorKind

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = new.target.name
	}
}

/** Bad ticker or date. The only error a source client lets escape. */
export class InvalidInputError extends DataError {
	readonly kind = 'invalid_input'
}

export class UpstreamUnavailableError extends DataError {
	readonly kind = 'upstream_unavailable'

	constructor(
		readonly source: string,
		message: string,
		readonly status?: number,
		options?: { cause?: unknown },
	) {
		super(`[${source}] ${message}`, options)
	}
}

export class CacheUnavailableError extends DataError {
	readonly kind = 'cache_unavailable'
}

export class PersistenceError extends DataError {
	readonly kind = 'persistence_failure'
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
