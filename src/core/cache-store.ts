import { createHash } from 'node:crypto'
import {
	accessSync,
	constants,
	existsSync,
	mkdirSync,
	readFileSync,
	readdirSync,
	renameSync,
	rmSync,
	writeFileSync,
} from 'node:fs'
import { join } from 'node:path'
import { z } from 'zod'
import { CacheUnavailableError, errorMessage } from './errors.js'

export interface CacheEntry {
	value: unknown
	storedAt: number
}

/** Raw key/value storage behind the cache. Knows nothing about expiry. */
export interface CacheStore {
	read(key: string): CacheEntry | undefined
	write(key: string, entry: CacheEntry): void
	delete(key: string): boolean
	keys(): string[]
	clear(): number
}

export class MemoryCacheStore implements CacheStore {
	private readonly entries = new Map<string, CacheEntry>()

	read(key: string): CacheEntry | undefined {
		return this.entries.get(key)
	}

	write(key: string, entry: CacheEntry): void {
		this.entries.set(key, entry)
	}

	delete(key: string): boolean {
		return this.entries.delete(key)
	}

	keys(): string[] {
		return [...this.entries.keys()]
	}

	clear(): number {
		const count = this.entries.size
		this.entries.clear()
		return count
	}
}

const fileEntrySchema = z.object({
	key: z.string(),
	value: z.unknown(),
	storedAt: z.number(),
})

const SUFFIX = '.cache.json'

/**
 * One JSON file per key, named `<sha1>.cache.json`. Only files with that suffix that
 * parse as an entry belong to the cache; anything else in the directory is left alone.
 * Writes land in a temp file first and are renamed into
 * place, so processes sharing the directory never read a half-written entry.
 */
export class FileCacheStore implements CacheStore {
	constructor(private readonly dir: string) {
		try {
			mkdirSync(dir, { recursive: true })
			accessSync(dir, constants.R_OK | constants.W_OK)
		} catch (err) {
			throw new CacheUnavailableError(`Cache directory ${dir} is not usable: ${errorMessage(err)}`, {
				cause: err,
			})
		}
	}

	private pathFor(key: string): string {
		const digest = createHash('sha1').update(key).digest('hex')
		return join(this.dir, `${digest}${SUFFIX}`)
	}

	private readFile(path: string): z.infer<typeof fileEntrySchema> | undefined {
		if (!existsSync(path)) return undefined
		let raw: unknown
		try {
			raw = JSON.parse(readFileSync(path, 'utf-8'))
		} catch {
			// unreadable or truncated; treated as absent
			return undefined
		}
		const parsed = fileEntrySchema.safeParse(raw)
		return parsed.success ? parsed.data : undefined
	}

	read(key: string): CacheEntry | undefined {
		const entry = this.readFile(this.pathFor(key))
		if (!entry || entry.key !== key) return undefined
		return { value: entry.value, storedAt: entry.storedAt }
	}

	write(key: string, entry: CacheEntry): void {
		const path = this.pathFor(key)
		const tmp = `${path}.${process.pid}.tmp`
		writeFileSync(tmp, JSON.stringify({ key, ...entry }))
		renameSync(tmp, path)
	}

	delete(key: string): boolean {
		const path = this.pathFor(key)
		if (!existsSync(path)) return false
		rmSync(path, { force: true })
		return true
	}

	private entryFiles(): { path: string; key: string }[] {
		const found: { path: string; key: string }[] = []
		for (const name of readdirSync(this.dir)) {
			if (!name.endsWith(SUFFIX)) continue
			const path = join(this.dir, name)
			const entry = this.readFile(path)
			if (entry) found.push({ path, key: entry.key })
		}
		return found
	}

	keys(): string[] {
		return this.entryFiles().map((f) => f.key)
	}

	clear(): number {
		const files = this.entryFiles()
		for (const { path } of files) rmSync(path, { force: true })
		return files.length
	}
}
