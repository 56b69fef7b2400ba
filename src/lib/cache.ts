/** Per-day post cache for x-post-archive. */

import {
	existsSync,
	mkdirSync,
	readFileSync,
	renameSync,
	rmSync,
	writeFileSync,
} from 'node:fs'
import { join } from 'node:path'
import { TextDecoder } from 'node:util'

import type { ExportConfig } from './config.js'
import { datesInPeriod, partitionPosts } from './dates.js'
import { countIncludes, mergeIncludes } from './dedupe.js'
import { errorMessage, log } from './log.js'
import {
	bundleToCacheDict,
	type DayCacheRecord,
	dayCacheFromStored,
	type IncludesBundle,
	isStoredDayCache,
	type Period,
	type Post,
	type PostBundle,
} from './schema.js'

const utf8 = new TextDecoder('utf-8', { fatal: true })

/** Cache file name for a YYYY-MM-DD key: `20260220.json`. */
export function cacheFileName(dateKey: string): string {
	return `${dateKey.replaceAll('-', '')}.json`
}

/**
 * Date-partitioned cache store.
 * One JSON file per local calendar day under `config.cacheDir`.
 */
export class DayCacheStore {
	private readonly cacheDir: string
	private readonly timeZone: string

	constructor(config: Pick<ExportConfig, 'cacheDir' | 'timeZone'>) {
		this.cacheDir = config.cacheDir
		this.timeZone = config.timeZone
	}

	/** Path of the cache file for a date. */
	pathFor(dateKey: string): string {
		return join(this.cacheDir, cacheFileName(dateKey))
	}

	/**
	 * Read one day's cache.
	 * Returns null when the file is absent, not UTF-8, not JSON, or fails validation.
	 */
	readDay(dateKey: string): DayCacheRecord | null {
		const path = this.pathFor(dateKey)
		if (!existsSync(path)) return null

		let parsed: unknown
		try {
			parsed = JSON.parse(utf8.decode(readFileSync(path)))
		} catch (err) {
			if (err instanceof SyntaxError || err instanceof TypeError) {
				log(`Ignoring unreadable cache file ${path}: ${err.message}`)
				return null
			}
			throw err
		}

		if (!isStoredDayCache(parsed)) {
			log(`Ignoring malformed cache file ${path}`)
			return null
		}
		return dayCacheFromStored(parsed)
	}

	/**
	 * Partition posts by local date and write one file per affected date.
	 * The new group replaces the day's posts; includes are merged without duplicates.
	 * With a `period`, its days without posts are written as empty days so a
	 * later `load` of the same period hits.
	 * @returns Written file paths, in date order
	 */
	save(bundle: PostBundle, period?: Period): string[] {
		const groups = partitionPosts(bundle.posts, this.timeZone)
		if (period) {
			for (const dateKey of datesInPeriod(period, this.timeZone)) {
				if (!groups.has(dateKey)) groups.set(dateKey, [])
			}
		}
		const written: string[] = []

		for (const dateKey of [...groups.keys()].sort()) {
			const posts = groups.get(dateKey) ?? []
			const existing = this.readDay(dateKey)
			const includes = mergeIncludes(existing?.includes ?? {}, bundle.includes)
			const path = this.pathFor(dateKey)
			this.writeAtomic(path, bundleToCacheDict({ posts, includes }))
			log(
				`Cached ${posts.length} posts for ${dateKey} (${JSON.stringify(countIncludes(includes))})`,
			)
			written.push(path)
		}

		return written
	}

	/**
	 * Reassemble a period from its day files.
	 * All-or-nothing: any missing or invalid day yields null.
	 */
	load(period: Period): PostBundle | null {
		const dates = datesInPeriod(period, this.timeZone)
		if (dates.length === 0) return null

		const posts: Post[] = []
		let includes: IncludesBundle = {}
		for (const dateKey of dates) {
			const day = this.readDay(dateKey)
			if (!day) {
				log(`Cache miss for ${dateKey}`)
				return null
			}
			posts.push(...day.posts)
			includes = mergeIncludes(includes, day.includes)
		}

		log(`Cache hit for ${dates.length} day(s): ${posts.length} posts`)
		return { posts, includes }
	}

	private writeAtomic(path: string, record: DayCacheRecord): void {
		mkdirSync(this.cacheDir, { recursive: true })
		const tmpPath = `${path}.tmp.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2)}`
		try {
			writeFileSync(tmpPath, `${JSON.stringify(record, null, 2)}\n`, 'utf-8')
			renameSync(tmpPath, path)
		} catch (err) {
			rmSync(tmpPath, { force: true })
			throw new Error(`Failed to write cache file ${path}: ${errorMessage(err)}`, {
				cause: err,
			})
		}
	}
}
