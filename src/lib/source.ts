/** Post sources: where raw X API pages come from before they reach the cache. */

import { readFileSync } from 'node:fs'

import { parseInstant } from './dates.js'
import { includesFromItems, mergeUnique } from './dedupe.js'
import { log, warn } from './log.js'
import {
	createFetchResult,
	type FetchResult,
	type IncludeItem,
	type IncludesBundle,
	isArrayOf,
	isIncludesLike,
	isPostLike,
	isRecord,
	type Period,
	type Post,
} from './schema.js'

export interface PageMeta {
	result_count?: number
	next_token?: string
}

/** One page of a user-timeline response. */
export interface ApiPage {
	data?: Post[]
	includes?: IncludesBundle
	meta?: PageMeta
}

/** Anything that can produce timeline pages for a period. */
export interface PostSource {
	fetch(period: Period): Promise<ApiPage[]>
}

export function isApiPage(value: unknown): value is ApiPage {
	if (!isRecord(value)) return false
	if (value.data !== undefined && !isArrayOf(value.data, isPostLike)) return false
	if (value.meta !== undefined && !isRecord(value.meta)) return false
	return value.includes === undefined || isIncludesLike(value.includes)
}

/** Parse a saved response: a single page object or an array of pages. */
export function parseApiPages(raw: unknown): ApiPage[] {
	const candidates = Array.isArray(raw) ? raw : [raw]
	const pages: ApiPage[] = []
	candidates.forEach((candidate, index) => {
		if (!isApiPage(candidate)) {
			throw new Error(`Invalid API page at index ${index}`)
		}
		pages.push(candidate)
	})
	return pages
}

/** Reads API pages previously saved as JSON. */
export class JsonFileSource implements PostSource {
	private readonly path: string

	constructor(path: string) {
		this.path = path
	}

	async fetch(_period: Period): Promise<ApiPage[]> {
		let raw: unknown
		try {
			raw = JSON.parse(readFileSync(this.path, 'utf-8'))
		} catch (err) {
			throw new Error(`Failed to read input file ${this.path}`, { cause: err })
		}
		const pages = parseApiPages(raw)
		log(`Read ${pages.length} page(s) from ${this.path}`)
		return pages
	}
}

/** Tag every include record for the merge step. */
export function toIncludeItems(includes: IncludesBundle | undefined): IncludeItem[] {
	const items: IncludeItem[] = []
	for (const data of includes?.tweets ?? []) items.push({ kind: 'post', data })
	for (const data of includes?.users ?? []) items.push({ kind: 'user', data })
	for (const data of includes?.media ?? []) items.push({ kind: 'media', data })
	return items
}

function inPeriod(post: Post, period: Period): boolean {
	const instant = parseInstant(post.created_at)
	if (!instant) {
		warn(`Dropping post ${post.id} with invalid created_at "${post.created_at}"`)
		return false
	}
	const t = instant.getTime()
	return t >= period.start.getTime() && t < period.end.getTime()
}

/**
 * Combine pages into one fetch result.
 * Posts outside `period` are dropped; posts and includes are de-duplicated.
 */
export function collectFetchResult(
	pages: readonly ApiPage[],
	period?: Period,
): FetchResult {
	let posts: Post[] = []
	const items: IncludeItem[] = []
	for (const page of pages) {
		const pagePosts = page.data ?? []
		posts = mergeUnique(
			posts,
			period ? pagePosts.filter((post) => inPeriod(post, period)) : pagePosts,
			(post) => post.id,
		)
		items.push(...toIncludeItems(page.includes))
	}

	return createFetchResult({
		posts,
		includes: includesFromItems(items),
		request_count: pages.length,
	})
}
