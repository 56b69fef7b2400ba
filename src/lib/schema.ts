/** Data schemas for x-post-archive. Field names follow the X API v2 payloads. */

/** Engagement counters as returned by the API. */
export interface PublicMetrics {
	like_count?: number
	retweet_count?: number
	reply_count?: number
	impression_count?: number
	quote_count?: number
	bookmark_count?: number
}

export type ReferenceType = 'quoted' | 'retweeted' | 'replied_to'

export interface PostReference {
	type: ReferenceType
	id: string
}

/** Shortened URL entity; `title` is filled in by the title resolver. */
export interface UrlEntity {
	url: string
	expanded_url?: string
	display_url?: string
	title?: string
}

export interface Entities {
	urls?: UrlEntity[]
}

/** Long-form article payload. */
export interface Article {
	title?: string
	plain_text?: string
	cover_media?: string
}

/** Long post ("note tweet") payload carrying the untruncated text. */
export interface NotePost {
	text?: string
	entities?: Entities
}

export interface Post {
	id: string
	text: string
	created_at: string
	public_metrics?: PublicMetrics
	author_id?: string
	referenced_tweets?: PostReference[]
	entities?: Entities
	attachments?: { media_keys?: string[] }
	article?: Article
	note_tweet?: NotePost
}

export interface UserRecord {
	id: string
	username?: string
	name?: string
}

export interface MediaVariant {
	url: string
	content_type?: string
	bit_rate?: number
}

export interface MediaRecord {
	media_key: string
	id?: string
	type?: string
	url?: string
	preview_image_url?: string
	variants?: MediaVariant[]
}

/** Side-table of entities referenced by the primary post set. */
export interface IncludesBundle {
	tweets?: Post[]
	users?: UserRecord[]
	media?: MediaRecord[]
}

export type IncludeCategory = keyof IncludesBundle

/** Referenced entity as handed over by a fetch collaborator. */
export type IncludeItem =
	| { kind: 'post'; data: Post }
	| { kind: 'user'; data: UserRecord }
	| { kind: 'media'; data: MediaRecord }

/** Posts plus their side-table: what the cache stores and the renderer reads. */
export interface PostBundle {
	posts: Post[]
	includes: IncludesBundle
}

export interface FetchResult extends PostBundle {
	request_count: number
	from_cache: boolean
}

/** Half-open instant range `[start, end)`. */
export interface Period {
	start: Date
	end: Date
}

/** media_key → vault-relative file path. */
export type MediaMap = Record<string, string>

/** Persisted unit of the cache: one local calendar day. */
export interface DayCacheRecord {
	posts: Post[]
	includes: IncludesBundle
}

/** Older cache files stored the post list under `tweets`. */
interface StoredDayCache {
	posts?: Post[]
	tweets?: Post[]
	includes?: IncludesBundle
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/** Minimal shape check: an object with string `id` and `text`. */
export function isPostLike(value: unknown): value is Post {
	return (
		isRecord(value) &&
		typeof value.id === 'string' &&
		typeof value.text === 'string'
	)
}

export function isUserRecord(value: unknown): value is UserRecord {
	return isRecord(value) && typeof value.id === 'string'
}

export function isMediaRecord(value: unknown): value is MediaRecord {
	return isRecord(value) && typeof value.media_key === 'string'
}

export function isArrayOf<T>(value: unknown, guard: (item: unknown) => item is T): value is T[] {
	return Array.isArray(value) && value.every(guard)
}

/** Every present include category holds well-formed records. */
export function isIncludesLike(value: unknown): value is IncludesBundle {
	if (!isRecord(value)) return false
	return (
		(value.tweets === undefined || isArrayOf(value.tweets, isPostLike)) &&
		(value.users === undefined || isArrayOf(value.users, isUserRecord)) &&
		(value.media === undefined || isArrayOf(value.media, isMediaRecord))
	)
}

/** Structural validation applied to every cache file on read. */
export function isStoredDayCache(value: unknown): value is StoredDayCache {
	if (!isRecord(value)) return false
	const posts = value.posts ?? value.tweets
	if (!Array.isArray(posts)) return false
	if (!posts.every(isPostLike)) return false
	if (value.includes !== undefined && !isIncludesLike(value.includes)) {
		return false
	}
	return true
}

/** Normalize a validated cache file to the current record shape. */
export function dayCacheFromStored(stored: StoredDayCache): DayCacheRecord {
	return {
		posts: stored.posts ?? stored.tweets ?? [],
		includes: stored.includes ?? {},
	}
}

/** Create an empty fetch result. */
export function createFetchResult(
	partial: Partial<FetchResult> = {},
): FetchResult {
	return {
		posts: [],
		includes: {},
		request_count: 0,
		from_cache: false,
		...partial,
	}
}

/** Serialize a bundle to the on-disk cache shape. */
export function bundleToCacheDict(bundle: PostBundle): DayCacheRecord {
	return { posts: bundle.posts, includes: bundle.includes }
}
