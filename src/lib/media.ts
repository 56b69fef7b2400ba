/** Media download into the vault's `media/` folder. */

import { existsSync, mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'

import { get, HTTPError, type HttpResponse } from './http.js'
import { errorMessage, log, warn } from './log.js'
import type {
	IncludesBundle,
	MediaMap,
	MediaRecord,
	MediaVariant,
	Post,
} from './schema.js'

export const MEDIA_DIR_NAME = 'media'
const MEDIA_TIMEOUT = 30_000
const KNOWN_EXTENSIONS = new Set(['jpg', 'jpeg', 'png', 'gif', 'mp4', 'webp'])

/** Highest-bitrate mp4 variant. */
export function bestVideoUrl(variants: readonly MediaVariant[]): string | null {
	let best: MediaVariant | null = null
	for (const variant of variants) {
		if (variant.content_type !== 'video/mp4') continue
		if (!best || (variant.bit_rate ?? 0) > (best.bit_rate ?? 0)) best = variant
	}
	return best?.url ?? null
}

/** Download URL of a media record, or null for unsupported types. */
export function mediaUrl(media: MediaRecord): string | null {
	switch (media.type) {
		case 'photo':
			return media.url ?? null
		case 'video':
		case 'animated_gif':
			return bestVideoUrl(media.variants ?? [])
		default:
			return null
	}
}

/** File extension from the URL path; `jpg` when unknown. */
export function extensionFromUrl(url: string): string {
	let path: string
	try {
		path = new URL(url).pathname
	} catch {
		return 'jpg'
	}
	const dot = path.lastIndexOf('.')
	if (dot === -1) return 'jpg'
	const ext = path.slice(dot + 1)
	return KNOWN_EXTENSIONS.has(ext) ? ext : 'jpg'
}

/**
 * `pbs.twimg.com/media/ABC.jpg` → `pbs.twimg.com/media/ABC?format=jpg&name=large`.
 * Null for other hosts or paths without an extension.
 */
export function altPhotoUrl(url: string): string | null {
	let parsed: URL
	try {
		parsed = new URL(url)
	} catch {
		return null
	}
	if (parsed.hostname !== 'pbs.twimg.com') return null

	const slash = parsed.pathname.lastIndexOf('/')
	const dir = parsed.pathname.slice(0, slash)
	const filename = parsed.pathname.slice(slash + 1)
	const dot = filename.lastIndexOf('.')
	if (dot === -1) return null
	const base = filename.slice(0, dot)
	const ext = filename.slice(dot + 1)
	return `https://pbs.twimg.com${dir}/${base}?format=${ext}&name=large`
}

/**
 * Media keys the export needs: attachments of the posts and of every
 * referenced post, plus article cover images. Only keys present in
 * `includes.media` are returned.
 */
export function collectMediaKeys(
	posts: readonly Post[],
	includes: IncludesBundle,
): string[] {
	const known = new Set((includes.media ?? []).map((media) => media.media_key))
	const needed = new Set<string>()
	const add = (key: string | undefined): void => {
		if (key && known.has(key)) needed.add(key)
	}

	for (const post of [...posts, ...(includes.tweets ?? [])]) {
		for (const key of post.attachments?.media_keys ?? []) add(key)
		add(post.article?.cover_media)
	}
	return [...needed]
}

async function fetchMedia(url: string): Promise<HttpResponse> {
	try {
		return await get(url, undefined, { timeout: MEDIA_TIMEOUT })
	} catch (err) {
		const alt = altPhotoUrl(url)
		if (err instanceof HTTPError && err.status_code === 404 && alt) {
			log(`404 for ${url}, trying ${alt}`)
			return get(alt, undefined, { timeout: MEDIA_TIMEOUT })
		}
		throw err
	}
}

/**
 * Download needed media under `<outputDir>/media/` as `<media_key>.<ext>`.
 * Files already on disk are reused. Failures are warned about and skipped.
 * @returns media_key → vault-relative path
 */
export async function downloadMedia(
	posts: readonly Post[],
	includes: IncludesBundle,
	outputDir: string,
): Promise<MediaMap> {
	const keys = collectMediaKeys(posts, includes)
	if (keys.length === 0) return {}

	const records = new Map<string, MediaRecord>()
	for (const media of includes.media ?? []) records.set(media.media_key, media)

	const mediaDir = join(outputDir, MEDIA_DIR_NAME)
	mkdirSync(mediaDir, { recursive: true })

	const result: MediaMap = {}
	for (const key of keys) {
		const media = records.get(key)
		const url = media ? mediaUrl(media) : null
		if (!url) {
			log(`No download URL for ${key}`)
			continue
		}

		const filename = `${key}.${extensionFromUrl(url)}`
		const filePath = join(mediaDir, filename)
		const relativePath = `${MEDIA_DIR_NAME}/${filename}`

		if (existsSync(filePath)) {
			log(`Media exists: ${relativePath}`)
			result[key] = relativePath
			continue
		}

		try {
			const response = await fetchMedia(url)
			writeFileSync(filePath, response.body)
			log(`Downloaded ${relativePath} (${media?.type ?? 'unknown'})`)
			result[key] = relativePath
		} catch (err) {
			warn(`Media download failed: ${url} (${errorMessage(err)})`)
		}
	}
	return result
}
