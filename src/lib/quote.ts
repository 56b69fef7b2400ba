/** Block-quote rendering of referenced posts. */

import type { GraphPost, ReferenceGraph } from './references.js'
import type { Entities, MediaMap, Post, ReferenceType } from './schema.js'

/** Deepest quote level rendered; anything below is dropped. */
export const MAX_QUOTE_DEPTH = 5

const NESTED_REFERENCE_TYPES: ReadonlySet<ReferenceType> = new Set([
	'quoted',
	'retweeted',
	'replied_to',
])

/** Strip `[` and `]` so a title cannot break out of `[text](url)`. */
export function sanitizeLinkText(text: string): string {
	return text.replace(/[[\]]/g, '')
}

/**
 * Replace every shortened URL with its expanded form, or with a
 * `[title](expanded)` link when a title has been resolved.
 */
export function expandUrls(text: string, entities: Entities | undefined): string {
	let result = text
	for (const entity of entities?.urls ?? []) {
		if (!entity.url) continue
		const expanded = entity.expanded_url ?? entity.url
		const replacement = entity.title
			? `[${sanitizeLinkText(entity.title)}](${expanded})`
			: expanded
		result = result.split(entity.url).join(replacement)
	}
	return result
}

/** Display text of a post: the note payload when present, URLs expanded. */
export function postText(post: Post): string {
	const note = post.note_tweet
	if (note) {
		return expandUrls(note.text ?? post.text, note.entities ?? post.entities)
	}
	return expandUrls(post.text, post.entities)
}

/** Prefix every line of `text` with `prefix`. */
function quoteLines(text: string, prefix: string): string {
	return prefix + text.split('\n').join(`\n${prefix}`)
}

export interface QuoteOptions {
	depth?: number
	mediaMap?: MediaMap
	/** Ids already being rendered above this level. */
	path?: ReadonlySet<string>
}

/**
 * Render a referenced post as a block quote at `depth`, recursing into its
 * own quotes, retweets and reply targets while `depth < MAX_QUOTE_DEPTH`.
 */
export function renderQuoted(
	post: GraphPost,
	graph: ReferenceGraph,
	options: QuoteOptions = {},
): string[] {
	const depth = options.depth ?? 1
	const mediaMap = options.mediaMap ?? {}
	const prefix = '> '.repeat(depth)
	const emptyPrefix = prefix.trimEnd()
	const lines: string[] = []

	if (post.resolved_author_handle) {
		lines.push(`${prefix}@${post.resolved_author_handle}:`)
		lines.push(emptyPrefix)
	}

	const article = post.article
	if (article) {
		if (article.title) {
			lines.push(`${prefix}**${sanitizeLinkText(article.title)}**`)
			lines.push(emptyPrefix)
		}
		const coverPath = article.cover_media
			? mediaMap[article.cover_media]
			: undefined
		if (coverPath) {
			lines.push(`${prefix}![](${coverPath})`)
			lines.push(emptyPrefix)
		}
		if (article.plain_text) {
			lines.push(quoteLines(article.plain_text, prefix))
		}
		return lines
	}

	lines.push(quoteLines(postText(post), prefix))

	for (const key of post.attachments?.media_keys ?? []) {
		const path = mediaMap[key]
		if (path) {
			lines.push(emptyPrefix)
			lines.push(`${prefix}![](${path})`)
		}
	}

	if (depth < MAX_QUOTE_DEPTH) {
		const seen = new Set(options.path ?? [])
		seen.add(post.id)
		for (const ref of post.referenced_tweets ?? []) {
			if (!NESTED_REFERENCE_TYPES.has(ref.type) || seen.has(ref.id)) continue
			const target = graph.get(ref.id)
			if (!target) continue
			lines.push(emptyPrefix)
			lines.push(
				...renderQuoted(target, graph, { depth: depth + 1, mediaMap, path: seen }),
			)
		}
	}

	return lines
}
