/** Markdown rendering for x-post-archive: one document per local day. */

import { mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'

import { isPlainRetweet, renderAnalytics, renderMetrics } from './analytics.js'
import type { ExportConfig } from './config.js'
import {
	formatDateKey,
	parseInstant,
	partitionPosts,
	strftime,
	toLocalDateTime,
} from './dates.js'
import { log } from './log.js'
import { postText, renderQuoted, sanitizeLinkText } from './quote.js'
import { buildReferenceGraph, type ReferenceGraph } from './references.js'
import type { MediaMap, Post, PostBundle } from './schema.js'
import { detectSelfReplyChains, replyTargets } from './threads.js'

export const POST_URL_BASE = 'https://x.com'
/** Front-matter `type` of every generated note. */
export const DOCUMENT_TYPE = 'x-posts'

/** Everything a section renderer needs besides the post itself. */
export interface RenderContext {
	username: string
	graph: ReferenceGraph
	mediaMap: MediaMap
	timeZone: string
	headingFormat: string
}

export function postUrl(username: string, postId: string): string {
	return `${POST_URL_BASE}/${username}/status/${postId}`
}

function instantOf(post: Post): number {
	return parseInstant(post.created_at)?.getTime() ?? 0
}

/** Group posts by local date, chronological within each date. */
export function groupPostsByDate(
	posts: readonly Post[],
	timeZone: string,
): Map<string, Post[]> {
	const groups = partitionPosts(posts, timeZone)
	for (const group of groups.values()) {
		group.sort((a, b) => instantOf(a) - instantOf(b))
	}
	return groups
}

function renderHeading(post: Post, ctx: RenderContext): string {
	const instant = parseInstant(post.created_at)
	const label = instant
		? strftime(ctx.headingFormat, toLocalDateTime(instant, ctx.timeZone))
		: post.created_at
	return `## [${label}](${postUrl(ctx.username, post.id)})`
}

function renderMedia(post: Post, mediaMap: MediaMap): string[] {
	const lines: string[] = []
	for (const key of post.attachments?.media_keys ?? []) {
		const path = mediaMap[key]
		if (path) {
			lines.push(`![](${path})`)
			lines.push('')
		}
	}
	return lines
}

/**
 * Body of one post without heading or metrics: reply targets, text or
 * article, media, then quoted posts. Reply targets in `skipReplyIds` are
 * not quoted.
 */
export function renderPostBody(
	post: Post,
	ctx: RenderContext,
	skipReplyIds: ReadonlySet<string> = new Set(),
): string[] {
	const { graph, mediaMap } = ctx
	const path = new Set([post.id])
	const lines: string[] = []

	for (const id of replyTargets(post)) {
		const target = graph.get(id)
		if (!target || skipReplyIds.has(id)) continue
		lines.push(...renderQuoted(target, graph, { mediaMap, path }))
		lines.push('')
	}

	const article = post.article
	if (article) {
		if (article.title) {
			lines.push(`**${sanitizeLinkText(article.title)}**`)
			lines.push('')
		}
		const coverPath = article.cover_media
			? mediaMap[article.cover_media]
			: undefined
		if (coverPath) {
			lines.push(`![](${coverPath})`)
			lines.push('')
		}
		if (article.plain_text) {
			lines.push(article.plain_text)
			lines.push('')
		}
		return lines
	}

	lines.push(postText(post))
	lines.push('')
	lines.push(...renderMedia(post, mediaMap))

	for (const ref of post.referenced_tweets ?? []) {
		if (ref.type !== 'quoted') continue
		const target = graph.get(ref.id)
		if (!target) continue
		lines.push(...renderQuoted(target, graph, { mediaMap, path }))
		lines.push('')
	}

	return lines
}

/** Section for a standalone post. Plain retweets show only the original. */
export function renderPost(post: Post, ctx: RenderContext): string {
	const lines: string[] = [renderHeading(post, ctx), '']

	if (isPlainRetweet(post)) {
		for (const ref of post.referenced_tweets ?? []) {
			if (ref.type !== 'retweeted') continue
			const target = ctx.graph.get(ref.id)
			if (!target) continue
			lines.push(
				...renderQuoted(target, ctx.graph, {
					mediaMap: ctx.mediaMap,
					path: new Set([post.id]),
				}),
			)
			lines.push('')
		}
	} else {
		lines.push(...renderPostBody(post, ctx))
		lines.push(...renderMetrics([post]))
	}

	return lines.join('\n')
}

/** Section for a self-reply chain, linked to its first post. */
export function renderThread(chain: readonly Post[], ctx: RenderContext): string {
	const first = chain[0]
	if (!first) return ''

	const chainIds = new Set(chain.map((post) => post.id))
	const lines: string[] = [renderHeading(first, ctx), '']
	for (const post of chain) {
		lines.push(...renderPostBody(post, ctx, chainIds))
	}
	lines.push(...renderMetrics(chain))

	return lines.join('\n')
}

/** Full document for one local day. */
export function renderDay(
	dateKey: string,
	posts: readonly Post[],
	ctx: RenderContext,
	costPerRead: number,
): string {
	const { heads, suppressed } = detectSelfReplyChains(posts)

	const lines: string[] = [
		'---',
		`date: ${dateKey}`,
		`type: ${DOCUMENT_TYPE}`,
		'---',
		'',
		renderAnalytics(posts, costPerRead),
		'',
	]

	for (const post of posts) {
		if (suppressed.has(post.id)) continue
		lines.push('---')
		lines.push('')
		const chain = heads.get(post.id)
		lines.push(chain ? renderThread(chain, ctx) : renderPost(post, ctx))
		lines.push('')
	}

	return lines.join('\n')
}

export interface WriteOptions {
	username: string
	mediaMap?: MediaMap
}

/** Writes one Markdown document per local day into `config.outputDir`. */
export class MarkdownAssembler {
	private readonly config: ExportConfig

	constructor(config: ExportConfig) {
		this.config = config
	}

	/** Output file name for a date, from `filenameFormat`. */
	fileNameFor(dateKey: string): string {
		return `${formatDateKey(this.config.filenameFormat, dateKey)}.md`
	}

	/** Render every day of `bundle` without touching the disk. */
	renderAll(bundle: PostBundle, options: WriteOptions): Map<string, string> {
		const ctx: RenderContext = {
			username: options.username,
			graph: buildReferenceGraph(bundle.includes),
			mediaMap: options.mediaMap ?? {},
			timeZone: this.config.timeZone,
			headingFormat: this.config.headingFormat,
		}
		const groups = groupPostsByDate(bundle.posts, this.config.timeZone)
		const documents = new Map<string, string>()
		for (const dateKey of [...groups.keys()].sort()) {
			documents.set(
				dateKey,
				renderDay(dateKey, groups.get(dateKey) ?? [], ctx, this.config.costPerRead),
			)
		}
		return documents
	}

	/**
	 * Render and write all days, overwriting existing files.
	 * @returns Written file paths, in date order
	 */
	write(bundle: PostBundle, options: WriteOptions): string[] {
		mkdirSync(this.config.outputDir, { recursive: true })
		const written: string[] = []
		for (const [dateKey, content] of this.renderAll(bundle, options)) {
			const path = join(this.config.outputDir, this.fileNameFor(dateKey))
			writeFileSync(path, content, 'utf-8')
			log(`Wrote ${path}`)
			written.push(path)
		}
		return written
	}
}
