#!/usr/bin/env node
/**
 * x-post-archive CLI - Export a day of X posts into Obsidian notes.
 *
 * Usage:
 *   x-post-archive [YYYY-MM-DD] [options]
 *
 * Options:
 *   --end=YYYY-MM-DD  Exclusive end date (default: the day after start)
 *   --input=PATH      Saved X API timeline pages (JSON) to import
 *   --username=NAME   Account handle used in post links
 *   --refresh         Ignore cached days and re-import from --input
 *   --no-titles       Skip link title resolution
 *   --no-media        Skip media download
 *   --debug           Enable verbose debug logging
 */

import { estimateCost, formatCost } from './lib/analytics.js'
import { DayCacheStore } from './lib/cache.js'
import * as config from './lib/config.js'
import {
	addDays,
	daysBetween,
	localDateKey,
	parseDateKey,
	periodForDates,
} from './lib/dates.js'
import { DEBUG_ENV } from './lib/log.js'
import { downloadMedia } from './lib/media.js'
import { MarkdownAssembler } from './lib/render.js'
import { createFetchResult, type FetchResult, type MediaMap, type Post } from './lib/schema.js'
import { collectFetchResult, JsonFileSource } from './lib/source.js'
import { ProgressDisplay } from './lib/ui.js'
import { resolveTitles } from './lib/url-resolver.js'

/** Print usage information and exit. */
function showHelp(): never {
	const text = `x-post-archive - Export your X posts into per-day Obsidian notes.

Usage:
  x-post-archive [YYYY-MM-DD] [options]

Arguments:
  YYYY-MM-DD        First local day to export (default: yesterday)

Options:
  --end=YYYY-MM-DD  Exclusive end date (default: the day after start)
  --input=PATH      Saved X API timeline pages (JSON) to import
  --username=NAME   Account handle used in post links (default: X_USERNAME)
  --refresh         Ignore cached days and re-import from --input
  --no-titles       Skip link title resolution
  --no-media        Skip media download
  --debug           Enable verbose debug logging
  -h, --help        Show this help message

Config:
  Settings are loaded from environment variables or ~/.config/x-post-archive/.env
    OBSIDIAN_VAULT_PATH           Vault root (required)
    OBSIDIAN_OUTPUT_DIR           Folder inside the vault (default: x-posts)
    FILENAME_FORMAT               Note file name pattern (default: x-post-%Y-%m-%d)
    HEADING_FORMAT                Section heading pattern (default: %Y-%m-%d %H:%M)
    X_POST_ARCHIVE_TZ             Time zone of the daily split (default: Asia/Tokyo)
    X_POST_ARCHIVE_COST_PER_READ  USD per post read (default: 0.005)
    X_USERNAME                    Account handle

Examples:
  x-post-archive --input=timeline.json
  x-post-archive 2026-02-20 --end=2026-02-23 --input=pages.json
  x-post-archive 2026-02-20 --no-media`

	console.log(text)
	process.exit(0)
}

function fail(message: string): never {
	process.stderr.write(`Error: ${message}\n`)
	process.exit(1)
}

/** Parse CLI arguments. */
function parseArgs(args: string[]) {
	let date: string | null = null
	let end: string | null = null
	let input: string | null = null
	let username: string | null = null
	let refresh = false
	let titles = true
	let media = true
	let debug = false

	const valueOf = (i: number, flag: string): string => {
		const value = args[i + 1]
		if (!value || value.startsWith('-')) fail(`${flag} requires a value`)
		return value
	}

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? ''
		if (arg === '--help' || arg === '-h') {
			showHelp()
		} else if (arg.startsWith('--end=')) {
			end = arg.slice('--end='.length)
		} else if (arg === '--end') {
			end = valueOf(i, arg)
			i += 1
		} else if (arg.startsWith('--input=')) {
			input = arg.slice('--input='.length)
		} else if (arg === '--input') {
			input = valueOf(i, arg)
			i += 1
		} else if (arg.startsWith('--username=')) {
			username = arg.slice('--username='.length)
		} else if (arg === '--username') {
			username = valueOf(i, arg)
			i += 1
		} else if (arg === '--refresh') {
			refresh = true
		} else if (arg === '--no-titles') {
			titles = false
		} else if (arg === '--no-media') {
			media = false
		} else if (arg === '--debug') {
			debug = true
		} else if (arg.startsWith('-')) {
			process.stderr.write(`Error: Unknown flag: ${arg}\n`)
			process.stderr.write('Run x-post-archive --help for usage.\n')
			process.exit(1)
		} else if (date) {
			fail(`Unexpected argument: ${arg}`)
		} else {
			date = arg
		}
	}

	return { date, end, input, username, refresh, titles, media, debug }
}

function countTitles(posts: readonly Post[]): number {
	let count = 0
	for (const post of posts) {
		for (const entity of post.entities?.urls ?? []) {
			if (entity.title) count++
		}
		for (const entity of post.note_tweet?.entities?.urls ?? []) {
			if (entity.title) count++
		}
	}
	return count
}

async function main() {
	const args = parseArgs(process.argv.slice(2))

	if (args.debug) {
		process.env[DEBUG_ENV] = '1'
	}

	const raw = config.getConfig()
	const [cfg, configError] = config.resolveExportConfig(raw)
	if (!cfg) fail(configError ?? 'Invalid configuration')

	const username = args.username ?? raw.X_USERNAME
	if (!username) fail('No username. Pass --username=NAME or set X_USERNAME.')

	const startKey = args.date ?? addDays(localDateKey(new Date(), cfg.timeZone), -1)
	if (!parseDateKey(startKey)) fail(`Invalid date: "${startKey}" (expected YYYY-MM-DD)`)
	const endKey = args.end ?? addDays(startKey, 1)
	if (!parseDateKey(endKey)) fail(`Invalid --end: "${endKey}" (expected YYYY-MM-DD)`)
	const days = daysBetween(startKey, endKey)
	if (days < 1) fail('--end must be after the start date')

	const period = periodForDates(startKey, endKey, cfg.timeZone)
	const progress = new ProgressDisplay(
		`${startKey} → ${endKey} (${days} day${days === 1 ? '' : 's'}, ${cfg.timeZone})`,
	)
	const store = new DayCacheStore(cfg)

	let result: FetchResult | null = null
	if (!args.refresh) {
		const cached = store.load(period)
		if (cached) {
			result = createFetchResult({ ...cached, from_cache: true })
			progress.showCached(result.posts.length)
		}
	}

	if (!result) {
		if (!args.input) {
			fail(`No cached posts for ${startKey} → ${endKey}. Pass --input=PATH to import.`)
		}
		progress.startFetch(args.input)
		const pages = await new JsonFileSource(args.input).fetch(period)
		result = collectFetchResult(pages, period)
		progress.endFetch(result.posts.length, result.request_count)
		store.save(result, period)
	}

	if (result.posts.length === 0) {
		progress.showEmpty()
		return
	}

	let posts = result.posts
	const includes = result.includes

	if (args.titles) {
		progress.startTitles()
		const before = countTitles(posts)
		posts = await resolveTitles(posts)
		progress.endTitles(countTitles(posts) - before)
		store.save({ posts, includes })
	}

	let mediaMap: MediaMap = {}
	if (args.media) {
		progress.startMedia()
		mediaMap = await downloadMedia(posts, includes, cfg.outputDir)
		progress.endMedia(Object.keys(mediaMap).length)
	}

	const written = new MarkdownAssembler(cfg).write({ posts, includes }, { username, mediaMap })

	const cost = result.from_cache
		? null
		: `${formatCost(estimateCost(posts.length, cfg.costPerRead))} (${posts.length} reads)`
	progress.showComplete(written, cost)
}

main()
	.then(() => process.exit(0))
	.catch((e) => {
		process.stderr.write(`Fatal error: ${e instanceof Error ? e.message : String(e)}\n`)
		process.exit(1)
	})
