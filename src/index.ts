/**
 * x-post-archive
 *
 * Export X posts into per-day Obsidian Markdown notes, with a day-partitioned
 * JSON cache, quoted-post rendering, self-reply threads and engagement totals.
 */

// Analytics
export {
	estimateCost,
	formatCost,
	isPlainRetweet,
	type MetricTotals,
	renderAnalytics,
	renderMetrics,
	summarizeMetrics,
} from './lib/analytics.js'
// Cache
export { cacheFileName, DayCacheStore } from './lib/cache.js'
// Config
export {
	createExportConfig,
	DEFAULT_COST_PER_READ,
	DEFAULT_FILENAME_FORMAT,
	DEFAULT_HEADING_FORMAT,
	DEFAULT_OUTPUT_DIR,
	DEFAULT_TIME_ZONE,
	type ExportConfig,
	getConfig,
	loadEnvFile,
	resolveExportConfig,
} from './lib/config.js'
// Date utilities
export {
	addDays,
	datesInPeriod,
	daysBetween,
	formatDateKey,
	isValidTimeZone,
	type LocalDateTime,
	localDateKey,
	localMidnight,
	parseDateKey,
	parseInstant,
	partitionKey,
	partitionPosts,
	periodForDates,
	strftime,
	toLocalDateTime,
} from './lib/dates.js'
// Deduplication
export {
	countIncludes,
	includesFromItems,
	mediaIdentity,
	mergeIncludes,
	mergeUnique,
} from './lib/dedupe.js'
// HTTP
export { get, HTTPError, type HttpResponse, request } from './lib/http.js'
// Media
export {
	altPhotoUrl,
	bestVideoUrl,
	collectMediaKeys,
	downloadMedia,
	extensionFromUrl,
	MEDIA_DIR_NAME,
	mediaUrl,
} from './lib/media.js'
// Quotes
export {
	expandUrls,
	MAX_QUOTE_DEPTH,
	postText,
	type QuoteOptions,
	renderQuoted,
	sanitizeLinkText,
} from './lib/quote.js'
// Reference graph
export {
	buildReferenceGraph,
	type GraphPost,
	type ReferenceGraph,
} from './lib/references.js'
// Rendering
export {
	groupPostsByDate,
	MarkdownAssembler,
	postUrl,
	type RenderContext,
	renderDay,
	renderPost,
	renderPostBody,
	renderThread,
	type WriteOptions,
} from './lib/render.js'
// Schema
export type {
	DayCacheRecord,
	FetchResult,
	IncludeItem,
	IncludesBundle,
	MediaMap,
	MediaRecord,
	Period,
	Post,
	PostBundle,
	UserRecord,
} from './lib/schema.js'
export { createFetchResult, isStoredDayCache } from './lib/schema.js'
// Sources
export {
	type ApiPage,
	collectFetchResult,
	isApiPage,
	JsonFileSource,
	parseApiPages,
	type PostSource,
} from './lib/source.js'
// Threads
export {
	detectSelfReplyChains,
	type ReplyChains,
	replyTargets,
} from './lib/threads.js'
// Titles
export {
	extractTitle,
	fetchTitle,
	type HostLookup,
	isPrivateAddress,
	isPrivateHost,
	isXUrl,
	resolveTitles,
} from './lib/url-resolver.js'
// UI
export { ProgressDisplay } from './lib/ui.js'
