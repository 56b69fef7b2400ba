/** Engagement totals and cost estimate. */

import type { Post } from './schema.js'

export interface MetricTotals {
	like: number
	retweet: number
	reply: number
	impression: number
}

/** A retweet with no content of its own. */
export function isPlainRetweet(post: Post): boolean {
	return (post.referenced_tweets ?? []).some((ref) => ref.type === 'retweeted')
}

/** Sum public metrics; missing counters count as zero. */
export function summarizeMetrics(posts: readonly Post[]): MetricTotals {
	const totals: MetricTotals = { like: 0, retweet: 0, reply: 0, impression: 0 }
	for (const post of posts) {
		const m = post.public_metrics
		totals.like += m?.like_count ?? 0
		totals.retweet += m?.retweet_count ?? 0
		totals.reply += m?.reply_count ?? 0
		totals.impression += m?.impression_count ?? 0
	}
	return totals
}

/** Estimated API read cost in USD. */
export function estimateCost(postCount: number, costPerRead: number): number {
	return postCount * costPerRead
}

export function formatCost(cost: number): string {
	return `$${cost.toFixed(3)}`
}

/** Per-entry metric table. */
export function renderMetrics(posts: readonly Post[]): string[] {
	const t = summarizeMetrics(posts)
	return [
		'| Like | RT | Reply | Imp |',
		'|-----:|---:|------:|----:|',
		`| ${t.like} | ${t.retweet} | ${t.reply} | ${t.impression} |`,
	]
}

/**
 * Day-level analytics block.
 * Plain retweets are left out of the counts but still cost a read.
 */
export function renderAnalytics(
	posts: readonly Post[],
	costPerRead: number,
): string {
	const own = posts.filter((post) => !isPlainRetweet(post))
	const t = summarizeMetrics(own)
	const cost = estimateCost(posts.length, costPerRead)

	return [
		'## Analytics',
		'',
		'| Posts | Like | RT | Reply | Imp | Cost |',
		'|------:|-----:|---:|------:|----:|-----:|',
		`| ${own.length} | ${t.like} | ${t.retweet} | ${t.reply} | ${t.impression} | ${formatCost(cost)} |`,
	].join('\n')
}
