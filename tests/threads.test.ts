import { describe, expect, test } from 'vitest'

import {
	estimateCost,
	formatCost,
	isPlainRetweet,
	renderAnalytics,
	renderMetrics,
	summarizeMetrics,
} from '../src/lib/analytics.js'
import type { Post } from '../src/lib/schema.js'
import { detectSelfReplyChains, replyTargets } from '../src/lib/threads.js'

function reply(id: string, parent?: string): Post {
	return {
		id,
		text: id,
		created_at: '2026-02-20T00:00:00.000Z',
		referenced_tweets: parent ? [{ type: 'replied_to', id: parent }] : undefined,
	}
}

function ids(posts: Post[] | undefined): string[] | undefined {
	return posts?.map((p) => p.id)
}

// ---------------------------------------------------------------------------
// self-reply chains
// ---------------------------------------------------------------------------
describe('detectSelfReplyChains', () => {
	test('linear chain', () => {
		const { heads, suppressed } = detectSelfReplyChains([reply('1'), reply('2', '1'), reply('3', '2')])
		expect([...heads.keys()]).toEqual(['1'])
		expect(ids(heads.get('1'))).toEqual(['1', '2', '3'])
		expect([...suppressed].sort()).toEqual(['2', '3'])
	})

	test('input order does not matter for membership', () => {
		const { heads } = detectSelfReplyChains([reply('3', '2'), reply('1'), reply('2', '1')])
		expect(ids(heads.get('1'))).toEqual(['1', '2', '3'])
	})

	test('replies to posts outside the day are not chains', () => {
		const { heads, suppressed } = detectSelfReplyChains([reply('2', 'elsewhere'), reply('3')])
		expect(heads.size).toBe(0)
		expect(suppressed.size).toBe(0)
	})

	test('branches: the later tail keeps the head, both branches are suppressed', () => {
		const { heads, suppressed } = detectSelfReplyChains([reply('1'), reply('2', '1'), reply('3', '1')])
		expect([...heads.keys()]).toEqual(['1'])
		expect(ids(heads.get('1'))).toEqual(['1', '3'])
		expect([...suppressed].sort()).toEqual(['2', '3'])
	})

	test('reply cycles produce no chain', () => {
		const { heads } = detectSelfReplyChains([reply('1', '2'), reply('2', '1')])
		expect(heads.size).toBe(0)
	})

	test('replyTargets lists replied_to ids only', () => {
		const post: Post = {
			id: 'x',
			text: '',
			created_at: '2026-02-20T00:00:00.000Z',
			referenced_tweets: [
				{ type: 'quoted', id: 'q' },
				{ type: 'replied_to', id: 'r' },
			],
		}
		expect(replyTargets(post)).toEqual(['r'])
	})
})

// ---------------------------------------------------------------------------
// analytics
// ---------------------------------------------------------------------------
describe('analytics', () => {
	const own: Post = {
		id: 'own',
		text: 'hello',
		created_at: '2026-02-20T00:00:00.000Z',
		public_metrics: { like_count: 3, retweet_count: 1, reply_count: 0, impression_count: 50 },
	}
	const retweet: Post = {
		id: 'rt',
		text: 'RT @bob: hi',
		created_at: '2026-02-20T01:00:00.000Z',
		referenced_tweets: [{ type: 'retweeted', id: '900' }],
		public_metrics: { like_count: 99 },
	}

	test('isPlainRetweet', () => {
		expect(isPlainRetweet(retweet)).toBe(true)
		expect(isPlainRetweet(own)).toBe(false)
	})

	test('missing counters count as zero', () => {
		expect(summarizeMetrics([own, reply('bare')])).toEqual({
			like: 3,
			retweet: 1,
			reply: 0,
			impression: 50,
		})
	})

	test('day block excludes retweets from counts but not from cost', () => {
		expect(renderAnalytics([own, retweet], 0.005)).toBe(
			[
				'## Analytics',
				'',
				'| Posts | Like | RT | Reply | Imp | Cost |',
				'|------:|-----:|---:|------:|----:|-----:|',
				'| 1 | 3 | 1 | 0 | 50 | $0.010 |',
			].join('\n'),
		)
	})

	test('empty day', () => {
		expect(renderAnalytics([], 0.005).split('\n').at(-1)).toBe('| 0 | 0 | 0 | 0 | 0 | $0.000 |')
	})

	test('per-entry table', () => {
		expect(renderMetrics([own])).toEqual([
			'| Like | RT | Reply | Imp |',
			'|-----:|---:|------:|----:|',
			'| 3 | 1 | 0 | 50 |',
		])
	})

	test('cost helpers', () => {
		expect(estimateCost(4, 0.005)).toBeCloseTo(0.02)
		expect(formatCost(0.02)).toBe('$0.020')
	})
})
