/** Same-day self-reply chain detection. */

import type { Post } from './schema.js'

export interface ReplyChains {
	/** Head id → chain members, head first. */
	heads: Map<string, Post[]>
	/** Non-head members; rendered only inside their chain's entry. */
	suppressed: Set<string>
}

/** Ids of posts replied to by `post`. */
export function replyTargets(post: Post): string[] {
	return (post.referenced_tweets ?? [])
		.filter((ref) => ref.type === 'replied_to')
		.map((ref) => ref.id)
}

/**
 * Find maximal chains of replies between posts of the same day.
 *
 * Walks upward from every tail (a post nobody in the set replies to). Tails
 * are visited in input order, so when two branches share a head the later
 * one keeps it. Every non-head member of every walked chain is suppressed,
 * including those of a branch whose head was taken over.
 */
export function detectSelfReplyChains(posts: readonly Post[]): ReplyChains {
	const byId = new Map<string, Post>()
	for (const post of posts) byId.set(post.id, post)

	const childToParent = new Map<string, string>()
	for (const post of posts) {
		for (const target of replyTargets(post)) {
			if (byId.has(target)) childToParent.set(post.id, target)
		}
	}

	const parentIds = new Set(childToParent.values())
	const heads = new Map<string, Post[]>()
	const suppressed = new Set<string>()

	for (const post of posts) {
		if (parentIds.has(post.id)) continue

		const ids: string[] = []
		const visited = new Set<string>()
		let current: string | undefined = post.id
		while (current !== undefined && !visited.has(current)) {
			visited.add(current)
			ids.push(current)
			current = childToParent.get(current)
		}
		if (ids.length < 2) continue

		ids.reverse()
		const chain: Post[] = []
		for (const id of ids) {
			const member = byId.get(id)
			if (member) chain.push(member)
		}
		const head = chain[0]
		if (!head) continue
		heads.set(head.id, chain)
		for (const member of chain.slice(1)) suppressed.add(member.id)
	}

	return { heads, suppressed }
}
