/** Id-indexed lookup over referenced posts, used while rendering. */

import type { IncludesBundle, Post } from './schema.js'

/** Referenced post plus the author handle resolved from `includes.users`. */
export interface GraphPost extends Post {
	resolved_author_handle: string
}

export type ReferenceGraph = ReadonlyMap<string, GraphPost>

/**
 * Build the reference graph from an includes bundle.
 * Posts are copied, never mutated, so cached records stay untouched.
 */
export function buildReferenceGraph(includes: IncludesBundle): ReferenceGraph {
	const handles = new Map<string, string>()
	for (const user of includes.users ?? []) {
		handles.set(user.id, user.username ?? '')
	}

	const graph = new Map<string, GraphPost>()
	for (const post of includes.tweets ?? []) {
		graph.set(post.id, {
			...post,
			resolved_author_handle: handles.get(post.author_id ?? '') ?? '',
		})
	}
	return graph
}
