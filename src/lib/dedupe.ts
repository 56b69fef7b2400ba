/** Merge-without-duplication for include side-tables. */

import type {
	IncludeCategory,
	IncludeItem,
	IncludesBundle,
	MediaRecord,
	Post,
	UserRecord,
} from './schema.js'

/** Identity of a media record: `media_key`, falling back to `id`. */
export function mediaIdentity(media: MediaRecord): string {
	return media.media_key ?? media.id ?? ''
}

function recordIdentity(record: Post | UserRecord): string {
	return record.id ?? ''
}

/**
 * Concatenate `existing` then `incoming`, skipping any item whose identity
 * is already present. Duplicates inside `incoming` collapse too.
 */
export function mergeUnique<T>(
	existing: readonly T[],
	incoming: readonly T[],
	identity: (item: T) => string,
): T[] {
	const seen = new Set<string>()
	const result: T[] = []
	for (const item of [...existing, ...incoming]) {
		const key = identity(item)
		if (seen.has(key)) continue
		seen.add(key)
		result.push(item)
	}
	return result
}

function mergeCategory<T>(
	existing: readonly T[] | undefined,
	incoming: readonly T[] | undefined,
	identity: (item: T) => string,
): T[] | undefined {
	if (!existing && !incoming) return undefined
	return mergeUnique(existing ?? [], incoming ?? [], identity)
}

/** Merge two include bundles; categories absent from both stay absent. */
export function mergeIncludes(
	existing: IncludesBundle,
	incoming: IncludesBundle,
): IncludesBundle {
	const merged: IncludesBundle = {}
	const tweets = mergeCategory(existing.tweets, incoming.tweets, recordIdentity)
	const users = mergeCategory(existing.users, incoming.users, recordIdentity)
	const media = mergeCategory(existing.media, incoming.media, mediaIdentity)
	if (tweets) merged.tweets = tweets
	if (users) merged.users = users
	if (media) merged.media = media
	return merged
}

/** Number of records per category, for log lines. */
export function countIncludes(
	includes: IncludesBundle,
): Record<IncludeCategory, number> {
	return {
		tweets: includes.tweets?.length ?? 0,
		users: includes.users?.length ?? 0,
		media: includes.media?.length ?? 0,
	}
}

/** Fold tagged include items into a de-duplicated bundle. */
export function includesFromItems(
	items: readonly IncludeItem[],
	base: IncludesBundle = {},
): IncludesBundle {
	const incoming: IncludesBundle = {}
	for (const item of items) {
		switch (item.kind) {
			case 'post':
				;(incoming.tweets ??= []).push(item.data)
				break
			case 'user':
				;(incoming.users ??= []).push(item.data)
				break
			case 'media':
				;(incoming.media ??= []).push(item.data)
				break
		}
	}
	return mergeIncludes(base, incoming)
}
