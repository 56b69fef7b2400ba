/** Link-title resolution for shortened URLs, with a private-network filter. */

import { lookup } from 'node:dns/promises'
import { isIPv4, isIPv6 } from 'node:net'

import { request, responseText } from './http.js'
import { errorMessage, log } from './log.js'
import type { Entities, Post, UrlEntity } from './schema.js'

const TITLE_TIMEOUT = 5000
const MAX_REDIRECTS = 5
const X_DOMAINS = new Set(['x.com', 'twitter.com'])
const TITLE_RE = /<title[^>]*>([^<]+)<\/title>/i

/** Resolves a hostname to every address it maps to. */
export type HostLookup = (hostname: string) => Promise<string[]>

export const defaultLookup: HostLookup = async (hostname) => {
	const addresses = await lookup(hostname, { all: true })
	return addresses.map((entry) => entry.address)
}

export interface TitleOptions {
	lookup?: HostLookup
	timeout?: number
	maxRedirects?: number
}

function parseUrl(url: string): URL | null {
	try {
		return new URL(url)
	} catch {
		return null
	}
}

function hostnameOf(url: string): string | null {
	const parsed = parseUrl(url)
	return parsed ? parsed.hostname.replace(/^\[|\]$/g, '').toLowerCase() : null
}

/** Links to x.com or twitter.com are never fetched. */
export function isXUrl(url: string): boolean {
	const host = hostnameOf(url)
	if (!host) return false
	return X_DOMAINS.has(host.replace(/^www\./, ''))
}

function ipv4Octets(address: string): number[] | null {
	if (!isIPv4(address)) return null
	return address.split('.').map(Number)
}

function isPrivateIPv4(octets: readonly number[]): boolean {
	const [a = 0, b = 0] = octets
	if (a === 0 || a === 10 || a === 127) return true
	if (a === 169 && b === 254) return true
	if (a === 172 && b >= 16 && b <= 31) return true
	if (a === 192 && b === 168) return true
	if (a === 100 && b >= 64 && b <= 127) return true
	if (a >= 224) return true
	return false
}

/** Expand an IPv6 literal into eight 16-bit groups. */
function ipv6Groups(address: string): number[] | null {
	if (!isIPv6(address)) return null
	let text = address.toLowerCase().replace(/%.*$/, '')

	const tail = /(\d+\.\d+\.\d+\.\d+)$/.exec(text)
	if (tail?.[1]) {
		const octets = ipv4Octets(tail[1])
		if (!octets) return null
		const [a = 0, b = 0, c = 0, d = 0] = octets
		const hi = ((a << 8) | b).toString(16)
		const lo = ((c << 8) | d).toString(16)
		text = `${text.slice(0, -tail[1].length)}${hi}:${lo}`
	}

	const [head = '', rest] = text.split('::')
	const headGroups = head ? head.split(':') : []
	const restGroups = rest ? rest.split(':') : []
	const missing = 8 - headGroups.length - restGroups.length
	const groups =
		rest === undefined
			? headGroups
			: [...headGroups, ...Array<string>(missing).fill('0'), ...restGroups]
	if (groups.length !== 8) return null
	return groups.map((group) => Number.parseInt(group, 16))
}

/**
 * True for loopback, private, link-local, shared, unspecified, multicast
 * and broadcast addresses, including IPv4-mapped IPv6 forms.
 */
export function isPrivateAddress(address: string): boolean {
	const octets = ipv4Octets(address)
	if (octets) return isPrivateIPv4(octets)

	const groups = ipv6Groups(address)
	if (!groups) return true
	const [g0 = 0, g1 = 0, g2 = 0, g3 = 0, g4 = 0, g5 = 0, g6 = 0, g7 = 0] = groups

	const leadingZero = g0 === 0 && g1 === 0 && g2 === 0 && g3 === 0 && g4 === 0
	if (leadingZero && g5 === 0xffff) {
		return isPrivateIPv4([g6 >> 8, g6 & 0xff, g7 >> 8, g7 & 0xff])
	}
	if (leadingZero && g5 === 0 && g6 === 0 && (g7 === 0 || g7 === 1)) return true
	if ((g0 & 0xfe00) === 0xfc00) return true
	if ((g0 & 0xffc0) === 0xfe80) return true
	if ((g0 & 0xff00) === 0xff00) return true
	return false
}

/**
 * True when the URL's host is, or resolves to, a non-public address.
 * Unparseable URLs and failed lookups count as private.
 */
export async function isPrivateHost(
	url: string,
	resolve: HostLookup = defaultLookup,
): Promise<boolean> {
	const host = hostnameOf(url)
	if (!host) return true
	if (isIPv4(host) || isIPv6(host)) return isPrivateAddress(host)

	try {
		const addresses = await resolve(host)
		if (addresses.length === 0) return true
		return addresses.some(isPrivateAddress)
	} catch (err) {
		log(`DNS lookup failed for ${host}: ${errorMessage(err)}`)
		return true
	}
}

/** First `<title>` of an HTML document, trimmed. */
export function extractTitle(html: string): string | null {
	const match = TITLE_RE.exec(html)
	const title = match?.[1]?.trim()
	return title ? title : null
}

/**
 * Fetch the page title of a URL.
 * Redirects are followed by hand so every hop passes the private-host check.
 * Any failure yields null.
 */
export async function fetchTitle(
	url: string,
	options: TitleOptions = {},
): Promise<string | null> {
	const {
		lookup: resolve = defaultLookup,
		timeout = TITLE_TIMEOUT,
		maxRedirects = MAX_REDIRECTS,
	} = options

	let current = url
	for (let hop = 0; hop <= maxRedirects; hop++) {
		if (isXUrl(current)) return null
		const protocol = parseUrl(current)?.protocol
		if (protocol !== 'http:' && protocol !== 'https:') return null
		if (await isPrivateHost(current, resolve)) {
			log(`Skipping private host: ${current}`)
			return null
		}

		try {
			const response = await request('GET', current, {
				timeout,
				retries: 1,
				redirect: 'manual',
				headers: { Accept: 'text/html' },
			})
			if (response.status >= 300 && response.status < 400) {
				const location = response.headers.get('location')
				if (!location) return null
				current = new URL(location, current).toString()
				continue
			}
			const title = extractTitle(responseText(response))
			log(title ? `Title: ${current} -> ${title}` : `No title: ${current}`)
			return title
		} catch (err) {
			log(`Title fetch failed: ${current} (${errorMessage(err)})`)
			return null
		}
	}

	log(`Too many redirects: ${url}`)
	return null
}

type TitleCache = Map<string, Promise<string | null>>

async function resolveEntities(
	entities: Entities | undefined,
	cache: TitleCache,
	options: TitleOptions,
): Promise<Entities | undefined> {
	if (!entities?.urls) return entities
	const urls: UrlEntity[] = []
	for (const entity of entities.urls) {
		if (entity.title !== undefined) {
			urls.push(entity)
			continue
		}
		const target = entity.expanded_url ?? entity.url
		let pending = cache.get(target)
		if (!pending) {
			pending = fetchTitle(target, options)
			cache.set(target, pending)
		}
		const title = await pending
		urls.push(title ? { ...entity, title } : entity)
	}
	return { ...entities, urls }
}

/**
 * Fill in missing link titles on every post's URL entities.
 * Returns new post objects; each distinct URL is fetched once.
 */
export async function resolveTitles(
	posts: readonly Post[],
	options: TitleOptions = {},
): Promise<Post[]> {
	const cache: TitleCache = new Map()
	const resolved: Post[] = []
	for (const post of posts) {
		const next: Post = { ...post }
		const entities = await resolveEntities(post.entities, cache, options)
		if (entities) next.entities = entities
		if (post.note_tweet?.entities) {
			const noteEntities = await resolveEntities(post.note_tweet.entities, cache, options)
			next.note_tweet = { ...post.note_tweet, entities: noteEntities }
		}
		resolved.push(next)
	}
	return resolved
}
