/** HTTP utilities for x-post-archive. */

import { log } from './log.js'

const DEFAULT_TIMEOUT = 30_000
const MAX_RETRIES = 3
const RETRY_DELAY = 1000
const MAX_RETRY_DELAY = 30_000
const MAX_JITTER_MS = 1000
export const USER_AGENT = 'x-post-archive/0.1'

/** HTTP request error with status code. */
export class HTTPError extends Error {
	status_code: number | null
	body: string | null
	method: string | null
	url: string | null

	constructor(
		message: string,
		statusCode: number | null = null,
		body: string | null = null,
		meta: { method?: string; url?: string } = {},
	) {
		super(message)
		this.name = 'HTTPError'
		this.status_code = statusCode
		this.body = body
		this.method = meta.method ?? null
		this.url = meta.url ?? null
	}
}

/** Response with the body fully read. */
export interface HttpResponse {
	status: number
	url: string
	headers: Headers
	body: Uint8Array
}

export interface RequestOptions {
	headers?: Record<string, string>
	timeout?: number
	retries?: number
	/** `manual` hands 3xx responses back instead of following them. */
	redirect?: 'follow' | 'manual' | 'error'
}

/** Exponential backoff with bounded jitter. */
export function backoffDelay(attempt: number): number {
	const exponential = RETRY_DELAY * 2 ** attempt
	const jitter = Math.floor(Math.random() * MAX_JITTER_MS)
	return Math.min(exponential + jitter, MAX_RETRY_DELAY)
}

/** Parse Retry-After header (seconds or HTTP date) to milliseconds. */
export function parseRetryAfterMs(
	retryAfterValue: string | null,
	nowMs: number = Date.now(),
): number | null {
	if (!retryAfterValue) return null
	const v = retryAfterValue.trim()
	if (!v) return null

	const seconds = Number(v)
	if (!Number.isNaN(seconds) && Number.isFinite(seconds) && seconds >= 0) {
		return Math.round(seconds * 1000)
	}

	const dateMs = Date.parse(v)
	if (Number.isNaN(dateMs)) return null
	return Math.max(0, dateMs - nowMs)
}

function isRedirect(status: number): boolean {
	return status >= 300 && status < 400
}

/**
 * Make an HTTP request and read the whole body.
 * Retries connection errors, 429 and 5xx; other 4xx fail immediately.
 */
export async function request(
	method: string,
	url: string,
	options: RequestOptions = {},
): Promise<HttpResponse> {
	const {
		headers: inputHeaders = {},
		timeout = DEFAULT_TIMEOUT,
		retries = MAX_RETRIES,
		redirect = 'follow',
	} = options

	const headers: Record<string, string> = {
		'User-Agent': USER_AGENT,
		...inputHeaders,
	}

	log(`${method} ${url}`)

	let lastError: HTTPError | null = null

	for (let attempt = 0; attempt < retries; attempt++) {
		const isFinalAttempt = attempt >= retries - 1
		let waitMs = backoffDelay(attempt)
		try {
			const controller = new AbortController()
			const timer = setTimeout(() => controller.abort(), timeout)
			let response: Response
			let body: Uint8Array

			try {
				response = await fetch(url, {
					method,
					headers,
					redirect,
					signal: controller.signal,
				})
				body = new Uint8Array(await response.arrayBuffer())
			} finally {
				clearTimeout(timer)
			}

			log(`Response: ${response.status} (${body.length} bytes)`)

			if (response.ok || (redirect === 'manual' && isRedirect(response.status))) {
				return {
					status: response.status,
					url: response.url || url,
					headers: response.headers,
					body,
				}
			}

			const text = new TextDecoder().decode(body.slice(0, 500))
			const error = new HTTPError(
				`HTTP ${response.status}: ${response.statusText}`,
				response.status,
				text,
				{ method, url },
			)
			if (response.status !== 429 && response.status < 500) throw error

			lastError = error
			const hinted = parseRetryAfterMs(response.headers.get('retry-after'))
			if (hinted != null) waitMs = Math.min(MAX_RETRY_DELAY, Math.max(waitMs, hinted))
		} catch (err) {
			if (err instanceof HTTPError) throw err
			const name = err instanceof Error ? err.name : 'Error'
			const msg = err instanceof Error ? err.message : String(err)
			log(`Connection error: ${name}: ${msg}`)
			lastError = new HTTPError(`Connection error: ${name}: ${msg}`, null, null, {
				method,
				url,
			})
		}

		if (!isFinalAttempt) {
			log(`Retrying in ${waitMs}ms (attempt ${attempt + 1}/${retries})`)
			await sleep(waitMs)
		}
	}

	if (lastError) throw lastError
	throw new HTTPError('Request failed with no error details')
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms))
}

/** Make a GET request. */
export async function get(
	url: string,
	headers?: Record<string, string>,
	options?: Omit<RequestOptions, 'headers'>,
): Promise<HttpResponse> {
	return request('GET', url, { headers, ...options })
}

/** Decode a response body as UTF-8 text. */
export function responseText(response: HttpResponse): string {
	return new TextDecoder().decode(response.body)
}
