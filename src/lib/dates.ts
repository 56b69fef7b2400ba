/** Date utilities for x-post-archive: zone-aware calendar days and formatting. */

import type { Period, Post } from './schema.js'

const DATE_KEY_RE = /^(\d{4})-(\d{2})-(\d{2})$/
const DAY_MS = 24 * 60 * 60 * 1000

/** Wall-clock fields of an instant in some time zone. */
export interface LocalDateTime {
	year: number
	month: number
	day: number
	hour: number
	minute: number
	second: number
}

const formatters = new Map<string, Intl.DateTimeFormat>()

function getFormatter(timeZone: string): Intl.DateTimeFormat {
	let fmt = formatters.get(timeZone)
	if (!fmt) {
		fmt = new Intl.DateTimeFormat('en-US', {
			timeZone,
			hourCycle: 'h23',
			year: 'numeric',
			month: '2-digit',
			day: '2-digit',
			hour: '2-digit',
			minute: '2-digit',
			second: '2-digit',
		})
		formatters.set(timeZone, fmt)
	}
	return fmt
}

/** True when the runtime knows the IANA zone name. */
export function isValidTimeZone(timeZone: string): boolean {
	if (!timeZone) return false
	try {
		getFormatter(timeZone)
		return true
	} catch {
		return false
	}
}

/** Wall-clock fields of `instant` in `timeZone`. */
export function toLocalDateTime(instant: Date, timeZone: string): LocalDateTime {
	const fields: Record<string, number> = {}
	for (const part of getFormatter(timeZone).formatToParts(instant)) {
		if (part.type !== 'literal') fields[part.type] = Number(part.value)
	}
	return {
		year: fields.year ?? 0,
		month: fields.month ?? 1,
		day: fields.day ?? 1,
		hour: fields.hour ?? 0,
		minute: fields.minute ?? 0,
		second: fields.second ?? 0,
	}
}

/** Format a Date as YYYY-MM-DD in UTC. */
function formatDate(d: Date): string {
	const year = d.getUTCFullYear()
	const month = String(d.getUTCMonth() + 1).padStart(2, '0')
	const day = String(d.getUTCDate()).padStart(2, '0')
	return `${year}-${month}-${day}`
}

/** Offset of `timeZone` from UTC at `instant`, in milliseconds. */
function zoneOffsetMs(instantMs: number, timeZone: string): number {
	const wholeSecond = Math.floor(instantMs / 1000) * 1000
	const local = toLocalDateTime(new Date(wholeSecond), timeZone)
	const asUtc = Date.UTC(
		local.year,
		local.month - 1,
		local.day,
		local.hour,
		local.minute,
		local.second,
	)
	return asUtc - wholeSecond
}

/** Calendar date (YYYY-MM-DD) of `instant` in `timeZone`. */
export function localDateKey(instant: Date, timeZone: string): string {
	const local = toLocalDateTime(instant, timeZone)
	return formatDate(new Date(Date.UTC(local.year, local.month - 1, local.day)))
}

/**
 * Parse a YYYY-MM-DD key into its numeric parts.
 * Returns null for anything that is not a real calendar date.
 */
export function parseDateKey(
	dateKey: string,
): { year: number; month: number; day: number } | null {
	const match = DATE_KEY_RE.exec(dateKey)
	if (!match) return null
	const year = Number(match[1])
	const month = Number(match[2])
	const day = Number(match[3])
	const probe = new Date(Date.UTC(year, month - 1, day))
	if (formatDate(probe) !== dateKey) return null
	return { year, month, day }
}

function requireDateKey(dateKey: string): {
	year: number
	month: number
	day: number
} {
	const parts = parseDateKey(dateKey)
	if (!parts) throw new Error(`Invalid date: "${dateKey}" (expected YYYY-MM-DD)`)
	return parts
}

/** Shift a YYYY-MM-DD key by whole calendar days. */
export function addDays(dateKey: string, days: number): string {
	const { year, month, day } = requireDateKey(dateKey)
	return formatDate(new Date(Date.UTC(year, month - 1, day + days)))
}

/** Instant at which `dateKey` begins in `timeZone`. */
export function localMidnight(dateKey: string, timeZone: string): Date {
	const { year, month, day } = requireDateKey(dateKey)
	const guess = Date.UTC(year, month - 1, day)
	const firstOffset = zoneOffsetMs(guess, timeZone)
	let instant = guess - firstOffset
	const secondOffset = zoneOffsetMs(instant, timeZone)
	if (secondOffset !== firstOffset) instant = guess - secondOffset
	return new Date(instant)
}

/**
 * Calendar dates whose local day intersects the half-open period.
 * Steps local midnight from the floor of `start` until it reaches `end`.
 */
export function datesInPeriod(period: Period, timeZone: string): string[] {
	const dates: string[] = []
	if (period.start.getTime() >= period.end.getTime()) return dates

	let dateKey = localDateKey(period.start, timeZone)
	let midnight = localMidnight(dateKey, timeZone)
	while (midnight.getTime() < period.end.getTime()) {
		if (dates[dates.length - 1] !== dateKey) dates.push(dateKey)
		dateKey = addDays(dateKey, 1)
		midnight = localMidnight(dateKey, timeZone)
	}
	return dates
}

/** Period covering whole local days `[fromKey, toKey)`. */
export function periodForDates(
	fromKey: string,
	toKey: string,
	timeZone: string,
): Period {
	return {
		start: localMidnight(fromKey, timeZone),
		end: localMidnight(toKey, timeZone),
	}
}

/**
 * Parse an API timestamp (ISO 8601 with `Z` or an explicit offset).
 * Returns null for anything else.
 */
export function parseInstant(value: string | null | undefined): Date | null {
	if (!value) return null
	if (!/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/.test(value)) {
		return null
	}
	const parsed = new Date(value)
	return Number.isNaN(parsed.getTime()) ? null : parsed
}

/** Local calendar date of a post's `created_at`; throws on an unparseable value. */
export function partitionKey(createdAt: string, timeZone: string): string {
	const instant = parseInstant(createdAt)
	if (!instant) throw new Error(`Invalid created_at: "${createdAt}"`)
	return localDateKey(instant, timeZone)
}

/** Group posts by local calendar date, keeping input order within a date. */
export function partitionPosts(
	posts: readonly Post[],
	timeZone: string,
): Map<string, Post[]> {
	const groups = new Map<string, Post[]>()
	for (const post of posts) {
		const key = partitionKey(post.created_at, timeZone)
		const group = groups.get(key)
		if (group) group.push(post)
		else groups.set(key, [post])
	}
	return groups
}

function pad2(n: number): string {
	return String(n).padStart(2, '0')
}

/**
 * strftime subset: %Y %y %m %d %H %M %S %%.
 * Unknown directives are kept verbatim.
 */
export function strftime(pattern: string, t: LocalDateTime): string {
	return pattern.replace(/%(.)/g, (whole, directive: string) => {
		switch (directive) {
			case 'Y':
				return String(t.year).padStart(4, '0')
			case 'y':
				return pad2(t.year % 100)
			case 'm':
				return pad2(t.month)
			case 'd':
				return pad2(t.day)
			case 'H':
				return pad2(t.hour)
			case 'M':
				return pad2(t.minute)
			case 'S':
				return pad2(t.second)
			case '%':
				return '%'
			default:
				return whole
		}
	})
}

/** Apply a strftime pattern to a calendar date at midnight. */
export function formatDateKey(pattern: string, dateKey: string): string {
	const { year, month, day } = requireDateKey(dateKey)
	return strftime(pattern, { year, month, day, hour: 0, minute: 0, second: 0 })
}

/** Number of whole local days between two date keys (`to - from`). */
export function daysBetween(fromKey: string, toKey: string): number {
	const from = requireDateKey(fromKey)
	const to = requireDateKey(toKey)
	const fromMs = Date.UTC(from.year, from.month - 1, from.day)
	const toMs = Date.UTC(to.year, to.month - 1, to.day)
	return Math.round((toMs - fromMs) / DAY_MS)
}
