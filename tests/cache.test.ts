import { mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { cacheFileName, DayCacheStore } from '../src/lib/cache.js'
import { periodForDates } from '../src/lib/dates.js'
import type { Post } from '../src/lib/schema.js'

const TOKYO = 'Asia/Tokyo'

const p1: Post = { id: '1', text: 'first', created_at: '2026-02-19T16:00:00.000Z' }
const p2: Post = { id: '2', text: 'second', created_at: '2026-02-20T16:00:00.000Z' }

let dir: string
let store: DayCacheStore

beforeEach(() => {
	dir = mkdtempSync(join(tmpdir(), 'x-post-archive-cache-'))
	store = new DayCacheStore({ cacheDir: dir, timeZone: TOKYO })
})

afterEach(() => {
	rmSync(dir, { recursive: true, force: true })
})

function readJson(path: string): unknown {
	return JSON.parse(readFileSync(path, 'utf-8'))
}

describe('cacheFileName', () => {
	test('drops the dashes', () => {
		expect(cacheFileName('2026-02-20')).toBe('20260220.json')
	})
})

// ---------------------------------------------------------------------------
// save
// ---------------------------------------------------------------------------
describe('DayCacheStore.save', () => {
	test('writes one file per local day', () => {
		const written = store.save({
			posts: [p2, p1],
			includes: { users: [{ id: 'u1', username: 'alice' }] },
		})
		expect(written).toEqual([join(dir, '20260220.json'), join(dir, '20260221.json')])
		expect(readJson(join(dir, '20260220.json'))).toEqual({
			posts: [p1],
			includes: { users: [{ id: 'u1', username: 'alice' }] },
		})
		expect(readFileSync(join(dir, '20260221.json'), 'utf-8').endsWith('}\n')).toBe(true)
	})

	test('leaves no temporary files behind', () => {
		store.save({ posts: [p1, p2], includes: {} })
		expect(readdirSync(dir).sort()).toEqual(['20260220.json', '20260221.json'])
	})

	test('replaces posts and merges includes on re-save', () => {
		store.save({ posts: [p1], includes: { users: [{ id: 'u1' }] } })
		const edited: Post = { ...p1, text: 'edited' }
		store.save({
			posts: [edited],
			includes: { users: [{ id: 'u1' }, { id: 'u2' }], media: [{ media_key: '3_1' }] },
		})
		expect(readJson(join(dir, '20260220.json'))).toEqual({
			posts: [edited],
			includes: {
				users: [{ id: 'u1' }, { id: 'u2' }],
				media: [{ media_key: '3_1' }],
			},
		})
	})

	test('creates the cache directory on demand', () => {
		const nested = new DayCacheStore({ cacheDir: join(dir, 'a', 'b'), timeZone: TOKYO })
		nested.save({ posts: [p1], includes: {} })
		expect(readdirSync(join(dir, 'a', 'b'))).toEqual(['20260220.json'])
	})

	test('writes empty days for the rest of a period', () => {
		const written = store.save(
			{ posts: [p1], includes: {} },
			periodForDates('2026-02-20', '2026-02-23', TOKYO),
		)
		expect(written).toEqual([
			join(dir, '20260220.json'),
			join(dir, '20260221.json'),
			join(dir, '20260222.json'),
		])
		expect(readJson(join(dir, '20260222.json'))).toEqual({ posts: [], includes: {} })
		expect(store.load(periodForDates('2026-02-20', '2026-02-23', TOKYO))).toEqual({
			posts: [p1],
			includes: {},
		})
	})

	test('throws on a post with an invalid created_at', () => {
		const bad: Post = { id: '9', text: 'bad', created_at: 'nope' }
		expect(() => store.save({ posts: [bad], includes: {} })).toThrow('Invalid created_at')
	})
})

// ---------------------------------------------------------------------------
// load
// ---------------------------------------------------------------------------
describe('DayCacheStore.load', () => {
	test('reassembles a multi-day period', () => {
		store.save({ posts: [p1, p2], includes: { users: [{ id: 'u1' }] } })
		const bundle = store.load(periodForDates('2026-02-20', '2026-02-22', TOKYO))
		expect(bundle).toEqual({ posts: [p1, p2], includes: { users: [{ id: 'u1' }] } })
	})

	test('misses when any day is absent', () => {
		store.save({ posts: [p1, p2], includes: {} })
		expect(store.load(periodForDates('2026-02-20', '2026-02-23', TOKYO))).toBeNull()
	})

	test('misses on an empty period', () => {
		store.save({ posts: [p1], includes: {} })
		expect(store.load(periodForDates('2026-02-20', '2026-02-20', TOKYO))).toBeNull()
	})

	test('a day with malformed includes misses instead of throwing', () => {
		store.save({ posts: [p1, p2], includes: {} })
		writeFileSync(join(dir, '20260221.json'), '{"posts":[],"includes":{"users":[null]}}')
		expect(store.load(periodForDates('2026-02-20', '2026-02-22', TOKYO))).toBeNull()
	})

	test('an empty day file is a hit', () => {
		writeFileSync(join(dir, '20260220.json'), '{"posts":[],"includes":{}}')
		expect(store.load(periodForDates('2026-02-20', '2026-02-21', TOKYO))).toEqual({
			posts: [],
			includes: {},
		})
	})
})

// ---------------------------------------------------------------------------
// readDay
// ---------------------------------------------------------------------------
describe('DayCacheStore.readDay', () => {
	test('reads the legacy tweets key', () => {
		writeFileSync(join(dir, '20260220.json'), JSON.stringify({ tweets: [p1] }))
		expect(store.readDay('2026-02-20')).toEqual({ posts: [p1], includes: {} })
	})

	test('invalid JSON is a miss', () => {
		writeFileSync(join(dir, '20260220.json'), '{"posts": [')
		expect(store.readDay('2026-02-20')).toBeNull()
	})

	test('invalid UTF-8 is a miss', () => {
		writeFileSync(join(dir, '20260220.json'), Buffer.from([0xff, 0xfe, 0x00]))
		expect(store.readDay('2026-02-20')).toBeNull()
	})

	test('wrong shapes are a miss', () => {
		writeFileSync(join(dir, '20260220.json'), '{"posts":"x"}')
		expect(store.readDay('2026-02-20')).toBeNull()
		writeFileSync(join(dir, '20260220.json'), '{"posts":[{"id":1}]}')
		expect(store.readDay('2026-02-20')).toBeNull()
		writeFileSync(join(dir, '20260220.json'), '{"posts":[],"includes":{"users":{}}}')
		expect(store.readDay('2026-02-20')).toBeNull()
	})

	test('malformed include records are a miss', () => {
		writeFileSync(join(dir, '20260220.json'), '{"posts":[],"includes":{"users":[null]}}')
		expect(store.readDay('2026-02-20')).toBeNull()
		writeFileSync(join(dir, '20260220.json'), '{"posts":[],"includes":{"tweets":[{"id":"q"}]}}')
		expect(store.readDay('2026-02-20')).toBeNull()
		writeFileSync(join(dir, '20260220.json'), '{"posts":[],"includes":{"media":[{"type":"photo"}]}}')
		expect(store.readDay('2026-02-20')).toBeNull()
	})

	test('absent file is a miss', () => {
		expect(store.readDay('2026-02-20')).toBeNull()
	})

	test('a directory in place of the file is an error', () => {
		mkdirSync(join(dir, '20260220.json'))
		expect(() => store.readDay('2026-02-20')).toThrow()
	})
})
