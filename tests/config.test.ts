import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import {
	createExportConfig,
	getConfig,
	loadEnvFile,
	resolveExportConfig,
} from '../src/lib/config.js'
import { countIncludes, includesFromItems, mergeIncludes, mergeUnique } from '../src/lib/dedupe.js'

let dir: string

beforeEach(() => {
	dir = mkdtempSync(join(tmpdir(), 'x-post-archive-config-'))
})

afterEach(() => {
	rmSync(dir, { recursive: true, force: true })
})

function raw(overrides: Record<string, string | null>): Record<string, string | null> {
	return { ...getConfig({}, join(dir, 'missing.env')), ...overrides }
}

// ---------------------------------------------------------------------------
// config
// ---------------------------------------------------------------------------
describe('loadEnvFile', () => {
	test('parses keys, quotes and comments', () => {
		const path = join(dir, '.env')
		writeFileSync(
			path,
			['# comment', 'OBSIDIAN_VAULT_PATH="/vault"', "X_USERNAME='tester'", 'EMPTY=', 'junk line'].join('\n'),
		)
		expect(loadEnvFile(path)).toEqual({ OBSIDIAN_VAULT_PATH: '/vault', X_USERNAME: 'tester' })
	})

	test('missing file is empty', () => {
		expect(loadEnvFile(join(dir, 'nope.env'))).toEqual({})
	})
})

describe('getConfig', () => {
	test('environment wins over the file, defaults fill the rest', () => {
		const path = join(dir, '.env')
		writeFileSync(path, 'X_USERNAME=from-file\nX_POST_ARCHIVE_TZ=UTC\n')
		const cfg = getConfig({ X_USERNAME: 'from-env' }, path)
		expect(cfg.X_USERNAME).toBe('from-env')
		expect(cfg.X_POST_ARCHIVE_TZ).toBe('UTC')
		expect(cfg.OBSIDIAN_OUTPUT_DIR).toBe('x-posts')
		expect(cfg.FILENAME_FORMAT).toBe('x-post-%Y-%m-%d')
		expect(cfg.OBSIDIAN_VAULT_PATH).toBeNull()
	})
})

describe('resolveExportConfig', () => {
	test('builds paths under the vault', () => {
		const [cfg, error] = resolveExportConfig(raw({ OBSIDIAN_VAULT_PATH: dir }))
		expect(error).toBeNull()
		expect(cfg).toEqual({
			outputDir: join(dir, 'x-posts'),
			cacheDir: join(dir, 'x-posts', '.cache'),
			timeZone: 'Asia/Tokyo',
			filenameFormat: 'x-post-%Y-%m-%d',
			headingFormat: '%Y-%m-%d %H:%M',
			costPerRead: 0.005,
		})
	})

	test('reads the cost override', () => {
		const [cfg] = resolveExportConfig(
			raw({ OBSIDIAN_VAULT_PATH: dir, X_POST_ARCHIVE_COST_PER_READ: '0.01' }),
		)
		expect(cfg?.costPerRead).toBe(0.01)
	})

	test('reports each invalid setting', () => {
		expect(resolveExportConfig(raw({}))[1]).toContain('OBSIDIAN_VAULT_PATH is not set')
		expect(resolveExportConfig(raw({ OBSIDIAN_VAULT_PATH: join(dir, 'none') }))[1]).toBe(
			`Obsidian vault not found: ${join(dir, 'none')}`,
		)
		expect(
			resolveExportConfig(raw({ OBSIDIAN_VAULT_PATH: dir, X_POST_ARCHIVE_TZ: 'Mars/Olympus' }))[1],
		).toBe('Unknown time zone: "Mars/Olympus"')
		expect(
			resolveExportConfig(raw({ OBSIDIAN_VAULT_PATH: dir, X_POST_ARCHIVE_COST_PER_READ: '-1' }))[1],
		).toBe('Invalid X_POST_ARCHIVE_COST_PER_READ: "-1"')
	})

	test('createExportConfig derives the cache dir', () => {
		expect(createExportConfig({ outputDir: '/out' }).cacheDir).toBe(join('/out', '.cache'))
		expect(createExportConfig({ outputDir: '/out', cacheDir: '/c' }).cacheDir).toBe('/c')
	})
})

// ---------------------------------------------------------------------------
// dedupe
// ---------------------------------------------------------------------------
describe('dedupe', () => {
	test('mergeUnique keeps the first occurrence', () => {
		const merged = mergeUnique(
			[{ id: 'a', v: 1 }],
			[
				{ id: 'a', v: 2 },
				{ id: 'b', v: 3 },
				{ id: 'b', v: 4 },
			],
			(item) => item.id,
		)
		expect(merged).toEqual([
			{ id: 'a', v: 1 },
			{ id: 'b', v: 3 },
		])
	})

	test('mergeIncludes leaves absent categories absent', () => {
		expect(mergeIncludes({ users: [{ id: 'u1' }] }, { users: [{ id: 'u1' }, { id: 'u2' }] })).toEqual({
			users: [{ id: 'u1' }, { id: 'u2' }],
		})
		expect(mergeIncludes({}, {})).toEqual({})
	})

	test('media are keyed by media_key', () => {
		const merged = mergeIncludes(
			{ media: [{ media_key: '3_1', type: 'photo' }] },
			{ media: [{ media_key: '3_1', type: 'video' }, { media_key: '3_2' }] },
		)
		expect(merged.media).toEqual([{ media_key: '3_1', type: 'photo' }, { media_key: '3_2' }])
	})

	test('includesFromItems folds tagged items', () => {
		const includes = includesFromItems([
			{ kind: 'user', data: { id: 'u1' } },
			{ kind: 'post', data: { id: 'p1', text: 't', created_at: '2026-02-20T00:00:00Z' } },
			{ kind: 'user', data: { id: 'u1' } },
		])
		expect(countIncludes(includes)).toEqual({ tweets: 1, users: 1, media: 0 })
		expect(includes.media).toBeUndefined()
	})
})
