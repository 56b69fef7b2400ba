/** Environment and output settings for x-post-archive. */

import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'

import { isValidTimeZone } from './dates.js'

const CONFIG_DIR = join(homedir(), '.config', 'x-post-archive')
const CONFIG_FILE = join(CONFIG_DIR, '.env')

export const DEFAULT_OUTPUT_DIR = 'x-posts'
export const DEFAULT_FILENAME_FORMAT = 'x-post-%Y-%m-%d'
export const DEFAULT_HEADING_FORMAT = '%Y-%m-%d %H:%M'
export const DEFAULT_TIME_ZONE = 'Asia/Tokyo'
/** Pay-per-use read price, USD per post. */
export const DEFAULT_COST_PER_READ = 0.005

const CACHE_DIR_NAME = '.cache'

/** Settings shared by the cache store and the Markdown assembler. */
export interface ExportConfig {
	/** Directory that receives the Markdown files and `media/`. */
	outputDir: string
	/** Directory holding one JSON file per local day. */
	cacheDir: string
	timeZone: string
	filenameFormat: string
	headingFormat: string
	costPerRead: number
}

/** Build an ExportConfig, filling unspecified fields with defaults. */
export function createExportConfig(
	partial: Partial<ExportConfig> & { outputDir: string },
): ExportConfig {
	return {
		cacheDir: join(partial.outputDir, CACHE_DIR_NAME),
		timeZone: DEFAULT_TIME_ZONE,
		filenameFormat: DEFAULT_FILENAME_FORMAT,
		headingFormat: DEFAULT_HEADING_FORMAT,
		costPerRead: DEFAULT_COST_PER_READ,
		...partial,
	}
}

/** Load environment variables from a file. */
export function loadEnvFile(path: string): Record<string, string> {
	const env: Record<string, string> = {}
	if (!existsSync(path)) return env

	const content = readFileSync(path, 'utf-8')
	for (const rawLine of content.split('\n')) {
		const line = rawLine.trim()
		if (!line || line.startsWith('#')) continue
		const eqIdx = line.indexOf('=')
		if (eqIdx === -1) continue

		const key = line.slice(0, eqIdx).trim()
		let value = line.slice(eqIdx + 1).trim()

		// Remove quotes if present
		if (
			value.length >= 2 &&
			((value[0] === '"' && value[value.length - 1] === '"') ||
				(value[0] === "'" && value[value.length - 1] === "'"))
		) {
			value = value.slice(1, -1)
		}

		if (key && value) env[key] = value
	}
	return env
}

/** Load configuration from ~/.config/x-post-archive/.env and environment. */
export function getConfig(
	env: NodeJS.ProcessEnv = process.env,
	configFile: string = CONFIG_FILE,
): Record<string, string | null> {
	const fileEnv = loadEnvFile(configFile)
	const pick = (key: string): string | null => env[key] ?? fileEnv[key] ?? null

	return {
		OBSIDIAN_VAULT_PATH: pick('OBSIDIAN_VAULT_PATH'),
		OBSIDIAN_OUTPUT_DIR: pick('OBSIDIAN_OUTPUT_DIR') ?? DEFAULT_OUTPUT_DIR,
		FILENAME_FORMAT: pick('FILENAME_FORMAT') ?? DEFAULT_FILENAME_FORMAT,
		HEADING_FORMAT: pick('HEADING_FORMAT') ?? DEFAULT_HEADING_FORMAT,
		X_POST_ARCHIVE_TZ: pick('X_POST_ARCHIVE_TZ') ?? DEFAULT_TIME_ZONE,
		X_POST_ARCHIVE_COST_PER_READ: pick('X_POST_ARCHIVE_COST_PER_READ'),
		X_USERNAME: pick('X_USERNAME'),
	}
}

/**
 * Turn raw settings into an ExportConfig.
 * @returns [config, errorMessage]; exactly one of them is null
 */
export function resolveExportConfig(
	raw: Record<string, string | null>,
): [ExportConfig | null, string | null] {
	const vault = raw.OBSIDIAN_VAULT_PATH
	if (!vault) {
		return [
			null,
			`OBSIDIAN_VAULT_PATH is not set. Add it to the environment or ${CONFIG_FILE}.`,
		]
	}
	if (!existsSync(vault)) {
		return [null, `Obsidian vault not found: ${vault}`]
	}

	const timeZone = raw.X_POST_ARCHIVE_TZ ?? DEFAULT_TIME_ZONE
	if (!isValidTimeZone(timeZone)) {
		return [null, `Unknown time zone: "${timeZone}"`]
	}

	let costPerRead = DEFAULT_COST_PER_READ
	const rawCost = raw.X_POST_ARCHIVE_COST_PER_READ
	if (rawCost) {
		const n = Number(rawCost)
		if (!Number.isFinite(n) || n < 0) {
			return [null, `Invalid X_POST_ARCHIVE_COST_PER_READ: "${rawCost}"`]
		}
		costPerRead = n
	}

	const config = createExportConfig({
		outputDir: join(vault, raw.OBSIDIAN_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR),
		timeZone,
		filenameFormat: raw.FILENAME_FORMAT ?? DEFAULT_FILENAME_FORMAT,
		headingFormat: raw.HEADING_FORMAT ?? DEFAULT_HEADING_FORMAT,
		costPerRead,
	})
	return [config, null]
}
