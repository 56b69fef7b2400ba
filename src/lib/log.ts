/** stderr logging for x-post-archive. */

export const DEBUG_ENV = 'X_POST_ARCHIVE_DEBUG'

/** Debug output is on when X_POST_ARCHIVE_DEBUG is `1` or `true`. */
export function isDebug(): boolean {
	const raw = process.env[DEBUG_ENV]?.toLowerCase()
	return raw === '1' || raw === 'true'
}

export function log(msg: string): void {
	if (isDebug()) {
		process.stderr.write(`[DEBUG] ${msg}\n`)
	}
}

export function warn(msg: string): void {
	process.stderr.write(`[WARN] ${msg}\n`)
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
