/** Terminal progress output for x-post-archive. */

const IS_TTY = process.stderr.isTTY ?? false

const CYAN = '\x1b[96m'
const GREEN = '\x1b[92m'
const YELLOW = '\x1b[93m'
const RED = '\x1b[91m'
const BOLD = '\x1b[1m'
const DIM = '\x1b[2m'
const RESET = '\x1b[0m'

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

class Spinner {
	private message: string
	private color: string
	private timer: ReturnType<typeof setInterval> | null = null
	private frameIdx = 0

	constructor(message: string, color = CYAN) {
		this.message = message
		this.color = color
	}

	start(): void {
		if (IS_TTY) {
			this.timer = setInterval(() => {
				const frame = SPINNER_FRAMES[this.frameIdx % SPINNER_FRAMES.length]
				process.stderr.write(`\r${this.color}${frame}${RESET} ${this.message}  `)
				this.frameIdx++
			}, 80)
		} else {
			process.stderr.write(`⏳ ${this.message}\n`)
		}
	}

	stop(finalMessage = ''): void {
		if (this.timer) {
			clearInterval(this.timer)
			this.timer = null
		}
		if (IS_TTY) {
			process.stderr.write(`\r${' '.repeat(80)}\r`)
		}
		if (finalMessage) {
			process.stderr.write(`✓ ${finalMessage}\n`)
		}
	}
}

/** Progress display for export phases. */
export class ProgressDisplay {
	private spinner: Spinner | null = null
	private startTime: number

	constructor(periodLabel: string) {
		this.startTime = Date.now()
		if (IS_TTY) {
			process.stderr.write(`${CYAN}${BOLD}x-post-archive${RESET} ${DIM}· ${periodLabel}${RESET}\n\n`)
		} else {
			process.stderr.write(`x-post-archive · ${periodLabel}\n`)
		}
	}

	private begin(message: string, color: string): void {
		this.spinner?.stop()
		this.spinner = new Spinner(message, color)
		this.spinner.start()
	}

	private end(message: string): void {
		this.spinner?.stop(message)
		this.spinner = null
	}

	showCached(postCount: number): void {
		process.stderr.write(
			`${GREEN}⚡${RESET} ${DIM}Using cached posts (${postCount}) - use --refresh for fresh data${RESET}\n`,
		)
	}

	startFetch(source: string): void {
		this.begin(`${CYAN}Posts${RESET} Reading ${source}...`, CYAN)
	}

	endFetch(postCount: number, pageCount: number): void {
		this.end(`${CYAN}Posts${RESET} ${postCount} posts from ${pageCount} page(s)`)
	}

	startTitles(): void {
		this.begin(`${YELLOW}Links${RESET} Resolving link titles...`, YELLOW)
	}

	endTitles(resolved: number): void {
		this.end(`${YELLOW}Links${RESET} ${resolved} titles resolved`)
	}

	startMedia(): void {
		this.begin(`${GREEN}Media${RESET} Downloading media...`, GREEN)
	}

	endMedia(count: number): void {
		this.end(`${GREEN}Media${RESET} ${count} files ready`)
	}

	showComplete(files: readonly string[], cost: string | null): void {
		const elapsed = ((Date.now() - this.startTime) / 1000).toFixed(1)
		const costStr = cost ? ` · estimated API cost ${cost}` : ''
		if (IS_TTY) {
			process.stderr.write(
				`\n${GREEN}${BOLD}✓ Export complete${RESET} ${DIM}(${elapsed}s)${costStr}${RESET}\n`,
			)
		} else {
			process.stderr.write(`✓ Export complete (${elapsed}s)${costStr}\n`)
		}
		for (const file of files) {
			process.stderr.write(`  ${file}\n`)
		}
	}

	showEmpty(): void {
		this.spinner?.stop()
		process.stderr.write(`${DIM}No posts in this period${RESET}\n`)
	}

	showError(message: string): void {
		this.spinner?.stop()
		process.stderr.write(`${RED}✗ Error:${RESET} ${message}\n`)
	}
}
