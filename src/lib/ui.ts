/** Terminal progress display for trendscope. Writes to stderr only. */

const IS_TTY = process.stderr.isTTY ?? false

const ANSI = {
	purple: '\x1b[95m',
	cyan: '\x1b[96m',
	green: '\x1b[92m',
	bold: '\x1b[1m',
	dim: '\x1b[2m',
	reset: '\x1b[0m',
} as const

type Style = Exclude<keyof typeof ANSI, 'reset'>

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']
const FRAME_MS = 80

/** Wrap text in ANSI styles on a TTY; plain text otherwise. */
function paint(text: string, ...styles: Style[]): string {
	if (!IS_TTY || styles.length === 0) return text
	return `${styles.map((s) => ANSI[s]).join('')}${text}${ANSI.reset}`
}

function seconds(since: number): string {
	return ((Date.now() - since) / 1000).toFixed(1)
}

/** One spinning status line. Static on non-TTY stderr. */
class PhaseSpinner {
	private readonly label: string
	private readonly startedAt = Date.now()
	private interval: ReturnType<typeof setInterval> | null = null
	private tick = 0

	constructor(label: string) {
		this.label = label
		if (!IS_TTY) {
			process.stderr.write(`⏳ ${label}\n`)
			return
		}
		this.interval = setInterval(() => {
			const frame = FRAMES[this.tick % FRAMES.length] ?? ''
			this.tick += 1
			process.stderr.write(`\r${paint(frame, 'cyan')} ${this.label}  `)
		}, FRAME_MS)
	}

	/** Stop spinning; print `done` with the phase time when given. */
	finish(done = ''): void {
		if (this.interval !== null) {
			clearInterval(this.interval)
			this.interval = null
			process.stderr.write(`\r${' '.repeat(this.label.length + 4)}\r`)
		}
		if (done) process.stderr.write(`✓ ${done} ${paint(`(${seconds(this.startedAt)}s)`, 'dim')}\n`)
	}
}

/** Phase-by-phase progress for one CLI command. */
export class ProgressDisplay {
	private readonly command: string
	private readonly startedAt = Date.now()
	private phase: PhaseSpinner | null = null

	constructor(command: string, detail = '', showBanner = true) {
		this.command = command
		if (showBanner) this.banner(detail)
	}

	private banner(detail: string): void {
		const head = `${paint('trendscope', 'purple', 'bold')} ${paint(`· ${this.command}`, 'dim')}`
		process.stderr.write(detail ? `${head}: ${paint(detail, 'bold')}\n` : `${head}\n`)
	}

	startReading(range: string): void {
		this.endPhase()
		this.phase = new PhaseSpinner(`${paint('Store', 'cyan')} Reading snapshots for ${range}...`)
	}

	endPhase(message = ''): void {
		this.phase?.finish(message)
		this.phase = null
	}

	showComplete(summary: string): void {
		this.endPhase()
		const done = paint('✓ Done', 'green', 'bold')
		process.stderr.write(`${done} ${paint(`(${seconds(this.startedAt)}s)`, 'dim')} - ${summary}\n`)
	}
}
