/** Stderr logging for trendscope. */

function envFlag(value: string | undefined): boolean {
	const v = value?.toLowerCase()
	return v === '1' || v === 'true'
}

/** Whether debug logging is on. Read per call so `--debug` can flip it. */
export function isDebug(): boolean {
	return envFlag(process.env.TRENDSCOPE_DEBUG)
}

export function debug(msg: string): void {
	if (isDebug()) {
		process.stderr.write(`[DEBUG] ${msg}\n`)
	}
}

export function warn(msg: string): void {
	process.stderr.write(`[WARN] ${msg}\n`)
}
