/** Date utilities for trendscope. All calendar dates are UTC. */

import { EmptyRangeError, ValidationError } from './errors.js'

/** Inclusive range of capture dates as YYYY-MM-DD strings. */
export interface DateRange {
	start: string
	end: string
}

export type DefaultDateRange = 'today' | 'yesterday'

const DAY_MS = 24 * 60 * 60 * 1000
const MAX_RELATIVE_DAYS = 365

const WEEKDAYS: Record<string, number> = {
	monday: 0,
	tuesday: 1,
	wednesday: 2,
	thursday: 3,
	friday: 4,
	saturday: 5,
	sunday: 6,
}

/** Format a Date as YYYY-MM-DD in UTC. */
export function formatDate(d: Date): string {
	const year = d.getUTCFullYear()
	const month = String(d.getUTCMonth() + 1).padStart(2, '0')
	const day = String(d.getUTCDate()).padStart(2, '0')
	return `${year}-${month}-${day}`
}

/** Format the time part of a Date as HH-MM-SS in UTC. */
export function formatTime(d: Date): string {
	const h = String(d.getUTCHours()).padStart(2, '0')
	const m = String(d.getUTCMinutes()).padStart(2, '0')
	const s = String(d.getUTCSeconds()).padStart(2, '0')
	return `${h}-${m}-${s}`
}

/**
 * Parse a YYYY-MM-DD string to UTC midnight.
 * Returns null for malformed or impossible dates (2025-02-30).
 */
export function parseDay(dateStr: string | null | undefined): Date | null {
	if (!dateStr || !/^\d{4}-\d{2}-\d{2}$/.test(dateStr)) return null
	const dt = new Date(`${dateStr}T00:00:00Z`)
	if (Number.isNaN(dt.getTime())) return null
	return formatDate(dt) === dateStr ? dt : null
}

/** Parse an ISO-8601 timestamp. Returns null when unparseable. */
export function parseTimestamp(value: string | null | undefined): Date | null {
	if (!value) return null
	if (!/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/.test(value)) {
		return null
	}
	const parsed = new Date(value)
	return Number.isNaN(parsed.getTime()) ? null : parsed
}

/** UTC capture date of an ISO timestamp. */
export function captureDate(timestamp: string): string {
	return formatDate(new Date(timestamp))
}

export function addDays(dateStr: string, days: number): string {
	const dt = parseDay(dateStr)
	if (!dt) throw new ValidationError(`Invalid date: ${dateStr}`, { field: 'date' })
	return formatDate(new Date(dt.getTime() + days * DAY_MS))
}

export function todayDate(now: Date = new Date()): string {
	return formatDate(now)
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: string, to: string): number {
	const a = parseDay(from)
	const b = parseDay(to)
	if (!a || !b) throw new ValidationError(`Invalid date range ${from}..${to}`)
	return Math.round((b.getTime() - a.getTime()) / DAY_MS)
}

/** Range covering the last `days` days, today included. */
export function lastNDays(days: number, now: Date = new Date()): DateRange {
	const end = todayDate(now)
	return { start: addDays(end, -(Math.max(1, days) - 1)), end }
}

/** The named default window: today only, or yesterday only. */
export function defaultRange(
	kind: DefaultDateRange,
	now: Date = new Date(),
): DateRange {
	const today = todayDate(now)
	const day = kind === 'yesterday' ? addDays(today, -1) : today
	return { start: day, end: day }
}

/** Every date in the range, ascending. */
export function eachDay(range: DateRange): string[] {
	const days: string[] = []
	const total = daysBetween(range.start, range.end)
	for (let i = 0; i <= total; i++) {
		days.push(addDays(range.start, i))
	}
	return days
}

export function inRange(dateStr: string, range: DateRange): boolean {
	return dateStr >= range.start && dateStr <= range.end
}

/**
 * Resolve an optional caller range against a default window.
 * A lone start or end stands for a single day.
 */
export function resolveDateRange(
	input: Partial<DateRange> | null | undefined,
	fallback: DateRange,
): DateRange {
	const start = input?.start ?? input?.end
	const end = input?.end ?? input?.start
	if (!start || !end) return fallback

	for (const [field, value] of [
		['start', start],
		['end', end],
	] as const) {
		if (!parseDay(value)) {
			throw new ValidationError(`Invalid date format: ${value}`, {
				field,
				suggestion: 'Use YYYY-MM-DD, e.g. 2025-01-15.',
			})
		}
	}
	if (start > end) throw new EmptyRangeError(start, end)
	return { start, end }
}

/**
 * Parse a human date query into YYYY-MM-DD.
 *
 * Supports: today, yesterday, day before yesterday, N days ago,
 * this/last <weekday>, YYYY-MM-DD, YYYY/MM/DD and MM/DD.
 */
export function parseDateQuery(query: string, now: Date = new Date()): string {
	const q = query.trim().toLowerCase()
	if (!q) throw new ValidationError('Date query cannot be empty', { field: 'date' })

	const today = todayDate(now)
	if (q === 'today') return today
	if (q === 'yesterday') return addDays(today, -1)
	if (q === 'day before yesterday') return addDays(today, -2)

	const agoMatch = /^(\d+)\s*days?\s+ago$/.exec(q)
	if (agoMatch) {
		const n = Number(agoMatch[1])
		if (n > MAX_RELATIVE_DAYS) {
			throw new ValidationError(`Number of days too large: ${n}`, {
				field: 'date',
				suggestion: `Use at most ${MAX_RELATIVE_DAYS} days or an absolute date.`,
			})
		}
		return addDays(today, -n)
	}

	const weekdayMatch =
		/^(last|this)\s+(monday|tuesday|wednesday|thursday|friday|saturday|sunday)$/.exec(q)
	if (weekdayMatch) {
		const target = WEEKDAYS[weekdayMatch[2] ?? ''] ?? 0
		const current = (now.getUTCDay() + 6) % 7
		let diff = (current - target + 7) % 7
		if (weekdayMatch[1] === 'last') diff += 7
		return addDays(today, -diff)
	}

	if (/^\d{4}-\d{1,2}-\d{1,2}$/.test(q)) {
		const [y, m, d] = q.split('-')
		return checkedDate(q, `${y}-${pad(m)}-${pad(d)}`)
	}

	const slashMatch = /^(?:(\d{4})\/)?(\d{1,2})\/(\d{1,2})$/.exec(q)
	if (slashMatch) {
		const month = Number(slashMatch[2])
		let year = slashMatch[1] ? Number(slashMatch[1]) : now.getUTCFullYear()
		// MM/DD later in the year than now means last year
		if (!slashMatch[1] && month > now.getUTCMonth() + 1) year -= 1
		return checkedDate(q, `${year}-${pad(slashMatch[2])}-${pad(slashMatch[3])}`)
	}

	throw new ValidationError(`Unrecognized date format: ${query}`, {
		field: 'date',
		suggestion:
			'Supported: today, yesterday, 3 days ago, last monday, 2025-10-10, 2025/10/10',
	})
}

function pad(part: string | undefined): string {
	return (part ?? '').padStart(2, '0')
}

function checkedDate(query: string, candidate: string): string {
	if (!parseDay(candidate)) {
		throw new ValidationError(`Invalid date: ${query}`, { field: 'date' })
	}
	return candidate
}
