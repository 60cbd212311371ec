/**
 * Append-only snapshot storage.
 *
 * Layout: `<root>/<YYYY-MM-DD>/<HH-MM-SS>.json`, one file per capture tick,
 * UTC. A tick is written to a temp file and then hard-linked to its final
 * name, so readers only ever see complete files and a second write of the
 * same tick fails instead of replacing the first.
 */

import {
	existsSync,
	linkSync,
	mkdirSync,
	readdirSync,
	readFileSync,
	rmSync,
	statSync,
	writeFileSync,
} from 'node:fs'
import { join } from 'node:path'

import {
	captureDate,
	type DateRange,
	defaultRange,
	formatTime,
	inRange,
} from './dates.js'
import { errorMessage, PartialReadWarning, ValidationError } from './errors.js'
import { debug, warn } from './log.js'
import {
	type SnapshotSet,
	snapshotSetFromDict,
	snapshotSetToDict,
	validateSnapshotSet,
} from './schema.js'

const DATE_DIR_RE = /^\d{4}-\d{2}-\d{2}$/
const TICK_FILE_RE = /^\d{2}-\d{2}-\d{2}\.json$/

/** Snapshot sets read for a window, plus the ticks that could not be read. */
export interface ReadResult {
	sets: SnapshotSet[]
	skipped_ticks: number
	warnings: PartialReadWarning[]
}

export interface StoreStats {
	dates: number
	ticks: number
	bytes: number
	earliest: string | null
	latest: string | null
}

/** Read/append contract the engine needs from storage. */
export interface SnapshotStore {
	append(set: SnapshotSet): string
	listDates(range?: DateRange): string[]
	read(range?: DateRange, platforms?: readonly string[] | null): ReadResult
	availableDateRange(): DateRange | null
	stats(): StoreStats
}

export interface FileSnapshotStoreOptions {
	dataDir: string
	/** Max minutes a platform snapshot may drift from its tick. */
	jitterMinutes?: number
	now?: () => Date
}

function errnoCode(err: unknown): string {
	if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
		return err.code
	}
	return ''
}

export class FileSnapshotStore implements SnapshotStore {
	readonly root: string
	private readonly jitterMinutes: number
	private readonly now: () => Date

	constructor(options: FileSnapshotStoreOptions) {
		this.root = options.dataDir
		this.jitterMinutes = options.jitterMinutes ?? 5
		this.now = options.now ?? (() => new Date())
	}

	/**
	 * Publish one capture tick.
	 * @returns Path of the written tick file
	 */
	append(set: SnapshotSet): string {
		validateSnapshotSet(set, this.jitterMinutes)

		const tick = new Date(set.captured_at)
		const dateDir = join(this.root, captureDate(set.captured_at))
		const finalPath = join(dateDir, `${formatTime(tick)}.json`)
		if (existsSync(finalPath)) throw duplicateTick(set.captured_at)

		mkdirSync(dateDir, { recursive: true })
		const tmpPath = `${finalPath}.tmp.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2)}`
		try {
			writeFileSync(tmpPath, JSON.stringify(snapshotSetToDict(set)))
			linkSync(tmpPath, finalPath)
		} catch (err) {
			if (errnoCode(err) === 'EEXIST') throw duplicateTick(set.captured_at)
			throw err
		} finally {
			rmSync(tmpPath, { force: true })
		}

		debug(`appended tick ${set.captured_at} (${set.snapshots.length} snapshots) -> ${finalPath}`)
		return finalPath
	}

	/** Capture dates with at least one tick, ascending. Defaults to today. */
	listDates(range: DateRange = defaultRange('today', this.now())): string[] {
		return this.scanDates().filter((d) => inRange(d, range))
	}

	/**
	 * Snapshot sets captured in range, ascending by capture time.
	 * Unreadable ticks are skipped and reported, never fatal.
	 */
	read(
		range: DateRange = defaultRange('today', this.now()),
		platforms: readonly string[] | null = null,
	): ReadResult {
		const wanted = platforms && platforms.length > 0 ? new Set(platforms) : null
		const sets: SnapshotSet[] = []
		const warnings: PartialReadWarning[] = []

		for (const date of this.listDates(range)) {
			for (const file of this.tickFiles(date)) {
				let set: SnapshotSet
				try {
					set = this.readTick(date, file)
				} catch (err) {
					const warning = new PartialReadWarning(date, file, errorMessage(err))
					warn(`skipped tick ${warning.toString()}`)
					warnings.push(warning)
					continue
				}

				if (wanted) {
					const snapshots = set.snapshots.filter((s) => wanted.has(s.platform))
					if (snapshots.length === 0) continue
					set = { captured_at: set.captured_at, snapshots }
				}
				sets.push(set)
			}
		}

		sets.sort(
			(a, b) => new Date(a.captured_at).getTime() - new Date(b.captured_at).getTime(),
		)
		debug(
			`read ${sets.length} ticks for ${range.start}..${range.end}` +
				(warnings.length > 0 ? `, skipped ${warnings.length}` : ''),
		)
		return { sets, skipped_ticks: warnings.length, warnings }
	}

	availableDateRange(): DateRange | null {
		const dates = this.scanDates()
		const first = dates[0]
		const last = dates[dates.length - 1]
		return first && last ? { start: first, end: last } : null
	}

	stats(): StoreStats {
		const dates = this.scanDates()
		let ticks = 0
		let bytes = 0
		for (const date of dates) {
			for (const file of this.tickFiles(date)) {
				ticks++
				bytes += statSync(join(this.root, date, file)).size
			}
		}
		return {
			dates: dates.length,
			ticks,
			bytes,
			earliest: dates[0] ?? null,
			latest: dates[dates.length - 1] ?? null,
		}
	}

	private scanDates(): string[] {
		if (!existsSync(this.root)) return []
		return readdirSync(this.root)
			.filter((name) => DATE_DIR_RE.test(name))
			.filter((name) => this.tickFiles(name).length > 0)
			.sort()
	}

	private tickFiles(date: string): string[] {
		const dir = join(this.root, date)
		try {
			return readdirSync(dir)
				.filter((name) => TICK_FILE_RE.test(name))
				.sort()
		} catch (err) {
			if (errnoCode(err) === 'ENOTDIR' || errnoCode(err) === 'ENOENT') return []
			throw err
		}
	}

	private readTick(date: string, file: string): SnapshotSet {
		const raw: unknown = JSON.parse(readFileSync(join(this.root, date, file), 'utf-8'))
		const set = snapshotSetFromDict(raw)
		validateSnapshotSet(set, this.jitterMinutes)
		if (captureDate(set.captured_at) !== date) {
			throw new ValidationError(
				`tick captured at ${set.captured_at} is filed under ${date}`,
			)
		}
		return set
	}
}

function duplicateTick(capturedAt: string): ValidationError {
	return new ValidationError(`A snapshot set for tick ${capturedAt} already exists`, {
		field: 'captured_at',
		suggestion: 'Each capture tick can be appended only once.',
	})
}
