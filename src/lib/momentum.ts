/**
 * Keyword momentum between capture days: sudden spikes against the
 * previous day, and keywords climbing steadily over the last few days.
 */

import type { EngineConfig } from './config.js'
import { addDays, captureDate, eachDay, parseDay, todayDate } from './dates.js'
import { InsufficientDataError, ValidationError } from './errors.js'
import { debug } from './log.js'
import { type NewsItem, setItems, type SnapshotSet } from './schema.js'
import { collapseItems, type SearchEngine, validateLimit } from './search.js'
import { extractKeywords } from './similarity.js'

export const DEFAULT_VIRAL_THRESHOLD = 3.0
/** Mentions a keyword absent the day before needs to count as viral. */
export const MIN_NEW_MENTIONS = 5
export const DEFAULT_CONFIDENCE = 0.7

const PREDICT_LOOKBACK_DAYS = 3
const PREDICT_TOP_N = 20
const MIN_GROWTH = 0.3
const MIN_NEW_RISING = 3
const SAMPLE_TITLES = 3

export type AlertLevel = 'high' | 'medium'

export interface ViralTopic {
	keyword: string
	current_count: number
	previous_count: number
	/** current / previous; null for a keyword new today. */
	growth_rate: number | null
	alert_level: AlertLevel
	sample_titles: string[]
}

export interface ViralResult {
	date: string
	previous_date: string
	threshold: number
	topics: ViralTopic[]
	total_detected: number
	skipped_ticks: number
}

export interface ViralOptions {
	/** Day to inspect; today by default. */
	date?: string | null
	threshold?: number | null
	limit?: number | null
}

export interface PredictedTopic {
	keyword: string
	current_count: number
	/** Relative change over the previous data day; 1 for a keyword new today. */
	growth_rate: number
	confidence: number
	/** Counts per data day, oldest first. */
	series: number[]
	sample_titles: string[]
}

export interface PredictionResult {
	date: string
	data_days: string[]
	confidence_threshold: number
	topics: PredictedTopic[]
	total_predicted: number
	note: string
	skipped_ticks: number
}

export interface PredictOptions {
	date?: string | null
	confidence_threshold?: number | null
	top_n?: number | null
}

export interface MomentumOptions {
	now?: () => Date
}

/** Keyword counts of one capture date, each distinct story counted once. */
export interface DayKeywords {
	counts: Map<string, number>
	titles: Map<string, string[]>
}

function byText(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0
}

/** Group sets by capture date and count keywords per distinct identity. */
export function keywordsByDay(sets: readonly SnapshotSet[]): Map<string, DayKeywords> {
	const itemsByDay = new Map<string, NewsItem[]>()
	for (const set of sets) {
		const date = captureDate(set.captured_at)
		const bucket = itemsByDay.get(date)
		if (bucket) bucket.push(...setItems(set))
		else itemsByDay.set(date, setItems(set))
	}

	const days = new Map<string, DayKeywords>()
	for (const [date, items] of itemsByDay) {
		const day: DayKeywords = { counts: new Map(), titles: new Map() }
		for (const item of collapseItems(items).sort((a, b) => a.rank - b.rank)) {
			for (const word of new Set(extractKeywords(item.title))) {
				day.counts.set(word, (day.counts.get(word) ?? 0) + 1)
				const titles = day.titles.get(word)
				if (!titles) day.titles.set(word, [item.title])
				else if (titles.length < SAMPLE_TITLES) titles.push(item.title)
			}
		}
		days.set(date, day)
	}
	return days
}

export class MomentumAnalyzer {
	private readonly search: SearchEngine
	private readonly config: EngineConfig
	private readonly now: () => Date

	constructor(search: SearchEngine, config: EngineConfig, options: MomentumOptions = {}) {
		this.search = search
		this.config = config
		this.now = options.now ?? (() => new Date())
	}

	/**
	 * Keywords whose count jumped by `threshold` times over the previous day.
	 * A keyword absent the day before is viral once it reaches five stories.
	 */
	detectViralTopics(options: ViralOptions = {}): ViralResult {
		const threshold = options.threshold ?? DEFAULT_VIRAL_THRESHOLD
		if (!Number.isFinite(threshold) || threshold < 1) {
			throw new ValidationError('threshold must be at least 1', {
				field: 'threshold',
				suggestion: 'Typical values are 2 to 5.',
			})
		}
		const limit = validateLimit(options.limit, this.config.result_limit_default)
		const date = this.resolveDay(options.date)
		const previousDate = addDays(date, -1)

		const window = this.search.loadWindow({ start: previousDate, end: date }, null)
		const days = keywordsByDay(window.sets)
		const current = days.get(date)
		if (!current) {
			throw new InsufficientDataError(
				`No snapshots stored for ${date}`,
				'Ingest a tick for that day or pass an earlier date.',
			)
		}
		const previous = days.get(previousDate)

		const topics: ViralTopic[] = []
		for (const [keyword, count] of current.counts) {
			const before = previous?.counts.get(keyword) ?? 0
			let growth: number | null = null
			if (before === 0) {
				if (count < MIN_NEW_MENTIONS) continue
			} else {
				growth = count / before
				if (growth < threshold) continue
			}
			topics.push({
				keyword,
				current_count: count,
				previous_count: before,
				growth_rate: growth,
				alert_level: growth === null || growth > threshold * 2 ? 'high' : 'medium',
				sample_titles: current.titles.get(keyword) ?? [],
			})
		}
		// new keywords rank by count, others by growth
		topics.sort(
			(a, b) =>
				(b.growth_rate ?? b.current_count) - (a.growth_rate ?? a.current_count) ||
				byText(a.keyword, b.keyword),
		)
		debug(`viral ${date}: ${topics.length} keyword(s) at ${threshold}x`)

		return {
			date,
			previous_date: previousDate,
			threshold,
			topics: topics.slice(0, limit),
			total_detected: topics.length,
			skipped_ticks: window.skipped_ticks,
		}
	}

	/**
	 * Keywords rising into the given day over the three days before it.
	 * Confidence is 0.9 for a steady climb over three or more data days,
	 * 0.7 for an uneven one and 0.6 with only two data days.
	 */
	predictTrendingTopics(options: PredictOptions = {}): PredictionResult {
		const minConfidence = options.confidence_threshold ?? DEFAULT_CONFIDENCE
		if (!Number.isFinite(minConfidence) || minConfidence < 0 || minConfidence > 1) {
			throw new ValidationError('confidence_threshold must be between 0 and 1', {
				field: 'confidence_threshold',
				suggestion: 'Typical values are 0.6 to 0.8.',
			})
		}
		const topN = validateLimit(options.top_n, PREDICT_TOP_N)
		const date = this.resolveDay(options.date)
		const range = { start: addDays(date, -PREDICT_LOOKBACK_DAYS), end: date }

		const window = this.search.loadWindow(range, null)
		const days = keywordsByDay(window.sets)
		const today = days.get(date)
		if (!today) {
			throw new InsufficientDataError(
				`No snapshots stored for ${date}`,
				'Ingest a tick for that day or pass an earlier date.',
			)
		}
		const dataDays = eachDay(range).filter((d) => days.has(d))

		const topics: PredictedTopic[] = []
		for (const [keyword, recent] of today.counts) {
			const series = dataDays.map((d) => days.get(d)?.counts.get(keyword) ?? 0)
			if (series.length < 2) continue
			const previous = series[series.length - 2] ?? 0

			let growth: number
			if (previous === 0) {
				if (recent < MIN_NEW_RISING) continue
				growth = 1
			} else {
				growth = (recent - previous) / previous
			}
			if (growth <= MIN_GROWTH) continue

			let confidence = 0.6
			if (series.length >= 3) {
				const steady = series.every((c, i) => i === 0 || (series[i - 1] ?? 0) <= c)
				confidence = steady ? 0.9 : 0.7
			}
			if (confidence < minConfidence) continue

			topics.push({
				keyword,
				current_count: recent,
				growth_rate: growth,
				confidence,
				series,
				sample_titles: today.titles.get(keyword) ?? [],
			})
		}
		topics.sort(
			(a, b) =>
				b.confidence - a.confidence ||
				b.growth_rate - a.growth_rate ||
				byText(a.keyword, b.keyword),
		)
		debug(`predict ${date}: ${topics.length} rising keyword(s) over ${dataDays.length} day(s)`)

		return {
			date,
			data_days: dataDays,
			confidence_threshold: minConfidence,
			topics: topics.slice(0, topN),
			total_predicted: topics.length,
			note: 'Extrapolated from recent daily counts; not a forecast model.',
			skipped_ticks: window.skipped_ticks,
		}
	}

	private resolveDay(date: string | null | undefined): string {
		if (date === null || date === undefined) return todayDate(this.now())
		if (!parseDay(date)) {
			throw new ValidationError(`Invalid date format: ${date}`, {
				field: 'date',
				suggestion: 'Use YYYY-MM-DD, e.g. 2025-01-15.',
			})
		}
		return date
	}
}
