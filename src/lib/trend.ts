/**
 * Topic trend analysis over daily mention counts: direction, lifecycle
 * phase, anomalous days and a naive next-day projection.
 */

import type { EngineConfig } from './config.js'
import { addDays, captureDate, type DateRange, eachDay, lastNDays, resolveDateRange } from './dates.js'
import { InsufficientDataError } from './errors.js'
import { debug } from './log.js'
import { identityKey, setItems, type SnapshotSet } from './schema.js'
import { buildWindow, ScoringEngine } from './score.js'
import { collapseItems, topicMatcher, validateQuery } from './search.js'
import { SimilarityEngine } from './similarity.js'
import type { SnapshotStore } from './store.js'

export type TrendDirection = 'rising' | 'falling' | 'stable'
export type LifecyclePhase = 'emerging' | 'sustained' | 'fading' | 'flash'

export interface SeriesPoint {
	date: string
	count: number
	/** Mean composite score of the day's matches, 0 when none. */
	mean_score: number
	/** Up to three matching titles of the day, best rank first. */
	sample_titles: string[]
}

export interface TopicSeries {
	topic: string
	date_range: DateRange
	points: SeriesPoint[]
}

export interface Anomaly {
	date: string
	count: number
	baseline_mean: number
	baseline_std: number
	z_score: number
}

export interface Prediction {
	date: string
	count: number
	slope: number
	naive: true
	note: string
}

export interface TrendAnalysis {
	topic: string
	date_range: DateRange
	series: TopicSeries
	trend: TrendDirection
	lifecycle: LifecyclePhase
	anomalies: Anomaly[]
	prediction: Prediction
	total_mentions: number
	peak_date: string
	peak_count: number
	first_appearance: string
	last_appearance: string
	/** Days with at least one mention. */
	active_days: number
	/** Mean mentions over active days. */
	avg_daily_mentions: number
	skipped_ticks: number
}

export interface AnalyzeOptions {
	date_range?: Partial<DateRange> | null
	signal?: AbortSignal
}

const SAMPLE_TITLES = 3

type AnalysisConfig = Pick<
	EngineConfig,
	| 'trend_margin'
	| 'lifecycle_concentration'
	| 'lifecycle_min_active_days'
	| 'anomaly_z_threshold'
>

function sum(values: readonly number[]): number {
	return values.reduce((acc, v) => acc + v, 0)
}

function mean(values: readonly number[]): number {
	return values.length > 0 ? sum(values) / values.length : 0
}

/** Second-half mean against first-half mean; odd lengths leave out the middle day. */
export function classifyTrend(counts: readonly number[], margin: number): TrendDirection {
	if (counts.length < 2) return 'stable'
	const half = Math.floor(counts.length / 2)
	const first = mean(counts.slice(0, half))
	const second = mean(counts.slice(counts.length - half))

	if (first === 0) return second > 0 ? 'rising' : 'stable'
	const ratio = second / first
	if (ratio > margin) return 'rising'
	if (ratio < 1 / margin) return 'falling'
	return 'stable'
}

export function classifyLifecycle(
	counts: readonly number[],
	concentration: number,
	minActiveDays: number,
): LifecyclePhase {
	const total = sum(counts)
	const peak = Math.max(...counts)
	const peakShare = total > 0 ? peak / total : 0
	const activeDays = counts.filter((c) => c > 0).length

	if (peakShare > concentration) return 'flash'
	if (peakShare < concentration && activeDays >= minActiveDays) return 'sustained'

	const peakIdx = counts.indexOf(peak)
	const third = counts.length / 3
	if (peakIdx >= counts.length - third) return 'emerging'
	if (peakIdx < third) return 'fading'

	const before = sum(counts.slice(0, peakIdx))
	const after = sum(counts.slice(peakIdx + 1))
	return after >= before ? 'emerging' : 'fading'
}

/** Days whose count sits more than `threshold` deviations above all prior days. */
export function detectAnomalies(
	points: readonly Pick<SeriesPoint, 'date' | 'count'>[],
	threshold: number,
): Anomaly[] {
	const anomalies: Anomaly[] = []
	for (let i = 3; i < points.length; i++) {
		const point = points[i]
		if (!point) continue
		const prior = points.slice(0, i).map((p) => p.count)
		const baselineMean = mean(prior)
		const variance = mean(prior.map((c) => (c - baselineMean) ** 2))
		let std = Math.sqrt(variance)
		if (std === 0) std = Math.sqrt(Math.max(baselineMean, 1))

		const z = (point.count - baselineMean) / std
		if (z > threshold) {
			anomalies.push({
				date: point.date,
				count: point.count,
				baseline_mean: baselineMean,
				baseline_std: std,
				z_score: z,
			})
		}
	}
	return anomalies
}

/** Least-squares line over (day index, count), one day past the end. */
export function predictNext(
	points: readonly Pick<SeriesPoint, 'date' | 'count'>[],
	nextDate: string,
): Prediction {
	const n = points.length
	const xs = points.map((_, i) => i)
	const ys = points.map((p) => p.count)
	const xMean = mean(xs)
	const yMean = mean(ys)

	let num = 0
	let den = 0
	for (let i = 0; i < n; i++) {
		num += (i - xMean) * ((ys[i] ?? 0) - yMean)
		den += (i - xMean) ** 2
	}
	const slope = den > 0 ? num / den : 0
	const projected = yMean + slope * (n - xMean)

	return {
		date: nextDate,
		count: Math.max(0, projected),
		slope,
		naive: true,
		note: 'Linear extrapolation of daily counts; not a forecast model.',
	}
}

export interface TrendAnalyzerOptions {
	now?: () => Date
	similarity?: SimilarityEngine
}

export class TrendAnalyzer {
	private readonly store: SnapshotStore
	private readonly config: AnalysisConfig
	private readonly scorer: ScoringEngine
	private readonly now: () => Date
	private readonly similarity: SimilarityEngine

	constructor(
		store: SnapshotStore,
		config: EngineConfig,
		options: TrendAnalyzerOptions = {},
	) {
		this.store = store
		this.config = config
		this.scorer = new ScoringEngine(config)
		this.now = options.now ?? (() => new Date())
		this.similarity = options.similarity ?? new SimilarityEngine(config)
	}

	/** Daily distinct-identity counts of a topic at the related threshold. */
	buildSeries(
		topic: string,
		range: DateRange,
		sets: readonly SnapshotSet[],
		signal?: AbortSignal,
	): TopicSeries {
		const byDate = new Map<string, SnapshotSet[]>()
		for (const set of sets) {
			const date = captureDate(set.captured_at)
			const bucket = byDate.get(date)
			if (bucket) bucket.push(set)
			else byDate.set(date, [set])
		}

		const match = topicMatcher(topic, 'fuzzy', this.similarity)
		const points: SeriesPoint[] = []
		for (const date of eachDay(range)) {
			signal?.throwIfAborted()
			const daySets = byDate.get(date) ?? []
			const matched = collapseItems(
				daySets.flatMap((set) => setItems(set).filter((item) => match(item.title))),
			).sort((a, b) => a.rank - b.rank)
			const window = buildWindow(daySets)
			const scores = matched.map((item) => this.scorer.score(item, window).composite_score)
			points.push({
				date,
				count: new Set(matched.map(identityKey)).size,
				mean_score: mean(scores),
				sample_titles: matched.slice(0, SAMPLE_TITLES).map((item) => item.title),
			})
		}
		return { topic, date_range: range, points }
	}

	analyzeTopic(topic: string, options: AnalyzeOptions = {}): TrendAnalysis {
		const t = validateQuery(topic, 'topic')
		const range = resolveDateRange(options.date_range, lastNDays(7, this.now()))
		const { sets, skipped_ticks } = this.store.read(range)

		const series = this.buildSeries(t, range, sets, options.signal)
		const counts = series.points.map((p) => p.count)
		const total = sum(counts)
		if (total === 0) {
			throw new InsufficientDataError(
				`No mentions of "${t}" between ${range.start} and ${range.end}`,
				'Widen the date range or try a broader topic.',
			)
		}

		const peakCount = Math.max(...counts)
		const peakPoint = series.points[counts.indexOf(peakCount)]
		const lastPoint = series.points[series.points.length - 1]
		const nextDate = addDays(lastPoint?.date ?? range.end, 1)
		const active = series.points.filter((p) => p.count > 0)

		const analysis: TrendAnalysis = {
			topic: t,
			date_range: range,
			series,
			trend: classifyTrend(counts, this.config.trend_margin),
			lifecycle: classifyLifecycle(
				counts,
				this.config.lifecycle_concentration,
				this.config.lifecycle_min_active_days,
			),
			anomalies: detectAnomalies(series.points, this.config.anomaly_z_threshold),
			prediction: predictNext(series.points, nextDate),
			total_mentions: total,
			peak_date: peakPoint?.date ?? range.start,
			peak_count: peakCount,
			first_appearance: active[0]?.date ?? range.start,
			last_appearance: active[active.length - 1]?.date ?? range.end,
			active_days: active.length,
			avg_daily_mentions: total / active.length,
			skipped_ticks,
		}
		debug(`trend "${t}": ${analysis.trend}/${analysis.lifecycle}, ${total} mentions`)
		return analysis
	}
}
