/** Composite weighting of ranked items. */

import type { EngineConfig, RankScale } from './config.js'
import {
	identityKey,
	type NewsItem,
	type ScoredItem,
	type SnapshotSet,
	setItems,
} from './schema.js'

export type SortOrder = 'weight' | 'time'

/**
 * Statistics of the candidate window an item is scored against:
 * how many ticks carried each identity, and each platform's hotness span.
 */
export interface ScoringWindow {
	tick_count: number
	appearances: Map<string, number>
	first_seen: Map<string, string>
	last_seen: Map<string, string>
	hotness: Map<string, { min: number; max: number }>
}

function timeOf(timestamp: string): number {
	return new Date(timestamp).getTime()
}

/** Summarize a window of snapshot sets for frequency and hotness scoring. */
export function buildWindow(sets: readonly SnapshotSet[]): ScoringWindow {
	const appearances = new Map<string, number>()
	const firstSeen = new Map<string, string>()
	const lastSeen = new Map<string, string>()
	const hotness = new Map<string, { min: number; max: number }>()

	for (const set of sets) {
		const seenThisTick = new Set<string>()
		for (const item of setItems(set)) {
			const key = identityKey(item)
			if (!seenThisTick.has(key)) {
				seenThisTick.add(key)
				appearances.set(key, (appearances.get(key) ?? 0) + 1)
			}

			const first = firstSeen.get(key)
			if (first === undefined || timeOf(item.captured_at) < timeOf(first)) {
				firstSeen.set(key, item.captured_at)
			}
			const last = lastSeen.get(key)
			if (last === undefined || timeOf(item.captured_at) > timeOf(last)) {
				lastSeen.set(key, item.captured_at)
			}

			if (item.hotness != null) {
				const span = hotness.get(item.platform)
				if (!span) {
					hotness.set(item.platform, { min: item.hotness, max: item.hotness })
				} else {
					span.min = Math.min(span.min, item.hotness)
					span.max = Math.max(span.max, item.hotness)
				}
			}
		}
	}

	return {
		tick_count: sets.length,
		appearances,
		first_seen: firstSeen,
		last_seen: lastSeen,
		hotness,
	}
}

/** Rank to [0,1], rank 1 highest. */
export function rankScore(rank: number, scale: RankScale = 'reciprocal'): number {
	if (rank < 1) return 0
	if (scale === 'linear') return (11 - Math.min(rank, 10)) / 10
	return 1 / rank
}

type ScoringConfig = Pick<
	EngineConfig,
	'rank_weight' | 'frequency_weight' | 'hotness_weight' | 'rank_scale' | 'hotness_platforms'
>

/** Scores items against a window. Pure: same item and window, same score. */
export class ScoringEngine {
	private readonly config: ScoringConfig
	private readonly hotnessPlatforms: ReadonlySet<string>
	private readonly weightSum: number

	constructor(config: ScoringConfig) {
		this.config = config
		this.hotnessPlatforms = new Set(config.hotness_platforms)
		this.weightSum = config.rank_weight + config.frequency_weight + config.hotness_weight
	}

	/** Min-max hotness within the item's platform; 0.5 when the span is flat. */
	normalizedHotness(item: NewsItem, window: ScoringWindow): number | null {
		if (item.hotness == null) return null
		const span = window.hotness.get(item.platform)
		if (!span) return null
		if (span.max === span.min) return 0.5
		const scaled = (item.hotness - span.min) / (span.max - span.min)
		return Math.max(0, Math.min(1, scaled))
	}

	score(item: NewsItem, window: ScoringWindow): ScoredItem {
		const key = identityKey(item)
		const hot = this.normalizedHotness(item, window)
		const rank =
			this.hotnessPlatforms.has(item.platform) && hot !== null
				? hot
				: rankScore(item.rank, this.config.rank_scale)
		const appearances = window.appearances.get(key) ?? 0
		const frequency =
			window.tick_count > 0 ? Math.min(1, appearances / window.tick_count) : 0
		const hotness = hot ?? 0

		const weighted =
			this.config.rank_weight * rank +
			this.config.frequency_weight * frequency +
			this.config.hotness_weight * hotness

		return {
			...item,
			composite_score: this.weightSum > 0 ? weighted / this.weightSum : 0,
			subs: { rank, frequency, hotness },
			appearances,
			first_seen_at: window.first_seen.get(key) ?? item.captured_at,
			last_seen_at: window.last_seen.get(key) ?? item.captured_at,
		}
	}

	scoreAll(items: readonly NewsItem[], window: ScoringWindow): ScoredItem[] {
		return items.map((item) => this.score(item, window))
	}
}

function compareText(a: string, b: string): number {
	if (a === b) return 0
	return a < b ? -1 : 1
}

/**
 * Sort scored items.
 * `weight`: score desc, then earliest capture, platform, rank, title.
 * `time`: latest capture first, then score desc, platform, rank, title.
 */
export function sortScored<T extends ScoredItem>(items: readonly T[], sort: SortOrder = 'weight'): T[] {
	return [...items].sort((a, b) => {
		const timeA = timeOf(a.captured_at)
		const timeB = timeOf(b.captured_at)
		if (sort === 'time') {
			if (timeA !== timeB) return timeB - timeA
			if (a.composite_score !== b.composite_score) return b.composite_score - a.composite_score
		} else {
			if (a.composite_score !== b.composite_score) return b.composite_score - a.composite_score
			if (timeA !== timeB) return timeA - timeB
		}
		return (
			compareText(a.platform, b.platform) ||
			a.rank - b.rank ||
			compareText(a.title, b.title)
		)
	})
}
