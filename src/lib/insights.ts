/** Cross-platform comparisons and keyword co-occurrence. */

import type { DateRange } from './dates.js'
import { ValidationError } from './errors.js'
import { setItems } from './schema.js'
import {
	type SearchEngine,
	type SearchMode,
	topicMatcher,
	validateLimit,
	validateQuery,
} from './search.js'
import { extractKeywords } from './similarity.js'

export interface PlatformComparison {
	platform: string
	count: number
	mean_score: number | null
}

export interface CompareResult {
	topic: string
	mode: SearchMode
	date_range: DateRange
	platforms: PlatformComparison[]
	total_found: number
	skipped_ticks: number
}

export interface PlatformActivity {
	platform: string
	snapshot_count: number
	item_count: number
	first_capture: string
	last_capture: string
	/** Mean minutes between consecutive captures; null below two captures. */
	avg_interval_minutes: number | null
}

export interface ActivityResult {
	date_range: DateRange
	platforms: PlatformActivity[]
	total_snapshots: number
	skipped_ticks: number
}

export interface KeywordPair {
	pair: [string, string]
	count: number
}

export interface CooccurrenceResult {
	topic: string | null
	date_range: DateRange
	pairs: KeywordPair[]
	items_analyzed: number
	skipped_ticks: number
}

export interface CompareOptions {
	date_range?: Partial<DateRange> | null
	mode?: SearchMode
}

export interface ActivityOptions {
	date_range?: Partial<DateRange> | null
	platforms?: readonly string[] | null
}

export interface CooccurrenceOptions {
	topic?: string | null
	date_range?: Partial<DateRange> | null
	min_frequency?: number
	top_n?: number
}

function byText(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0
}

export class InsightEngine {
	private readonly search: SearchEngine

	constructor(search: SearchEngine) {
		this.search = search
	}

	/** Distinct matches and mean weight per platform, busiest first. */
	comparePlatforms(topic: string, options: CompareOptions = {}): CompareResult {
		const t = validateQuery(topic, 'topic')
		const mode = options.mode ?? 'keyword'
		const window = this.search.loadWindow(options.date_range, null)
		const matches = this.search.collectMatches(
			window,
			topicMatcher(t, mode, this.search.similarity),
		)

		const stats = new Map<string, { count: number; total: number }>()
		for (const set of window.sets) {
			for (const snapshot of set.snapshots) {
				if (!stats.has(snapshot.platform)) stats.set(snapshot.platform, { count: 0, total: 0 })
			}
		}
		for (const item of matches) {
			const entry = stats.get(item.platform) ?? { count: 0, total: 0 }
			entry.count++
			entry.total += item.composite_score
			stats.set(item.platform, entry)
		}

		const platforms = [...stats.entries()]
			.map(([platform, { count, total }]) => ({
				platform,
				count,
				mean_score: count > 0 ? total / count : null,
			}))
			.sort((a, b) => b.count - a.count || byText(a.platform, b.platform))

		return {
			topic: t,
			mode,
			date_range: window.range,
			platforms,
			total_found: matches.length,
			skipped_ticks: window.skipped_ticks,
		}
	}

	/** How often each platform was captured, and how many items it carried. */
	activityStats(options: ActivityOptions = {}): ActivityResult {
		const window = this.search.loadWindow(options.date_range, options.platforms)

		const captures = new Map<string, { times: string[]; items: number }>()
		for (const set of window.sets) {
			for (const snapshot of set.snapshots) {
				const entry = captures.get(snapshot.platform) ?? { times: [], items: 0 }
				entry.times.push(snapshot.captured_at)
				entry.items += snapshot.items.length
				captures.set(snapshot.platform, entry)
			}
		}

		const platforms: PlatformActivity[] = []
		for (const [platform, { times, items }] of captures) {
			const sorted = times
				.map((t) => ({ t, ms: new Date(t).getTime() }))
				.sort((a, b) => a.ms - b.ms)
			const first = sorted[0]
			const last = sorted[sorted.length - 1]
			if (!first || !last) continue
			platforms.push({
				platform,
				snapshot_count: sorted.length,
				item_count: items,
				first_capture: first.t,
				last_capture: last.t,
				avg_interval_minutes:
					sorted.length > 1 ? (last.ms - first.ms) / 60_000 / (sorted.length - 1) : null,
			})
		}
		platforms.sort((a, b) => b.snapshot_count - a.snapshot_count || byText(a.platform, b.platform))

		return {
			date_range: window.range,
			platforms,
			total_snapshots: platforms.reduce((acc, p) => acc + p.snapshot_count, 0),
			skipped_ticks: window.skipped_ticks,
		}
	}

	/**
	 * Keyword pairs appearing together in distinct titles.
	 * With a topic, only titles containing it are counted.
	 */
	keywordCooccurrence(options: CooccurrenceOptions = {}): CooccurrenceResult {
		const topic = options.topic ? validateQuery(options.topic, 'topic') : null
		const minFrequency = options.min_frequency ?? 3
		if (!Number.isInteger(minFrequency) || minFrequency < 1) {
			throw new ValidationError('min_frequency must be a positive integer', {
				field: 'min_frequency',
			})
		}
		const topN = validateLimit(options.top_n, 20)

		const window = this.search.loadWindow(options.date_range, null)
		const match = topic ? topicMatcher(topic, 'keyword', this.search.similarity) : () => true
		const titles = new Set<string>()
		for (const set of window.sets) {
			for (const item of setItems(set)) {
				if (match(item.title)) titles.add(`${item.platform}\u0000${item.title}`)
			}
		}

		const counts = new Map<string, number>()
		for (const key of titles) {
			const title = key.slice(key.indexOf('\u0000') + 1)
			const words = [...new Set(extractKeywords(title))].sort(byText)
			for (let i = 0; i < words.length; i++) {
				for (let j = i + 1; j < words.length; j++) {
					const pairKey = `${words[i]} ${words[j]}`
					counts.set(pairKey, (counts.get(pairKey) ?? 0) + 1)
				}
			}
		}

		const pairs: KeywordPair[] = []
		for (const [key, count] of counts) {
			if (count < minFrequency) continue
			const [a = '', b = ''] = key.split(' ')
			pairs.push({ pair: [a, b], count })
		}
		pairs.sort(
			(x, y) => y.count - x.count || byText(x.pair[0], y.pair[0]) || byText(x.pair[1], y.pair[1]),
		)

		return {
			topic,
			date_range: window.range,
			pairs: pairs.slice(0, topN),
			items_analyzed: titles.size,
			skipped_ticks: window.skipped_ticks,
		}
	}
}
