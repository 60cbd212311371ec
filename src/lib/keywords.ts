/** Watch-keyword frequency counts. Substring matching only, no similarity. */

import type { EngineConfig } from './config.js'
import { captureDate, type DateRange } from './dates.js'
import { ValidationError } from './errors.js'
import { identityKey, type NewsItem, setItems } from './schema.js'
import { containsKeyword, type SearchEngine, validateLimit } from './search.js'

export type CountMode = 'daily' | 'current'

export const COUNT_MODES: readonly CountMode[] = ['daily', 'current']

const SAMPLE_TITLES = 3

export interface KeywordCount {
	keyword: string
	count: number
	samples: string[]
}

export interface KeywordCountResult {
	mode: CountMode
	date_range: DateRange | null
	captured_at: string | null
	total_items: number
	keywords: KeywordCount[]
	skipped_ticks: number
}

export interface CountOptions {
	date_range?: Partial<DateRange> | null
	mode?: CountMode
	top_n?: number | null
}

interface CountedItems {
	items: NewsItem[]
	range: DateRange | null
	capturedAt: string | null
	skipped: number
}

export function isCountMode(value: string): value is CountMode {
	return COUNT_MODES.some((m) => m === value)
}

export class KeywordCounter {
	private readonly search: SearchEngine
	private readonly config: EngineConfig

	constructor(search: SearchEngine, config: EngineConfig) {
		this.search = search
		this.config = config
	}

	/**
	 * Count items whose title contains each keyword.
	 * `daily`: distinct item identities per capture date in range.
	 * `current`: the items of the most recent tick.
	 */
	countKeywords(
		keywords: readonly string[] = this.config.watch_keywords,
		options: CountOptions = {},
	): KeywordCountResult {
		const watch = keywords.map((k) => k.trim()).filter(Boolean)
		if (watch.length === 0) {
			throw new ValidationError('No watch keywords to count', {
				field: 'watch_keywords',
				suggestion: 'Pass keywords or set TRENDSCOPE_WATCH_KEYWORDS.',
			})
		}
		const mode = options.mode ?? 'daily'
		const topN =
			options.top_n === null || options.top_n === undefined
				? null
				: validateLimit(options.top_n, watch.length)

		const { items, range, capturedAt, skipped } =
			mode === 'current' ? this.currentItems() : this.dailyItems(options.date_range)

		let counts: KeywordCount[] = watch.map((keyword) => {
			const hits = items.filter((item) => containsKeyword(item.title, keyword))
			return {
				keyword,
				count: hits.length,
				samples: hits.slice(0, SAMPLE_TITLES).map((item) => item.title),
			}
		})
		if (topN !== null) {
			counts = [...counts].sort((a, b) => b.count - a.count).slice(0, topN)
		}

		return {
			mode,
			date_range: range,
			captured_at: capturedAt,
			total_items: items.length,
			keywords: counts,
			skipped_ticks: skipped,
		}
	}

	private dailyItems(dateRange: Partial<DateRange> | null | undefined): CountedItems {
		const window = this.search.loadWindow(dateRange, null)
		const seen = new Set<string>()
		const items: NewsItem[] = []
		for (const set of window.sets) {
			for (const item of setItems(set)) {
				const key = `${captureDate(item.captured_at)}\u0000${identityKey(item)}`
				if (seen.has(key)) continue
				seen.add(key)
				items.push(item)
			}
		}
		return {
			items,
			range: window.range,
			capturedAt: null,
			skipped: window.skipped_ticks,
		}
	}

	private currentItems(): CountedItems {
		const { set, skipped_ticks } = this.search.latestSet()
		return {
			items: set ? setItems(set) : [],
			range: null,
			capturedAt: set?.captured_at ?? null,
			skipped: skipped_ticks,
		}
	}
}
