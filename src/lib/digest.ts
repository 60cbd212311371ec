/** Digests: sentiment analysis bundles and daily/weekly summary reports. */

import type { EngineConfig } from './config.js'
import { type DateRange, defaultRange, lastNDays } from './dates.js'
import { dedupeItems } from './dedupe.js'
import { InsufficientDataError } from './errors.js'
import type { ScoredItem } from './schema.js'
import { sortScored } from './score.js'
import { type SearchEngine, topicMatcher, validateLimit, validateQuery } from './search.js'
import { type KeywordTally, tallyKeywords } from './similarity.js'

export type ReportKind = 'daily' | 'weekly'

export const REPORT_KINDS: readonly ReportKind[] = ['daily', 'weekly']

const REPORT_TOP_N = 10

export interface SentimentOptions {
	topic?: string | null
	date_range?: Partial<DateRange> | null
	platforms?: readonly string[] | null
	limit?: number | null
	sort_by_weight?: boolean
}

export interface SentimentBundle {
	topic: string | null
	date_range: DateRange
	total_found: number
	duplicates_removed: number
	returned: number
	by_platform: Record<string, ScoredItem[]>
	prompt: string
	skipped_ticks: number
}

export interface SummaryReport {
	kind: ReportKind
	date_range: DateRange
	generated_at: string
	ticks: number
	total_items: number
	platforms: { platform: string; items: number }[]
	top_keywords: KeywordTally[]
	top_items: ScoredItem[]
	skipped_ticks: number
}

export interface SummaryOptions {
	kind?: ReportKind
	date_range?: Partial<DateRange> | null
}

export function isReportKind(value: string): value is ReportKind {
	return REPORT_KINDS.some((k) => k === value)
}

function byText(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0
}

/** Prompt asking a language model for a sentiment narrative over the items. */
export function buildSentimentPrompt(
	topic: string | null,
	range: DateRange,
	byPlatform: Record<string, ScoredItem[]>,
): string {
	const subject = topic ? `coverage of "${topic}"` : 'overall coverage'
	const lines = [
		`Analyze the sentiment of trending-news ${subject} from ${range.start} to ${range.end}.`,
		'',
		'For each platform, describe the dominant tone (positive, negative, neutral or mixed),',
		'name the stories driving it, and note where platforms disagree.',
		'Finish with a two-sentence overall assessment.',
		'',
	]
	for (const [platform, items] of Object.entries(byPlatform)) {
		lines.push(`## ${platform}`)
		for (const item of items) lines.push(`- [#${item.rank}] ${item.title}`)
		lines.push('')
	}
	return lines.join('\n').trimEnd()
}

export interface DigestOptions {
	now?: () => Date
}

export class DigestBuilder {
	private readonly search: SearchEngine
	private readonly config: EngineConfig
	private readonly now: () => Date

	constructor(search: SearchEngine, config: EngineConfig, options: DigestOptions = {}) {
		this.search = search
		this.config = config
		this.now = options.now ?? (() => new Date())
	}

	/** Deduplicated items grouped by platform, ready for sentiment analysis. */
	sentimentBundle(options: SentimentOptions = {}): SentimentBundle {
		const topic = options.topic ? validateQuery(options.topic, 'topic') : null
		const limit = validateLimit(options.limit, this.config.result_limit_default)
		const window = this.search.loadWindow(options.date_range, options.platforms)
		const match = topic ? topicMatcher(topic, 'keyword', this.search.similarity) : () => true

		const matches = this.search.collectMatches(window, match)
		if (matches.length === 0) {
			throw new InsufficientDataError(
				topic
					? `No items mention "${topic}" between ${window.range.start} and ${window.range.end}`
					: `No items stored between ${window.range.start} and ${window.range.end}`,
				'Widen the date range or check that snapshots were ingested.',
			)
		}

		const unique = dedupeItems(sortScored(matches), this.search.similarity.dedupThreshold)
		const ordered = sortScored(unique, options.sort_by_weight === false ? 'time' : 'weight')
		const selected = ordered.slice(0, limit)

		const byPlatform: Record<string, ScoredItem[]> = {}
		for (const item of selected) {
			const group = byPlatform[item.platform]
			if (group) group.push(item)
			else byPlatform[item.platform] = [item]
		}

		return {
			topic,
			date_range: window.range,
			total_found: matches.length,
			duplicates_removed: matches.length - unique.length,
			returned: selected.length,
			by_platform: byPlatform,
			prompt: buildSentimentPrompt(topic, window.range, byPlatform),
			skipped_ticks: window.skipped_ticks,
		}
	}

	/** Totals, busiest platforms, frequent keywords and top stories of a window. */
	summaryReport(options: SummaryOptions = {}): SummaryReport {
		const kind = options.kind ?? 'daily'
		const fallback =
			kind === 'weekly'
				? lastNDays(7, this.now())
				: defaultRange(this.config.default_date_range, this.now())
		const window = this.search.loadWindow(options.date_range, null, fallback)
		const items = this.search.collectMatches(window, () => true)

		const perPlatform = new Map<string, number>()
		for (const item of items) {
			perPlatform.set(item.platform, (perPlatform.get(item.platform) ?? 0) + 1)
		}

		const platforms = [...perPlatform.entries()]
			.map(([platform, count]) => ({ platform, items: count }))
			.sort((a, b) => b.items - a.items || byText(a.platform, b.platform))
		const topKeywords = tallyKeywords(
			items.map((item) => item.title),
			REPORT_TOP_N,
		)

		return {
			kind,
			date_range: window.range,
			generated_at: this.now().toISOString(),
			ticks: window.sets.length,
			total_items: items.length,
			platforms,
			top_keywords: topKeywords,
			top_items: sortScored(items).slice(0, REPORT_TOP_N),
			skipped_ticks: window.skipped_ticks,
		}
	}
}
