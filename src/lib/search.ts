/** Search and retrieval over stored snapshot sets. */

import { type EngineConfig, MAX_RESULT_LIMIT } from './config.js'
import { addDays, type DateRange, defaultRange, parseDay, resolveDateRange, todayDate } from './dates.js'
import { ValidationError } from './errors.js'
import { debug } from './log.js'
import {
	identityKey,
	type NewsItem,
	normalizeTitle,
	type ScoredItem,
	type SnapshotSet,
	setItems,
} from './schema.js'
import { buildWindow, ScoringEngine, type SortOrder, sortScored } from './score.js'
import {
	entityTokens,
	extractEntities,
	type KeywordTally,
	SimilarityEngine,
	tallyKeywords,
} from './similarity.js'
import type { SnapshotStore } from './store.js'

export type SearchMode = 'keyword' | 'fuzzy' | 'entity'

export const SEARCH_MODES: readonly SearchMode[] = ['keyword', 'fuzzy', 'entity']
export const MAX_QUERY_LENGTH = 100

/** Named look-back windows for related history, all ending yesterday. */
export type RelatedPreset = 'yesterday' | 'last_week' | 'last_month'

export const RELATED_PRESETS: readonly RelatedPreset[] = ['yesterday', 'last_week', 'last_month']

const PRESET_DAYS: Record<RelatedPreset, number> = { yesterday: 1, last_week: 7, last_month: 30 }

const CONTEXT_KEYWORDS = 10

export interface WindowOptions {
	date_range?: Partial<DateRange> | null
	platforms?: readonly string[] | null
	limit?: number | null
}

export interface SearchOptions extends WindowOptions {
	mode?: SearchMode
	sort?: SortOrder
}

export interface RelatedOptions extends WindowOptions {
	/** Ignored when `date_range` is given. */
	preset?: RelatedPreset
}

export interface SearchResult {
	query: string
	mode: SearchMode
	effective_mode: SearchMode
	date_range: DateRange
	items: ScoredItem[]
	total_found: number
	returned: number
	skipped_ticks: number
	notes: string[]
	/** Entity mode only: keywords seen alongside the entity in matching titles. */
	related_keywords: KeywordTally[] | null
}

export interface SimilarItem extends ScoredItem {
	similarity: number
}

export interface SimilarResult {
	reference: string
	threshold: number
	date_range: DateRange
	items: SimilarItem[]
	total_found: number
	returned: number
	skipped_ticks: number
}

export interface LatestResult {
	captured_at: string | null
	items: NewsItem[]
	total_found: number
	returned: number
	skipped_ticks: number
}

export interface DayResult {
	date: string
	items: ScoredItem[]
	total_found: number
	returned: number
	skipped_ticks: number
}

/** Snapshot sets of a window plus how many ticks could not be read. */
export interface LoadedWindow {
	range: DateRange
	sets: SnapshotSet[]
	skipped_ticks: number
}

/** Trimmed, non-empty query of at most 100 characters. */
export function validateQuery(query: string, field = 'query'): string {
	const q = query.trim()
	if (!q) {
		throw new ValidationError(`${field} cannot be empty`, { field })
	}
	if (q.length > MAX_QUERY_LENGTH) {
		throw new ValidationError(`${field} cannot exceed ${MAX_QUERY_LENGTH} characters`, {
			field,
			suggestion: 'Shorten the query to its key terms.',
		})
	}
	return q
}

/** Resolve a result limit: default when absent, integer in [1, 1000] otherwise. */
export function validateLimit(limit: number | null | undefined, fallback: number): number {
	if (limit === null || limit === undefined) return fallback
	if (!Number.isInteger(limit) || limit < 1 || limit > MAX_RESULT_LIMIT) {
		throw new ValidationError(`limit must be an integer between 1 and ${MAX_RESULT_LIMIT}`, {
			field: 'limit',
		})
	}
	return limit
}

export function isSearchMode(value: string): value is SearchMode {
	return SEARCH_MODES.some((m) => m === value)
}

export function isRelatedPreset(value: string): value is RelatedPreset {
	return RELATED_PRESETS.some((p) => p === value)
}

/** Window of a related-history preset: N days back through yesterday. */
export function presetRange(preset: RelatedPreset, now: Date = new Date()): DateRange {
	const today = todayDate(now)
	return { start: addDays(today, -PRESET_DAYS[preset]), end: addDays(today, -1) }
}

/** Case-insensitive substring match. */
export function containsKeyword(title: string, keyword: string): boolean {
	return title.toLowerCase().includes(keyword.trim().toLowerCase())
}

/** Title predicate for a query in the given mode. */
export function topicMatcher(
	query: string,
	mode: SearchMode,
	similarity: SimilarityEngine,
): (title: string) => boolean {
	switch (mode) {
		case 'fuzzy':
			return (title) => similarity.isRelated(query, title)
		case 'entity': {
			const wanted = entityTokens(query)
			return (title) => {
				if (!containsKeyword(title, query)) return false
				const entities = extractEntities(title)
				return wanted.every((token) => entities.has(token))
			}
		}
		default:
			return (title) => containsKeyword(title, query)
	}
}

/**
 * Collapse occurrences to one per identity.
 * The representative is the best-ranked, then earliest-captured occurrence.
 */
export function collapseItems(items: readonly NewsItem[]): NewsItem[] {
	const byIdentity = new Map<string, NewsItem>()
	for (const item of items) {
		const key = identityKey(item)
		const current = byIdentity.get(key)
		if (
			!current ||
			item.rank < current.rank ||
			(item.rank === current.rank &&
				new Date(item.captured_at).getTime() < new Date(current.captured_at).getTime())
		) {
			byIdentity.set(key, item)
		}
	}
	return [...byIdentity.values()]
}

export interface SearchEngineOptions {
	now?: () => Date
	/** Shared thresholds; built from `config` when absent. */
	similarity?: SimilarityEngine
}

export class SearchEngine {
	private readonly store: SnapshotStore
	private readonly config: EngineConfig
	private readonly scorer: ScoringEngine
	private readonly now: () => Date
	readonly similarity: SimilarityEngine

	constructor(store: SnapshotStore, config: EngineConfig, options: SearchEngineOptions = {}) {
		this.store = store
		this.config = config
		this.scorer = new ScoringEngine(config)
		this.now = options.now ?? (() => new Date())
		this.similarity = options.similarity ?? new SimilarityEngine(config)
	}

	/** Read a window, defaulting to the configured today/yesterday range. */
	loadWindow(
		dateRange: Partial<DateRange> | null | undefined,
		platforms: readonly string[] | null | undefined,
		fallback: DateRange = defaultRange(this.config.default_date_range, this.now()),
	): LoadedWindow {
		const range = resolveDateRange(dateRange, fallback)
		const { sets, skipped_ticks } = this.store.read(range, platforms ?? null)
		return { range, sets, skipped_ticks }
	}

	/** Collapsed, scored items of a window whose titles pass `match`. */
	collectMatches(window: LoadedWindow, match: (title: string) => boolean): ScoredItem[] {
		const matched = window.sets.flatMap((set) => setItems(set).filter((item) => match(item.title)))
		return this.scorer.scoreAll(collapseItems(matched), buildWindow(window.sets))
	}

	search(query: string, options: SearchOptions = {}): SearchResult {
		const q = validateQuery(query)
		const mode = options.mode ?? 'keyword'
		const limit = validateLimit(options.limit, this.config.result_limit_default)
		const notes: string[] = []

		let effectiveMode = mode
		if (mode === 'entity' && this.config.entity_extractor === 'none') {
			effectiveMode = 'keyword'
			notes.push('Entity extraction is disabled; fell back to keyword matching.')
		}

		const window = this.loadWindow(options.date_range, options.platforms)
		const matches = this.collectMatches(
			window,
			topicMatcher(q, effectiveMode, this.similarity),
		)
		const items = sortScored(matches, options.sort ?? 'weight').slice(0, limit)
		const relatedKeywords =
			effectiveMode === 'entity'
				? tallyKeywords(
						matches.map((item) => item.title),
						CONTEXT_KEYWORDS,
						new Set(normalizeTitle(q).split(' ')),
					)
				: null

		if (window.sets.length === 0) {
			notes.push(`No snapshots stored for ${window.range.start}..${window.range.end}.`)
		}
		if (window.skipped_ticks > 0) {
			notes.push(`${window.skipped_ticks} unreadable tick(s) skipped.`)
		}
		debug(`search "${q}" (${effectiveMode}): ${matches.length} found, ${items.length} returned`)

		return {
			query: q,
			mode,
			effective_mode: effectiveMode,
			date_range: window.range,
			items,
			total_found: matches.length,
			returned: items.length,
			skipped_ticks: window.skipped_ticks,
			notes,
			related_keywords: relatedKeywords,
		}
	}

	/**
	 * Near-duplicates of a reference item or text at the dedup threshold.
	 * An item reference never matches its own identity; a text reference
	 * never matches items carrying the same normalized title.
	 */
	findSimilar(reference: NewsItem | string, options: WindowOptions = {}): SimilarResult {
		const text = validateQuery(typeof reference === 'string' ? reference : reference.title, 'reference')
		let isReference: (item: NewsItem) => boolean
		if (typeof reference === 'string') {
			const normalized = normalizeTitle(text)
			isReference = (item) => normalizeTitle(item.title) === normalized
		} else {
			const key = identityKey(reference)
			isReference = (item) => identityKey(item) === key
		}
		return this.similarTo(text, isReference, this.similarity.dedupThreshold, options)
	}

	/** Related stories for a topic, over yesterday (or another preset) by default. */
	searchRelatedHistory(topic: string, options: RelatedOptions = {}): SimilarResult {
		const fallback = presetRange(options.preset ?? 'yesterday', this.now())
		return this.similarTo(
			validateQuery(topic, 'topic'),
			() => false,
			this.similarity.relatedThreshold,
			options,
			fallback,
		)
	}

	/** The most recent readable tick, optionally narrowed to some platforms. */
	latestSet(platforms: readonly string[] | null = null): { set: SnapshotSet | null; skipped_ticks: number } {
		const available = this.store.availableDateRange()
		if (!available) return { set: null, skipped_ticks: 0 }

		const day = { start: available.end, end: available.end }
		const { sets, skipped_ticks } = this.store.read(day, platforms)
		return { set: sets[sets.length - 1] ?? null, skipped_ticks }
	}

	/** Items of the most recent tick, by rank then platform. */
	latest(options: Omit<WindowOptions, 'date_range'> = {}): LatestResult {
		const limit = validateLimit(options.limit, this.config.result_limit_default)
		const { set, skipped_ticks } = this.latestSet(options.platforms)
		if (!set) {
			return { captured_at: null, items: [], total_found: 0, returned: 0, skipped_ticks }
		}

		const all = setItems(set).sort(
			(a, b) => a.rank - b.rank || (a.platform < b.platform ? -1 : a.platform > b.platform ? 1 : 0),
		)
		const items = all.slice(0, limit)
		return {
			captured_at: set.captured_at,
			items,
			total_found: all.length,
			returned: items.length,
			skipped_ticks,
		}
	}

	/** Every distinct item of one capture date, by weight. */
	newsByDate(date: string, options: Omit<WindowOptions, 'date_range'> = {}): DayResult {
		if (!parseDay(date)) {
			throw new ValidationError(`Invalid date format: ${date}`, {
				field: 'date',
				suggestion: 'Use YYYY-MM-DD, e.g. 2025-01-15.',
			})
		}
		const limit = validateLimit(options.limit, this.config.result_limit_default)
		const window = this.loadWindow({ start: date, end: date }, options.platforms)
		const all = sortScored(this.collectMatches(window, () => true))
		const items = all.slice(0, limit)
		return {
			date,
			items,
			total_found: all.length,
			returned: items.length,
			skipped_ticks: window.skipped_ticks,
		}
	}

	private similarTo(
		text: string,
		isReference: (item: NewsItem) => boolean,
		threshold: number,
		options: WindowOptions,
		fallback?: DateRange,
	): SimilarResult {
		const limit = validateLimit(options.limit, this.config.result_limit_default)
		const window = this.loadWindow(options.date_range, options.platforms, fallback)

		const scores = new Map<string, number>()
		const matches = this.collectMatches(window, (title) => {
			const s = this.similarity.similarity(text, title)
			if (s < threshold) return false
			scores.set(title, s)
			return true
		}).filter((item) => !isReference(item))

		const withSimilarity: SimilarItem[] = sortScored(matches).map((item) => ({
			...item,
			similarity: scores.get(item.title) ?? this.similarity.similarity(text, item.title),
		}))
		// stable sort keeps weight order among equal similarity
		withSimilarity.sort((a, b) => b.similarity - a.similarity)
		const items = withSimilarity.slice(0, limit)

		return {
			reference: text,
			threshold,
			date_range: window.range,
			items,
			total_found: withSimilarity.length,
			returned: items.length,
			skipped_ticks: window.skipped_ticks,
		}
	}
}
