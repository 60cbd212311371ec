/** Engine facade: one config, every analytic operation. */

import { readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'

import { type ConfigSection, describeConfig, type EngineConfig } from './config.js'
import type { DateRange } from './dates.js'
import {
	DigestBuilder,
	type SentimentBundle,
	type SentimentOptions,
	type SummaryOptions,
	type SummaryReport,
} from './digest.js'
import { errorMessage } from './errors.js'
import {
	type ActivityOptions,
	type ActivityResult,
	type CompareOptions,
	type CompareResult,
	type CooccurrenceOptions,
	type CooccurrenceResult,
	InsightEngine,
} from './insights.js'
import { type CountOptions, KeywordCounter, type KeywordCountResult } from './keywords.js'
import { debug } from './log.js'
import {
	MomentumAnalyzer,
	type PredictionResult,
	type PredictOptions,
	type ViralOptions,
	type ViralResult,
} from './momentum.js'
import type { NewsItem, SnapshotSet } from './schema.js'
import {
	type DayResult,
	type LatestResult,
	type RelatedOptions,
	SearchEngine,
	type SearchOptions,
	type SearchResult,
	type SimilarResult,
	type WindowOptions,
} from './search.js'
import { SimilarityEngine } from './similarity.js'
import { FileSnapshotStore, type SnapshotStore, type StoreStats } from './store.js'
import { type AnalyzeOptions, type TrendAnalysis, TrendAnalyzer } from './trend.js'

export interface EngineStatus {
	version: string
	data_dir: string
	available_range: DateRange | null
	store: StoreStats
	watch_keywords: number
}

export interface TrendEngineOptions {
	/** Storage backend; a file store under `config.data_dir` by default. */
	store?: SnapshotStore
	now?: () => Date
}

/** Package version, read from package.json beside src/ or dist/. */
export function packageVersion(): string {
	const pkgPath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json')
	try {
		const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'))
		if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
			return pkg.version
		}
	} catch (err) {
		debug(`could not read ${pkgPath}: ${errorMessage(err)}`)
	}
	return '0.0.0'
}

export class TrendEngine {
	readonly config: EngineConfig
	readonly store: SnapshotStore
	readonly similarity: SimilarityEngine
	readonly searchEngine: SearchEngine
	readonly analyzer: TrendAnalyzer
	readonly insights: InsightEngine
	readonly counter: KeywordCounter
	readonly momentum: MomentumAnalyzer
	readonly digest: DigestBuilder

	constructor(config: EngineConfig, options: TrendEngineOptions = {}) {
		const now = options.now
		this.config = config
		this.store =
			options.store ??
			new FileSnapshotStore({
				dataDir: config.data_dir,
				jitterMinutes: config.capture_jitter_minutes,
				now,
			})
		this.similarity = new SimilarityEngine(config)
		this.searchEngine = new SearchEngine(this.store, config, { now, similarity: this.similarity })
		this.analyzer = new TrendAnalyzer(this.store, config, { now, similarity: this.similarity })
		this.insights = new InsightEngine(this.searchEngine)
		this.counter = new KeywordCounter(this.searchEngine, config)
		this.momentum = new MomentumAnalyzer(this.searchEngine, config, { now })
		this.digest = new DigestBuilder(this.searchEngine, config, { now })
	}

	ingest(set: SnapshotSet): string {
		return this.store.append(set)
	}

	listDates(range?: DateRange): string[] {
		return this.store.listDates(range)
	}

	search(query: string, options?: SearchOptions): SearchResult {
		return this.searchEngine.search(query, options)
	}

	findSimilar(reference: NewsItem | string, options?: WindowOptions): SimilarResult {
		return this.searchEngine.findSimilar(reference, options)
	}

	searchRelatedHistory(topic: string, options?: RelatedOptions): SimilarResult {
		return this.searchEngine.searchRelatedHistory(topic, options)
	}

	latest(options?: Omit<WindowOptions, 'date_range'>): LatestResult {
		return this.searchEngine.latest(options)
	}

	newsByDate(date: string, options?: Omit<WindowOptions, 'date_range'>): DayResult {
		return this.searchEngine.newsByDate(date, options)
	}

	analyzeTopic(topic: string, options?: AnalyzeOptions): TrendAnalysis {
		return this.analyzer.analyzeTopic(topic, options)
	}

	detectViralTopics(options?: ViralOptions): ViralResult {
		return this.momentum.detectViralTopics(options)
	}

	predictTrendingTopics(options?: PredictOptions): PredictionResult {
		return this.momentum.predictTrendingTopics(options)
	}

	comparePlatforms(topic: string, options?: CompareOptions): CompareResult {
		return this.insights.comparePlatforms(topic, options)
	}

	activityStats(options?: ActivityOptions): ActivityResult {
		return this.insights.activityStats(options)
	}

	keywordCooccurrence(options?: CooccurrenceOptions): CooccurrenceResult {
		return this.insights.keywordCooccurrence(options)
	}

	countKeywords(keywords?: readonly string[], options?: CountOptions): KeywordCountResult {
		return this.counter.countKeywords(keywords, options)
	}

	sentimentBundle(options?: SentimentOptions): SentimentBundle {
		return this.digest.sentimentBundle(options)
	}

	summaryReport(options?: SummaryOptions): SummaryReport {
		return this.digest.summaryReport(options)
	}

	describeConfig(section: ConfigSection = 'all'): Record<string, unknown> {
		return describeConfig(this.config, section)
	}

	status(): EngineStatus {
		return {
			version: packageVersion(),
			data_dir: this.config.data_dir,
			available_range: this.store.availableDateRange(),
			store: this.store.stats(),
			watch_keywords: this.config.watch_keywords.length,
		}
	}
}
