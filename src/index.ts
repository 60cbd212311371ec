/**
 * trendscope
 *
 * Search and analytics over append-only snapshots of trending-news lists.
 * Weighted ranking, near-duplicate detection, topic trends and insights.
 */

// Config
export {
	CONFIG_SECTIONS,
	type ConfigSection,
	createEngineConfig,
	describeConfig,
	type EngineConfig,
	type EntityExtractorKind,
	getRawConfig,
	isConfigSection,
	loadEngineConfig,
	MAX_RESULT_LIMIT,
	parseWatchKeywords,
	type RankScale,
	validateEngineConfig,
} from './lib/config.js'
// Date utilities
export {
	addDays,
	captureDate,
	type DateRange,
	type DefaultDateRange,
	defaultRange,
	eachDay,
	lastNDays,
	parseDateQuery,
	parseDay,
	resolveDateRange,
	todayDate,
} from './lib/dates.js'
// Deduplication
export { dedupeItems, findDuplicates } from './lib/dedupe.js'
// Digest
export {
	buildSentimentPrompt,
	DigestBuilder,
	type ReportKind,
	type SentimentBundle,
	type SentimentOptions,
	type SummaryOptions,
	type SummaryReport,
} from './lib/digest.js'
// Engine facade
export { type EngineStatus, TrendEngine, type TrendEngineOptions } from './lib/engine.js'
// Errors
export {
	EmptyRangeError,
	EngineError,
	type EngineErrorCode,
	InsufficientDataError,
	PartialReadWarning,
	ValidationError,
} from './lib/errors.js'
// Insights
export {
	type ActivityResult,
	type CompareResult,
	type CooccurrenceResult,
	InsightEngine,
	type KeywordPair,
	type PlatformActivity,
	type PlatformComparison,
} from './lib/insights.js'
// Keyword counter
export { type CountMode, KeywordCounter, type KeywordCount, type KeywordCountResult } from './lib/keywords.js'
// Keyword momentum
export {
	type AlertLevel,
	keywordsByDay,
	MomentumAnalyzer,
	type PredictedTopic,
	type PredictionResult,
	type PredictOptions,
	type ViralOptions,
	type ViralResult,
	type ViralTopic,
} from './lib/momentum.js'
// Schema
export {
	createSnapshot,
	createSnapshotSet,
	identityKey,
	type NewsItem,
	normalizeTitle,
	type RawItem,
	type ScoredItem,
	type Snapshot,
	type SnapshotSet,
	snapshotSetFromDict,
	snapshotSetToDict,
	type SubScores,
	validateSnapshotSet,
} from './lib/schema.js'
// Scoring
export { buildWindow, rankScore, ScoringEngine, type ScoringWindow, type SortOrder, sortScored } from './lib/score.js'
// Search
export {
	type DayResult,
	type LatestResult,
	presetRange,
	type RelatedOptions,
	type RelatedPreset,
	SearchEngine,
	type SearchMode,
	type SearchOptions,
	type SearchResult,
	type SimilarItem,
	type SimilarResult,
} from './lib/search.js'
// Similarity
export {
	entityTokens,
	extractEntities,
	extractKeywords,
	type KeywordTally,
	SimilarityEngine,
	similarity,
	tallyKeywords,
	tokenSet,
} from './lib/similarity.js'
// Storage
export { FileSnapshotStore, type ReadResult, type SnapshotStore, type StoreStats } from './lib/store.js'
// Trend analysis
export {
	type Anomaly,
	classifyLifecycle,
	classifyTrend,
	detectAnomalies,
	type LifecyclePhase,
	type SeriesPoint,
	type Prediction,
	predictNext,
	type TopicSeries,
	type TrendAnalysis,
	TrendAnalyzer,
	type TrendDirection,
} from './lib/trend.js'
