/** Environment and option management for trendscope. */

import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'

import type { DefaultDateRange } from './dates.js'
import { ValidationError } from './errors.js'

const CONFIG_DIR = join(homedir(), '.config', 'trendscope')
const CONFIG_FILE = join(CONFIG_DIR, '.env')
const DEFAULT_DATA_DIR = join(homedir(), '.local', 'share', 'trendscope', 'snapshots')

export const MAX_RESULT_LIMIT = 1000

export type RankScale = 'reciprocal' | 'linear'
export type EntityExtractorKind = 'capitalized' | 'none'

/** Validated engine options. Frozen; read-only after startup. */
export interface EngineConfig {
	readonly data_dir: string
	readonly rank_weight: number
	readonly frequency_weight: number
	readonly hotness_weight: number
	readonly rank_scale: RankScale
	/** Platforms whose hotness substitutes for rank. */
	readonly hotness_platforms: readonly string[]
	readonly dedup_threshold: number
	readonly related_threshold: number
	readonly default_date_range: DefaultDateRange
	readonly result_limit_default: number
	readonly watch_keywords: readonly string[]
	readonly entity_extractor: EntityExtractorKind
	readonly trend_margin: number
	readonly lifecycle_concentration: number
	readonly lifecycle_min_active_days: number
	readonly anomaly_z_threshold: number
	readonly capture_jitter_minutes: number
}

export type ConfigSection = 'all' | 'weights' | 'thresholds' | 'keywords' | 'analysis' | 'storage'

export const CONFIG_SECTIONS: readonly ConfigSection[] = [
	'all',
	'weights',
	'thresholds',
	'keywords',
	'analysis',
	'storage',
]

export function isConfigSection(value: string): value is ConfigSection {
	return CONFIG_SECTIONS.some((s) => s === value)
}

const DEFAULTS: EngineConfig = {
	data_dir: DEFAULT_DATA_DIR,
	rank_weight: 0.6,
	frequency_weight: 0.3,
	hotness_weight: 0.1,
	rank_scale: 'reciprocal',
	hotness_platforms: [],
	dedup_threshold: 0.6,
	related_threshold: 0.4,
	default_date_range: 'today',
	result_limit_default: 50,
	watch_keywords: [],
	entity_extractor: 'capitalized',
	trend_margin: 1.2,
	lifecycle_concentration: 0.5,
	lifecycle_min_active_days: 3,
	anomaly_z_threshold: 2.0,
	capture_jitter_minutes: 5,
}

/** Load environment variables from a file. */
function loadEnvFile(path: string): Record<string, string> {
	const env: Record<string, string> = {}
	if (!existsSync(path)) return env

	const content = readFileSync(path, 'utf-8')
	for (const rawLine of content.split('\n')) {
		const line = rawLine.trim()
		if (!line || line.startsWith('#')) continue
		const eqIdx = line.indexOf('=')
		if (eqIdx === -1) continue

		const key = line.slice(0, eqIdx).trim()
		let value = line.slice(eqIdx + 1).trim()

		// Remove quotes if present
		if (
			value.length >= 2 &&
			((value[0] === '"' && value[value.length - 1] === '"') ||
				(value[0] === "'" && value[value.length - 1] === "'"))
		) {
			value = value.slice(1, -1)
		}

		if (key && value) env[key] = value
	}
	return env
}

/** Parse a watch-keyword list: one per line, `#` comments and blanks skipped. */
export function parseWatchKeywords(text: string): string[] {
	const seen = new Set<string>()
	const out: string[] = []
	for (const raw of text.split(/\r?\n/)) {
		const word = raw.trim()
		if (!word || word.startsWith('#')) continue
		const key = word.toLowerCase()
		if (seen.has(key)) continue
		seen.add(key)
		out.push(word)
	}
	return out
}

function splitList(value: string | undefined): string[] {
	if (!value) return []
	return value
		.split(',')
		.map((v) => v.trim())
		.filter(Boolean)
}

function parseNumber(key: string, raw: string | undefined, fallback: number): number {
	if (raw === undefined || raw.trim() === '') return fallback
	const n = Number(raw)
	if (!Number.isFinite(n)) {
		throw new ValidationError(`${key} must be a number, got "${raw}"`, { field: key })
	}
	return n
}

function parseEnum<T extends string>(
	key: string,
	raw: string | undefined,
	allowed: readonly T[],
	fallback: T,
): T {
	if (raw === undefined || raw.trim() === '') return fallback
	const value = raw.trim().toLowerCase()
	const match = allowed.find((a) => a === value)
	if (!match) {
		throw new ValidationError(`${key} must be one of ${allowed.join(', ')}, got "${raw}"`, {
			field: key,
		})
	}
	return match
}

/**
 * Merge process environment over the config file.
 * The file is ~/.config/trendscope/.env unless TRENDSCOPE_CONFIG names another.
 */
export function getRawConfig(
	env: NodeJS.ProcessEnv = process.env,
): Record<string, string | undefined> {
	const fileEnv = loadEnvFile(env.TRENDSCOPE_CONFIG ?? CONFIG_FILE)
	const keys = new Set([
		...Object.keys(fileEnv).filter((k) => k.startsWith('TRENDSCOPE_')),
		...Object.keys(env).filter((k) => k.startsWith('TRENDSCOPE_')),
	])
	const merged: Record<string, string | undefined> = {}
	for (const key of keys) merged[key] = env[key] ?? fileEnv[key]
	return merged
}

/** Build a validated EngineConfig from TRENDSCOPE_* settings. */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
	const raw = getRawConfig(env)

	let watchKeywords = splitList(raw.TRENDSCOPE_WATCH_KEYWORDS)
	const keywordsFile = raw.TRENDSCOPE_WATCH_KEYWORDS_FILE
	if (keywordsFile) {
		if (!existsSync(keywordsFile)) {
			throw new ValidationError(`Watch keyword file not found: ${keywordsFile}`, {
				field: 'TRENDSCOPE_WATCH_KEYWORDS_FILE',
			})
		}
		watchKeywords = [...watchKeywords, ...parseWatchKeywords(readFileSync(keywordsFile, 'utf-8'))]
	}

	return createEngineConfig({
		data_dir: raw.TRENDSCOPE_DATA_DIR ?? DEFAULTS.data_dir,
		rank_weight: parseNumber('TRENDSCOPE_RANK_WEIGHT', raw.TRENDSCOPE_RANK_WEIGHT, DEFAULTS.rank_weight),
		frequency_weight: parseNumber(
			'TRENDSCOPE_FREQUENCY_WEIGHT',
			raw.TRENDSCOPE_FREQUENCY_WEIGHT,
			DEFAULTS.frequency_weight,
		),
		hotness_weight: parseNumber(
			'TRENDSCOPE_HOTNESS_WEIGHT',
			raw.TRENDSCOPE_HOTNESS_WEIGHT,
			DEFAULTS.hotness_weight,
		),
		rank_scale: parseEnum(
			'TRENDSCOPE_RANK_SCALE',
			raw.TRENDSCOPE_RANK_SCALE,
			['reciprocal', 'linear'] as const,
			DEFAULTS.rank_scale,
		),
		hotness_platforms: splitList(raw.TRENDSCOPE_HOTNESS_PLATFORMS),
		dedup_threshold: parseNumber(
			'TRENDSCOPE_DEDUP_THRESHOLD',
			raw.TRENDSCOPE_DEDUP_THRESHOLD,
			DEFAULTS.dedup_threshold,
		),
		related_threshold: parseNumber(
			'TRENDSCOPE_RELATED_THRESHOLD',
			raw.TRENDSCOPE_RELATED_THRESHOLD,
			DEFAULTS.related_threshold,
		),
		default_date_range: parseEnum(
			'TRENDSCOPE_DEFAULT_DATE_RANGE',
			raw.TRENDSCOPE_DEFAULT_DATE_RANGE,
			['today', 'yesterday'] as const,
			DEFAULTS.default_date_range,
		),
		result_limit_default: parseNumber(
			'TRENDSCOPE_RESULT_LIMIT',
			raw.TRENDSCOPE_RESULT_LIMIT,
			DEFAULTS.result_limit_default,
		),
		watch_keywords: watchKeywords,
		entity_extractor: parseEnum(
			'TRENDSCOPE_ENTITY_EXTRACTOR',
			raw.TRENDSCOPE_ENTITY_EXTRACTOR,
			['capitalized', 'none'] as const,
			DEFAULTS.entity_extractor,
		),
		trend_margin: parseNumber('TRENDSCOPE_TREND_MARGIN', raw.TRENDSCOPE_TREND_MARGIN, DEFAULTS.trend_margin),
		lifecycle_concentration: parseNumber(
			'TRENDSCOPE_LIFECYCLE_CONCENTRATION',
			raw.TRENDSCOPE_LIFECYCLE_CONCENTRATION,
			DEFAULTS.lifecycle_concentration,
		),
		lifecycle_min_active_days: parseNumber(
			'TRENDSCOPE_LIFECYCLE_MIN_ACTIVE_DAYS',
			raw.TRENDSCOPE_LIFECYCLE_MIN_ACTIVE_DAYS,
			DEFAULTS.lifecycle_min_active_days,
		),
		anomaly_z_threshold: parseNumber(
			'TRENDSCOPE_ANOMALY_Z',
			raw.TRENDSCOPE_ANOMALY_Z,
			DEFAULTS.anomaly_z_threshold,
		),
		capture_jitter_minutes: parseNumber(
			'TRENDSCOPE_CAPTURE_JITTER_MINUTES',
			raw.TRENDSCOPE_CAPTURE_JITTER_MINUTES,
			DEFAULTS.capture_jitter_minutes,
		),
	})
}

/** Defaults overlaid with `overrides`, validated and frozen. */
export function createEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
	const cfg: EngineConfig = {
		...DEFAULTS,
		...overrides,
		hotness_platforms: Object.freeze([...(overrides.hotness_platforms ?? DEFAULTS.hotness_platforms)]),
		watch_keywords: Object.freeze([...(overrides.watch_keywords ?? DEFAULTS.watch_keywords)]),
	}
	validateEngineConfig(cfg)
	return Object.freeze(cfg)
}

function checkUnit(key: string, value: number): void {
	if (!Number.isFinite(value) || value < 0 || value > 1) {
		throw new ValidationError(`${key} must be between 0 and 1, got ${value}`, { field: key })
	}
}

/** Fail fast on options no query could run with. */
export function validateEngineConfig(cfg: EngineConfig): void {
	if (!cfg.data_dir.trim()) {
		throw new ValidationError('data_dir cannot be empty', { field: 'data_dir' })
	}

	for (const key of ['rank_weight', 'frequency_weight', 'hotness_weight'] as const) {
		const w = cfg[key]
		if (!Number.isFinite(w) || w < 0) {
			throw new ValidationError(`${key} must be a non-negative number, got ${w}`, { field: key })
		}
	}
	if (cfg.rank_weight + cfg.frequency_weight + cfg.hotness_weight <= 0) {
		throw new ValidationError('At least one scoring weight must be positive', {
			field: 'rank_weight',
		})
	}

	checkUnit('dedup_threshold', cfg.dedup_threshold)
	checkUnit('related_threshold', cfg.related_threshold)
	if (cfg.related_threshold > cfg.dedup_threshold) {
		throw new ValidationError(
			`related_threshold (${cfg.related_threshold}) cannot exceed dedup_threshold (${cfg.dedup_threshold})`,
			{ field: 'related_threshold', suggestion: 'Related matching must be looser than dedup.' },
		)
	}

	if (
		!Number.isInteger(cfg.result_limit_default) ||
		cfg.result_limit_default < 1 ||
		cfg.result_limit_default > MAX_RESULT_LIMIT
	) {
		throw new ValidationError(
			`result_limit_default must be an integer between 1 and ${MAX_RESULT_LIMIT}`,
			{ field: 'result_limit_default' },
		)
	}

	if (!Number.isFinite(cfg.trend_margin) || cfg.trend_margin < 1) {
		throw new ValidationError('trend_margin must be at least 1', { field: 'trend_margin' })
	}
	checkUnit('lifecycle_concentration', cfg.lifecycle_concentration)
	if (!Number.isInteger(cfg.lifecycle_min_active_days) || cfg.lifecycle_min_active_days < 1) {
		throw new ValidationError('lifecycle_min_active_days must be a positive integer', {
			field: 'lifecycle_min_active_days',
		})
	}
	if (!Number.isFinite(cfg.anomaly_z_threshold) || cfg.anomaly_z_threshold <= 0) {
		throw new ValidationError('anomaly_z_threshold must be positive', {
			field: 'anomaly_z_threshold',
		})
	}
	if (!Number.isFinite(cfg.capture_jitter_minutes) || cfg.capture_jitter_minutes < 0) {
		throw new ValidationError('capture_jitter_minutes must be non-negative', {
			field: 'capture_jitter_minutes',
		})
	}
	for (const word of cfg.watch_keywords) {
		if (!word.trim()) {
			throw new ValidationError('Watch keywords cannot be blank', { field: 'watch_keywords' })
		}
	}
}

/** One section of the active configuration, for status output. */
export function describeConfig(
	cfg: EngineConfig,
	section: ConfigSection = 'all',
): Record<string, unknown> {
	const sections: Record<Exclude<ConfigSection, 'all'>, Record<string, unknown>> = {
		weights: {
			rank_weight: cfg.rank_weight,
			frequency_weight: cfg.frequency_weight,
			hotness_weight: cfg.hotness_weight,
			rank_scale: cfg.rank_scale,
			hotness_platforms: [...cfg.hotness_platforms],
		},
		thresholds: {
			dedup_threshold: cfg.dedup_threshold,
			related_threshold: cfg.related_threshold,
		},
		keywords: {
			watch_keywords: [...cfg.watch_keywords],
			total: cfg.watch_keywords.length,
			entity_extractor: cfg.entity_extractor,
		},
		analysis: {
			trend_margin: cfg.trend_margin,
			lifecycle_concentration: cfg.lifecycle_concentration,
			lifecycle_min_active_days: cfg.lifecycle_min_active_days,
			anomaly_z_threshold: cfg.anomaly_z_threshold,
		},
		storage: {
			data_dir: cfg.data_dir,
			capture_jitter_minutes: cfg.capture_jitter_minutes,
			default_date_range: cfg.default_date_range,
			result_limit_default: cfg.result_limit_default,
		},
	}
	if (section === 'all') return sections
	return sections[section]
}
