#!/usr/bin/env node
/**
 * trendscope CLI - query stored trending-news snapshots.
 *
 * Usage:
 *   trendscope <command> [args] [options]
 *
 * Run `trendscope --help` for commands and options.
 */

import { readFileSync } from 'node:fs'

import { type ConfigSection, isConfigSection, loadEngineConfig } from './lib/config.js'
import { type DateRange, parseDateQuery, resolveDateRange, todayDate } from './lib/dates.js'
import { isReportKind, type ReportKind } from './lib/digest.js'
import { TrendEngine } from './lib/engine.js'
import { EngineError, errorMessage, ValidationError } from './lib/errors.js'
import { type CountMode, isCountMode } from './lib/keywords.js'
import * as render from './lib/render.js'
import { snapshotSetFromDict } from './lib/schema.js'
import type { SortOrder } from './lib/score.js'
import { isRelatedPreset, isSearchMode, type RelatedPreset, type SearchMode } from './lib/search.js'
import { ProgressDisplay } from './lib/ui.js'

type EmitMode = 'compact' | 'json'

const COMMANDS = [
	'ingest',
	'dates',
	'latest',
	'day',
	'search',
	'similar',
	'related',
	'trend',
	'viral',
	'predict',
	'compare',
	'activity',
	'cooccur',
	'keywords',
	'sentiment',
	'summary',
	'config',
	'status',
] as const

type Command = (typeof COMMANDS)[number]

/** Commands that read a window of snapshots and show progress while doing it. */
const READING_COMMANDS: ReadonlySet<Command> = new Set<Command>([
	'latest',
	'day',
	'search',
	'similar',
	'related',
	'trend',
	'viral',
	'predict',
	'compare',
	'activity',
	'cooccur',
	'keywords',
	'sentiment',
	'summary',
])

interface CliArgs {
	command: Command
	positionals: string[]
	from: string | null
	to: string | null
	platforms: string[] | null
	mode: string | null
	limit: number | null
	sort: SortOrder | null
	minFrequency: number | null
	top: number | null
	threshold: number | null
	preset: RelatedPreset | null
	kind: ReportKind
	emit: EmitMode
	dataDir: string | null
	debug: boolean
}

/** Print usage information and exit. */
function showHelp(): never {
	const text = `trendscope - Search and analyze trending-news snapshots.

Usage:
  trendscope <command> [args] [options]

Commands:
  ingest <file>        Append a snapshot set (JSON) to the store
  dates                List capture dates
  latest               Items of the most recent capture
  day <date>           Every item captured on one date, by weight
  search <query>       Search titles (--mode keyword|fuzzy|entity)
  similar <text>       Near-duplicates of a title
  related <topic>      Related stories, yesterday by default (--preset)
  trend <topic>        Trend, lifecycle, anomalies and projection (last 7 days)
  viral [date]         Keywords spiking against the day before (default: today)
  predict [date]       Keywords climbing over the last three days
  compare <topic>      Per-platform match counts
  activity             Per-platform capture activity
  cooccur [topic]      Keyword pairs appearing together
  keywords [kw...]     Watch-keyword counts (--mode daily|current)
  sentiment [topic]    Deduplicated items and a sentiment prompt
  summary              Daily or weekly summary report (--kind daily|weekly)
  config [section]     Show configuration (all|weights|thresholds|keywords|analysis|storage)
  status               Store statistics

Options:
  --from=DATE          Window start (YYYY-MM-DD, today, yesterday, "3 days ago",
                       "last monday", YYYY/MM/DD, MM/DD)
  --to=DATE            Window end (same formats); alone, a single day.
                       A lone --from runs through today.
  --platforms=A,B      Only these platforms
  --mode=MODE          Search or keyword-count mode
  --limit=N            Max results (1-1000)
  --sort=ORDER         weight|time (default: weight)
  --min-frequency=N    Minimum pair count for cooccur (default: 3)
  --top=N              Keep the top N keywords, pairs or predictions
  --threshold=X        viral: growth multiple (default: 3, at least 1);
                       predict: minimum confidence (default: 0.7, 0-1)
  --preset=NAME        related window: yesterday|last_week|last_month
  --kind=KIND          Summary kind: daily|weekly (default: daily)
  --emit=MODE          Output mode: compact|json (default: compact)
  --data-dir=PATH      Snapshot directory (overrides TRENDSCOPE_DATA_DIR)
  --debug              Enable verbose debug logging
  -h, --help           Show this help message

Config:
  Settings are read from TRENDSCOPE_* environment variables, then from
  ~/.config/trendscope/.env (or the file named by TRENDSCOPE_CONFIG).

Examples:
  trendscope ingest ./tick.json
  trendscope search "rate cut" --from="3 days ago" --limit=10
  trendscope trend "chip export" --from=2025-01-01 --to=2025-01-07
  trendscope keywords --mode=current --emit=json
  trendscope viral --threshold=2`

	console.log(text)
	process.exit(0)
}

/** Parse a flag value as a base-10 integer. */
function parseIntValue(flag: string, value: string): number {
	if (!/^\d+$/.test(value)) {
		throw new ValidationError(`${flag} must be a whole number, got "${value}"`, {
			field: flag,
		})
	}
	return Number(value)
}

/** Parse a flag value as a non-negative decimal. */
function parseFloatValue(flag: string, value: string): number {
	if (!/^\d+(\.\d+)?$/.test(value)) {
		throw new ValidationError(`${flag} must be a number, got "${value}"`, {
			field: flag,
		})
	}
	return Number(value)
}

function isCommand(value: string): value is Command {
	return COMMANDS.some((c) => c === value)
}

/** Parse CLI arguments. */
function parseArgs(argv: string[]): CliArgs {
	let command: Command | null = null
	const positionals: string[] = []
	const parsed: Omit<CliArgs, 'command' | 'positionals'> = {
		from: null,
		to: null,
		platforms: null,
		mode: null,
		limit: null,
		sort: null,
		minFrequency: null,
		top: null,
		threshold: null,
		preset: null,
		kind: 'daily',
		emit: 'compact',
		dataDir: null,
		debug: false,
	}

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? ''
		if (arg === '--help' || arg === '-h') showHelp()
		if (arg === '--debug') {
			parsed.debug = true
			continue
		}
		if (!arg.startsWith('--')) {
			if (command === null) {
				if (!isCommand(arg)) {
					throw new ValidationError(`Unknown command: ${arg}`, {
						suggestion: 'Run trendscope --help for usage.',
					})
				}
				command = arg
			} else {
				positionals.push(arg)
			}
			continue
		}

		const eqIdx = arg.indexOf('=')
		const flag = eqIdx === -1 ? arg : arg.slice(0, eqIdx)
		let value: string
		if (eqIdx !== -1) {
			value = arg.slice(eqIdx + 1)
		} else {
			const next = argv[i + 1]
			if (next === undefined || next.startsWith('--')) {
				throw new ValidationError(`${flag} needs a value`, { field: flag })
			}
			value = next
			i += 1
		}

		switch (flag) {
			case '--from':
				parsed.from = value
				break
			case '--to':
				parsed.to = value
				break
			case '--platforms':
				parsed.platforms = value
					.split(',')
					.map((p) => p.trim())
					.filter(Boolean)
				break
			case '--mode':
				parsed.mode = value
				break
			case '--limit':
				parsed.limit = parseIntValue(flag, value)
				break
			case '--sort':
				if (value !== 'weight' && value !== 'time') {
					throw new ValidationError(`Invalid --sort value: "${value}". Valid: weight, time`, {
						field: flag,
					})
				}
				parsed.sort = value
				break
			case '--min-frequency':
				parsed.minFrequency = parseIntValue(flag, value)
				break
			case '--top':
				parsed.top = parseIntValue(flag, value)
				break
			case '--threshold':
				parsed.threshold = parseFloatValue(flag, value)
				break
			case '--preset':
				if (!isRelatedPreset(value)) {
					throw new ValidationError(
						`Invalid --preset value: "${value}". Valid: yesterday, last_week, last_month`,
						{ field: flag },
					)
				}
				parsed.preset = value
				break
			case '--kind':
				if (!isReportKind(value)) {
					throw new ValidationError(`Invalid --kind value: "${value}". Valid: daily, weekly`, {
						field: flag,
					})
				}
				parsed.kind = value
				break
			case '--emit':
				if (value !== 'compact' && value !== 'json') {
					throw new ValidationError(`Invalid --emit value: "${value}". Valid: compact, json`, {
						field: flag,
					})
				}
				parsed.emit = value
				break
			case '--data-dir':
				parsed.dataDir = value
				break
			default:
				throw new ValidationError(`Unknown flag: ${flag}`, {
					suggestion: 'Run trendscope --help for usage.',
				})
		}
	}

	if (command === null) showHelp()
	return { command, positionals, ...parsed }
}

/** Pre-scan for --emit so argument errors can honor it. */
function emitFromArgv(argv: string[]): EmitMode {
	const idx = argv.findIndex((a) => a === '--emit' || a === '--emit=json')
	if (idx === -1) return 'compact'
	return argv[idx] === '--emit=json' || argv[idx + 1] === 'json' ? 'json' : 'compact'
}

function requirePositional(args: CliArgs, name: string): string {
	const value = args.positionals.join(' ').trim()
	if (!value) {
		throw new ValidationError(`${args.command} needs a ${name}`, {
			field: name,
			suggestion: `Usage: trendscope ${args.command} <${name}>`,
		})
	}
	return value
}

/** --from alone runs through today; --to alone is one day. */
function dateRangeArg(args: CliArgs): Partial<DateRange> | null {
	if (args.from === null && args.to === null) return null
	const start = args.from === null ? undefined : parseDateQuery(args.from)
	if (args.to === null) return { start, end: todayDate() }
	return { start, end: parseDateQuery(args.to) }
}

function optionalDate(args: CliArgs): string | null {
	const value = args.positionals.join(' ').trim()
	return value ? parseDateQuery(value) : null
}

function searchModeArg(args: CliArgs): SearchMode | undefined {
	if (args.mode === null) return undefined
	if (!isSearchMode(args.mode)) {
		throw new ValidationError(`Invalid --mode value: "${args.mode}". Valid: keyword, fuzzy, entity`, {
			field: '--mode',
		})
	}
	return args.mode
}

function countModeArg(args: CliArgs): CountMode | undefined {
	if (args.mode === null) return undefined
	if (!isCountMode(args.mode)) {
		throw new ValidationError(`Invalid --mode value: "${args.mode}". Valid: daily, current`, {
			field: '--mode',
		})
	}
	return args.mode
}

function configSectionArg(args: CliArgs): ConfigSection {
	const section = args.positionals[0] ?? 'all'
	if (!isConfigSection(section)) {
		throw new ValidationError(`Unknown config section: ${section}`, {
			field: 'section',
			suggestion: 'Valid: all, weights, thresholds, keywords, analysis, storage',
		})
	}
	return section
}

/** Run one command; returns its output text and a one-line progress summary. */
function runCommand(
	engine: TrendEngine,
	args: CliArgs,
	progress: ProgressDisplay | null,
): { result: unknown; text: string; summary: string } {
	const range = dateRangeArg(args)
	const platforms = args.platforms
	const limit = args.limit

	if (progress) {
		progress.startReading(
			range ? `${range.start ?? range.end} to ${range.end ?? range.start}` : 'the default window',
		)
	}

	switch (args.command) {
		case 'ingest': {
			const file = requirePositional(args, 'file')
			let raw: unknown
			try {
				raw = JSON.parse(readFileSync(file, 'utf-8'))
			} catch (err) {
				throw new ValidationError(`Cannot read snapshot file ${file}: ${errorMessage(err)}`, {
					field: 'file',
				})
			}
			const set = snapshotSetFromDict(raw)
			const path = engine.ingest(set)
			const items = set.snapshots.reduce((acc, s) => acc + s.items.length, 0)
			const result = { path, captured_at: set.captured_at, snapshots: set.snapshots.length, items }
			return {
				result,
				text: `Stored tick ${set.captured_at} (${set.snapshots.length} platforms, ${items} items) -> ${path}`,
				summary: path,
			}
		}
		case 'dates': {
			const available = engine.store.availableDateRange()
			const today = todayDate()
			const window = resolveDateRange(range, available ?? { start: today, end: today })
			const dates = engine.listDates(window)
			return {
				result: { date_range: window, dates },
				text: render.renderDates(dates, available),
				summary: `${dates.length} dates`,
			}
		}
		case 'latest': {
			const result = engine.latest({ platforms, limit })
			return { result, text: render.renderLatest(result), summary: `${result.returned} items` }
		}
		case 'day': {
			const date = parseDateQuery(requirePositional(args, 'date'))
			const result = engine.newsByDate(date, { platforms, limit })
			return { result, text: render.renderDay(result), summary: `${result.returned} items` }
		}
		case 'search': {
			const result = engine.search(requirePositional(args, 'query'), {
				date_range: range,
				platforms,
				limit,
				mode: searchModeArg(args),
				sort: args.sort ?? undefined,
			})
			return {
				result,
				text: render.renderSearch(result),
				summary: `${result.total_found} found, ${result.returned} shown`,
			}
		}
		case 'similar': {
			const result = engine.findSimilar(requirePositional(args, 'text'), {
				date_range: range,
				platforms,
				limit,
			})
			return { result, text: render.renderSimilar(result), summary: `${result.total_found} similar` }
		}
		case 'related': {
			const result = engine.searchRelatedHistory(requirePositional(args, 'topic'), {
				date_range: range,
				platforms,
				limit,
				preset: args.preset ?? undefined,
			})
			return {
				result,
				text: render.renderSimilar(result, 'Related'),
				summary: `${result.total_found} related`,
			}
		}
		case 'trend': {
			const result = engine.analyzeTopic(requirePositional(args, 'topic'), { date_range: range })
			return {
				result,
				text: render.renderTrend(result),
				summary: `${result.trend}, ${result.lifecycle}`,
			}
		}
		case 'viral': {
			const result = engine.detectViralTopics({
				date: optionalDate(args),
				threshold: args.threshold,
				limit,
			})
			return {
				result,
				text: render.renderViral(result),
				summary: `${result.total_detected} viral keywords`,
			}
		}
		case 'predict': {
			const result = engine.predictTrendingTopics({
				date: optionalDate(args),
				confidence_threshold: args.threshold,
				top_n: args.top,
			})
			return {
				result,
				text: render.renderPrediction(result),
				summary: `${result.total_predicted} rising keywords`,
			}
		}
		case 'compare': {
			const result = engine.comparePlatforms(requirePositional(args, 'topic'), {
				date_range: range,
				mode: searchModeArg(args),
			})
			return {
				result,
				text: render.renderCompare(result),
				summary: `${result.platforms.length} platforms`,
			}
		}
		case 'activity': {
			const result = engine.activityStats({ date_range: range, platforms })
			return {
				result,
				text: render.renderActivity(result),
				summary: `${result.total_snapshots} snapshots`,
			}
		}
		case 'cooccur': {
			const topic = args.positionals.join(' ').trim()
			const result = engine.keywordCooccurrence({
				topic: topic || null,
				date_range: range,
				min_frequency: args.minFrequency ?? undefined,
				top_n: args.top ?? undefined,
			})
			return {
				result,
				text: render.renderCooccurrence(result),
				summary: `${result.pairs.length} pairs`,
			}
		}
		case 'keywords': {
			const result = engine.countKeywords(
				args.positionals.length > 0 ? args.positionals : undefined,
				{ date_range: range, mode: countModeArg(args), top_n: args.top },
			)
			return {
				result,
				text: render.renderKeywords(result),
				summary: `${result.keywords.length} keywords over ${result.total_items} items`,
			}
		}
		case 'sentiment': {
			const topic = args.positionals.join(' ').trim()
			const result = engine.sentimentBundle({
				topic: topic || null,
				date_range: range,
				platforms,
				limit,
				sort_by_weight: args.sort !== 'time',
			})
			return {
				result,
				text: render.renderSentiment(result),
				summary: `${result.returned} items`,
			}
		}
		case 'summary': {
			const result = engine.summaryReport({ kind: args.kind, date_range: range })
			return {
				result,
				text: render.renderSummary(result),
				summary: `${result.total_items} items`,
			}
		}
		case 'config': {
			const result = engine.describeConfig(configSectionArg(args))
			return { result, text: render.renderConfig(result), summary: 'config' }
		}
		case 'status': {
			const result = engine.status()
			return { result, text: render.renderStatus(result), summary: 'status' }
		}
	}
}

function main(argv: string[]): number {
	let emit = emitFromArgv(argv)
	let progress: ProgressDisplay | null = null
	try {
		const args = parseArgs(argv)
		emit = args.emit
		if (args.debug) process.env.TRENDSCOPE_DEBUG = '1'

		const env = args.dataDir ? { ...process.env, TRENDSCOPE_DATA_DIR: args.dataDir } : process.env
		const engine = new TrendEngine(loadEngineConfig(env))

		if (READING_COMMANDS.has(args.command)) {
			progress = new ProgressDisplay(args.command, args.positionals.join(' '))
		}
		const { result, text, summary } = runCommand(engine, args, progress)
		progress?.showComplete(summary)

		console.log(emit === 'json' ? JSON.stringify(result, null, 2) : text)
		return 0
	} catch (err) {
		progress?.endPhase()
		if (!(err instanceof EngineError)) throw err

		if (emit === 'json') {
			console.log(JSON.stringify({ error: err.toDict() }, null, 2))
			return err.code === 'INSUFFICIENT_DATA' ? 0 : 1
		}
		process.stderr.write(`Error: ${err.message}\n`)
		if (err.suggestion) process.stderr.write(`${err.suggestion}\n`)
		return 1
	}
}

try {
	process.exitCode = main(process.argv.slice(2))
} catch (e) {
	process.stderr.write(`Fatal error: ${errorMessage(e)}\n`)
	process.exitCode = 1
}
