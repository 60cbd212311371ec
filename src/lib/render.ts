/** Markdown rendering of engine results for the CLI. */

import type { DateRange } from './dates.js'
import type { SentimentBundle, SummaryReport } from './digest.js'
import type { EngineStatus } from './engine.js'
import type { ActivityResult, CompareResult, CooccurrenceResult } from './insights.js'
import type { KeywordCountResult } from './keywords.js'
import type { PredictionResult, ViralResult } from './momentum.js'
import type { NewsItem, ScoredItem } from './schema.js'
import type { DayResult, LatestResult, SearchResult, SimilarResult } from './search.js'
import type { TrendAnalysis } from './trend.js'

/** Two-decimal score text. */
export function fmtScore(value: number): string {
	return value.toFixed(2)
}

function fmtRange(range: DateRange): string {
	return range.start === range.end ? range.start : `${range.start} to ${range.end}`
}

function pushItem(lines: string[], item: NewsItem | ScoredItem, extra = ''): void {
	const score = 'composite_score' in item ? ` (score:${fmtScore(item.composite_score)})` : ''
	const hot = item.hotness != null ? ` [hot:${item.hotness}]` : ''
	lines.push(`**#${item.rank}** ${item.platform}${score}${hot}${extra}`)
	lines.push(`  ${item.title}`)
	if (item.url) lines.push(`  ${item.url}`)
}

function pushSkipped(lines: string[], skipped: number): void {
	if (skipped > 0) {
		lines.push(`**⚠️ ${skipped} unreadable tick(s) skipped** - results may be incomplete.`)
		lines.push('')
	}
}

export function renderDates(dates: string[], available: DateRange | null): string {
	if (dates.length === 0) return '*No capture dates in range.*'
	const lines = ['## Capture Dates', '']
	if (available) lines.push(`**Stored:** ${fmtRange(available)}`, '')
	for (const d of dates) lines.push(`- ${d}`)
	return lines.join('\n')
}

export function renderSearch(result: SearchResult): string {
	const lines: string[] = []
	lines.push(`## Search: ${result.query}`)
	lines.push('')
	lines.push(`**Date Range:** ${fmtRange(result.date_range)}`)
	lines.push(
		`**Mode:** ${result.effective_mode}${result.effective_mode !== result.mode ? ` (requested ${result.mode})` : ''}`,
	)
	lines.push(`**Found:** ${result.total_found} (showing ${result.returned})`)
	lines.push('')
	for (const note of result.notes) lines.push(`*${note}*`)
	if (result.notes.length > 0) lines.push('')
	if (result.related_keywords && result.related_keywords.length > 0) {
		lines.push(`**Related:** ${result.related_keywords.map((k) => `${k.keyword} (${k.count})`).join(', ')}`)
		lines.push('')
	}

	if (result.items.length === 0) {
		lines.push('*No matching items.*')
		return lines.join('\n')
	}
	for (const item of result.items) {
		pushItem(lines, item, ` seen ${item.appearances}x`)
		lines.push('')
	}
	return lines.join('\n').trimEnd()
}

export function renderSimilar(result: SimilarResult, heading = 'Similar'): string {
	const lines: string[] = []
	lines.push(`## ${heading}: ${result.reference}`)
	lines.push('')
	lines.push(`**Date Range:** ${fmtRange(result.date_range)}`)
	lines.push(`**Threshold:** ${fmtScore(result.threshold)}`)
	lines.push(`**Found:** ${result.total_found} (showing ${result.returned})`)
	lines.push('')
	pushSkipped(lines, result.skipped_ticks)

	if (result.items.length === 0) {
		lines.push('*No similar items.*')
		return lines.join('\n')
	}
	for (const item of result.items) {
		pushItem(lines, item, ` sim:${fmtScore(item.similarity)}`)
		lines.push('')
	}
	return lines.join('\n').trimEnd()
}

export function renderLatest(result: LatestResult): string {
	if (!result.captured_at) return '*No snapshots stored yet.*'
	const lines = [`## Latest: ${result.captured_at}`, '']
	lines.push(`**Items:** ${result.total_found} (showing ${result.returned})`, '')
	for (const item of result.items) {
		pushItem(lines, item)
		lines.push('')
	}
	return lines.join('\n').trimEnd()
}

export function renderDay(result: DayResult): string {
	const lines = [`## News: ${result.date}`, '']
	lines.push(`**Items:** ${result.total_found} (showing ${result.returned})`, '')
	pushSkipped(lines, result.skipped_ticks)
	if (result.items.length === 0) {
		lines.push('*No items captured on this date.*')
		return lines.join('\n')
	}
	for (const item of result.items) {
		pushItem(lines, item)
		lines.push('')
	}
	return lines.join('\n').trimEnd()
}

export function renderTrend(analysis: TrendAnalysis): string {
	const lines: string[] = []
	lines.push(`## Trend: ${analysis.topic}`)
	lines.push('')
	lines.push(`**Date Range:** ${fmtRange(analysis.date_range)}`)
	lines.push(`**Trend:** ${analysis.trend}`)
	lines.push(`**Lifecycle:** ${analysis.lifecycle}`)
	lines.push(`**Mentions:** ${analysis.total_mentions} (peak ${analysis.peak_count} on ${analysis.peak_date})`)
	lines.push(
		`**Active:** ${analysis.active_days} day(s), ${analysis.first_appearance} to ${analysis.last_appearance}, ` +
			`${analysis.avg_daily_mentions.toFixed(1)}/day`,
	)
	lines.push('')
	pushSkipped(lines, analysis.skipped_ticks)

	lines.push('### Daily Counts', '')
	for (const point of analysis.series.points) {
		lines.push(`- ${point.date}: ${point.count}${point.count > 0 ? ` (avg score:${fmtScore(point.mean_score)})` : ''}`)
		for (const title of point.sample_titles) lines.push(`  - ${title}`)
	}
	lines.push('')

	if (analysis.anomalies.length > 0) {
		lines.push('### Anomalies', '')
		for (const a of analysis.anomalies) {
			lines.push(
				`- ${a.date}: ${a.count} vs baseline ${fmtScore(a.baseline_mean)}±${fmtScore(a.baseline_std)} (z=${fmtScore(a.z_score)})`,
			)
		}
		lines.push('')
	}

	const p = analysis.prediction
	lines.push('### Projection', '')
	lines.push(`- ${p.date}: ~${p.count.toFixed(1)} (slope ${fmtScore(p.slope)}/day)`)
	lines.push(`  *${p.note}*`)
	return lines.join('\n')
}

export function renderViral(result: ViralResult): string {
	const lines = [`## Viral Keywords: ${result.date}`, '']
	lines.push(`**Compared with:** ${result.previous_date}`)
	lines.push(`**Threshold:** ${result.threshold}x`)
	lines.push(`**Detected:** ${result.total_detected}`)
	lines.push('')
	pushSkipped(lines, result.skipped_ticks)
	if (result.topics.length === 0) {
		lines.push(`*No keyword grew ${result.threshold}x or more.*`)
		return lines.join('\n')
	}
	for (const t of result.topics) {
		const growth = t.growth_rate === null ? 'new' : `${t.growth_rate.toFixed(1)}x`
		lines.push(`- **${t.keyword}** [${t.alert_level}]: ${t.previous_count} -> ${t.current_count} (${growth})`)
		for (const title of t.sample_titles) lines.push(`  - ${title}`)
	}
	return lines.join('\n')
}

export function renderPrediction(result: PredictionResult): string {
	const lines = [`## Rising Keywords: ${result.date}`, '']
	lines.push(`**Data days:** ${result.data_days.join(', ')}`)
	lines.push(`**Min confidence:** ${fmtScore(result.confidence_threshold)}`)
	lines.push(`**Predicted:** ${result.total_predicted}`)
	lines.push('')
	pushSkipped(lines, result.skipped_ticks)
	if (result.topics.length === 0) {
		lines.push('*No keyword is climbing with enough confidence.*')
	}
	for (const t of result.topics) {
		lines.push(
			`- **${t.keyword}**: ${t.series.join(' -> ')} (+${Math.round(t.growth_rate * 100)}%, confidence ${fmtScore(t.confidence)})`,
		)
		for (const title of t.sample_titles) lines.push(`  - ${title}`)
	}
	lines.push('', `*${result.note}*`)
	return lines.join('\n')
}

export function renderCompare(result: CompareResult): string {
	const lines = [`## Platforms: ${result.topic}`, '']
	lines.push(`**Date Range:** ${fmtRange(result.date_range)}`)
	lines.push(`**Mode:** ${result.mode}`)
	lines.push(`**Matches:** ${result.total_found}`)
	lines.push('')
	pushSkipped(lines, result.skipped_ticks)
	if (result.platforms.length === 0) {
		lines.push('*No snapshots in range.*')
		return lines.join('\n')
	}
	lines.push('| Platform | Matches | Mean score |', '|---|---|---|')
	for (const p of result.platforms) {
		lines.push(`| ${p.platform} | ${p.count} | ${p.mean_score === null ? '-' : fmtScore(p.mean_score)} |`)
	}
	return lines.join('\n')
}

export function renderActivity(result: ActivityResult): string {
	const lines = ['## Platform Activity', '']
	lines.push(`**Date Range:** ${fmtRange(result.date_range)}`)
	lines.push(`**Snapshots:** ${result.total_snapshots}`)
	lines.push('')
	pushSkipped(lines, result.skipped_ticks)
	if (result.platforms.length === 0) {
		lines.push('*No snapshots in range.*')
		return lines.join('\n')
	}
	lines.push('| Platform | Snapshots | Items | Avg interval |', '|---|---|---|---|')
	for (const p of result.platforms) {
		const interval = p.avg_interval_minutes === null ? '-' : `${p.avg_interval_minutes.toFixed(1)}m`
		lines.push(`| ${p.platform} | ${p.snapshot_count} | ${p.item_count} | ${interval} |`)
	}
	return lines.join('\n')
}

export function renderCooccurrence(result: CooccurrenceResult): string {
	const lines = [`## Keyword Pairs${result.topic ? `: ${result.topic}` : ''}`, '']
	lines.push(`**Date Range:** ${fmtRange(result.date_range)}`)
	lines.push(`**Titles analyzed:** ${result.items_analyzed}`)
	lines.push('')
	pushSkipped(lines, result.skipped_ticks)
	if (result.pairs.length === 0) {
		lines.push('*No keyword pairs reach the minimum frequency.*')
		return lines.join('\n')
	}
	for (const p of result.pairs) lines.push(`- ${p.pair[0]} + ${p.pair[1]}: ${p.count}`)
	return lines.join('\n')
}

export function renderKeywords(result: KeywordCountResult): string {
	const lines = ['## Watch Keywords', '']
	if (result.date_range) lines.push(`**Date Range:** ${fmtRange(result.date_range)}`)
	if (result.captured_at) lines.push(`**Tick:** ${result.captured_at}`)
	lines.push(`**Mode:** ${result.mode}`)
	lines.push(`**Items:** ${result.total_items}`)
	lines.push('')
	pushSkipped(lines, result.skipped_ticks)
	for (const k of result.keywords) {
		lines.push(`- **${k.keyword}**: ${k.count}`)
		for (const title of k.samples) lines.push(`  - ${title}`)
	}
	return lines.join('\n')
}

/** The sentiment prompt, preceded by a short header. */
export function renderSentiment(bundle: SentimentBundle): string {
	const lines: string[] = []
	lines.push(`**Items:** ${bundle.returned} of ${bundle.total_found} (${bundle.duplicates_removed} duplicates removed)`)
	lines.push('')
	pushSkipped(lines, bundle.skipped_ticks)
	lines.push(bundle.prompt)
	return lines.join('\n')
}

export function renderSummary(report: SummaryReport): string {
	const lines: string[] = []
	const title = report.kind === 'weekly' ? 'Weekly Summary' : 'Daily Summary'
	lines.push(`# ${title}: ${fmtRange(report.date_range)}`)
	lines.push('')
	lines.push(`**Generated:** ${report.generated_at}`)
	lines.push(`**Ticks:** ${report.ticks}`)
	lines.push(`**Distinct items:** ${report.total_items}`)
	lines.push('')
	pushSkipped(lines, report.skipped_ticks)

	if (report.total_items === 0) {
		lines.push('*No items captured in this window.*')
		return lines.join('\n')
	}

	lines.push('## Platforms', '')
	for (const p of report.platforms) lines.push(`- ${p.platform}: ${p.items}`)
	lines.push('')

	lines.push('## Top Keywords', '')
	for (const k of report.top_keywords) lines.push(`- ${k.keyword} (${k.count})`)
	lines.push('')

	lines.push('## Top Stories', '')
	report.top_items.forEach((item, idx) => {
		lines.push(`${idx + 1}. ${item.title} - ${item.platform} (score:${fmtScore(item.composite_score)})`)
	})
	return lines.join('\n')
}

export function renderStatus(status: EngineStatus): string {
	const lines = [`## trendscope ${status.version}`, '']
	lines.push(`**Data dir:** ${status.data_dir}`)
	lines.push(
		`**Stored range:** ${status.available_range ? fmtRange(status.available_range) : 'empty'}`,
	)
	lines.push(`**Dates:** ${status.store.dates}`)
	lines.push(`**Ticks:** ${status.store.ticks}`)
	lines.push(`**Bytes:** ${status.store.bytes}`)
	lines.push(`**Watch keywords:** ${status.watch_keywords}`)
	return lines.join('\n')
}

/** Config sections as nested `key: value` lines. */
export function renderConfig(config: Record<string, unknown>, indent = ''): string {
	const lines: string[] = []
	for (const [key, value] of Object.entries(config)) {
		if (value && typeof value === 'object' && !Array.isArray(value)) {
			lines.push(`${indent}${key}:`)
			const nested: Record<string, unknown> = { ...value }
			lines.push(renderConfig(nested, `${indent}  `))
		} else if (Array.isArray(value)) {
			lines.push(`${indent}${key}: ${value.length > 0 ? value.join(', ') : '(none)'}`)
		} else {
			lines.push(`${indent}${key}: ${String(value)}`)
		}
	}
	return lines.join('\n')
}
