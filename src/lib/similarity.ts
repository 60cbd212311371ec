/** Text similarity for search, dedup and related-history matching. */

import type { EngineConfig } from './config.js'
import { normalizeTitle } from './schema.js'

const STOPWORDS = new Set([
	'a',
	'an',
	'the',
	'and',
	'or',
	'but',
	'not',
	'for',
	'to',
	'of',
	'in',
	'on',
	'at',
	'by',
	'with',
	'from',
	'as',
	'is',
	'are',
	'was',
	'were',
	'be',
	'been',
	'this',
	'that',
	'it',
	'its',
	'into',
	'over',
	'after',
	'about',
])

/** Extra noise words dropped from keyword statistics but kept for matching. */
const HEADLINE_NOISE = new Set(['top', 'hot', 'new', 'news', 'breaking', 'latest'])

/** Light suffix stemming so "cuts" and "cut" share a token. */
export function stemToken(token: string): string {
	let t = token
	if (t.endsWith('ies') && t.length > 4) {
		t = `${t.slice(0, -3)}y`
	} else if (/(ss|x|z|ch|sh)es$/.test(t) && t.length > 4) {
		t = t.slice(0, -2)
	} else if (t.endsWith('s') && !t.endsWith('ss') && t.length > 3) {
		t = t.slice(0, -1)
	}
	if (t.endsWith('ing') && t.length > 5) {
		t = t.slice(0, -3)
	} else if (t.endsWith('ed') && t.length > 4) {
		t = t.slice(0, -2)
	}
	if (t.endsWith('e') && t.length > 4) t = t.slice(0, -1)
	return t
}

/** Comparable token set; a title made only of stopwords keeps them all. */
export function tokenSet(text: string): Set<string> {
	const normalized = normalizeTitle(text)
	if (!normalized) return new Set()
	const raw = normalized.split(' ')
	const kept = raw.filter((t) => !STOPWORDS.has(t))
	return new Set((kept.length > 0 ? kept : raw).map(stemToken))
}

/**
 * Token-set overlap normalized by the smaller set, in [0,1].
 *
 * Symmetric and reflexive for any non-empty text; a one-word topic
 * contained in a long title scores 1.
 */
export function similarity(textA: string, textB: string): number {
	const na = normalizeTitle(textA)
	const nb = normalizeTitle(textB)
	if (!na || !nb) {
		const a = textA.trim().toLowerCase()
		return a !== '' && a === textB.trim().toLowerCase() ? 1 : 0
	}
	if (na === nb) return 1

	return overlapRatio(tokenSet(textA), tokenSet(textB))
}

/** Shared tokens over the size of the smaller set. */
export function overlapRatio(setA: Set<string>, setB: Set<string>): number {
	if (setA.size === 0 || setB.size === 0) return 0
	let shared = 0
	for (const token of setA) {
		if (setB.has(token)) shared++
	}
	return shared / Math.min(setA.size, setB.size)
}

/** Keywords of a title for co-occurrence and summary statistics. */
export function extractKeywords(title: string, minLength = 2): string[] {
	const normalized = normalizeTitle(title.replace(/https?:\/\/\S+/g, ' '))
	if (!normalized) return []
	return normalized
		.split(' ')
		.filter(
			(w) => w.length >= minLength && !STOPWORDS.has(w) && !HEADLINE_NOISE.has(w),
		)
}

/** Keyword with its number of distinct titles. */
export interface KeywordTally {
	keyword: string
	count: number
}

/**
 * Count each keyword once per title, busiest first then lexical.
 * Words in `exclude` are left out.
 */
export function tallyKeywords(
	titles: Iterable<string>,
	topN: number,
	exclude: ReadonlySet<string> = new Set(),
): KeywordTally[] {
	const counts = new Map<string, number>()
	for (const title of titles) {
		for (const word of new Set(extractKeywords(title))) {
			if (exclude.has(word)) continue
			counts.set(word, (counts.get(word) ?? 0) + 1)
		}
	}
	return [...counts.entries()]
		.map(([keyword, count]) => ({ keyword, count }))
		.sort((a, b) => b.count - a.count || (a.keyword < b.keyword ? -1 : a.keyword > b.keyword ? 1 : 0))
		.slice(0, topN)
}

/**
 * Words of a text as entity tokens: possessive `'s` stripped, lowercased,
 * stopwords dropped. With `capitalizedOnly`, words must start uppercase.
 */
export function entityTokens(text: string, capitalizedOnly = false): string[] {
	const tokens: string[] = []
	for (const match of text.matchAll(/[\p{L}\p{N}]+(?:'[\p{L}]+)?/gu)) {
		const word = match[0].replace(/'s$/i, '')
		if (capitalizedOnly && !/^\p{Lu}/u.test(word)) continue
		const lower = word.toLowerCase()
		if (!lower || STOPWORDS.has(lower)) continue
		tokens.push(lower)
	}
	return tokens
}

/**
 * Proper-noun-like tokens of a title, lowercased.
 * Capitalized words and acronyms count; stopwords never do.
 */
export function extractEntities(title: string): Set<string> {
	return new Set(entityTokens(title, true))
}

/** Thresholded similarity checks bound to one configuration. */
export class SimilarityEngine {
	readonly dedupThreshold: number
	readonly relatedThreshold: number

	constructor(config: Pick<EngineConfig, 'dedup_threshold' | 'related_threshold'>) {
		this.dedupThreshold = config.dedup_threshold
		this.relatedThreshold = config.related_threshold
	}

	similarity(textA: string, textB: string): number {
		return similarity(textA, textB)
	}

	/** Same story. */
	isDuplicate(textA: string, textB: string): boolean {
		return similarity(textA, textB) >= this.dedupThreshold
	}

	/** Related but possibly distinct story. */
	isRelated(textA: string, textB: string): boolean {
		return similarity(textA, textB) >= this.relatedThreshold
	}
}
