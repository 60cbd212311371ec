import { afterEach, describe, expect, test } from 'vitest'

import { writeFileSync } from 'node:fs'
import { join } from 'node:path'

import {
	buildWindow,
	createEngineConfig,
	createSnapshot,
	createSnapshotSet,
	dedupeItems,
	describeConfig,
	EmptyRangeError,
	entityTokens,
	extractEntities,
	extractKeywords,
	findDuplicates,
	identityKey,
	lastNDays,
	loadEngineConfig,
	normalizeTitle,
	parseDateQuery,
	parseWatchKeywords,
	rankScore,
	resolveDateRange,
	type ScoredItem,
	ScoringEngine,
	SimilarityEngine,
	similarity,
	snapshotSetFromDict,
	sortScored,
	tallyKeywords,
	ValidationError,
	validateSnapshotSet,
} from '../src/index.js'
import { stemToken } from '../src/lib/similarity.js'
import { cleanupTempDirs, tempDir } from './helpers.js'

afterEach(cleanupTempDirs)

function scored(
	title: string,
	composite: number,
	overrides: Partial<ScoredItem> = {},
): ScoredItem {
	return {
		platform: 'P',
		title,
		url: '',
		rank: 1,
		hotness: null,
		captured_at: '2025-01-01T10:00:00Z',
		composite_score: composite,
		subs: { rank: 0, frequency: 0, hotness: 0 },
		appearances: 1,
		first_seen_at: '2025-01-01T10:00:00Z',
		last_seen_at: '2025-01-01T10:00:00Z',
		...overrides,
	}
}

// ---------------------------------------------------------------------------
// dates
// ---------------------------------------------------------------------------
describe('dates', () => {
	// Wednesday
	const now = new Date('2025-01-15T10:00:00Z')

	test('parseDateQuery handles relative days', () => {
		expect(parseDateQuery('today', now)).toBe('2025-01-15')
		expect(parseDateQuery('yesterday', now)).toBe('2025-01-14')
		expect(parseDateQuery('day before yesterday', now)).toBe('2025-01-13')
		expect(parseDateQuery('3 days ago', now)).toBe('2025-01-12')
	})

	test('parseDateQuery handles weekdays', () => {
		expect(parseDateQuery('this monday', now)).toBe('2025-01-13')
		expect(parseDateQuery('last monday', now)).toBe('2025-01-06')
		expect(parseDateQuery('this wednesday', now)).toBe('2025-01-15')
	})

	test('parseDateQuery handles absolute formats', () => {
		expect(parseDateQuery('2025-1-5', now)).toBe('2025-01-05')
		expect(parseDateQuery('2024/10/09', now)).toBe('2024-10-09')
		expect(parseDateQuery('01/02', now)).toBe('2025-01-02')
		expect(parseDateQuery('12/25', now)).toBe('2024-12-25')
	})

	test('parseDateQuery rejects unknown and oversized queries', () => {
		expect(() => parseDateQuery('soon', now)).toThrow(ValidationError)
		expect(() => parseDateQuery('400 days ago', now)).toThrow('Number of days too large: 400')
		expect(() => parseDateQuery('2025-02-30', now)).toThrow('Invalid date: 2025-02-30')
	})

	test('lastNDays includes today', () => {
		expect(lastNDays(7, now)).toEqual({ start: '2025-01-09', end: '2025-01-15' })
	})

	test('resolveDateRange falls back, widens lone bounds and rejects inverted ranges', () => {
		const fallback = { start: '2025-01-01', end: '2025-01-01' }
		expect(resolveDateRange(null, fallback)).toBe(fallback)
		expect(resolveDateRange({ start: '2025-01-02' }, fallback)).toEqual({
			start: '2025-01-02',
			end: '2025-01-02',
		})
		expect(() => resolveDateRange({ start: '2025-01-05', end: '2025-01-01' }, fallback)).toThrow(
			EmptyRangeError,
		)
		expect(() => resolveDateRange({ start: '2025/01/05' }, fallback)).toThrow(
			'Invalid date format: 2025/01/05',
		)
	})
})

// ---------------------------------------------------------------------------
// config
// ---------------------------------------------------------------------------
describe('config', () => {
	test('defaults are valid and frozen', () => {
		const cfg = createEngineConfig({ data_dir: '/tmp/trendscope-unused' })
		expect(cfg.rank_weight).toBe(0.6)
		expect(cfg.frequency_weight).toBe(0.3)
		expect(cfg.hotness_weight).toBe(0.1)
		expect(cfg.result_limit_default).toBe(50)
		expect(cfg.default_date_range).toBe('today')
		expect(Object.isFrozen(cfg)).toBe(true)
	})

	test('rejects related threshold above dedup threshold', () => {
		try {
			createEngineConfig({ dedup_threshold: 0.3, related_threshold: 0.5 })
			expect.unreachable()
		} catch (err) {
			expect(err).toBeInstanceOf(ValidationError)
			if (err instanceof ValidationError) expect(err.field).toBe('related_threshold')
		}
	})

	test('rejects out-of-range limits and zero weights', () => {
		expect(() => createEngineConfig({ result_limit_default: 1001 })).toThrow(ValidationError)
		expect(() => createEngineConfig({ result_limit_default: 0 })).toThrow(ValidationError)
		expect(() =>
			createEngineConfig({ rank_weight: 0, frequency_weight: 0, hotness_weight: 0 }),
		).toThrow('At least one scoring weight must be positive')
		expect(() => createEngineConfig({ dedup_threshold: 1.5 })).toThrow(ValidationError)
	})

	test('loadEngineConfig reads TRENDSCOPE_* variables', () => {
		const cfg = loadEngineConfig({
			TRENDSCOPE_CONFIG: join(tempDir(), 'missing.env'),
			TRENDSCOPE_DATA_DIR: '/tmp/trendscope-data',
			TRENDSCOPE_RANK_WEIGHT: '0.5',
			TRENDSCOPE_RANK_SCALE: 'linear',
			TRENDSCOPE_WATCH_KEYWORDS: 'AI, chips',
		})
		expect(cfg.data_dir).toBe('/tmp/trendscope-data')
		expect(cfg.rank_weight).toBe(0.5)
		expect(cfg.rank_scale).toBe('linear')
		expect(cfg.watch_keywords).toEqual(['AI', 'chips'])
	})

	test('environment wins over the config file', () => {
		const dir = tempDir()
		const file = join(dir, 'trendscope.env')
		writeFileSync(
			file,
			'# thresholds\nTRENDSCOPE_DEDUP_THRESHOLD=0.7\nTRENDSCOPE_RELATED_THRESHOLD="0.5"\n',
		)
		const fromFile = loadEngineConfig({ TRENDSCOPE_CONFIG: file })
		expect(fromFile.dedup_threshold).toBe(0.7)
		expect(fromFile.related_threshold).toBe(0.5)

		const overridden = loadEngineConfig({
			TRENDSCOPE_CONFIG: file,
			TRENDSCOPE_DEDUP_THRESHOLD: '0.8',
		})
		expect(overridden.dedup_threshold).toBe(0.8)
	})

	test('watch keyword file is read one keyword per line', () => {
		const dir = tempDir()
		const file = join(dir, 'keywords.txt')
		writeFileSync(file, 'AI\n# comment\n\nai\nchips\n')
		const cfg = loadEngineConfig({
			TRENDSCOPE_CONFIG: join(dir, 'missing.env'),
			TRENDSCOPE_WATCH_KEYWORDS_FILE: file,
		})
		expect(cfg.watch_keywords).toEqual(['AI', 'chips'])
		expect(parseWatchKeywords('rain\n  Rain \nsnow')).toEqual(['rain', 'snow'])
	})

	test('non-numeric values name the offending key', () => {
		expect(() =>
			loadEngineConfig({
				TRENDSCOPE_CONFIG: join(tempDir(), 'missing.env'),
				TRENDSCOPE_RANK_WEIGHT: 'abc',
			}),
		).toThrow('TRENDSCOPE_RANK_WEIGHT must be a number, got "abc"')
	})

	test('describeConfig returns one section', () => {
		const cfg = createEngineConfig({ data_dir: '/tmp/trendscope-unused' })
		expect(describeConfig(cfg, 'thresholds')).toEqual({
			dedup_threshold: 0.6,
			related_threshold: 0.4,
		})
		expect(Object.keys(describeConfig(cfg))).toEqual([
			'weights',
			'thresholds',
			'keywords',
			'analysis',
			'storage',
		])
	})
})

// ---------------------------------------------------------------------------
// schema
// ---------------------------------------------------------------------------
describe('schema', () => {
	const ts = '2025-01-01T10:00:00Z'

	test('normalizeTitle and identityKey ignore punctuation and case', () => {
		expect(normalizeTitle('  Hello,   World! ')).toBe('hello world')
		expect(identityKey({ platform: 'X', title: 'AI Breakthrough!' })).toBe('X::ai breakthrough')
	})

	test('createSnapshot stamps platform, time and list ranks', () => {
		const snap = createSnapshot('P', ts, [{ title: 'One' }, { title: 'Two', hotness: 12 }])
		expect(snap.items.map((i) => [i.rank, i.platform, i.captured_at, i.hotness])).toEqual([
			[1, 'P', ts, null],
			[2, 'P', ts, 12],
		])
	})

	test('validateSnapshotSet rejects rank gaps and duplicates', () => {
		const gap = createSnapshotSet(ts, { P: [{ title: 'One', rank: 1 }, { title: 'Three', rank: 3 }] })
		expect(() => validateSnapshotSet(gap, 5)).toThrow('rank 2 is missing')

		const dup = createSnapshotSet(ts, { P: [{ title: 'One', rank: 1 }, { title: 'Uno', rank: 1 }] })
		expect(() => validateSnapshotSet(dup, 5)).toThrow('duplicate rank 1')
	})

	test('validateSnapshotSet rejects repeated platforms and drift past the jitter', () => {
		const repeated = {
			captured_at: ts,
			snapshots: [createSnapshot('P', ts, [{ title: 'One' }]), createSnapshot('P', ts, [{ title: 'Two' }])],
		}
		expect(() => validateSnapshotSet(repeated, 5)).toThrow('Platform "P" appears twice in one tick')

		const drifted = {
			captured_at: ts,
			snapshots: [createSnapshot('P', '2025-01-01T10:10:00Z', [{ title: 'One' }])],
		}
		expect(() => validateSnapshotSet(drifted, 5)).toThrow(ValidationError)
		expect(() => validateSnapshotSet(drifted, 15)).not.toThrow()
	})

	test('snapshotSetFromDict checks shape', () => {
		expect(() => snapshotSetFromDict([])).toThrow('Snapshot set must be an object')
		expect(() =>
			snapshotSetFromDict({ captured_at: ts, snapshots: [{ platform: 'P', items: [{ rank: 1 }] }] }),
		).toThrow('snapshot #1 (P) item #1: "title" must be a string')

		const set = snapshotSetFromDict({
			captured_at: ts,
			snapshots: [{ platform: 'P', items: [{ title: 'One', hotness: 5 }] }],
		})
		expect(set.snapshots[0]?.items[0]).toEqual({
			platform: 'P',
			title: 'One',
			url: '',
			rank: 1,
			hotness: 5,
			captured_at: ts,
		})
	})
})

// ---------------------------------------------------------------------------
// similarity
// ---------------------------------------------------------------------------
describe('similarity', () => {
	test('is reflexive', () => {
		for (const text of ['AI Breakthrough Announced', 'the', 'Fed cuts rates', '!!!']) {
			expect(similarity(text, text)).toBe(1)
		}
	})

	test('is symmetric', () => {
		const pairs: [string, string][] = [
			['Apple launches new phone', 'Apple phone sales slump'],
			['AI Breakthrough', 'AI Breakthrough Announced'],
			['Stock market rally', 'Weather storm warning'],
		]
		for (const [a, b] of pairs) {
			expect(similarity(a, b)).toBe(similarity(b, a))
		}
	})

	test('normalizes by the smaller token set', () => {
		expect(similarity('AI Breakthrough', 'AI Breakthrough Announced')).toBe(1)
		expect(similarity('Apple launches new phone', 'Apple phone sales slump')).toBe(0.5)
		expect(similarity('Stock market rally', 'Weather storm warning')).toBe(0)
	})

	test('grows with each shared token', () => {
		const base = 'solar farm opens'
		const one = similarity(base, 'solar grid expands')
		const two = similarity(base, 'solar grid expands farm')
		const three = similarity(base, 'solar grid expands farm opens')
		expect(one).toBeCloseTo(1 / 3)
		expect(two).toBeCloseTo(2 / 3)
		expect(three).toBe(1)
		expect(one).toBeLessThan(two)
		expect(two).toBeLessThan(three)
	})

	test('stemming folds plural and verb forms', () => {
		expect(stemToken('stories')).toBe('story')
		expect(stemToken('watches')).toBe('watch')
		expect(stemToken('cuts')).toBe('cut')
		expect(similarity('Fed cuts rates', 'Fed cut rate')).toBe(1)
	})

	test('SimilarityEngine applies configured thresholds', () => {
		const engine = new SimilarityEngine({ dedup_threshold: 0.6, related_threshold: 0.4 })
		expect(engine.isDuplicate('Apple launches new phone', 'Apple phone sales slump')).toBe(false)
		expect(engine.isRelated('Apple launches new phone', 'Apple phone sales slump')).toBe(true)
	})

	test('extractKeywords drops urls, stopwords and headline noise', () => {
		expect(extractKeywords('Breaking: new AI chips hit the market https://example.com/a')).toEqual([
			'ai',
			'chips',
			'hit',
			'market',
		])
	})

	test('entityTokens strips possessives and stopwords', () => {
		expect(entityTokens("The Fed's Bank of America")).toEqual(['fed', 'bank', 'america'])
		expect(entityTokens("Apple's new chip", true)).toEqual(['apple'])
	})

	test('tallyKeywords counts a keyword once per title', () => {
		expect(tallyKeywords(['Chip chip chip', 'Chip plant opens', 'Plant tour'], 2)).toEqual([
			{ keyword: 'chip', count: 2 },
			{ keyword: 'plant', count: 2 },
		])
		expect(tallyKeywords(['Chip plant opens'], 5, new Set(['chip']))).toEqual([
			{ keyword: 'opens', count: 1 },
			{ keyword: 'plant', count: 1 },
		])
	})

	test('extractEntities keeps capitalized words', () => {
		expect([...extractEntities('OpenAI and Microsoft sign deal')]).toEqual(['openai', 'microsoft'])
		expect([...extractEntities("Apple's new iPhone")]).toEqual(['apple'])
	})
})

// ---------------------------------------------------------------------------
// dedupe
// ---------------------------------------------------------------------------
describe('dedupe', () => {
	test('findDuplicates returns index pairs above the threshold', () => {
		expect(findDuplicates(['alpha beta', 'gamma delta', 'alpha beta gamma'], 0.6)).toEqual([[0, 2]])
	})

	test('dedupeItems keeps the higher-scored item', () => {
		const items = [scored('Fed cuts rates', 0.5), scored('Fed cut rate', 0.9), scored('Weather storm', 0.3)]
		expect(dedupeItems(items, 0.6).map((i) => i.title)).toEqual(['Fed cut rate', 'Weather storm'])
	})

	test('dedupeItems keeps the earlier item on a tie', () => {
		const items = [scored('Fed cuts rates', 0.5), scored('Fed cut rate', 0.5)]
		expect(dedupeItems(items, 0.6).map((i) => i.title)).toEqual(['Fed cuts rates'])
	})
})

// ---------------------------------------------------------------------------
// score
// ---------------------------------------------------------------------------
describe('score', () => {
	const sets = [
		createSnapshotSet('2025-01-01T10:00:00Z', {
			P: [
				{ title: 'Alpha story', hotness: 100 },
				{ title: 'Beta story', hotness: 50 },
			],
			Q: [{ title: 'Gamma story' }],
		}),
		createSnapshotSet('2025-01-01T11:00:00Z', {
			P: [{ title: 'Alpha story', hotness: 300 }],
		}),
	]
	const window = buildWindow(sets)
	const [first, second] = sets
	const alpha = second?.snapshots[0]?.items[0]
	const beta = first?.snapshots[0]?.items[1]
	const gamma = first?.snapshots[1]?.items[0]

	test('buildWindow counts ticks per identity and hotness spans', () => {
		expect(window.tick_count).toBe(2)
		expect(window.appearances.get('P::alpha story')).toBe(2)
		expect(window.appearances.get('P::beta story')).toBe(1)
		expect(window.hotness.get('P')).toEqual({ min: 50, max: 300 })
		expect(window.first_seen.get('P::alpha story')).toBe('2025-01-01T10:00:00Z')
		expect(window.last_seen.get('P::alpha story')).toBe('2025-01-01T11:00:00Z')
	})

	test('composite combines rank, frequency and hotness', () => {
		const scorer = new ScoringEngine(createEngineConfig())
		if (!alpha || !beta || !gamma) throw new Error('fixture items missing')

		const a = scorer.score(alpha, window)
		expect(a.subs).toEqual({ rank: 1, frequency: 1, hotness: 1 })
		expect(a.composite_score).toBeCloseTo(1)
		expect(a.appearances).toBe(2)

		const b = scorer.score(beta, window)
		expect(b.subs).toEqual({ rank: 0.5, frequency: 0.5, hotness: 0 })
		expect(b.composite_score).toBeCloseTo(0.45)

		const c = scorer.score(gamma, window)
		expect(c.subs.hotness).toBe(0)
		expect(c.composite_score).toBeCloseTo(0.75)
	})

	test('scoring is deterministic', () => {
		const scorer = new ScoringEngine(createEngineConfig())
		if (!beta) throw new Error('fixture items missing')
		expect(scorer.score(beta, window).composite_score).toBe(scorer.score(beta, window).composite_score)
	})

	test('weights are normalized by their sum', () => {
		const scorer = new ScoringEngine(
			createEngineConfig({ rank_weight: 3, frequency_weight: 0, hotness_weight: 0 }),
		)
		if (!beta) throw new Error('fixture items missing')
		expect(scorer.score(beta, window).composite_score).toBe(0.5)
	})

	test('hotness substitutes for rank on hotness platforms', () => {
		const scorer = new ScoringEngine(createEngineConfig({ hotness_platforms: ['P'] }))
		if (!beta) throw new Error('fixture items missing')
		const b = scorer.score(beta, window)
		expect(b.subs.rank).toBe(0)
		expect(b.composite_score).toBeCloseTo(0.15)
	})

	test('flat hotness spans score 0.5', () => {
		const flat = buildWindow([
			createSnapshotSet('2025-01-01T10:00:00Z', { P: [{ title: 'Only story', hotness: 7 }] }),
		])
		const item = createSnapshot('P', '2025-01-01T10:00:00Z', [{ title: 'Only story', hotness: 7 }]).items[0]
		if (!item) throw new Error('fixture items missing')
		expect(new ScoringEngine(createEngineConfig()).normalizedHotness(item, flat)).toBe(0.5)
	})

	test('rankScore supports reciprocal and linear scales', () => {
		expect(rankScore(4)).toBe(0.25)
		expect(rankScore(1, 'linear')).toBe(1)
		expect(rankScore(3, 'linear')).toBe(0.8)
		expect(rankScore(15, 'linear')).toBe(0.1)
	})

	test('sortScored orders by weight then earliest capture, or by time', () => {
		const items = [
			scored('Late strong', 0.9, { captured_at: '2025-01-01T12:00:00Z' }),
			scored('Early strong', 0.9, { captured_at: '2025-01-01T08:00:00Z' }),
			scored('Weak', 0.2, { captured_at: '2025-01-01T13:00:00Z' }),
		]
		expect(sortScored(items).map((i) => i.title)).toEqual(['Early strong', 'Late strong', 'Weak'])
		expect(sortScored(items, 'time').map((i) => i.title)).toEqual([
			'Weak',
			'Late strong',
			'Early strong',
		])
	})

	test('sortScored breaks full ties by platform then rank', () => {
		const items = [
			scored('B second', 0.5, { platform: 'B', rank: 2 }),
			scored('A second', 0.5, { platform: 'A', rank: 2 }),
			scored('A first', 0.5, { platform: 'A', rank: 1 }),
		]
		expect(sortScored(items).map((i) => i.title)).toEqual(['A first', 'A second', 'B second'])
	})
})
