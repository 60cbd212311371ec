/** Data schemas for trendscope. */

import { parseTimestamp } from './dates.js'
import { ValidationError } from './errors.js'

/** One ranked entry of a platform snapshot. Immutable once written. */
export interface NewsItem {
	platform: string
	title: string
	url: string
	/** 1-based position within its platform snapshot. */
	rank: number
	/** Platform-reported popularity signal, when the platform has one. */
	hotness: number | null
	captured_at: string
}

/** One platform's ranked items at one capture time. */
export interface Snapshot {
	platform: string
	captured_at: string
	items: NewsItem[]
}

/** Every platform's snapshot for one capture tick. */
export interface SnapshotSet {
	captured_at: string
	snapshots: Snapshot[]
}

/** Component scores, each in [0,1]. */
export interface SubScores {
	rank: number
	frequency: number
	hotness: number
}

/** A NewsItem with its composite weight for the queried window. */
export interface ScoredItem extends NewsItem {
	composite_score: number
	subs: SubScores
	/** SnapshotSets in the window containing this item's identity. */
	appearances: number
	first_seen_at: string
	last_seen_at: string
}

/** Raw item as handed over by ingestion. Rank defaults to list position. */
export interface RawItem {
	title: string
	url?: string | null
	rank?: number | null
	hotness?: number | null
}

/** Normalize a title for identity and comparison. */
export function normalizeTitle(text: string): string {
	return text
		.toLowerCase()
		.replace(/[^\p{L}\p{N}\s]/gu, ' ')
		.replace(/\s+/g, ' ')
		.trim()
}

/** Dedup identity: platform plus normalized title, never the URL. */
export function identityKey(item: Pick<NewsItem, 'platform' | 'title'>): string {
	return `${item.platform}::${normalizeTitle(item.title)}`
}

/** Create a Snapshot, stamping platform and capture time on every item. */
export function createSnapshot(
	platform: string,
	capturedAt: string,
	items: RawItem[],
): Snapshot {
	return {
		platform,
		captured_at: capturedAt,
		items: items.map((item, idx) => ({
			platform,
			title: item.title,
			url: item.url ?? '',
			rank: item.rank ?? idx + 1,
			hotness: item.hotness ?? null,
			captured_at: capturedAt,
		})),
	}
}

/** Create a SnapshotSet from per-platform raw item lists sharing one tick. */
export function createSnapshotSet(
	capturedAt: string,
	platforms: Record<string, RawItem[]>,
): SnapshotSet {
	return {
		captured_at: capturedAt,
		snapshots: Object.entries(platforms).map(([platform, items]) =>
			createSnapshot(platform, capturedAt, items),
		),
	}
}

/** All items of a set, in snapshot then rank order. */
export function setItems(set: SnapshotSet): NewsItem[] {
	return set.snapshots.flatMap((s) => s.items)
}

/** Serialize a SnapshotSet for storage; items drop fields the snapshot carries. */
export function snapshotSetToDict(set: SnapshotSet): Record<string, unknown> {
	return {
		captured_at: set.captured_at,
		snapshots: set.snapshots.map((s) => ({
			platform: s.platform,
			captured_at: s.captured_at,
			items: s.items.map((item) => {
				const d: Record<string, unknown> = {
					rank: item.rank,
					title: item.title,
					url: item.url,
				}
				if (item.hotness != null) d.hotness = item.hotness
				return d
			}),
		})),
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function requireString(
	obj: Record<string, unknown>,
	key: string,
	where: string,
): string {
	const value = obj[key]
	if (typeof value !== 'string') {
		throw new ValidationError(`${where}: "${key}" must be a string`, { field: key })
	}
	return value
}

function requireTimestamp(
	obj: Record<string, unknown>,
	key: string,
	where: string,
): string {
	const value = requireString(obj, key, where)
	if (!parseTimestamp(value)) {
		throw new ValidationError(`${where}: "${key}" is not an ISO timestamp: ${value}`, {
			field: key,
		})
	}
	return value
}

/**
 * Reconstruct a SnapshotSet from its stored or handed-over form.
 * Checks shape only; rank and tick invariants are checked by validateSnapshotSet.
 */
export function snapshotSetFromDict(data: unknown): SnapshotSet {
	if (!isRecord(data)) throw new ValidationError('Snapshot set must be an object')
	const capturedAt = requireTimestamp(data, 'captured_at', 'snapshot set')
	const snapshotsRaw = data.snapshots
	if (!Array.isArray(snapshotsRaw)) {
		throw new ValidationError('snapshot set: "snapshots" must be an array', {
			field: 'snapshots',
		})
	}

	const snapshots = snapshotsRaw.map((raw: unknown, sIdx): Snapshot => {
		const where = `snapshot #${sIdx + 1}`
		if (!isRecord(raw)) throw new ValidationError(`${where} must be an object`)
		const platform = requireString(raw, 'platform', where)
		const snapCapturedAt =
			raw.captured_at === undefined
				? capturedAt
				: requireTimestamp(raw, 'captured_at', where)
		const itemsRaw = raw.items
		if (!Array.isArray(itemsRaw)) {
			throw new ValidationError(`${where}: "items" must be an array`, { field: 'items' })
		}

		const items = itemsRaw.map((rawItem: unknown, iIdx): NewsItem => {
			const itemWhere = `${where} (${platform}) item #${iIdx + 1}`
			if (!isRecord(rawItem)) throw new ValidationError(`${itemWhere} must be an object`)
			const rank = rawItem.rank ?? iIdx + 1
			if (typeof rank !== 'number') {
				throw new ValidationError(`${itemWhere}: "rank" must be a number`, { field: 'rank' })
			}
			const hotnessRaw = rawItem.hotness ?? null
			let hotness: number | null = null
			if (hotnessRaw !== null) {
				if (typeof hotnessRaw !== 'number' || !Number.isFinite(hotnessRaw)) {
					throw new ValidationError(`${itemWhere}: "hotness" must be a finite number`, {
						field: 'hotness',
					})
				}
				hotness = hotnessRaw
			}
			const url = rawItem.url ?? ''
			if (typeof url !== 'string') {
				throw new ValidationError(`${itemWhere}: "url" must be a string`, { field: 'url' })
			}
			return {
				platform,
				title: requireString(rawItem, 'title', itemWhere),
				url,
				rank,
				hotness,
				captured_at: snapCapturedAt,
			}
		})

		return { platform, captured_at: snapCapturedAt, items }
	})

	return { captured_at: capturedAt, snapshots }
}

/**
 * Check the invariants of a SnapshotSet.
 * Ranks unique and contiguous from 1, one snapshot per platform,
 * and every snapshot within `jitterMinutes` of the set's capture time.
 */
export function validateSnapshotSet(set: SnapshotSet, jitterMinutes: number): void {
	const tick = parseTimestamp(set.captured_at)
	if (!tick) {
		throw new ValidationError(`Invalid capture timestamp: ${set.captured_at}`, {
			field: 'captured_at',
		})
	}
	if (set.snapshots.length === 0) {
		throw new ValidationError('Snapshot set contains no snapshots', { field: 'snapshots' })
	}

	const seenPlatforms = new Set<string>()
	for (const snapshot of set.snapshots) {
		const platform = snapshot.platform.trim()
		if (!platform) {
			throw new ValidationError('Snapshot platform cannot be empty', { field: 'platform' })
		}
		if (seenPlatforms.has(platform)) {
			throw new ValidationError(`Platform "${platform}" appears twice in one tick`, {
				field: 'platform',
			})
		}
		seenPlatforms.add(platform)

		const snapTime = parseTimestamp(snapshot.captured_at)
		if (!snapTime) {
			throw new ValidationError(
				`Snapshot ${platform}: invalid capture timestamp ${snapshot.captured_at}`,
				{ field: 'captured_at' },
			)
		}
		const driftMinutes = Math.abs(snapTime.getTime() - tick.getTime()) / 60_000
		if (driftMinutes > jitterMinutes) {
			throw new ValidationError(
				`Snapshot ${platform} captured ${driftMinutes.toFixed(1)} min away from its tick (max ${jitterMinutes})`,
				{ field: 'captured_at' },
			)
		}

		validateRanks(snapshot)
	}
}

function validateRanks(snapshot: Snapshot): void {
	const { platform, items } = snapshot
	const ranks = new Set<number>()
	for (const item of items) {
		if (item.platform !== platform || item.captured_at !== snapshot.captured_at) {
			throw new ValidationError(
				`Snapshot ${platform}: item "${item.title}" does not belong to this snapshot`,
			)
		}
		if (!item.title.trim()) {
			throw new ValidationError(`Snapshot ${platform}: item at rank ${item.rank} has no title`, {
				field: 'title',
			})
		}
		if (!Number.isInteger(item.rank) || item.rank < 1) {
			throw new ValidationError(`Snapshot ${platform}: rank ${item.rank} is not a positive integer`, {
				field: 'rank',
			})
		}
		if (ranks.has(item.rank)) {
			throw new ValidationError(`Snapshot ${platform}: duplicate rank ${item.rank}`, {
				field: 'rank',
			})
		}
		ranks.add(item.rank)
	}
	for (let r = 1; r <= items.length; r++) {
		if (!ranks.has(r)) {
			throw new ValidationError(
				`Snapshot ${platform}: ranks must be contiguous from 1, rank ${r} is missing`,
				{ field: 'rank' },
			)
		}
	}
}
