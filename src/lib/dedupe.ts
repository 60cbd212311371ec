/** Near-duplicate detection across platforms. */

import type { ScoredItem } from './schema.js'
import { overlapRatio, tokenSet } from './similarity.js'

/** Find near-duplicate index pairs among titles. */
export function findDuplicates(titles: string[], threshold: number): [number, number][] {
	const duplicates: [number, number][] = []
	const sets = titles.map((title) => tokenSet(title))

	sets.forEach((setI, i) => {
		for (let j = i + 1; j < sets.length; j++) {
			const setJ = sets[j]
			if (setJ && overlapRatio(setI, setJ) >= threshold) duplicates.push([i, j])
		}
	})

	return duplicates
}

/**
 * Remove near-duplicates, keeping the higher-scored item of each pair
 * (the earlier one on a tie). Input order is preserved.
 */
export function dedupeItems<T extends ScoredItem>(items: T[], threshold: number): T[] {
	if (items.length <= 1) return items

	const dupPairs = findDuplicates(
		items.map((item) => item.title),
		threshold,
	)
	const toRemove = new Set<number>()

	for (const [i, j] of dupPairs) {
		const a = items[i]
		const b = items[j]
		if (!a || !b) continue
		if (a.composite_score >= b.composite_score) {
			toRemove.add(j)
		} else {
			toRemove.add(i)
		}
	}

	return items.filter((_, idx) => !toRemove.has(idx))
}
