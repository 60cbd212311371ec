import { afterEach, describe, expect, test } from 'vitest'

import { mkdirSync, readdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'

import { createSnapshotSet, FileSnapshotStore, ValidationError } from '../src/index.js'
import { cleanupTempDirs, tempDir } from './helpers.js'

afterEach(cleanupTempDirs)

function makeStore(now = new Date('2025-01-02T12:00:00Z')) {
	const dir = tempDir()
	return { dir, store: new FileSnapshotStore({ dataDir: dir, now: () => now }) }
}

const day1 = createSnapshotSet('2025-01-01T10:00:00Z', {
	X: [{ title: 'First story' }, { title: 'Second story' }],
	Y: [{ title: 'Other story', hotness: 120 }],
})
const day2 = createSnapshotSet('2025-01-02T09:30:15Z', {
	X: [{ title: 'Newer story' }],
})

describe('FileSnapshotStore', () => {
	test('append writes one file per tick under its capture date', () => {
		const { dir, store } = makeStore()
		const path = store.append(day1)
		expect(path).toBe(join(dir, '2025-01-01', '10-00-00.json'))
		expect(readdirSync(join(dir, '2025-01-01'))).toEqual(['10-00-00.json'])
	})

	test('read round-trips sets in capture order', () => {
		const { store } = makeStore()
		store.append(day2)
		store.append(day1)
		const result = store.read({ start: '2025-01-01', end: '2025-01-02' })
		expect(result.sets).toEqual([day1, day2])
		expect(result.skipped_ticks).toBe(0)
		expect(result.warnings).toEqual([])
	})

	test('rejects a second set for the same tick', () => {
		const { store } = makeStore()
		store.append(day1)
		expect(() => store.append(day1)).toThrow(
			'A snapshot set for tick 2025-01-01T10:00:00Z already exists',
		)
	})

	test('rejects sets that break rank invariants', () => {
		const { dir, store } = makeStore()
		const broken = createSnapshotSet('2025-01-01T10:00:00Z', {
			X: [{ title: 'One', rank: 2 }],
		})
		expect(() => store.append(broken)).toThrow(ValidationError)
		expect(store.listDates({ start: '2025-01-01', end: '2025-01-01' })).toEqual([])
		expect(readdirSync(dir)).toEqual([])
	})

	test('listDates filters by range and defaults to today', () => {
		const { store } = makeStore()
		store.append(day1)
		store.append(day2)
		expect(store.listDates({ start: '2024-12-01', end: '2025-12-31' })).toEqual([
			'2025-01-01',
			'2025-01-02',
		])
		expect(store.listDates()).toEqual(['2025-01-02'])
		expect(store.listDates({ start: '2025-01-03', end: '2025-01-09' })).toEqual([])
	})

	test('platform filter drops sets left empty', () => {
		const { store } = makeStore()
		store.append(day1)
		store.append(day2)
		const result = store.read({ start: '2025-01-01', end: '2025-01-02' }, ['Y'])
		expect(result.sets).toHaveLength(1)
		expect(result.sets[0]?.snapshots.map((s) => s.platform)).toEqual(['Y'])
	})

	test('corrupt ticks are skipped and reported', () => {
		const { dir, store } = makeStore()
		store.append(day1)
		writeFileSync(join(dir, '2025-01-01', '11-00-00.json'), '{"captured_at": "2025-01-01T11:')
		writeFileSync(join(dir, '2025-01-01', '12-00-00.json.tmp.1.2.abc'), 'partial')

		const result = store.read({ start: '2025-01-01', end: '2025-01-01' })
		expect(result.sets).toEqual([day1])
		expect(result.skipped_ticks).toBe(1)
		expect(result.warnings[0]?.date).toBe('2025-01-01')
		expect(result.warnings[0]?.file).toBe('11-00-00.json')
	})

	test('a tick filed under the wrong date is skipped', () => {
		const { dir, store } = makeStore()
		mkdirSync(join(dir, '2025-01-05'))
		writeFileSync(
			join(dir, '2025-01-05', '10-00-00.json'),
			JSON.stringify({ captured_at: '2025-01-01T10:00:00Z', snapshots: [{ platform: 'X', items: [{ title: 'A' }] }] }),
		)
		const result = store.read({ start: '2025-01-05', end: '2025-01-05' })
		expect(result.sets).toEqual([])
		expect(result.warnings[0]?.reason).toBe('tick captured at 2025-01-01T10:00:00Z is filed under 2025-01-05')
	})

	test('availableDateRange and stats describe the store', () => {
		const { store } = makeStore()
		expect(store.availableDateRange()).toBeNull()
		expect(store.stats()).toEqual({ dates: 0, ticks: 0, bytes: 0, earliest: null, latest: null })

		store.append(day1)
		store.append(day2)
		expect(store.availableDateRange()).toEqual({ start: '2025-01-01', end: '2025-01-02' })
		const stats = store.stats()
		expect(stats.dates).toBe(2)
		expect(stats.ticks).toBe(2)
		expect(stats.bytes).toBeGreaterThan(0)
	})
})
