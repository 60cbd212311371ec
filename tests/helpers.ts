import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { createEngineConfig, createSnapshotSet, type EngineConfig, type RawItem, TrendEngine } from '../src/index.js'

const dirs: string[] = []

export function tempDir(): string {
	const dir = mkdtempSync(join(tmpdir(), 'trendscope-test-'))
	dirs.push(dir)
	return dir
}

export function cleanupTempDirs(): void {
	for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true })
}

export const NOW = new Date('2025-01-03T12:00:00Z')

export function makeEngine(overrides: Partial<EngineConfig> = {}, now: Date = NOW): TrendEngine {
	const config = createEngineConfig({ data_dir: tempDir(), ...overrides })
	return new TrendEngine(config, { now: () => now })
}

/** Titles per platform; ranks follow list order. */
export function tick(
	engine: TrendEngine,
	capturedAt: string,
	platforms: Record<string, (string | RawItem)[]>,
): void {
	const raw: Record<string, RawItem[]> = {}
	for (const [platform, items] of Object.entries(platforms)) {
		raw[platform] = items.map((item) => (typeof item === 'string' ? { title: item } : item))
	}
	engine.ingest(createSnapshotSet(capturedAt, raw))
}

/**
 * Two days of ticks on platforms X and Y:
 * 2025-01-02 08:00, 2025-01-03 08:00 and 2025-01-03 09:00.
 */
export function seedBasic(engine: TrendEngine): void {
	tick(engine, '2025-01-02T08:00:00Z', {
		X: ['AI Breakthrough Announced', 'Markets rally on rate cut hopes', 'Storm hits coast'],
		Y: ['AI breakthrough announced!', 'Local team wins final'],
	})
	tick(engine, '2025-01-03T08:00:00Z', {
		X: ['Markets rally on rate cut hopes', 'AI Breakthrough Announced', 'New phone launch draws crowds'],
		Y: ['Rate cut expected next month', 'AI breakthrough announced!'],
	})
	tick(engine, '2025-01-03T09:00:00Z', {
		X: ['AI Breakthrough Announced', 'Storm hits coast'],
		Y: ['Rate cut expected next month'],
	})
}
