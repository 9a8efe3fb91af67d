import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, readFile, readdir, rm, utimes, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createLatestView, selectExpired } from './manager.js'
import type { LatestEntry, LatestView } from './manager.js'

const HOUR_MS = 60 * 60 * 1000

describe('LatestView', () => {
  let mediaRoot: string
  let archiveDir: string
  let view: LatestView

  beforeEach(async () => {
    mediaRoot = await mkdtemp(join(tmpdir(), 'latest-view-test-'))
    archiveDir = join(mediaRoot, 'porch', '2025', '06', '02')
    await mkdir(archiveDir, { recursive: true })
    view = createLatestView({ latestDir: join(mediaRoot, 'latest') })
  })

  afterEach(async () => {
    await rm(mediaRoot, { recursive: true, force: true })
  })

  async function archive(name: string, content = name): Promise<string> {
    const path = join(archiveDir, name)
    await writeFile(path, content)
    return path
  }

  /** Mirror a clip and pin its mirror mtime. */
  async function mirrorAt(name: string, mtime: Date): Promise<string> {
    const latestPath = await view.mirror(await archive(name))
    await utimes(latestPath, mtime, mtime)
    return latestPath
  }

  describe('mirror', () => {
    it('copies the archived file under its basename', async () => {
      const source = await archive('a.mp4', 'clip-a')
      const target = await view.mirror(source)

      expect(target).toBe(join(mediaRoot, 'latest', 'a.mp4'))
      expect(await readFile(target, 'utf-8')).toBe('clip-a')
      expect(await readFile(source, 'utf-8')).toBe('clip-a')
    })

    it('overwrites an existing copy', async () => {
      const source = await archive('a.mp4', 'old')
      await view.mirror(source)
      await writeFile(source, 'new')
      const target = await view.mirror(source)

      expect(await readFile(target, 'utf-8')).toBe('new')
    })
  })

  describe('list', () => {
    it('returns empty array when the mirror does not exist', async () => {
      expect(await view.list()).toEqual([])
    })

    it('orders entries newest first', async () => {
      const base = Date.UTC(2025, 5, 2, 12)
      await mirrorAt('old.mp4', new Date(base - 2 * HOUR_MS))
      await mirrorAt('new.mp4', new Date(base))
      await mirrorAt('mid.mp4', new Date(base - HOUR_MS))

      const names = (await view.list()).map((e) => e.name)
      expect(names).toEqual(['new.mp4', 'mid.mp4', 'old.mp4'])
    })
  })

  describe('prune (count mode)', () => {
    it('keeps exactly the N most recently modified entries', async () => {
      const base = Date.UTC(2025, 5, 2, 12)
      for (let i = 0; i < 5; i++) {
        await mirrorAt(`clip-${i}.mp4`, new Date(base + i * HOUR_MS))
      }

      const removed = await view.prune({ maxAgeHours: 0, maxCount: 3 })

      expect(removed.sort()).toEqual([
        join(mediaRoot, 'latest', 'clip-0.mp4'),
        join(mediaRoot, 'latest', 'clip-1.mp4'),
      ])
      expect((await readdir(join(mediaRoot, 'latest'))).sort()).toEqual([
        'clip-2.mp4',
        'clip-3.mp4',
        'clip-4.mp4',
      ])
    })

    it('removes nothing when under the limit', async () => {
      await mirrorAt('a.mp4', new Date())
      expect(await view.prune({ maxAgeHours: 0, maxCount: 3 })).toEqual([])
    })

    it('never touches the archive copies', async () => {
      const base = Date.UTC(2025, 5, 2, 12)
      await mirrorAt('a.mp4', new Date(base))
      await mirrorAt('b.mp4', new Date(base + HOUR_MS))

      await view.prune({ maxAgeHours: 0, maxCount: 0 })

      expect(await readdir(join(mediaRoot, 'latest'))).toEqual([])
      expect((await readdir(archiveDir)).sort()).toEqual(['a.mp4', 'b.mp4'])
    })
  })

  describe('prune (age mode)', () => {
    it('removes entries older than now - maxAgeHours regardless of count', async () => {
      const now = new Date(Date.UTC(2025, 5, 2, 12))
      await mirrorAt('fresh.mp4', new Date(now.getTime() - HOUR_MS))
      await mirrorAt('edge.mp4', new Date(now.getTime() - 6 * HOUR_MS))
      await mirrorAt('stale.mp4', new Date(now.getTime() - 7 * HOUR_MS))

      const removed = await view.prune({ maxAgeHours: 6, maxCount: 1 }, now)

      expect(removed).toEqual([join(mediaRoot, 'latest', 'stale.mp4')])
      const remaining = await view.list()
      expect(remaining.map((e) => e.name)).toEqual(['fresh.mp4', 'edge.mp4'])
      for (const entry of remaining) {
        expect(entry.mtime.getTime()).toBeGreaterThanOrEqual(now.getTime() - 6 * HOUR_MS)
      }
    })
  })
})

describe('selectExpired', () => {
  const now = new Date(Date.UTC(2025, 5, 2, 12))
  const entry = (name: string, hoursAgo: number): LatestEntry => ({
    name,
    path: `/latest/${name}`,
    mtime: new Date(now.getTime() - hoursAgo * HOUR_MS),
  })
  const entries = [entry('a', 1), entry('b', 2), entry('c', 3)]

  it('count mode drops everything past maxCount', () => {
    expect(selectExpired(entries, { maxAgeHours: 0, maxCount: 1 }, now).map((e) => e.name)).toEqual([
      'b',
      'c',
    ])
  })

  it('age mode ignores maxCount', () => {
    expect(selectExpired(entries, { maxAgeHours: 2.5, maxCount: 0 }, now).map((e) => e.name)).toEqual([
      'c',
    ])
  })
})
