import { copyFile, mkdir, readdir, stat, unlink } from 'node:fs/promises'
import { basename, join } from 'node:path'
import type { RetentionPolicy } from '../../schemas/server-config.js'

export interface LatestViewOptions {
  /** Flat mirror directory, normally {mediaRoot}/latest */
  latestDir: string
}

export interface LatestEntry {
  name: string
  path: string
  mtime: Date
}

export interface LatestView {
  readonly latestDir: string
  /** Copy an archived clip into the mirror under its basename, overwriting. Returns the copy's path. */
  mirror(archivePath: string): Promise<string>
  /** Files in the mirror, most recently modified first. */
  list(): Promise<LatestEntry[]>
  /** Apply the retention policy. Returns the removed paths. */
  prune(policy: RetentionPolicy, now?: Date): Promise<string[]>
}

const HOUR_MS = 60 * 60 * 1000

/**
 * Entries the policy drops from a newest-first listing.
 * Age mode when maxAgeHours > 0, count mode otherwise.
 */
export function selectExpired(
  entries: LatestEntry[],
  policy: RetentionPolicy,
  now: Date,
): LatestEntry[] {
  if (policy.maxAgeHours > 0) {
    const cutoff = now.getTime() - policy.maxAgeHours * HOUR_MS
    return entries.filter((e) => e.mtime.getTime() < cutoff)
  }
  return entries.slice(policy.maxCount)
}

export function createLatestView(options: LatestViewOptions): LatestView {
  const { latestDir } = options

  async function list(): Promise<LatestEntry[]> {
    let names: string[]
    try {
      names = await readdir(latestDir)
    } catch (err: unknown) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return []
      }
      throw err
    }

    const entries: LatestEntry[] = []
    for (const name of names) {
      const path = join(latestDir, name)
      const stats = await stat(path)
      if (stats.isFile()) {
        entries.push({ name, path, mtime: stats.mtime })
      }
    }

    // Newest first; name breaks ties so equal mtimes order deterministically
    return entries.sort(
      (a, b) =>
        b.mtime.getTime() - a.mtime.getTime() ||
        (a.name < b.name ? 1 : a.name > b.name ? -1 : 0),
    )
  }

  return {
    latestDir,

    async mirror(archivePath) {
      await mkdir(latestDir, { recursive: true })
      // A copy rather than a link: some media servers do not follow symlinks
      const target = join(latestDir, basename(archivePath))
      await copyFile(archivePath, target)
      return target
    },

    list,

    async prune(policy, now = new Date()) {
      const expired = selectExpired(await list(), policy, now)
      for (const entry of expired) {
        await unlink(entry.path)
      }
      return expired.map((e) => e.path)
    },
  }
}
