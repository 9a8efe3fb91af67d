import { mkdir, readdir, stat, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

export interface IndexStoreOptions {
  /** Directory holding the markers, normally {mediaRoot}/.idx */
  indexDir: string
}

export interface IndexStore {
  readonly indexDir: string
  /** Where a clip is downloaded before placement: {indexDir}/.staging/{filename} */
  stagingPath(filename: string): string
  /** Marked, or downloaded and waiting for placement. */
  exists(filename: string): Promise<boolean>
  /** Create a zero-byte marker. No-op when it already exists. */
  mark(filename: string): Promise<void>
  /** Names of every entry: markers and staged downloads. */
  list(): Promise<Set<string>>
  /** Names of downloads that were never placed. */
  listStaged(): Promise<Set<string>>
}

/** In-progress downloads use this infix and are never treated as entries. */
export const TEMP_INFIX = '.tmp.'

/** Staged downloads live here so a marker is never mistaken for one, whatever its size. */
export const STAGING_DIRNAME = '.staging'

export function isTempName(name: string): boolean {
  return name.includes(TEMP_INFIX)
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return false
    }
    throw err
  }
}

async function listFiles(dir: string): Promise<Set<string>> {
  let names: string[]
  try {
    names = await readdir(dir)
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return new Set()
    }
    throw err
  }

  const files = new Set<string>()
  for (const name of names) {
    if (isTempName(name)) continue
    if ((await stat(join(dir, name))).isFile()) {
      files.add(name)
    }
  }
  return files
}

export function createIndexStore(options: IndexStoreOptions): IndexStore {
  const { indexDir } = options
  const stagingDir = join(indexDir, STAGING_DIRNAME)

  return {
    indexDir,

    stagingPath(filename) {
      return join(stagingDir, filename)
    },

    async exists(filename) {
      return (
        (await isFile(join(indexDir, filename))) ||
        (await isFile(join(stagingDir, filename)))
      )
    },

    async mark(filename) {
      await mkdir(indexDir, { recursive: true })
      // 'a' creates the file if missing and leaves existing content alone
      await writeFile(join(indexDir, filename), '', { flag: 'a' })
    },

    async list() {
      const markers = await listFiles(indexDir)
      for (const name of await listFiles(stagingDir)) {
        markers.add(name)
      }
      return markers
    },

    listStaged() {
      return listFiles(stagingDir)
    },
  }
}

/** Names present in `after` but not in `before`, sorted. */
export function diffListings(
  before: ReadonlySet<string>,
  after: ReadonlySet<string>,
): string[] {
  return [...after].filter((name) => !before.has(name)).sort()
}
