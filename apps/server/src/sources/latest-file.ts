import type { Stats } from 'node:fs'
import { readdir, stat } from 'node:fs/promises'
import { join } from 'node:path'

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Most recently modified file in `dir` whose name starts with `prefix` and
 * ends with `ext`. Null when there is none or the directory does not exist.
 */
export async function findLatestFile(dir: string, prefix: string, ext = '.csv'): Promise<string | null> {
  let names: string[]
  try {
    names = await readdir(dir)
  } catch (err) {
    if (isNotFound(err)) return null
    throw err
  }

  let latest: { path: string; mtimeMs: number } | null = null
  for (const name of names) {
    if (!name.startsWith(prefix) || !name.endsWith(ext)) continue
    const path = join(dir, name)
    let info: Stats
    try {
      info = await stat(path)
    } catch (err) {
      // removed between readdir and stat
      if (isNotFound(err)) continue
      throw err
    }
    if (!info.isFile()) continue
    if (latest === null || info.mtimeMs > latest.mtimeMs) {
      latest = { path, mtimeMs: info.mtimeMs }
    }
  }
  return latest?.path ?? null
}
