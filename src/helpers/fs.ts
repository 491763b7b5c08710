import { promises as fs } from 'node:fs'
import path from 'node:path'

export interface WalkOptions {
  /** Return true to leave a directory (and everything below it) out of the walk */
  skipDir?: (dir: string) => boolean
  /** Receives nested directories that could not be read; without it the error is thrown */
  onError?: (dir: string, err: unknown) => void
}

/**
 * Lists regular files below `dir`, recursively, in name order.
 * A failure to read `dir` itself always rejects.
 */
export async function walk(dir: string, options: WalkOptions = {}): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true })
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

  const result: string[] = []

  for (const e of entries) {
    const full = path.join(dir, e.name)
    if (e.isDirectory()) {
      if (options.skipDir?.(full))
        continue
      try {
        result.push(...(await walk(full, options)))
      }
      catch (err) {
        if (!options.onError)
          throw err
        options.onError(full, err)
      }
    }
    else if (e.isFile()) {
      result.push(full)
    }
  }

  return result
}

export async function ensureDir(p: string) {
  await fs.mkdir(p, { recursive: true })
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p)
    return true
  }
  catch {
    return false
  }
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory()
  }
  catch {
    return false
  }
}
