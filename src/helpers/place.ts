import { constants, promises as fs } from 'node:fs'
import path from 'node:path'
import { ensureDir, pathExists } from './fs'
import { hashFile } from './hash'

export interface PlaceOptions {
  /** Delete the source once an identical copy is in place */
  remove: boolean
}

export interface PlaceResult {
  status: 'copied' | 'already-sorted'
  target: string
  removed: boolean
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string')
    return err.code
  return undefined
}

/**
 * Byte comparison by size, then SHA-1 digest.
 */
export async function filesIdentical(a: string, b: string): Promise<boolean> {
  const [sa, sb] = await Promise.all([fs.stat(a), fs.stat(b)])
  if (sa.size !== sb.size)
    return false

  const ha = await hashFile(a)
  const hb = await hashFile(b)
  return ha === hb
}

/**
 * `photo.jpg`, `photo-1.jpg`, `photo-2.jpg`, ...
 */
export function candidateName(fileName: string, n: number) {
  if (n === 0)
    return fileName
  const ext = path.extname(fileName)
  return `${path.basename(fileName, ext)}-${n}${ext}`
}

/**
 * Picks the first candidate name in `destDir` that is either free or already
 * holds an identical copy of `source`. The same inputs always give the same
 * answer, so a re-run lands on the copy made the first time.
 */
export async function findTarget(source: string, destDir: string): Promise<{ target: string, exists: boolean }> {
  const fileName = path.basename(source)

  for (let n = 0; ; n++) {
    const target = path.join(destDir, candidateName(fileName, n))
    if (!(await pathExists(target)))
      return { target, exists: false }
    if (await filesIdentical(source, target))
      return { target, exists: true }
  }
}

async function copyVerified(source: string, target: string) {
  try {
    await fs.copyFile(source, target, constants.COPYFILE_EXCL)
  }
  catch (err) {
    // EEXIST means the file belongs to someone else
    if (errorCode(err) !== 'EEXIST')
      await fs.rm(target, { force: true })
    throw err
  }

  const { atime, mtime } = await fs.stat(source)
  await fs.utimes(target, atime, mtime)

  if (!(await filesIdentical(source, target))) {
    await fs.rm(target, { force: true })
    throw new Error(`Copy of ${source} does not match the original, source kept`)
  }
}

/**
 * Copies `source` into `destDir`, verifies the copy, and only then removes
 * the source when asked to. Rejects on any failure with the source untouched.
 */
export async function placeFile(source: string, destDir: string, options: PlaceOptions): Promise<PlaceResult> {
  if (path.resolve(path.dirname(source)) === path.resolve(destDir)) {
    return { status: 'already-sorted', target: source, removed: false }
  }

  await ensureDir(destDir)

  const { target, exists } = await findTarget(source, destDir)
  if (!exists) {
    await copyVerified(source, target)
  }

  if (options.remove) {
    await fs.unlink(source)
  }

  return { status: exists ? 'already-sorted' : 'copied', target, removed: options.remove }
}
