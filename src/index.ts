import path from 'node:path'
import { formatDateDir, isDateLayoutDir } from './helpers/date'
import type { DateSource } from './helpers/exif'
import { resolveDate } from './helpers/exif'
import { isDirectory, walk } from './helpers/fs'
import type { Logger } from './helpers/log'
import { createLogger } from './helpers/log'
import { isPhotoFile } from './helpers/media'
import { placeFile } from './helpers/place'
import { createProgressBar } from './helpers/progress'

/* ---------- TYPES ---------- */

export interface SortOptions {
  inputDir: string
  outputDir: string
  remove: boolean
  verbose?: boolean
  logger?: Logger
}

export type LogEntry =
  | { type: 'sorted', file: string, target: string, dateSource: DateSource, reason?: string, removed: boolean }
  | { type: 'skipped', file: string, target: string, reason: 'already-sorted', removed: boolean }
  | { type: 'error', file: string, message: string }

export interface SortSummary {
  sorted: number
  skipped: number
  failed: number
  entries: LogEntry[]
}

export type { DateSource, ResolvedDate } from './helpers/exif'
export type { Logger } from './helpers/log'
export type { PlaceOptions, PlaceResult } from './helpers/place'
export { formatDateDir, formatDatePath } from './helpers/date'
export { resolveDate } from './helpers/exif'
export { placeFile } from './helpers/place'

/* ---------- HELPERS ---------- */

function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err)
}

async function sortOne(file: string, outputDir: string, remove: boolean): Promise<LogEntry> {
  const { date, source, reason } = await resolveDate(file)
  const result = await placeFile(file, formatDateDir(outputDir, date), { remove })

  if (result.status === 'already-sorted') {
    return { type: 'skipped', file, target: result.target, reason: 'already-sorted', removed: result.removed }
  }
  return { type: 'sorted', file, target: result.target, dateSource: source, reason, removed: result.removed }
}

function report(entries: LogEntry[], outputDir: string, log: Logger) {
  for (const entry of entries) {
    switch (entry.type) {
      case 'sorted':
        log.info(`✅ ${entry.file} → ${path.relative(outputDir, entry.target)}${entry.removed ? ' (source removed)' : ''}`)
        if (entry.dateSource === 'mtime')
          log.debug(`   dated by modification time: ${entry.reason ?? 'no capture date'}`)
        break
      case 'skipped':
        log.info(`⏭️ ${entry.file} already sorted as ${path.relative(outputDir, entry.target)}${entry.removed ? ' (source removed)' : ''}`)
        break
      case 'error':
        log.error(`❌ ${entry.file}: ${entry.message}`)
        break
    }
  }
}

/* ---------- MAIN ---------- */

export async function runPhotoSort(options: SortOptions): Promise<SortSummary> {
  const { inputDir, outputDir, remove } = options
  const log = options.logger ?? createLogger(options.verbose)

  if (!(await isDirectory(inputDir))) {
    throw new Error(`Input "${inputDir}" is not a directory`)
  }

  log.info(`📷 Sorting photos from "${inputDir}" to "${outputDir}"`)
  log.info(`🗑️ Delete photos after copy: ${remove ? 'yes' : 'no'}`)

  log.info('🔍 Scanning source...')
  const allFiles = await walk(inputDir, {
    skipDir: (dir) => {
      const skip = isDateLayoutDir(outputDir, dir)
      if (skip)
        log.debug(`Skipping sorted directory ${dir}`)
      return skip
    },
    onError: (dir, err) => log.warn(`⚠️ Cannot read ${dir}: ${errorMessage(err)}`),
  })

  const photos: string[] = []
  for (const file of allFiles) {
    if (isPhotoFile(file))
      photos.push(file)
    else
      log.debug(`Ignoring ${file}`)
  }

  log.info(`📂 Found ${photos.length} photos`)

  const entries: LogEntry[] = []

  if (photos.length > 0) {
    const bar = createProgressBar(photos.length, '📦 Sorting photos')

    for (const file of photos) {
      try {
        entries.push(await sortOne(file, outputDir, remove))
      }
      catch (err) {
        entries.push({ type: 'error', file, message: errorMessage(err) })
      }
      bar.tick(file)
    }

    bar.stop()
  }

  report(entries, outputDir, log)

  const summary: SortSummary = {
    sorted: entries.filter(e => e.type === 'sorted').length,
    skipped: entries.filter(e => e.type === 'skipped').length,
    failed: entries.filter(e => e.type === 'error').length,
    entries,
  }

  log.info(`🎉 Done: ${summary.sorted} sorted, ${summary.skipped} skipped, ${summary.failed} failed`)

  return summary
}
