import { promises as fs } from 'node:fs'
import { parse as readExif } from 'exifr'

// Real capture time first, then the time the image was digitized
const CAPTURE_TAGS = ['DateTimeOriginal', 'CreateDate'] as const

const EXIF_DATE = /^(\d{4})[:-](\d{2})[:-](\d{2})(?:[ T](\d{2}):(\d{2}):(\d{2}))?/

export type DateSource = 'exif' | 'mtime'

export interface ResolvedDate {
  date: Date
  source: DateSource
  /** Why the metadata could not be used; set when `source` is `mtime` */
  reason?: string
}

function isValidDate(d: Date) {
  return !Number.isNaN(d.getTime())
}

/**
 * Parses a raw `YYYY:MM:DD HH:MM:SS` string in local time.
 * Values that do not name a real calendar day give null.
 */
export function parseExifDate(raw: unknown): Date | null {
  if (typeof raw !== 'string')
    return null

  const match = EXIF_DATE.exec(raw.trim())
  if (!match)
    return null

  const [, y, mo, d, hh = '0', mm = '0', ss = '0'] = match
  const year = Number(y)
  const month = Number(mo) - 1
  const day = Number(d)
  const date = new Date(year, month, day, Number(hh), Number(mm), Number(ss))

  // Date rolls 2021-02-30 over into March
  if (date.getFullYear() !== year || date.getMonth() !== month || date.getDate() !== day)
    return null
  return isValidDate(date) ? date : null
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/**
 * Reads the capture date from the file's embedded metadata.
 * Resolves null when no usable tag is present; rejects when the file
 * cannot be parsed at all.
 */
export async function readCaptureDate(file: string): Promise<Date | null> {
  // Revived dates are built with `new Date(y, m - 1, d)`, which rolls
  // `0000:00:00` and `2021:02:30` over to real days; keep the raw strings
  const tags: unknown = await readExif(file, { pick: [...CAPTURE_TAGS], reviveValues: false })
  if (!isRecord(tags))
    return null

  for (const tag of CAPTURE_TAGS) {
    const date = parseExifDate(tags[tag])
    if (date)
      return date
  }
  return null
}

/**
 * Capture date from metadata, or the file's modification time when the
 * metadata is missing, malformed or unreadable. Metadata errors never reject.
 */
export async function resolveDate(file: string): Promise<ResolvedDate> {
  let reason: string
  try {
    const date = await readCaptureDate(file)
    if (date)
      return { date, source: 'exif' }
    reason = 'no capture date in metadata'
  }
  catch (err) {
    reason = `unreadable metadata: ${err instanceof Error ? err.message : String(err)}`
  }

  const { mtime } = await fs.stat(file)
  return { date: mtime, source: 'mtime', reason }
}
