import path from 'node:path'

const YEAR_DIR = /^\d{4}$/

export function getDateParts(date: Date) {
  return {
    y: String(date.getFullYear()).padStart(4, '0'),
    m: String(date.getMonth() + 1).padStart(2, '0'),
    d: String(date.getDate()).padStart(2, '0'),
  }
}

/**
 * Relative `YYYY/MM/DD` directory for a date, in local time.
 */
export function formatDatePath(date: Date) {
  const { y, m, d } = getDateParts(date)
  return path.join(y, m, d)
}

export function formatDateDir(targetDir: string, date: Date) {
  return path.join(targetDir, formatDatePath(date))
}

/**
 * True for a year directory sitting directly under the output root,
 * i.e. a tree this tool has already produced.
 */
export function isDateLayoutDir(targetDir: string, dir: string) {
  return YEAR_DIR.test(path.relative(targetDir, dir))
}
