import path from 'node:path'

const PHOTO_EXT = new Set([
  '.jpg',
  '.jpeg',
  '.png',
  '.heic',
  '.heif',
  '.tif',
  '.tiff',
  '.webp',
  '.dng',
  '.avif',
])

export function isPhotoFile(file: string): boolean {
  return PHOTO_EXT.has(path.extname(file).toLowerCase())
}
