import { createHash } from 'node:crypto'
import { createReadStream } from 'node:fs'

const BLOCK_SIZE = 64 * 1024

/**
 * Streams a file through SHA-1 and resolves with the hex digest.
 */
export async function hashFile(file: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const h = createHash('sha1')
    const s = createReadStream(file, { highWaterMark: BLOCK_SIZE })

    s.on('error', reject)
    s.on('data', c => h.update(c))
    s.on('end', () => resolve(h.digest('hex')))
  })
}
