import { randomUUID } from 'node:crypto'
import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { IOFailureError } from '../errors/errors'

export const temporaryPathFor = (path: string): string =>
  join(dirname(path), `.${basename(path)}.${randomUUID().slice(0, 8)}.tmp`)

/**
 * Writes `data` next to `path` and renames it into place, so readers see either the previous
 * file or the complete new one. Missing parent directories are created.
 */
export async function writeFileAtomic(path: string, data: Uint8Array | string): Promise<void> {
  const temporary = temporaryPathFor(path)
  try {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(temporary, data)
    await rename(temporary, path)
  } catch (error) {
    await rm(temporary, { force: true }).catch((cleanupError: unknown) => {
      console.warn('[atomic-write] could not remove temporary file', temporary, cleanupError)
    })
    throw new IOFailureError(path, error)
  }
}
