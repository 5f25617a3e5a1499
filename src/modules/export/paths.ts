import { dirname, join } from 'node:path'

export const DEFAULT_EXPORT_DIR = 'saved'

export type ExportExtension = 'png' | 'csv'

export const defaultExportName = (extension: ExportExtension, nowMs: number = Date.now()): string =>
  `sgram_${Math.floor(nowMs / 1000)}.${extension}`

/** A bare file name (or nothing) lands in `saved/`; paths with a directory are kept. */
export function resolveExportPath(requested: string | null | undefined, extension: ExportExtension, nowMs?: number): string {
  const name = requested && requested.length > 0 ? requested : defaultExportName(extension, nowMs)
  return dirname(name) === '.' ? join(DEFAULT_EXPORT_DIR, name) : name
}
