import { PNG } from 'pngjs'
import { InvalidConfigError } from '../errors/errors'
import { subRowsFor } from '../settings/config'
import type { HistoryReader } from '../storage/history'
import { projectView, type ProjectionGrid, type ProjectionOptions, type ProjectionView } from '../render/projection'
import { writeFileAtomic } from './atomic-write'

export interface ImageExportOptions extends ProjectionOptions {
  width: number
  height: number
}

export interface ExportResult {
  kind: 'image' | 'matrix'
  path: string
  written: boolean
  rows: number
  bytes: number
}

export function projectImage(history: HistoryReader, view: ProjectionView, options: ImageExportOptions): ProjectionGrid {
  const subRows = subRowsFor(view.density)
  if (!Number.isInteger(options.width) || options.width < 1 || !Number.isInteger(options.height) || options.height < 1) {
    throw new InvalidConfigError([`image size must be positive integers (got ${options.width}x${options.height})`])
  }
  if (options.height % subRows !== 0) {
    throw new InvalidConfigError([
      `imageHeight: must be a multiple of ${subRows} for ${view.density} density (got ${options.height})`,
    ])
  }
  return projectView(history, view, { columns: options.width, rows: options.height / subRows }, options)
}

/** RGB PNG of a projection; cells without data are black. */
export function encodePng(grid: ProjectionGrid): Buffer {
  const png = new PNG({ width: grid.width, height: grid.height })
  grid.cells.forEach((cell, index) => {
    const offset = index * 4
    const [r, g, b] = cell ? cell.color : [0, 0, 0]
    png.data[offset] = r
    png.data[offset + 1] = g
    png.data[offset + 2] = b
    png.data[offset + 3] = 255
  })
  return PNG.sync.write(png, { colorType: 2 })
}

/**
 * Renders the history through the same projection the terminal uses, at a fixed canvas size.
 * Nothing is written while the history is empty.
 */
export async function exportImage(
  history: HistoryReader,
  view: ProjectionView,
  options: ImageExportOptions,
  path: string,
): Promise<ExportResult> {
  const snapshot = history.snapshot()
  if (snapshot.length === 0) {
    return { kind: 'image', path, written: false, rows: 0, bytes: 0 }
  }
  const grid = projectImage(history, view, options)
  const encoded = encodePng(grid)
  await writeFileAtomic(path, encoded)
  return { kind: 'image', path, written: true, rows: snapshot.length, bytes: encoded.byteLength }
}
