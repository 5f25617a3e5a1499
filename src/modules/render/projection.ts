import { aggregateBins, binPositions, binRangeForSpan, type AxisContext } from '../analysis/frequency-axis'
import { InvalidConfigError } from '../errors/errors'
import { subRowsFor, type Aggregation } from '../settings/config'
import type { ViewState } from '../settings/view-state'
import type { HistoryReader } from '../storage/history'
import { colorAt, type Palette, type Rgb } from './palette'

export type ProjectionView = Pick<
  ViewState,
  'zoom' | 'freqScale' | 'style' | 'density' | 'dbFloor' | 'dbCeiling' | 'overview'
>

export interface ProjectionGeometry {
  /** Character columns. */
  columns: number
  /** Character rows; each holds `subRows` pixel rows. */
  rows: number
}

export interface ProjectionOptions extends AxisContext {
  aggregation: Aggregation
  palette: Palette
}

export interface ProjectionCell {
  intensity: number
  color: Rgb
}

export interface ProjectionGrid {
  width: number
  height: number
  subRows: number
  /** Row-major, `width * height`; null where no history row reaches the cell. */
  cells: (ProjectionCell | null)[]
  /** History rows covered by the time axis. */
  rowsShown: number
}

/** Half-open history row range `[start, end)` per time cell, oldest cell first. */
export type TimeRange = readonly [number, number]

export const intensityOf = (db: number, floor: number, ceiling: number): number =>
  Math.min(1, Math.max(0, (db - floor) / (ceiling - floor)))

/**
 * Assigns history rows to `cells` time cells. Live view shows the newest rows one per cell,
 * right-aligned so the last cell holds the newest row. Overview splits the whole history into
 * contiguous ranges; a cell whose range is empty borrows the nearest row.
 */
export function timeCellRanges(length: number, cells: number, overview: boolean): (TimeRange | null)[] {
  const ranges: (TimeRange | null)[] = new Array<TimeRange | null>(cells).fill(null)
  if (length === 0 || cells === 0) {
    return ranges
  }
  if (!overview) {
    const shown = Math.min(length, cells)
    for (let offset = 0; offset < shown; offset += 1) {
      const row = length - shown + offset
      ranges[cells - shown + offset] = [row, row + 1]
    }
    return ranges
  }
  for (let t = 0; t < cells; t += 1) {
    const start = Math.floor((t * length) / cells)
    const end = Math.floor(((t + 1) * length) / cells)
    if (end > start) {
      ranges[t] = [start, end]
    } else {
      const nearest = Math.min(length - 1, Math.floor(((t + 0.5) * length) / cells))
      ranges[t] = [nearest, nearest + 1]
    }
  }
  return ranges
}

export const cellAt = (grid: ProjectionGrid, x: number, y: number): ProjectionCell | null =>
  grid.cells[y * grid.width + x] ?? null

/**
 * Projects a history snapshot into a grid of coloured pixels. Waterfall puts time on the
 * vertical axis (newest at the top) and frequency across (low at the left); horizontal puts
 * time across (newest at the right) and frequency up (low at the bottom).
 */
export function projectView(
  history: HistoryReader,
  view: ProjectionView,
  geometry: ProjectionGeometry,
  options: ProjectionOptions,
): ProjectionGrid {
  const subRows = subRowsFor(view.density)
  const width = Math.max(0, Math.floor(geometry.columns))
  const height = Math.max(0, Math.floor(geometry.rows)) * subRows
  const cells = new Array<ProjectionCell | null>(width * height).fill(null)
  const snapshot = history.snapshot()
  const grid: ProjectionGrid = { width, height, subRows, cells, rowsShown: 0 }
  if (snapshot.length === 0 || width === 0 || height === 0) {
    return grid
  }
  if (snapshot.binCount !== options.fftSize / 2 + 1) {
    throw new InvalidConfigError([
      `history rows hold ${snapshot.binCount} bins, projection expects ${options.fftSize / 2 + 1}`,
    ])
  }

  const waterfall = view.style === 'waterfall'
  const timeCells = waterfall ? height : width
  const freqCells = waterfall ? width : height
  const positions = binPositions(view.zoom, view.freqScale, options)
  const spans = Array.from({ length: freqCells }, (_, f) =>
    binRangeForSpan(f / freqCells, (f + 1) / freqCells, view.zoom, view.freqScale, options, positions),
  )
  const ranges = timeCellRanges(snapshot.length, timeCells, view.overview)
  const accumulated = new Float64Array(freqCells)
  const rule = options.aggregation

  ranges.forEach((range, t) => {
    if (!range) return
    grid.rowsShown += range[1] - range[0]
    accumulated.fill(rule === 'max' ? -Infinity : 0)
    for (const row of history.rowsInRange(snapshot, range[0], range[1])) {
      spans.forEach(([first, last], f) => {
        const value = aggregateBins(row.values, first, last, rule)
        accumulated[f] = rule === 'max' ? Math.max(accumulated[f], value) : accumulated[f] + value
      })
    }
    const count = range[1] - range[0]
    for (let f = 0; f < freqCells; f += 1) {
      const db = rule === 'max' ? accumulated[f] : accumulated[f] / count
      const intensity = intensityOf(db, view.dbFloor, view.dbCeiling)
      const x = waterfall ? f : t
      const y = waterfall ? timeCells - 1 - t : freqCells - 1 - f
      cells[y * width + x] = { intensity, color: colorAt(options.palette, intensity) }
    }
  })
  return grid
}
