import { UnsupportedFormatError } from '../errors/errors'
import type { HistoryReader, HistorySnapshot } from '../storage/history'
import { intensityOf } from '../render/projection'
import { writeFileAtomic } from './atomic-write'
import type { ExportResult } from './image-export'

export type MatrixMode = 'raw' | 'display'

export interface MatrixExportOptions {
  fftSize: number
  sampleRate: number
  /** `raw` writes dB; `display` writes intensities in [0, 1] under the floor/ceiling. */
  mode?: MatrixMode
  dbFloor?: number
  dbCeiling?: number
  delimiter?: string
  /** Fixed decimals; shortest round-trip form when omitted. */
  precision?: number
}

export interface ParsedMatrix {
  frequencies: number[]
  rows: { index: number; values: Float32Array }[]
}

const formatValue = (value: number, precision: number | undefined) =>
  precision === undefined ? String(value) : value.toFixed(precision)

/** Header `row,<bin centre Hz...>` then one line per history row, oldest first. */
export function formatMatrix(
  history: HistoryReader,
  options: MatrixExportOptions,
  snapshot: HistorySnapshot = history.snapshot(),
): string {
  const delimiter = options.delimiter ?? ','
  const mode = options.mode ?? 'raw'
  const { dbFloor = -80, dbCeiling = 0, precision } = options
  const spacing = options.sampleRate / options.fftSize
  const header = ['row']
  for (let bin = 0; bin < snapshot.binCount; bin += 1) {
    header.push(String(bin * spacing))
  }

  const lines = [header.join(delimiter)]
  for (const row of history.rowsInRange(snapshot, 0, snapshot.length)) {
    const cells = [String(row.index)]
    for (const value of row.values) {
      cells.push(formatValue(mode === 'display' ? intensityOf(value, dbFloor, dbCeiling) : value, precision))
    }
    lines.push(cells.join(delimiter))
  }
  return `${lines.join('\n')}\n`
}

export async function exportMatrix(
  history: HistoryReader,
  options: MatrixExportOptions,
  path: string,
): Promise<ExportResult> {
  const snapshot = history.snapshot()
  const text = formatMatrix(history, options, snapshot)
  await writeFileAtomic(path, text)
  return { kind: 'matrix', path, written: true, rows: snapshot.length, bytes: Buffer.byteLength(text) }
}

const parseNumber = (text: string, line: number): number => {
  const value = Number(text)
  if (text.trim() === '' || Number.isNaN(value)) {
    throw new UnsupportedFormatError(`Matrix line ${line}: '${text}' is not a number`, { line })
  }
  return value
}

export function parseMatrix(text: string, delimiter = ','): ParsedMatrix {
  const lines = text.split(/\r?\n/).filter((line) => line.length > 0)
  const [header, ...body] = lines
  if (header === undefined) {
    throw new UnsupportedFormatError('Matrix is empty')
  }
  const headerCells = header.split(delimiter)
  if (headerCells[0] !== 'row') {
    throw new UnsupportedFormatError(`Matrix header must start with 'row' (got '${headerCells[0]}')`)
  }
  const frequencies = headerCells.slice(1).map((cell) => parseNumber(cell, 1))
  const rows = body.map((line, offset) => {
    const cells = line.split(delimiter)
    if (cells.length !== headerCells.length) {
      throw new UnsupportedFormatError(
        `Matrix line ${offset + 2} has ${cells.length} fields, header has ${headerCells.length}`,
        { line: offset + 2 },
      )
    }
    return {
      index: parseNumber(cells[0], offset + 2),
      values: Float32Array.from(cells.slice(1), (cell) => parseNumber(cell, offset + 2)),
    }
  })
  return { frequencies, rows }
}
