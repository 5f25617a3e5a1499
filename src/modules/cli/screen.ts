import { positionToFrequency } from '../analysis/frequency-axis'
import type { SourceStateSnapshot } from '../capture/source'
import type { EngineMetrics } from '../pipeline/engine'
import { projectView, type ProjectionOptions } from '../render/projection'
import { RESET, moveTo, renderGrid } from '../render/terminal'
import type { SpectrogramConfig } from '../settings/config'
import type { ViewState } from '../settings/view-state'
import type { HistoryReader } from '../storage/history'
import { HELP_TEXT } from './args'
import { KEY_HELP, type PathPrompt } from './keys'

export interface ScreenSize {
  columns: number
  rows: number
}

export interface ScreenInput {
  size: ScreenSize
  view: ViewState
  config: SpectrogramConfig
  history: HistoryReader
  projection: ProjectionOptions
  metrics: EngineMetrics
  source: SourceStateSnapshot
  prompt: PathPrompt | null
  message: string | null
}

const STATUS_LINES = 3
const CLEAR_LINE = '\u001b[K'

export const fit = (text: string, columns: number): string =>
  text.length >= columns ? text.slice(0, Math.max(0, columns)) : text.padEnd(columns)

export const formatHz = (hz: number): string => (hz >= 1000 ? `${(hz / 1000).toFixed(1)}kHz` : `${hz.toFixed(0)}Hz`)

export function statusLine(input: Omit<ScreenInput, 'size' | 'history' | 'projection' | 'prompt' | 'message'>): string {
  const { view, config, metrics, source } = input
  const fMax = config.sampleRate / 2 / view.zoom
  return [
    `src: ${source.description}${source.state === 'error' ? ` (error: ${source.error ?? 'unknown'})` : ''}`,
    `style: ${view.style}`,
    `zoom: ${view.zoom.toFixed(2)}`,
    `floor: ${view.dbFloor.toFixed(1)} dB ceil: ${view.dbCeiling.toFixed(1)}`,
    `rows: ${metrics.totalRows}`,
    `freq: 0..${fMax.toFixed(0)} Hz`,
    `time: 0..${metrics.totalSeconds.toFixed(2)}s`,
    `L/H/N: ${config.windowLength}/${config.hop}/${config.fftSize}`,
    `rps: ${metrics.rowsPerSecond.toFixed(1)}`,
    `rt: ${config.realtime ? 'on' : 'off'}`,
    `scale: ${view.freqScale}`,
    `render: ${view.density}`,
    `dropped: ${metrics.droppedChunks}`,
    ...(view.paused ? ['PAUSED'] : []),
  ].join(' | ')
}

export function detailLines(input: Pick<ScreenInput, 'view' | 'config' | 'metrics' | 'source'>): string[] {
  const { view, config, metrics, source } = input
  const spacing = config.sampleRate / config.fftSize
  return [
    `src: ${source.description}`,
    `fs: ${config.sampleRate} Hz | L/H/N: ${config.windowLength}/${config.hop}/${config.fftSize}`,
    `bins: ${config.fftSize / 2 + 1} | df: ${spacing.toFixed(1)} Hz | window: ${config.window}`,
    `floor/ceil: ${view.dbFloor.toFixed(0)}/${view.dbCeiling.toFixed(0)} dB | zoom: ${view.zoom.toFixed(2)}`,
    `throughput: ${metrics.rowsPerSecond.toFixed(1)} rows/s | RTF: ${metrics.realTimeFactor.toFixed(2)}x | total: ${metrics.totalSeconds.toFixed(2)}s`,
    `scale: ${view.freqScale} | render: ${view.density} | overview: ${view.overview ? 'on' : 'off'}`,
  ]
}

/** Evenly spaced frequency labels along the display axis, lowest first. */
export function frequencyTicks(
  view: Pick<ViewState, 'zoom' | 'freqScale'>,
  projection: Pick<ProjectionOptions, 'fftSize' | 'sampleRate'>,
  count = 5,
): { position: number; label: string }[] {
  return Array.from({ length: count }, (_, index) => {
    const position = count === 1 ? 0 : index / (count - 1)
    return { position, label: formatHz(positionToFrequency(position, view.zoom, view.freqScale, projection)) }
  })
}

/** One full frame of terminal output, drawn from the home position. */
export function composeScreen(input: ScreenInput): string {
  const { size, view } = input
  const columns = Math.max(1, size.columns)
  const statusRows = view.fullscreen ? 0 : STATUS_LINES
  const plotRows = Math.max(1, size.rows - statusRows)

  const grid = projectView(input.history, view, { columns, rows: plotRows }, input.projection)
  let output = ''
  renderGrid(grid).forEach((line, row) => {
    output += moveTo(row, 0) + line
  })

  if (view.detailed) {
    const ticks = frequencyTicks(view, input.projection)
    for (const tick of ticks) {
      if (view.style === 'waterfall') {
        const column = Math.min(columns - tick.label.length, Math.round(tick.position * (columns - 1)))
        output += moveTo(0, Math.max(0, column)) + RESET + tick.label
      } else {
        output += moveTo(Math.round((1 - tick.position) * (plotRows - 1)), 0) + RESET + tick.label
      }
    }
    const panel = detailLines(input)
    const width = Math.min(columns, Math.max(...panel.map((line) => line.length)) + 2)
    panel.forEach((line, index) => {
      if (index + 1 >= plotRows) return
      output += moveTo(index + 1, columns - width) + RESET + fit(` ${line}`, width)
    })
  }

  if (view.showHelp) {
    const lines = [...HELP_TEXT.split('\n'), '', `Keys: ${KEY_HELP}`]
    lines.slice(0, plotRows).forEach((line, index) => {
      output += moveTo(index, 0) + RESET + fit(line, columns)
    })
  }

  if (statusRows > 0) {
    const third = input.prompt
      ? `${input.prompt.kind === 'image' ? 'PNG' : 'CSV'} path: ${input.prompt.input}_`
      : (input.message ?? '')
    const status = [KEY_HELP, statusLine(input), third]
    status.forEach((line, index) => {
      output += moveTo(plotRows + index, 0) + RESET + fit(line, columns) + CLEAR_LINE
    })
  }
  return output + RESET
}
