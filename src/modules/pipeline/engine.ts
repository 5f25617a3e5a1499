import { Framer } from '../analysis/framer'
import { SpectralAnalyzer } from '../analysis/spectral-analyzer'
import { ChunkQueue } from '../capture/chunk-queue'
import { systemClock, type PacingClock } from '../capture/file-source'
import type { SampleSource, SourceState } from '../capture/source'
import { describeError } from '../errors/errors'
import { logError, logInfo } from '../logging/logger'
import { exportImage, type ExportResult } from '../export/image-export'
import { exportMatrix, type MatrixMode } from '../export/matrix-export'
import { resolveExportPath } from '../export/paths'
import { PALETTES, type Palette } from '../render/palette'
import type { ProjectionOptions } from '../render/projection'
import type { SpectrogramConfig } from '../settings/config'
import type { ViewState, ViewStateStore } from '../settings/view-state'
import { SpectrogramHistory } from '../storage/history'
import { telemetrySink as defaultTelemetrySink, type TelemetryEvent, type TelemetrySink } from '../telemetry/telemetry'

export interface EngineMetrics {
  rowsPerSecond: number
  /** Rows per second times hop over sample rate; 1.0 keeps up with real time. */
  realTimeFactor: number
  droppedChunks: number
  totalRows: number
  /** Audio time covered by the history. */
  totalSeconds: number
  queueDepth: number
}

export type ExportOutcome =
  | { ok: true; result: ExportResult }
  | { ok: false; kind: ExportResult['kind']; path: string; error: string }

export interface EngineOptions {
  config: SpectrogramConfig
  source: SampleSource
  view: ViewStateStore
  palettes?: readonly Palette[]
  telemetry?: TelemetrySink
  clock?: PacingClock
}

export interface RunOptions {
  signal?: AbortSignal
  /** Called after every tick, e.g. to redraw. */
  onFrame?: (rows: number) => void
  /** Return once the source has finished and every queued chunk is processed. */
  untilDrained?: boolean
}

const METRICS_WINDOW_MS = 1_000

/**
 * Processing context: drains the chunk queue on each tick, turns samples into spectral rows
 * and owns the history. Exports run one at a time behind the ticks and never interrupt them.
 */
export class SpectrogramEngine {
  readonly config: SpectrogramConfig
  readonly history: SpectrogramHistory
  readonly queue: ChunkQueue
  readonly source: SampleSource
  readonly view: ViewStateStore
  #palettes: readonly Palette[]
  #telemetry: TelemetrySink
  #clock: PacingClock
  #framer: Framer
  #analyzer: SpectralAnalyzer
  #exportQueue: Promise<void> = Promise.resolve()
  #unsubscribeSource: (() => void) | null = null
  #lastSourceState: SourceState | null = null
  #windowStartedAt: number
  #windowRows = 0
  #rowsPerSecond = 0
  #reportedDrops = 0
  #started = false
  #stopped = false

  constructor(options: EngineOptions) {
    this.config = options.config
    this.source = options.source
    this.view = options.view
    this.#palettes = options.palettes ?? PALETTES
    this.#telemetry = options.telemetry ?? defaultTelemetrySink
    this.#clock = options.clock ?? systemClock
    this.queue = new ChunkQueue(options.config.queueCapacity)
    this.#framer = new Framer(options.config)
    this.#analyzer = new SpectralAnalyzer(options.config)
    this.history = new SpectrogramHistory(this.#analyzer.binCount)
    this.#windowStartedAt = this.#clock.now()
  }

  get metrics(): EngineMetrics {
    const { hop, sampleRate } = this.config
    return {
      rowsPerSecond: this.#rowsPerSecond,
      realTimeFactor: (this.#rowsPerSecond * hop) / sampleRate,
      droppedChunks: this.queue.droppedCount,
      totalRows: this.history.length,
      totalSeconds: (this.history.length * hop) / sampleRate,
      queueDepth: this.queue.size,
    }
  }

  get binSpacingHz(): number {
    return this.#analyzer.binSpacingHz
  }

  get palette(): Palette {
    const { paletteIndex } = this.view.get()
    return this.#palettes[paletteIndex % this.#palettes.length]
  }

  projectionOptions(): ProjectionOptions {
    return {
      fftSize: this.config.fftSize,
      sampleRate: this.config.sampleRate,
      aggregation: this.config.aggregation,
      palette: this.palette,
    }
  }

  async start(): Promise<void> {
    if (this.#started) {
      throw new Error('Engine already started')
    }
    this.#started = true
    this.#unsubscribeSource = this.source.subscribe((snapshot) => {
      if (snapshot.state === this.#lastSourceState) return
      this.#lastSourceState = snapshot.state
      this.#record('capture-state', {
        state: snapshot.state,
        source: snapshot.description,
        error: snapshot.error ?? null,
      })
    })
    await logInfo('Engine starting', {
      source: this.source.describe(),
      fftSize: this.config.fftSize,
      windowLength: this.config.windowLength,
      hop: this.config.hop,
      sampleRate: this.config.sampleRate,
    })
    await this.source.start(this.queue)
  }

  /** Processes everything queued unless paused. Returns the number of rows appended. */
  tick(): number {
    let rows = 0
    if (!this.view.get().paused) {
      for (const chunk of this.queue.drain()) {
        this.#framer.push(chunk.samples)
        for (const frame of this.#framer.frames()) {
          this.history.append(this.#analyzer.analyze(frame))
          rows += 1
        }
      }
    }
    this.#updateMetrics(rows)
    return rows
  }

  #updateMetrics(rows: number) {
    this.#windowRows += rows
    const now = this.#clock.now()
    const elapsed = now - this.#windowStartedAt
    if (elapsed < METRICS_WINDOW_MS) {
      return
    }
    this.#rowsPerSecond = (this.#windowRows * 1000) / elapsed
    this.#windowRows = 0
    this.#windowStartedAt = now
    const metrics = this.metrics
    this.#record('throughput', {
      rowsPerSecond: metrics.rowsPerSecond,
      realTimeFactor: metrics.realTimeFactor,
      totalRows: metrics.totalRows,
    })
    if (metrics.droppedChunks > this.#reportedDrops) {
      this.#record('chunks-dropped', {
        dropped: metrics.droppedChunks - this.#reportedDrops,
        total: metrics.droppedChunks,
      })
      this.#reportedDrops = metrics.droppedChunks
    }
  }

  async run(options: RunOptions = {}): Promise<void> {
    const interval = 1000 / this.config.fps
    const { signal, onFrame, untilDrained = false } = options
    while (!signal?.aborted && !this.#stopped) {
      const started = this.#clock.now()
      const rows = this.tick()
      onFrame?.(rows)
      if (untilDrained && this.#sourceDone() && this.queue.size === 0) {
        break
      }
      const remaining = interval - (this.#clock.now() - started)
      if (remaining > 0) {
        await this.#clock.sleep(remaining)
      }
    }
  }

  #sourceDone(): boolean {
    const { state } = this.source.state
    return state === 'finished' || state === 'error' || state === 'idle'
  }

  exportImage(path?: string | null, view: ViewState = this.view.get()): Promise<ExportOutcome> {
    const target = resolveExportPath(path, 'png')
    const options = {
      ...this.projectionOptions(),
      palette: this.#palettes[view.paletteIndex % this.#palettes.length],
      width: this.config.imageWidth,
      height: this.config.imageHeight,
    }
    return this.#enqueueExport('image', target, () => exportImage(this.history, view, options, target))
  }

  exportMatrix(path?: string | null, mode: MatrixMode = 'raw', view: ViewState = this.view.get()): Promise<ExportOutcome> {
    const target = resolveExportPath(path, 'csv')
    const options = {
      fftSize: this.config.fftSize,
      sampleRate: this.config.sampleRate,
      mode,
      dbFloor: view.dbFloor,
      dbCeiling: view.dbCeiling,
    }
    return this.#enqueueExport('matrix', target, () => exportMatrix(this.history, options, target))
  }

  #enqueueExport(
    kind: ExportResult['kind'],
    path: string,
    task: () => Promise<ExportResult>,
  ): Promise<ExportOutcome> {
    const outcome = this.#exportQueue.then(async (): Promise<ExportOutcome> => {
      try {
        const result = await task()
        this.#record('export-completed', { kind, path, rows: result.rows, bytes: result.bytes, written: result.written })
        void logInfo('Export completed', { kind, path, rows: result.rows, written: result.written })
        return { ok: true, result }
      } catch (error) {
        console.error('[SpectrogramEngine] Export failed', error)
        this.#record('export-failed', { kind, path, error: describeError(error) })
        void logError('Export failed', { kind, path, error: describeError(error) })
        return { ok: false, kind, path, error: describeError(error) }
      }
    })
    this.#exportQueue = outcome.then(() => undefined)
    return outcome
  }

  /** Settles once every export queued so far has finished. */
  async flushExports(): Promise<void> {
    await this.#exportQueue
  }

  /** Stops the source, waits for queued exports, then flushes telemetry. */
  async stop(): Promise<void> {
    if (this.#stopped) {
      return
    }
    this.#stopped = true
    try {
      await this.source.stop()
    } finally {
      await this.#exportQueue
      this.#unsubscribeSource?.()
      this.#unsubscribeSource = null
      await this.#telemetry.flush()
      await logInfo('Engine stopped', { ...this.metrics })
    }
  }

  #record(type: TelemetryEvent['type'], payload: Record<string, unknown>) {
    this.#telemetry.record({ type, payload, timestamp: Date.now() })
  }
}
