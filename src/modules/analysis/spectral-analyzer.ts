import FFT from 'fft.js'
import { InvalidConfigError } from '../errors/errors'
import { binCountFor, binSpacingHz, type SpectrogramConfig } from '../settings/config'
import type { AnalysisFrame } from './framer'
import { createWindow, windowSum } from './window'

export const MAGNITUDE_EPSILON = 1e-12
export const POWER_EPSILON = 1e-24

export type AnalyzerConfig = Pick<
  SpectrogramConfig,
  | 'fftSize'
  | 'windowLength'
  | 'sampleRate'
  | 'alpha'
  | 'window'
  | 'dbFloor'
  | 'normalize'
  | 'normalizeRange'
  | 'clampFloor'
  | 'zoom'
>

/** Highest bin index a normalization pass looks at. */
export function normalizationLimit(config: Pick<AnalyzerConfig, 'fftSize' | 'normalizeRange' | 'zoom'>): number {
  const nyquistBin = config.fftSize / 2
  if (config.normalizeRange === 'full') {
    return nyquistBin
  }
  return Math.max(0, Math.min(nyquistBin, Math.floor(nyquistBin / config.zoom)))
}

/**
 * Turns windowed frames into calibrated dB rows. A full-scale sinusoid centred on a bin reads
 * close to 0 dB whatever the window, because the spectrum is scaled by 2 / sum(window).
 */
export class SpectralAnalyzer {
  readonly binCount: number
  readonly binSpacingHz: number
  #config: AnalyzerConfig
  #fft: FFT
  #spectrum: number[]
  #input: number[]
  #scale: number

  constructor(config: AnalyzerConfig) {
    if (config.fftSize < 2 || (config.fftSize & (config.fftSize - 1)) !== 0) {
      throw new InvalidConfigError([`fftSize must be a power of two (got ${config.fftSize})`])
    }
    this.#config = config
    this.#fft = new FFT(config.fftSize)
    this.#spectrum = this.#fft.createComplexArray()
    this.#input = new Array<number>(config.fftSize).fill(0)
    this.#scale = 2 / windowSum(createWindow(config.window, config.windowLength))
    this.binCount = binCountFor(config)
    this.binSpacingHz = binSpacingHz(config)
  }

  analyze(frame: AnalysisFrame): Float32Array {
    const { fftSize, alpha } = this.#config
    if (frame.samples.length !== fftSize) {
      throw new InvalidConfigError([`frame holds ${frame.samples.length} samples, expected ${fftSize}`])
    }
    for (let n = 0; n < fftSize; n += 1) {
      this.#input[n] = frame.samples[n]
    }
    this.#fft.realTransform(this.#spectrum, this.#input)
    this.#fft.completeSpectrum(this.#spectrum)

    const row = new Float32Array(this.binCount)
    for (let bin = 0; bin < this.binCount; bin += 1) {
      const re = this.#spectrum[2 * bin] * this.#scale
      const im = this.#spectrum[2 * bin + 1] * this.#scale
      const power = re * re + im * im
      row[bin] =
        alpha === 2
          ? 10 * Math.log10(Math.max(power, POWER_EPSILON))
          : 20 * Math.log10(Math.max(Math.sqrt(power), MAGNITUDE_EPSILON))
    }
    this.#postProcess(row)
    return row
  }

  #postProcess(row: Float32Array) {
    const { normalize, clampFloor, dbFloor } = this.#config
    if (normalize) {
      const limit = normalizationLimit(this.#config)
      let peak = -Infinity
      for (let bin = 0; bin <= limit; bin += 1) {
        if (row[bin] > peak) peak = row[bin]
      }
      for (let bin = 0; bin < row.length; bin += 1) {
        row[bin] -= peak
      }
    }
    if (clampFloor) {
      for (let bin = 0; bin < row.length; bin += 1) {
        if (row[bin] < dbFloor) row[bin] = dbFloor
      }
    }
  }
}
