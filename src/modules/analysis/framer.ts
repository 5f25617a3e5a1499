import { InvalidConfigError } from '../errors/errors'
import type { SpectrogramConfig } from '../settings/config'
import { createWindow } from './window'

export interface AnalysisFrame {
  index: number
  /** Position of the frame's first sample in the stream pushed so far. */
  startSample: number
  /** `windowLength` windowed samples followed by zeros up to `fftSize`. */
  samples: Float32Array
}

export type FramerConfig = Pick<SpectrogramConfig, 'fftSize' | 'windowLength' | 'hop' | 'window' | 'preEmphasis'>

/**
 * Cuts a sample stream into overlapping windowed frames. Consecutive frames share
 * `windowLength - hop` input samples.
 */
export class Framer {
  readonly window: Float32Array
  #config: FramerConfig
  #buffer: Float32Array
  #length = 0
  #readOffset = 0
  #consumedBefore = 0
  #nextIndex = 0
  #previousSample = 0

  constructor(config: FramerConfig) {
    if (config.windowLength > config.fftSize || config.hop < 1 || config.hop > config.windowLength) {
      throw new InvalidConfigError([
        `framer needs 1 <= hop <= windowLength <= fftSize (got ${config.hop}, ${config.windowLength}, ${config.fftSize})`,
      ])
    }
    this.#config = config
    this.window = createWindow(config.window, config.windowLength)
    this.#buffer = new Float32Array(config.windowLength * 2)
  }

  /** Samples buffered but not yet covered by an emitted frame's hop. */
  get pending(): number {
    return this.#length - this.#readOffset
  }

  push(samples: Float32Array): void {
    this.#ensureCapacity(samples.length)
    const beta = this.#config.preEmphasis
    let write = this.#length
    if (beta === null) {
      this.#buffer.set(samples, write)
      write += samples.length
    } else {
      let previous = this.#previousSample
      for (const sample of samples) {
        this.#buffer[write] = sample - beta * previous
        previous = sample
        write += 1
      }
      this.#previousSample = previous
    }
    this.#length = write
  }

  *frames(): Generator<AnalysisFrame> {
    const { windowLength, fftSize, hop } = this.#config
    while (this.#length - this.#readOffset >= windowLength) {
      const samples = new Float32Array(fftSize)
      const start = this.#readOffset
      for (let n = 0; n < windowLength; n += 1) {
        samples[n] = this.#buffer[start + n] * this.window[n]
      }
      const frame: AnalysisFrame = {
        index: this.#nextIndex,
        startSample: this.#consumedBefore + start,
        samples,
      }
      this.#nextIndex += 1
      this.#readOffset += hop
      yield frame
    }
  }

  reset(): void {
    this.#length = 0
    this.#readOffset = 0
    this.#consumedBefore = 0
    this.#nextIndex = 0
    this.#previousSample = 0
  }

  #ensureCapacity(incoming: number) {
    // Compact first: drop samples no future frame can reach.
    if (this.#readOffset > 0) {
      this.#buffer.copyWithin(0, this.#readOffset, this.#length)
      this.#length -= this.#readOffset
      this.#consumedBefore += this.#readOffset
      this.#readOffset = 0
    }
    const needed = this.#length + incoming
    if (needed > this.#buffer.length) {
      let capacity = this.#buffer.length
      while (capacity < needed) capacity *= 2
      const grown = new Float32Array(capacity)
      grown.set(this.#buffer.subarray(0, this.#length))
      this.#buffer = grown
    }
  }
}
