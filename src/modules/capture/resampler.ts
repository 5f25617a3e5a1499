import { InvalidConfigError } from '../errors/errors'

/**
 * Streaming linear-interpolation resampler. The fractional read position and the last
 * unconsumed source sample carry over between calls, so feeding a signal in pieces yields the
 * same output as feeding it whole.
 *
 * There is no anti-aliasing filter: content above the target Nyquist folds back when
 * downsampling. Acceptable for the modest rate changes a capture device needs.
 */
export class LinearResampler {
  readonly inputRate: number
  readonly outputRate: number
  readonly passthrough: boolean
  #step: number
  #carry: Float32Array = new Float32Array(0)
  #position = 0

  constructor(inputRate: number, outputRate: number) {
    if (!(inputRate > 0) || !(outputRate > 0)) {
      throw new InvalidConfigError([`sample rates must be positive (got ${inputRate} -> ${outputRate})`])
    }
    this.inputRate = inputRate
    this.outputRate = outputRate
    this.passthrough = inputRate === outputRate
    this.#step = inputRate / outputRate
  }

  process(input: Float32Array): Float32Array {
    if (this.passthrough) {
      return input.slice()
    }

    const source = new Float32Array(this.#carry.length + input.length)
    source.set(this.#carry, 0)
    source.set(input, this.#carry.length)

    const output: number[] = []
    let position = this.#position
    while (position + 1 < source.length) {
      const index = Math.floor(position)
      const fraction = position - index
      output.push(source[index] * (1 - fraction) + source[index + 1] * fraction)
      position += this.#step
    }

    const consumed = Math.min(Math.floor(position), Math.max(0, source.length - 1))
    this.#carry = source.slice(consumed)
    this.#position = position - consumed
    return Float32Array.from(output)
  }

  reset(): void {
    this.#carry = new Float32Array(0)
    this.#position = 0
  }
}
