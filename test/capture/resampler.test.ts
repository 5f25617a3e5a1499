import { describe, expect, it } from 'vitest'
import { LinearResampler } from '../../src/modules/capture/resampler'
import { InvalidConfigError } from '../../src/modules/errors/errors'
import { sine } from '../helpers/audio'

const feedInPieces = (resampler: LinearResampler, input: Float32Array, cuts: number[]): number[] => {
  const output: number[] = []
  let start = 0
  for (const end of [...cuts, input.length]) {
    output.push(...resampler.process(input.subarray(start, end)))
    start = end
  }
  return output
}

describe('LinearResampler', () => {
  it('copies samples through when the rates match', () => {
    const resampler = new LinearResampler(48_000, 48_000)
    const input = Float32Array.of(0.1, 0.2, 0.3)
    const output = resampler.process(input)
    expect(resampler.passthrough).toBe(true)
    expect(output).not.toBe(input)
    expect(Array.from(output)).toEqual(Array.from(input))
  })

  it('interpolates between neighbours when upsampling', () => {
    const ramp = Float32Array.from({ length: 100 }, (_, n) => n)
    const output = new LinearResampler(24_000, 48_000).process(ramp)
    expect(output.length).toBe(198)
    expect(output[1]).toBe(0.5)
    expect(output[197]).toBe(98.5)
  })

  it('produces identical output however the input is split', () => {
    const input = sine(440, 24_000, 500)
    const whole = Array.from(new LinearResampler(24_000, 16_000).process(input))
    const pieces = feedInPieces(new LinearResampler(24_000, 16_000), input, [1, 37, 38, 250, 499])
    expect(pieces).toEqual(whole)
  })

  it('stays continuous across chunks for non-binary ratios', () => {
    const input = sine(1_000, 44_100, 2_000)
    const whole = new LinearResampler(44_100, 48_000).process(input)
    const pieces = feedInPieces(new LinearResampler(44_100, 48_000), input, [512, 1024, 1536])
    expect(pieces.length).toBe(whole.length)
    const worst = pieces.reduce((max, value, index) => Math.max(max, Math.abs(value - whole[index])), 0)
    expect(worst).toBeLessThan(1e-6)
  })

  it('rejects non-positive rates', () => {
    expect(() => new LinearResampler(0, 48_000)).toThrow(InvalidConfigError)
  })
})
