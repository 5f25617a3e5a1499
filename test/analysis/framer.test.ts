import { describe, expect, it } from 'vitest'
import { Framer, type FramerConfig } from '../../src/modules/analysis/framer'
import { createWindow, windowSum } from '../../src/modules/analysis/window'
import { InvalidConfigError } from '../../src/modules/errors/errors'

const base: FramerConfig = { fftSize: 8, windowLength: 8, hop: 4, window: 'hann', preEmphasis: null }
const ramp = (length: number, from = 0) => Float32Array.from({ length }, (_, n) => from + n)

describe('createWindow', () => {
  it('builds periodic windows', () => {
    const hann = createWindow('hann', 8)
    expect(hann[0]).toBe(0)
    expect(hann[4]).toBe(1)
    expect(hann[2]).toBeCloseTo(0.5, 6)
    expect(windowSum(hann)).toBeCloseTo(4, 5)
  })

  it('keeps the hamming and blackman end points', () => {
    expect(createWindow('hamming', 16)[0]).toBeCloseTo(0.08, 6)
    expect(createWindow('blackman', 16)[0]).toBeCloseTo(0, 6)
    expect(createWindow('blackman', 16)[8]).toBeCloseTo(1, 6)
  })
})

describe('Framer', () => {
  it('emits a frame every hop once a full window is buffered', () => {
    const framer = new Framer(base)
    framer.push(ramp(20))
    const frames = [...framer.frames()]
    expect(frames.map((frame) => frame.startSample)).toEqual([0, 4, 8, 12])
    expect(frames.map((frame) => frame.index)).toEqual([0, 1, 2, 3])
    expect(framer.pending).toBe(4)
  })

  it('frames the same positions when samples arrive in small pieces', () => {
    const framer = new Framer(base)
    const starts: number[] = []
    let from = 0
    for (const size of [8, 3, 1, 4]) {
      framer.push(ramp(size, from))
      from += size
      for (const frame of framer.frames()) starts.push(frame.startSample)
    }
    expect(starts).toEqual([0, 4, 8])
  })

  it('multiplies by the window and zero-pads to the FFT size', () => {
    const framer = new Framer({ ...base, fftSize: 16 })
    framer.push(ramp(12))
    const [first, second] = [...framer.frames()]
    expect(first.samples.length).toBe(16)
    expect(first.samples[4]).toBeCloseTo(4, 6)
    expect(first.samples[2]).toBeCloseTo(1, 6)
    expect(second.samples[4]).toBeCloseTo(8, 6)
    expect(second.samples[2]).toBeCloseTo(3, 6)
    expect(Array.from(first.samples.subarray(8))).toEqual(new Array(8).fill(0))
  })

  it('carries the pre-emphasis filter state across pushes', () => {
    const framer = new Framer({ ...base, preEmphasis: 0.5 })
    framer.push(Float32Array.of(1, 1, 1))
    framer.push(Float32Array.of(1, 1, 1, 1, 1))
    const [frame] = [...framer.frames()]
    expect(frame.samples[0]).toBe(0)
    expect(frame.samples[4]).toBeCloseTo(0.5, 6)
  })

  it('starts over after reset', () => {
    const framer = new Framer(base)
    framer.push(ramp(12))
    expect([...framer.frames()]).toHaveLength(2)
    framer.reset()
    framer.push(ramp(8))
    const frames = [...framer.frames()]
    expect(frames.map((frame) => [frame.index, frame.startSample])).toEqual([[0, 0]])
  })

  it('rejects impossible hop and window sizes', () => {
    expect(() => new Framer({ ...base, hop: 0 })).toThrow(InvalidConfigError)
    expect(() => new Framer({ ...base, windowLength: 16 })).toThrow(InvalidConfigError)
    expect(() => new Framer({ ...base, hop: 9 })).toThrow(InvalidConfigError)
  })
})
