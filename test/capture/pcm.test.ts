import { describe, expect, it } from 'vitest'
import { isSpectrogramError } from '../../src/modules/errors/errors'
import { completeFrameBytes, decodePcm, downmixInterleaved } from '../../src/modules/capture/pcm'
import { encodeF32, encodeS16 } from '../helpers/audio'

describe('decodePcm', () => {
  it('decodes 8-bit unsigned mid-scale to exact silence', () => {
    const samples = decodePcm(Uint8Array.of(128, 128, 128, 128), { encoding: 'unsigned', bitsPerSample: 8, channels: 1 })
    expect(Array.from(samples)).toEqual([0, 0, 0, 0])
  })

  it('maps the 8-bit unsigned extremes without bias', () => {
    const samples = decodePcm(Uint8Array.of(0, 255), { encoding: 'unsigned', bitsPerSample: 8, channels: 1 })
    expect(Array.from(samples)).toEqual([-1, 127 / 128])
  })

  it('scales signed 16-bit by 2^15', () => {
    const samples = decodePcm(encodeS16([-32_768, 16_384, 0]), { encoding: 'signed', bitsPerSample: 16, channels: 1 })
    expect(Array.from(samples)).toEqual([-1, 0.5, 0])
  })

  it('sign-extends 24-bit samples', () => {
    const bytes = Uint8Array.of(0x00, 0x00, 0x40, 0x00, 0x00, 0xc0)
    const samples = decodePcm(bytes, { encoding: 'signed', bitsPerSample: 24, channels: 1 })
    expect(Array.from(samples)).toEqual([0.5, -0.5])
  })

  it('averages interleaved channels into mono', () => {
    const samples = decodePcm(encodeS16([16_384, 0, 16_384, 16_384]), {
      encoding: 'signed',
      bitsPerSample: 16,
      channels: 2,
    })
    expect(Array.from(samples)).toEqual([0.25, 0.5])
  })

  it('reads 32-bit floats as-is', () => {
    const samples = decodePcm(encodeF32([0.25, -0.75]), { encoding: 'float', bitsPerSample: 32, channels: 1 })
    expect(Array.from(samples)).toEqual([0.25, -0.75])
  })

  it('ignores a trailing partial frame', () => {
    const bytes = Uint8Array.of(0x00, 0x40, 0x00)
    const samples = decodePcm(bytes, { encoding: 'signed', bitsPerSample: 16, channels: 1 })
    expect(Array.from(samples)).toEqual([0.5])
  })

  it('rejects bit depths it cannot decode', () => {
    let caught: unknown
    try {
      decodePcm(new Uint8Array(4), { encoding: 'signed', bitsPerSample: 12, channels: 1 })
    } catch (error) {
      caught = error
    }
    expect(isSpectrogramError(caught, 'UnsupportedFormat')).toBe(true)
  })
})

describe('frame helpers', () => {
  it('rounds a byte count down to whole frames', () => {
    expect(completeFrameBytes(7, { encoding: 'signed', bitsPerSample: 16, channels: 2 })).toBe(4)
    expect(completeFrameBytes(8, { encoding: 'signed', bitsPerSample: 16, channels: 2 })).toBe(8)
  })

  it('downmixes interleaved floats', () => {
    expect(Array.from(downmixInterleaved(Float32Array.of(1, 0, 0.5, 0.5), 2))).toEqual([0.5, 0.5])
  })
})
