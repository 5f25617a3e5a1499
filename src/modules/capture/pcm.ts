import { UnsupportedFormatError } from '../errors/errors'

export type SampleEncoding = 'signed' | 'unsigned' | 'float'

export interface PcmFormat {
  encoding: SampleEncoding
  bitsPerSample: number
  channels: number
}

const SUPPORTED: Record<SampleEncoding, number[]> = {
  signed: [8, 16, 24, 32],
  unsigned: [8, 16],
  float: [32, 64],
}

export function assertSupportedFormat(format: PcmFormat): void {
  if (!Number.isInteger(format.channels) || format.channels < 1) {
    throw new UnsupportedFormatError(`Unsupported channel count ${format.channels}`, { ...format })
  }
  if (!SUPPORTED[format.encoding].includes(format.bitsPerSample)) {
    throw new UnsupportedFormatError(
      `Unsupported ${format.encoding} PCM at ${format.bitsPerSample} bits per sample`,
      { ...format },
    )
  }
}

const readSample = (view: DataView, offset: number, encoding: SampleEncoding, bits: number): number => {
  if (encoding === 'float') {
    return bits === 64 ? view.getFloat64(offset, true) : view.getFloat32(offset, true)
  }
  if (encoding === 'unsigned') {
    // Centre on the midpoint first so mid-scale decodes to exactly zero.
    const half = 2 ** (bits - 1)
    const raw = bits === 8 ? view.getUint8(offset) : view.getUint16(offset, true)
    return (raw - half) / half
  }
  switch (bits) {
    case 8:
      return view.getInt8(offset) / 128
    case 16:
      return view.getInt16(offset, true) / 32_768
    case 24: {
      const low = view.getUint16(offset, true)
      const high = view.getInt8(offset + 2)
      return (high * 65_536 + low) / 8_388_608
    }
    default:
      return view.getInt32(offset, true) / 2_147_483_648
  }
}

/**
 * Decodes interleaved little-endian PCM bytes and averages the channels into mono floats.
 * Trailing bytes that do not complete a frame are ignored; use {@link completeFrameBytes}
 * to carry them into the next block.
 */
export function decodePcm(bytes: Uint8Array, format: PcmFormat): Float32Array {
  assertSupportedFormat(format)
  const bytesPerSample = format.bitsPerSample / 8
  const frameBytes = bytesPerSample * format.channels
  const frameCount = Math.floor(bytes.byteLength / frameBytes)
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  const output = new Float32Array(frameCount)

  for (let frame = 0; frame < frameCount; frame += 1) {
    let sum = 0
    const base = frame * frameBytes
    for (let channel = 0; channel < format.channels; channel += 1) {
      sum += readSample(view, base + channel * bytesPerSample, format.encoding, format.bitsPerSample)
    }
    output[frame] = sum / format.channels
  }
  return output
}

export const completeFrameBytes = (byteLength: number, format: PcmFormat): number => {
  const frameBytes = (format.bitsPerSample / 8) * format.channels
  return byteLength - (byteLength % frameBytes)
}

/** Averages interleaved float channels into mono. */
export function downmixInterleaved(samples: Float32Array, channels: number): Float32Array {
  if (channels === 1) {
    return samples.slice()
  }
  const frameCount = Math.floor(samples.length / channels)
  const output = new Float32Array(frameCount)
  for (let frame = 0; frame < frameCount; frame += 1) {
    let sum = 0
    for (let channel = 0; channel < channels; channel += 1) {
      sum += samples[frame * channels + channel]
    }
    output[frame] = sum / channels
  }
  return output
}
