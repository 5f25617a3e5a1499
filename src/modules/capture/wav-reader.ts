import { readFile } from 'node:fs/promises'
import { IOFailureError, UnsupportedFormatError } from '../errors/errors'
import { assertSupportedFormat, decodePcm, type PcmFormat, type SampleEncoding } from './pcm'

export interface WaveHeader extends PcmFormat {
  sampleRate: number
  formatTag: number
  frameCount: number
}

export interface DecodedWave {
  header: WaveHeader
  /** Mono samples at the file's native rate. */
  samples: Float32Array
}

const WAVE_FORMAT_PCM = 0x0001
const WAVE_FORMAT_IEEE_FLOAT = 0x0003
const WAVE_FORMAT_EXTENSIBLE = 0xfffe

const readAscii = (view: DataView, offset: number, length: number) => {
  let text = ''
  for (let i = 0; i < length; i += 1) {
    text += String.fromCharCode(view.getUint8(offset + i))
  }
  return text
}

const resolveEncoding = (formatTag: number, bitsPerSample: number): SampleEncoding => {
  if (formatTag === WAVE_FORMAT_IEEE_FLOAT) {
    return 'float'
  }
  if (formatTag === WAVE_FORMAT_PCM) {
    // WAV stores 8-bit PCM unsigned and every wider depth signed.
    return bitsPerSample === 8 ? 'unsigned' : 'signed'
  }
  throw new UnsupportedFormatError(`Unsupported WAV format tag 0x${formatTag.toString(16)}`, { formatTag })
}

/** Parses a RIFF/WAVE byte buffer and decodes its data chunk to mono floats. */
export function parseWave(bytes: Uint8Array): DecodedWave {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  if (bytes.byteLength < 12 || readAscii(view, 0, 4) !== 'RIFF' || readAscii(view, 8, 4) !== 'WAVE') {
    throw new UnsupportedFormatError('Not a RIFF/WAVE file')
  }

  let format: (PcmFormat & { sampleRate: number; formatTag: number }) | null = null
  let data: Uint8Array | null = null
  let offset = 12

  while (offset + 8 <= bytes.byteLength) {
    const id = readAscii(view, offset, 4)
    const size = view.getUint32(offset + 4, true)
    const bodyStart = offset + 8
    const bodyEnd = Math.min(bodyStart + size, bytes.byteLength)

    if (id === 'fmt ') {
      if (size < 16) {
        throw new UnsupportedFormatError('Truncated fmt chunk', { size })
      }
      let formatTag = view.getUint16(bodyStart, true)
      const channels = view.getUint16(bodyStart + 2, true)
      const sampleRate = view.getUint32(bodyStart + 4, true)
      const bitsPerSample = view.getUint16(bodyStart + 14, true)
      if (formatTag === WAVE_FORMAT_EXTENSIBLE) {
        if (size < 40) {
          throw new UnsupportedFormatError('Truncated WAVE_FORMAT_EXTENSIBLE header', { size })
        }
        // The sub-format GUID starts with the effective format tag.
        formatTag = view.getUint16(bodyStart + 24, true)
      }
      format = {
        formatTag,
        channels,
        sampleRate,
        bitsPerSample,
        encoding: resolveEncoding(formatTag, bitsPerSample),
      }
    } else if (id === 'data') {
      data = bytes.subarray(bodyStart, bodyEnd)
    }

    // Chunks are word aligned.
    offset = bodyStart + size + (size % 2)
  }

  if (!format) {
    throw new UnsupportedFormatError('WAV file has no fmt chunk')
  }
  if (!data) {
    throw new UnsupportedFormatError('WAV file has no data chunk')
  }
  if (format.sampleRate <= 0) {
    throw new UnsupportedFormatError('WAV file declares a zero sample rate')
  }
  assertSupportedFormat(format)

  const samples = decodePcm(data, format)
  return {
    header: { ...format, frameCount: samples.length },
    samples,
  }
}

export async function readWaveFile(path: string, options: { timeoutMs: number }): Promise<DecodedWave> {
  let bytes: Buffer
  try {
    bytes = await readFile(path, { signal: AbortSignal.timeout(options.timeoutMs) })
  } catch (error) {
    throw new IOFailureError(path, error)
  }
  return parseWave(bytes)
}
