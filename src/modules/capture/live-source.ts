import { CaptureFailedError, DeviceNotFoundError, describeError } from '../errors/errors'
import { logDebug, logError, logInfo, logWarn } from '../logging/logger'
import { completeFrameBytes, decodePcm, type PcmFormat } from './pcm'
import { LinearResampler } from './resampler'
import { BaseSampleSource, type SampleSink } from './source'

export type CaptureSampleFormat = 's16le' | 'u16le' | 'f32le'

export interface CaptureDevice {
  id: string
  name: string
  sampleRate: number
  channels: number
  format: CaptureSampleFormat
  isDefault?: boolean
}

export interface CaptureHandlers {
  onData(bytes: Uint8Array): void
  onError(error: Error): void
  onEnd(): void
}

export interface CaptureStream {
  close(): Promise<void>
}

export interface CaptureBackend<D extends CaptureDevice = CaptureDevice> {
  readonly name: string
  listDevices(): Promise<D[]>
  open(device: D, handlers: CaptureHandlers): Promise<CaptureStream>
}

export interface LiveSourceOptions {
  targetRate: number
  /** Case-insensitive substring of the device name; the backend default when null. */
  device: string | null
  timeoutMs: number
}

const FORMATS: Record<CaptureSampleFormat, Omit<PcmFormat, 'channels'>> = {
  s16le: { encoding: 'signed', bitsPerSample: 16 },
  u16le: { encoding: 'unsigned', bitsPerSample: 16 },
  f32le: { encoding: 'float', bitsPerSample: 32 },
}

export const pcmFormatOf = (device: CaptureDevice): PcmFormat => ({ ...FORMATS[device.format], channels: device.channels })

export function matchDevice<D extends CaptureDevice>(devices: D[], requested: string | null): D {
  if (requested === null) {
    const fallback = devices.find((device) => device.isDefault) ?? devices[0]
    if (!fallback) {
      throw new DeviceNotFoundError('default', [])
    }
    return fallback
  }
  const needle = requested.toLowerCase()
  const match = devices.find((device) => device.name.toLowerCase().includes(needle))
  if (!match) {
    throw new DeviceNotFoundError(
      requested,
      devices.map((device) => device.name),
    )
  }
  return match
}

async function withTimeout<T>(task: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new CaptureFailedError(`${label} timed out after ${timeoutMs} ms`, { timeoutMs }))
    }, timeoutMs)
  })
  try {
    return await Promise.race([task, timeout])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Pulls PCM from a capture backend, converts it to mono at the target rate and offers each
 * block to the sink without ever waiting. A full sink drops the block.
 */
export class LiveSampleSource<D extends CaptureDevice = CaptureDevice> extends BaseSampleSource {
  #backend: CaptureBackend<D>
  #options: LiveSourceOptions
  #stream: CaptureStream | null = null
  #device: D | null = null
  #sink: SampleSink | null = null
  #resampler: LinearResampler | null = null
  #pending: Uint8Array = new Uint8Array(0)
  #seq = 0

  constructor(backend: CaptureBackend<D>, options: LiveSourceOptions) {
    super(options.device ? `Microphone: ${options.device}` : 'Microphone (default)')
    this.#backend = backend
    this.#options = options
  }

  get device(): D | null {
    return this.#device
  }

  async start(sink: SampleSink): Promise<void> {
    if (this.#stream) {
      throw new Error('Capture already running')
    }
    this.setState({ state: 'starting', error: undefined })

    let opening: Promise<CaptureStream> | null = null
    try {
      const devices = await withTimeout(this.#backend.listDevices(), this.#options.timeoutMs, 'Device enumeration')
      await logDebug('Capture devices enumerated', {
        backend: this.#backend.name,
        devices: devices.map((device) => device.name),
      })
      const device = matchDevice(devices, this.#options.device)
      this.#device = device
      this.#sink = sink
      this.#seq = 0
      this.#pending = new Uint8Array(0)
      this.#resampler = new LinearResampler(device.sampleRate, this.#options.targetRate)

      await logInfo('Opening capture device', {
        backend: this.#backend.name,
        device: device.name,
        sampleRate: device.sampleRate,
        channels: device.channels,
        format: device.format,
      })
      opening = this.#backend.open(device, {
        onData: (bytes) => this.#handleData(bytes),
        onError: (error) => this.#handleError(error),
        onEnd: () => this.#handleEnd(),
      })
      const stream = await withTimeout(
        opening,
        this.#options.timeoutMs,
        `Opening '${device.name}'`,
      )
      this.#stream = stream
      this.setState({ state: 'capturing', description: `Microphone: ${device.name}`, nativeRate: device.sampleRate })
    } catch (error) {
      if (opening && !this.#stream) {
        this.#closeWhenOpened(opening)
      }
      this.setState({ state: 'error', error: describeError(error) })
      await logError('Capture start failed', { backend: this.#backend.name, error: describeError(error) })
      throw error
    }
  }

  // An open abandoned by its timeout can still settle later; that stream is closed on arrival.
  #closeWhenOpened(opening: Promise<CaptureStream>) {
    void opening.then(
      async (stream) => {
        try {
          await stream.close()
          await logInfo('Closed capture stream that opened after its timeout', { device: this.#device?.name ?? null })
        } catch (error) {
          console.warn('[LiveSampleSource] close() failed', error)
          await logWarn('Capture close failed', { error: describeError(error) })
        }
      },
      (error: unknown) => logDebug('Abandoned capture open failed', { error: describeError(error) }),
    )
  }

  #handleData(bytes: Uint8Array) {
    const device = this.#device
    const resampler = this.#resampler
    if (!device || !resampler || !this.#sink || this.state.state !== 'capturing') {
      return
    }
    const format = pcmFormatOf(device)
    const joined = new Uint8Array(this.#pending.length + bytes.length)
    joined.set(this.#pending, 0)
    joined.set(bytes, this.#pending.length)
    const usable = completeFrameBytes(joined.length, format)
    this.#pending = joined.slice(usable)

    const mono = decodePcm(joined.subarray(0, usable), format)
    const samples = resampler.process(mono)
    if (samples.length === 0) {
      return
    }
    const accepted = this.#sink.tryPush({ seq: this.#seq, samples })
    this.#seq += 1
    this.setState({
      chunksEmitted: this.state.chunksEmitted + 1,
      droppedChunks: this.state.droppedChunks + (accepted ? 0 : 1),
      lastChunkAt: Date.now(),
    })
  }

  #handleError(error: Error) {
    if (this.state.state === 'stopping' || this.state.state === 'idle') {
      return
    }
    this.setState({ state: 'error', error: error.message })
    void logError('Capture stream error', { device: this.#device?.name ?? null, error: error.message })
  }

  #handleEnd() {
    if (this.state.state !== 'capturing') {
      return
    }
    // Only the capture context ends; the engine keeps the history it already has.
    this.setState({ state: 'error', error: 'Capture device disconnected' })
    void logWarn('Capture stream ended unexpectedly', { device: this.#device?.name ?? null })
  }

  async stop(): Promise<void> {
    const stream = this.#stream
    if (!stream) {
      return
    }
    this.setState({ state: 'stopping' })
    this.#stream = null
    try {
      await stream.close()
    } catch (error) {
      console.warn('[LiveSampleSource] close() failed', error)
      void logWarn('Capture close failed', { error: describeError(error) })
    }
    this.#sink = null
    this.#resampler = null
    this.setState({ state: 'idle' })
    await logInfo('Capture stopped', { device: this.#device?.name ?? null, chunks: this.state.chunksEmitted })
  }
}
