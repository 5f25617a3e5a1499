import { setImmediate as yieldToLoop, setTimeout as delay } from 'node:timers/promises'
import { basename } from 'node:path'
import { describeError } from '../errors/errors'
import { logError, logInfo } from '../logging/logger'
import { LinearResampler } from './resampler'
import { BaseSampleSource, type SampleSink } from './source'
import { readWaveFile, type DecodedWave } from './wav-reader'

export interface PacingClock {
  now(): number
  sleep(ms: number): Promise<void>
}

export const systemClock: PacingClock = {
  now: () => performance.now(),
  sleep: async (ms) => {
    await delay(ms)
  },
}

export interface FileSourceOptions {
  targetRate: number
  blockSize: number
  realtime: boolean
  readTimeoutMs: number
  clock?: PacingClock
  /** Pre-decoded audio; skips reading `path`. */
  decoded?: DecodedWave
}

/** Longest single pacing sleep, so one late wake-up never stalls the stream. */
export const MAX_PACING_SLEEP_MS = 50

export class FileSampleSource extends BaseSampleSource {
  #path: string
  #options: FileSourceOptions
  #clock: PacingClock
  #stopRequested = false
  #sink: SampleSink | null = null
  #loop: Promise<void> | null = null

  constructor(path: string, options: FileSourceOptions) {
    super(`WAV: ${basename(path)}`)
    this.#path = path
    this.#options = options
    this.#clock = options.clock ?? systemClock
  }

  /** Resolves when every block has been emitted, or the source was stopped. */
  get finished(): Promise<void> {
    return this.#loop ?? Promise.resolve()
  }

  async start(sink: SampleSink): Promise<void> {
    if (this.#loop) {
      throw new Error('File source already started')
    }
    this.setState({ state: 'starting', error: undefined })

    let decoded: DecodedWave
    try {
      decoded = this.#options.decoded ?? (await readWaveFile(this.#path, { timeoutMs: this.#options.readTimeoutMs }))
    } catch (error) {
      this.setState({ state: 'error', error: describeError(error) })
      await logError('WAV decode failed', { path: this.#path, error: describeError(error) })
      throw error
    }

    const { header } = decoded
    await logInfo('WAV opened', {
      path: this.#path,
      sampleRate: header.sampleRate,
      channels: header.channels,
      bitsPerSample: header.bitsPerSample,
      encoding: header.encoding,
      frames: header.frameCount,
      realtime: this.#options.realtime,
    })

    const resampler = new LinearResampler(header.sampleRate, this.#options.targetRate)
    const samples = resampler.process(decoded.samples)

    this.#sink = sink
    this.#stopRequested = false
    this.setState({ state: 'capturing', nativeRate: header.sampleRate })
    this.#loop = this.#emit(samples, sink).catch((error) => {
      this.setState({ state: 'error', error: describeError(error) })
      void logError('WAV emit loop failed', { path: this.#path, error: describeError(error) })
    })
  }

  async #emit(samples: Float32Array, sink: SampleSink): Promise<void> {
    const { blockSize, realtime, targetRate } = this.#options
    const started = this.#clock.now()
    let emitted = 0
    let seq = 0

    for (let offset = 0; offset < samples.length; offset += blockSize) {
      if (this.#stopRequested) break
      const block = samples.slice(offset, Math.min(offset + blockSize, samples.length))

      let accepted: boolean
      if (realtime) {
        accepted = sink.tryPush({ seq, samples: block })
      } else {
        await sink.whenWritable()
        if (this.#stopRequested) break
        accepted = sink.tryPush({ seq, samples: block })
      }
      seq += 1
      emitted += block.length
      this.setState({
        chunksEmitted: this.state.chunksEmitted + 1,
        droppedChunks: this.state.droppedChunks + (accepted ? 0 : 1),
        lastChunkAt: Date.now(),
      })

      if (realtime) {
        const targetMs = (emitted / targetRate) * 1000
        let behindMs = targetMs - (this.#clock.now() - started)
        while (behindMs > 0 && !this.#stopRequested) {
          await this.#clock.sleep(Math.min(behindMs, MAX_PACING_SLEEP_MS))
          behindMs = targetMs - (this.#clock.now() - started)
        }
      } else if (seq % 16 === 0) {
        await yieldToLoop()
      }
    }

    if (this.state.state === 'capturing') {
      this.setState({ state: 'finished' })
      await logInfo('WAV fully emitted', { path: this.#path, chunks: seq, samples: emitted })
    }
  }

  async stop(): Promise<void> {
    if (!this.#loop) {
      return
    }
    this.#stopRequested = true
    if (this.state.state === 'finished' || this.state.state === 'error') {
      await this.#loop
      return
    }
    this.setState({ state: 'stopping' })
    this.#sink?.releaseWaiters?.()
    await this.#loop
    this.setState({ state: 'idle' })
  }
}
