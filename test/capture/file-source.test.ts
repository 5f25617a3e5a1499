import { randomUUID } from 'node:crypto'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'
import { ChunkQueue, type SampleChunk } from '../../src/modules/capture/chunk-queue'
import { FileSampleSource } from '../../src/modules/capture/file-source'
import type { DecodedWave } from '../../src/modules/capture/wav-reader'
import { ManualClock } from '../helpers/audio'

const decodedOf = (length: number, sampleRate: number): DecodedWave => ({
  header: { encoding: 'float', bitsPerSample: 32, channels: 1, sampleRate, formatTag: 3, frameCount: length },
  samples: Float32Array.from({ length }, (_, n) => n),
})

const nextMacrotask = () => new Promise<void>((resolve) => setImmediate(resolve))

describe('FileSampleSource', () => {
  it('emits full blocks then a short final block', async () => {
    const queue = new ChunkQueue(64)
    const source = new FileSampleSource('clip.wav', {
      targetRate: 48_000,
      blockSize: 1_000,
      realtime: false,
      readTimeoutMs: 1_000,
      decoded: decodedOf(2_500, 48_000),
    })
    await source.start(queue)
    await source.finished

    const chunks = queue.drain()
    expect(chunks.map((chunk) => chunk.seq)).toEqual([0, 1, 2])
    expect(chunks.map((chunk) => chunk.samples.length)).toEqual([1_000, 1_000, 500])
    expect(chunks[2].samples[499]).toBe(2_499)
    expect(source.state.state).toBe('finished')
    expect(source.state.nativeRate).toBe(48_000)
    expect(source.describe()).toBe('WAV: clip.wav')
  })

  it('waits for queue space instead of dropping when not real-time', async () => {
    const queue = new ChunkQueue(1)
    const source = new FileSampleSource('clip.wav', {
      targetRate: 8_000,
      blockSize: 100,
      realtime: false,
      readTimeoutMs: 1_000,
      decoded: decodedOf(300, 8_000),
    })
    const received: SampleChunk[] = []
    await source.start(queue)
    while (source.state.state === 'capturing') {
      received.push(...queue.drain())
      await nextMacrotask()
    }
    received.push(...queue.drain())

    expect(received.map((chunk) => chunk.seq)).toEqual([0, 1, 2])
    expect(queue.droppedCount).toBe(0)
  })

  it('paces real-time playback against the clock in sleeps of at most 50 ms', async () => {
    const clock = new ManualClock()
    const queue = new ChunkQueue(64)
    const source = new FileSampleSource('clip.wav', {
      targetRate: 48_000,
      blockSize: 4_800,
      realtime: true,
      readTimeoutMs: 1_000,
      clock,
      decoded: decodedOf(9_600, 48_000),
    })
    await source.start(queue)
    await source.finished

    expect(clock.sleeps).toEqual([50, 50, 50, 50])
    expect(clock.time).toBe(200)
    expect(queue.size).toBe(2)
  })

  it('drops blocks the queue cannot take in real-time mode', async () => {
    const queue = new ChunkQueue(2)
    const source = new FileSampleSource('clip.wav', {
      targetRate: 48_000,
      blockSize: 480,
      realtime: true,
      readTimeoutMs: 1_000,
      clock: new ManualClock(),
      decoded: decodedOf(2_400, 48_000),
    })
    await source.start(queue)
    await source.finished

    expect(queue.droppedCount).toBe(3)
    expect(source.state.droppedChunks).toBe(3)
    expect(source.state.chunksEmitted).toBe(5)
  })

  it('stops while waiting for space', async () => {
    const queue = new ChunkQueue(1)
    const source = new FileSampleSource('clip.wav', {
      targetRate: 8_000,
      blockSize: 100,
      realtime: false,
      readTimeoutMs: 1_000,
      decoded: decodedOf(300, 8_000),
    })
    await source.start(queue)
    await nextMacrotask()
    await source.stop()

    expect(source.state.state).toBe('idle')
    expect(source.state.chunksEmitted).toBe(1)
  })

  it('fails with an I/O error when the file cannot be read', async () => {
    const source = new FileSampleSource(join(tmpdir(), `missing-${randomUUID()}.wav`), {
      targetRate: 48_000,
      blockSize: 1_024,
      realtime: false,
      readTimeoutMs: 1_000,
    })
    await expect(source.start(new ChunkQueue(4))).rejects.toMatchObject({ code: 'IOError' })
    expect(source.state.state).toBe('error')
  })
})
