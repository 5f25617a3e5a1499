import { describe, expect, it } from 'vitest'
import { ChunkQueue } from '../../src/modules/capture/chunk-queue'
import { InvalidConfigError } from '../../src/modules/errors/errors'

const chunk = (seq: number) => ({ seq, samples: new Float32Array(4) })

describe('ChunkQueue', () => {
  it('drops the newest chunk when full and counts it', () => {
    const queue = new ChunkQueue(2)
    expect(queue.tryPush(chunk(0))).toBe(true)
    expect(queue.tryPush(chunk(1))).toBe(true)
    expect(queue.tryPush(chunk(2))).toBe(false)

    expect(queue.droppedCount).toBe(1)
    expect(queue.acceptedCount).toBe(2)
    expect(queue.drain().map((item) => item.seq)).toEqual([0, 1])
    expect(queue.size).toBe(0)
  })

  it('never lowers the drop count', () => {
    const queue = new ChunkQueue(3)
    const observed: number[] = []
    for (let round = 0; round < 6; round += 1) {
      for (let seq = 0; seq < round + 2; seq += 1) {
        queue.tryPush(chunk(seq))
        observed.push(queue.droppedCount)
      }
      if (round % 2 === 0) queue.drain()
      observed.push(queue.droppedCount)
    }
    expect(observed.every((count, index) => index === 0 || count >= observed[index - 1])).toBe(true)
    expect(queue.droppedCount).toBe(16)
    expect(queue.acceptedCount).toBe(11)
  })

  it('wakes a waiting producer once the consumer drains', async () => {
    const queue = new ChunkQueue(1)
    queue.tryPush(chunk(0))
    let writable = false
    const waiting = queue.whenWritable().then(() => {
      writable = true
    })
    await Promise.resolve()
    expect(writable).toBe(false)

    queue.drain()
    await waiting
    expect(writable).toBe(true)
  })

  it('resolves immediately while there is room', async () => {
    await expect(new ChunkQueue(1).whenWritable()).resolves.toBeUndefined()
  })

  it('rejects a capacity below one', () => {
    expect(() => new ChunkQueue(0)).toThrow(InvalidConfigError)
  })
})
