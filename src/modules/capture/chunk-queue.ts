import { InvalidConfigError } from '../errors/errors'

export interface SampleChunk {
  seq: number
  samples: Float32Array
}

/**
 * Bounded single-producer/single-consumer queue between a capture context and the processing
 * tick. `tryPush` never waits: when the queue is full the incoming (newest) item is discarded and
 * counted.
 */
export class ChunkQueue<T = SampleChunk> {
  readonly capacity: number
  #items: T[] = []
  #dropped = 0
  #accepted = 0
  #waiters: Array<() => void> = []

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new InvalidConfigError([`queue capacity must be a positive integer (got ${capacity})`])
    }
    this.capacity = capacity
  }

  get size(): number {
    return this.#items.length
  }

  /** Chunks discarded because the queue was full. Never decreases. */
  get droppedCount(): number {
    return this.#dropped
  }

  get acceptedCount(): number {
    return this.#accepted
  }

  tryPush(item: T): boolean {
    if (this.#items.length >= this.capacity) {
      this.#dropped += 1
      return false
    }
    this.#items.push(item)
    this.#accepted += 1
    return true
  }

  /** Removes and returns everything currently queued, oldest first. */
  drain(): T[] {
    if (this.#items.length === 0) {
      return []
    }
    const drained = this.#items
    this.#items = []
    this.#releaseWaiters()
    return drained
  }

  /** Resolves once there is room for at least one item. Only for producers that may wait. */
  whenWritable(): Promise<void> {
    if (this.#items.length < this.capacity) {
      return Promise.resolve()
    }
    return new Promise<void>((resolve) => {
      this.#waiters.push(resolve)
    })
  }

  /** Wakes any waiting producer without freeing space, e.g. during shutdown. */
  releaseWaiters(): void {
    this.#releaseWaiters()
  }

  #releaseWaiters() {
    const waiters = this.#waiters
    this.#waiters = []
    waiters.forEach((resolve) => resolve())
  }
}
