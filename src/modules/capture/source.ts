import type { SampleChunk } from './chunk-queue'

export type SourceState = 'idle' | 'starting' | 'capturing' | 'stopping' | 'finished' | 'error'

export interface SourceStateSnapshot {
  state: SourceState
  description: string
  nativeRate: number | null
  chunksEmitted: number
  droppedChunks: number
  lastChunkAt: number | null
  error?: string
}

/** The producer-facing half of a {@link ChunkQueue}. */
export interface SampleSink {
  tryPush(chunk: SampleChunk): boolean
  whenWritable(): Promise<void>
  releaseWaiters?(): void
}

export interface SampleSource {
  readonly state: SourceStateSnapshot
  describe(): string
  start(sink: SampleSink): Promise<void>
  stop(): Promise<void>
  subscribe(listener: (state: SourceStateSnapshot) => void): () => void
}

export abstract class BaseSampleSource implements SampleSource {
  #listeners = new Set<(state: SourceStateSnapshot) => void>()
  #state: SourceStateSnapshot

  protected constructor(description: string) {
    this.#state = {
      state: 'idle',
      description,
      nativeRate: null,
      chunksEmitted: 0,
      droppedChunks: 0,
      lastChunkAt: null,
    }
  }

  get state(): SourceStateSnapshot {
    return this.#state
  }

  describe(): string {
    return this.#state.description
  }

  protected setState(patch: Partial<SourceStateSnapshot>): void {
    this.#state = { ...this.#state, ...patch }
    this.#listeners.forEach((listener) => listener(this.#state))
  }

  subscribe(listener: (state: SourceStateSnapshot) => void): () => void {
    this.#listeners.add(listener)
    listener(this.#state)
    return () => this.#listeners.delete(listener)
  }

  abstract start(sink: SampleSink): Promise<void>
  abstract stop(): Promise<void>
}
