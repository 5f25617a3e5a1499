import { IndexOutOfRangeError, InvalidConfigError } from '../errors/errors'

/**
 * One stored row. `values` is the history's own buffer and is shared with every reader;
 * readers must not write to it. Copy it (or use {@link SpectrogramHistory.toMatrix}) first.
 */
export interface SpectralRow {
  readonly index: number
  readonly values: Float32Array
}

/** Rows visible to a reader. Appends after the snapshot was taken are not part of it. */
export interface HistorySnapshot {
  readonly length: number
  readonly binCount: number
}

export interface HistoryReader {
  snapshot(): HistorySnapshot
  rowAt(index: number): SpectralRow
  rowsInRange(snapshot: HistorySnapshot, start: number, end: number): Iterable<SpectralRow>
  latest(count: number, snapshot?: HistorySnapshot): SpectralRow[]
}

/** Append-only spectral history. Rows are never evicted, reordered or modified. */
export class SpectrogramHistory implements HistoryReader {
  #rows: SpectralRow[] = []
  #binCount: number | null

  constructor(binCount: number | null = null) {
    this.#binCount = binCount
  }

  get length(): number {
    return this.#rows.length
  }

  get binCount(): number {
    return this.#binCount ?? 0
  }

  append(values: Float32Array): SpectralRow {
    if (this.#binCount === null) {
      this.#binCount = values.length
    } else if (values.length !== this.#binCount) {
      throw new InvalidConfigError([`row has ${values.length} bins, history holds ${this.#binCount}`])
    }
    // Stored as a copy so the producer's buffer can be reused.
    const row = Object.freeze({ index: this.#rows.length, values: values.slice() })
    this.#rows.push(row)
    return row
  }

  snapshot(): HistorySnapshot {
    return Object.freeze({ length: this.#rows.length, binCount: this.binCount })
  }

  rowAt(index: number): SpectralRow {
    if (!Number.isInteger(index) || index < 0 || index >= this.#rows.length) {
      throw new IndexOutOfRangeError(index, this.#rows.length)
    }
    return this.#rows[index]
  }

  *rowsInRange(snapshot: HistorySnapshot, start: number, end: number): Generator<SpectralRow> {
    const stop = Math.min(end, snapshot.length)
    for (let index = Math.max(0, start); index < stop; index += 1) {
      yield this.#rows[index]
    }
  }

  latest(count: number, snapshot: HistorySnapshot = this.snapshot()): SpectralRow[] {
    const start = Math.max(0, snapshot.length - Math.max(0, count))
    return this.#rows.slice(start, snapshot.length)
  }

  /** Copies every row of the snapshot, oldest first. */
  toMatrix(snapshot: HistorySnapshot = this.snapshot()): Float32Array[] {
    return this.#rows.slice(0, snapshot.length).map((row) => row.values.slice())
  }
}
