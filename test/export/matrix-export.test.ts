import { randomUUID } from 'node:crypto'
import { readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, expect, it } from 'vitest'
import { UnsupportedFormatError } from '../../src/modules/errors/errors'
import { exportMatrix, formatMatrix, parseMatrix } from '../../src/modules/export/matrix-export'
import { SpectrogramHistory } from '../../src/modules/storage/history'

const axis = { fftSize: 8, sampleRate: 8_000 }

const sampleHistory = () => {
  const history = new SpectrogramHistory(5)
  history.append(Float32Array.of(-12.5, -3.25, 0, -80, -0.1))
  history.append(Float32Array.of(-1, -2, -3, -4, -5))
  return history
}

describe('formatMatrix', () => {
  it('writes bin centre frequencies then one line per row in full precision', () => {
    const lines = formatMatrix(sampleHistory(), axis).split('\n')
    expect(lines[0]).toBe('row,0,1000,2000,3000,4000')
    expect(lines[1]).toBe('0,-12.5,-3.25,0,-80,-0.10000000149011612')
    expect(lines[2]).toBe('1,-1,-2,-3,-4,-5')
    expect(lines[3]).toBe('')
    expect(lines).toHaveLength(4)
  })

  it('writes display intensities under the floor and ceiling', () => {
    const [, first] = formatMatrix(sampleHistory(), { ...axis, mode: 'display' }).split('\n')
    expect(first.split(',').slice(0, 5)).toEqual(['0', '0.84375', '0.959375', '1', '0'])
  })

  it('rounds to fixed decimals when asked', () => {
    const [, first] = formatMatrix(sampleHistory(), { ...axis, precision: 2 }).split('\n')
    expect(first).toBe('0,-12.50,-3.25,0.00,-80.00,-0.10')
  })

  it('uses the configured delimiter', () => {
    const [header] = formatMatrix(sampleHistory(), { ...axis, delimiter: '\t' }).split('\n')
    expect(header).toBe('row\t0\t1000\t2000\t3000\t4000')
  })

  it('writes only the header for an empty history', () => {
    expect(formatMatrix(new SpectrogramHistory(5), axis)).toBe('row,0,1000,2000,3000,4000\n')
  })
})

describe('parseMatrix', () => {
  it('reads back what formatMatrix wrote', () => {
    const parsed = parseMatrix(formatMatrix(sampleHistory(), axis))
    expect(parsed.frequencies).toEqual([0, 1000, 2000, 3000, 4000])
    expect(parsed.rows.map((row) => row.index)).toEqual([0, 1])
    expect(parsed.rows[0].values).toEqual(Float32Array.of(-12.5, -3.25, 0, -80, -0.1))
  })

  it('rejects lines whose field count differs from the header', () => {
    expect(() => parseMatrix('row,0,1\n0,1\n')).toThrow('Matrix line 2 has 2 fields, header has 3')
  })

  it('rejects fields that are not numbers', () => {
    expect(() => parseMatrix('row,0\n0,abc\n')).toThrow(UnsupportedFormatError)
    expect(() => parseMatrix('bin,0\n')).toThrow("Matrix header must start with 'row' (got 'bin')")
  })
})

describe('exportMatrix', () => {
  const directory = join(tmpdir(), `sgram-matrix-${randomUUID()}`)

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  it('writes the formatted text and reports its size', async () => {
    const path = join(directory, 'rows.csv')
    const result = await exportMatrix(sampleHistory(), axis, path)
    const text = await readFile(path, 'utf8')
    expect(text).toBe(formatMatrix(sampleHistory(), axis))
    expect(result).toEqual({ kind: 'matrix', path, written: true, rows: 2, bytes: Buffer.byteLength(text) })
  })
})
