import type { Aggregation, FreqScale } from '../settings/config'

export interface AxisContext {
  fftSize: number
  sampleRate: number
}

export const MIN_WARPED_FREQUENCY_HZ = 20

export const hzToMel = (hz: number): number => 2595 * Math.log10(1 + hz / 700)
export const melToHz = (mel: number): number => 700 * (10 ** (mel / 2595) - 1)

interface FrequencySpan {
  min: number
  max: number
}

const spanFor = (zoom: number, ctx: AxisContext): FrequencySpan => {
  const max = ctx.sampleRate / 2 / zoom
  return { min: Math.min(MIN_WARPED_FREQUENCY_HZ, max / 2), max }
}

const clampUnit = (value: number) => Math.min(1, Math.max(0, value))

/** Warped position of a bin before clamping; values above 1 lie beyond the zoomed range. */
function rawPosition(bin: number, zoom: number, scale: FreqScale, ctx: AxisContext): number {
  const nyquistBin = ctx.fftSize / 2
  if (scale === 'linear') {
    return (bin / nyquistBin) * zoom
  }
  const span = spanFor(zoom, ctx)
  const frequency = Math.max((bin * ctx.sampleRate) / ctx.fftSize, span.min)
  if (scale === 'log') {
    return Math.log(frequency / span.min) / Math.log(span.max / span.min)
  }
  const melMin = hzToMel(span.min)
  return (hzToMel(frequency) - melMin) / (hzToMel(span.max) - melMin)
}

export const binToPosition = (bin: number, zoom: number, scale: FreqScale, ctx: AxisContext): number =>
  clampUnit(rawPosition(bin, zoom, scale, ctx))

export function positionToFrequency(position: number, zoom: number, scale: FreqScale, ctx: AxisContext): number {
  const p = clampUnit(position)
  const span = spanFor(zoom, ctx)
  switch (scale) {
    case 'linear':
      return p * span.max
    case 'log':
      return span.min * (span.max / span.min) ** p
    case 'mel': {
      const melMin = hzToMel(span.min)
      return melToHz(melMin + p * (hzToMel(span.max) - melMin))
    }
  }
}

/** Continuous (fractional) bin index at a display position. */
export const positionToBin = (position: number, zoom: number, scale: FreqScale, ctx: AxisContext): number =>
  (positionToFrequency(position, zoom, scale, ctx) * ctx.fftSize) / ctx.sampleRate

/** Unclamped positions of bins 0..N/2, for repeated span lookups under one view. */
export function binPositions(zoom: number, scale: FreqScale, ctx: AxisContext): Float64Array {
  const positions = new Float64Array(ctx.fftSize / 2 + 1)
  for (let bin = 0; bin < positions.length; bin += 1) {
    positions[bin] = rawPosition(bin, zoom, scale, ctx)
  }
  return positions
}

// First index whose value satisfies `accept`, assuming accept is monotone over the sorted array.
const lowerBound = (values: Float64Array, accept: (value: number) => boolean): number => {
  let low = 0
  let high = values.length
  while (low < high) {
    const mid = (low + high) >>> 1
    if (accept(values[mid])) high = mid
    else low = mid + 1
  }
  return low
}

/**
 * Inclusive bin range whose positions fall in `[p0, p1)`, or `[p0, 1]` for the span that ends
 * the axis. A span too narrow to hold a bin centre gets the bin nearest its midpoint.
 */
export function binRangeForSpan(
  p0: number,
  p1: number,
  zoom: number,
  scale: FreqScale,
  ctx: AxisContext,
  positions: Float64Array = binPositions(zoom, scale, ctx),
): [number, number] {
  const closesAxis = p1 >= 1
  const first = lowerBound(positions, (value) => value >= p0)
  const last = (closesAxis ? lowerBound(positions, (value) => value > 1) : lowerBound(positions, (value) => value >= p1)) - 1
  if (first <= last) {
    return [first, last]
  }
  const nyquistBin = ctx.fftSize / 2
  const nearest = Math.round(positionToBin((p0 + Math.min(p1, 1)) / 2, zoom, scale, ctx))
  const bin = Math.min(nyquistBin, Math.max(0, nearest))
  return [bin, bin]
}

export function aggregateBins(values: ArrayLike<number>, first: number, last: number, rule: Aggregation): number {
  if (rule === 'max') {
    let peak = -Infinity
    for (let bin = first; bin <= last; bin += 1) {
      if (values[bin] > peak) peak = values[bin]
    }
    return peak
  }
  let sum = 0
  for (let bin = first; bin <= last; bin += 1) {
    sum += values[bin]
  }
  return sum / (last - first + 1)
}
