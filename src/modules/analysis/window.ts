import type { WindowType } from '../settings/config'

const TWO_PI = 2 * Math.PI

const coefficient = (type: WindowType, phase: number): number => {
  switch (type) {
    case 'hann':
      return 0.5 - 0.5 * Math.cos(phase)
    case 'hamming':
      return 0.54 - 0.46 * Math.cos(phase)
    case 'blackman':
      return 0.42 - 0.5 * Math.cos(phase) + 0.08 * Math.cos(2 * phase)
  }
}

/** Periodic window of `length` taps (denominator `length`, not `length - 1`). */
export function createWindow(type: WindowType, length: number): Float32Array {
  const window = new Float32Array(length)
  for (let n = 0; n < length; n += 1) {
    window[n] = coefficient(type, (TWO_PI * n) / length)
  }
  return window
}

export const windowSum = (window: Float32Array): number => window.reduce((sum, value) => sum + value, 0)
