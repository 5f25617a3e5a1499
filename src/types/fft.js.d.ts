declare module 'fft.js' {
  export default class FFT {
    constructor(size: number)
    readonly size: number
    createComplexArray(): number[]
    toComplexArray(input: ArrayLike<number>, storage?: number[]): number[]
    fromComplexArray(complex: ArrayLike<number>, storage?: number[]): number[]
    completeSpectrum(spectrum: number[]): void
    transform(output: number[], input: ArrayLike<number>): void
    realTransform(output: number[], input: ArrayLike<number>): void
    inverseTransform(output: number[], input: ArrayLike<number>): void
  }
}
