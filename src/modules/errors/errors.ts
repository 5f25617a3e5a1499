export type SpectrogramErrorCode =
  | 'DeviceNotFound'
  | 'UnsupportedFormat'
  | 'InvalidConfig'
  | 'IndexOutOfRange'
  | 'IOError'
  | 'QueueOverflow'
  | 'CaptureFailed'

export class SpectrogramError extends Error {
  readonly code: SpectrogramErrorCode
  readonly details: Record<string, unknown>

  constructor(code: SpectrogramErrorCode, message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(message, options)
    this.name = `${code}Error`
    this.code = code
    this.details = details
  }
}

export class DeviceNotFoundError extends SpectrogramError {
  readonly requested: string
  readonly available: string[]

  constructor(requested: string, available: string[]) {
    const listing = available.length > 0 ? available.join(', ') : 'none'
    super('DeviceNotFound', `Input device '${requested}' not found (available: ${listing})`, { requested, available })
    this.requested = requested
    this.available = available
  }
}

export class UnsupportedFormatError extends SpectrogramError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('UnsupportedFormat', message, details)
  }
}

export class InvalidConfigError extends SpectrogramError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super('InvalidConfig', `Invalid configuration: ${issues.join('; ')}`, { issues })
    this.issues = issues
  }
}

export class IndexOutOfRangeError extends SpectrogramError {
  constructor(index: number, length: number) {
    super('IndexOutOfRange', `Row index ${index} is outside [0, ${length})`, { index, length })
  }
}

export class IOFailureError extends SpectrogramError {
  readonly path: string

  constructor(path: string, cause: unknown) {
    super('IOError', `I/O failed for ${path}: ${describeError(cause)}`, { path }, { cause })
    this.path = path
  }
}

export class CaptureFailedError extends SpectrogramError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super('CaptureFailed', message, details, cause === undefined ? undefined : { cause })
  }
}

export const isSpectrogramError = (error: unknown, code?: SpectrogramErrorCode): error is SpectrogramError =>
  error instanceof SpectrogramError && (code === undefined || error.code === code)

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error))
