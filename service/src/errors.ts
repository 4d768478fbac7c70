export class ApiError extends Error {
  status: number

  constructor(status: number, message?: string) {
    super(message ?? `Request failed: ${status}`)
    this.name = 'ApiError'
    this.status = status
  }
}

export class NegotiationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'NegotiationError'
  }
}

export class CaptureTimeoutError extends Error {
  timeoutMs: number

  constructor(timeoutMs: number) {
    super(`No frame within ${timeoutMs}ms`)
    this.name = 'CaptureTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

export class ClassificationParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ClassificationParseError'
  }
}

export class SinkError extends Error {
  sink: string

  constructor(sink: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SinkError'
    this.sink = sink
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
