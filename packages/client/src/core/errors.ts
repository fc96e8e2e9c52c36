// packages/client/src/core/errors.ts

export type SheetsErrorKind =
  | 'InvalidArgument'
  | 'EmptyBatch'
  | 'RemoteApiError'
  | 'TransportError'
  | 'DecodeError'

export abstract class SheetsClientError extends Error {
  abstract readonly kind: SheetsErrorKind
}

/**
 * Missing/uninitialized spreadsheet, a sheet from another spreadsheet, or a
 * malformed operation input (bad ranges, empty row sets).
 */
export class InvalidArgumentError extends SheetsClientError {
  readonly kind = 'InvalidArgument' as const

  constructor(message: string) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}

export class EmptyBatchError extends SheetsClientError {
  readonly kind = 'EmptyBatch' as const

  constructor(message = 'batch has no operations') {
    super(message)
    this.name = 'EmptyBatchError'
  }
}

/**
 * Decoded `{ error: { code, status, message } }` envelope. The remote API
 * reports failures in-body, so this is raised whatever the HTTP status was.
 */
export class RemoteApiError extends SheetsClientError {
  readonly kind = 'RemoteApiError' as const
  readonly code: number
  readonly status: string

  constructor(code: number, status: string, message: string) {
    super(message)
    this.name = 'RemoteApiError'
    this.code = code
    this.status = status
  }
}

export class TransportError extends SheetsClientError {
  readonly kind = 'TransportError' as const
  readonly statusCode?: number

  constructor(message: string, opts: { statusCode?: number; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause })
    this.name = 'TransportError'
    this.statusCode = opts.statusCode
  }
}

export class DecodeError extends SheetsClientError {
  readonly kind = 'DecodeError' as const
  /** First 200 characters of the offending body, when there was one. */
  readonly bodyPreview?: string

  constructor(message: string, opts: { body?: string; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause })
    this.name = 'DecodeError'
    this.bodyPreview = opts.body === undefined ? undefined : opts.body.slice(0, 200)
  }
}

export type SheetsErrorShape = {
  message: string
  kind?: SheetsErrorKind
  code?: number
  status?: string
}

/**
 * Flatten anything thrown into a loggable shape.
 */
export function toErrorShape(err: unknown): SheetsErrorShape {
  if (err instanceof RemoteApiError) {
    return { message: err.message, kind: err.kind, code: err.code, status: err.status }
  }
  if (err instanceof TransportError) {
    return { message: err.message, kind: err.kind, code: err.statusCode }
  }
  if (err instanceof SheetsClientError) {
    return { message: err.message, kind: err.kind }
  }
  if (err instanceof Error) {
    return { message: err.message }
  }
  return { message: String(err) }
}
