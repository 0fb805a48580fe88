// @DEV-GUIDE: Error taxonomy shared by the core pipeline, the service and the HTTP layer.
// InvalidRequestError is caller-caused (HTTP 400), InferenceError is a server/collaborator
// fault (HTTP 500), StartupError is fatal and keeps the service out of 'ready'.
// ImageDecodeError and ScorerShapeError are raised by the normalizer and the scorer and get
// translated by the service; they never reach a caller directly.

export type InvalidRequestReason =
  | 'n out of range'
  | 'empty payload'
  | 'unsupported format'
  | 'undecodable image'

export class ServiceError extends Error {
  readonly code: string

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ServiceError'
    this.code = code
  }
}

export class InvalidRequestError extends ServiceError {
  readonly reason: InvalidRequestReason

  constructor(reason: InvalidRequestReason, message: string = reason, options?: { cause?: unknown }) {
    super(message, 'INVALID_REQUEST', options)
    this.name = 'InvalidRequestError'
    this.reason = reason
  }
}

export class InferenceError extends ServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INFERENCE_FAILED', options)
    this.name = 'InferenceError'
  }
}

export class StartupError extends ServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STARTUP_FAILED', options)
    this.name = 'StartupError'
  }
}

export class ImageDecodeError extends ServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'IMAGE_DECODE_FAILED', options)
    this.name = 'ImageDecodeError'
  }
}

export class ScorerShapeError extends ServiceError {
  readonly expected: readonly number[]
  readonly actual: readonly number[]

  constructor(expected: readonly number[], actual: readonly number[]) {
    super(
      `Input shape mismatch: expected [${expected.join(', ')}], got [${actual.join(', ')}]`,
      'SCORER_SHAPE_MISMATCH',
    )
    this.name = 'ScorerShapeError'
    this.expected = expected
    this.actual = actual
  }
}

export class AdmissionRejectedError extends ServiceError {
  constructor(message = 'Too many predictions in flight') {
    super(message, 'ADMISSION_REJECTED')
    this.name = 'AdmissionRejectedError'
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
