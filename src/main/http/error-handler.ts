import type { ErrorRequestHandler, RequestHandler } from 'express'
import multer from 'multer'
import log from 'electron-log/node'
import {
  AdmissionRejectedError,
  InferenceError,
  InvalidRequestError,
  StartupError,
  errorMessage,
} from '@core/errors'
import type { SentryService } from '../services/sentry-service'

const logger = log.scope('http')

export interface ErrorBody {
  error: string
  detail: string
}

/**
 * Maps an error to the HTTP status and body a caller sees.
 * Caller mistakes are 4xx, server faults 5xx.
 */
export function toHttpError(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof InvalidRequestError) {
    return { status: 400, body: { error: error.reason, detail: error.message } }
  }
  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') {
      return { status: 413, body: { error: 'payload too large', detail: error.message } }
    }
    return { status: 400, body: { error: 'invalid upload', detail: error.message } }
  }
  if (error instanceof AdmissionRejectedError) {
    return { status: 503, body: { error: 'overloaded', detail: error.message } }
  }
  if (error instanceof InferenceError || error instanceof StartupError) {
    return { status: 500, body: { error: 'inference failed', detail: error.message } }
  }
  return {
    status: 500,
    body: { error: 'Something went wrong!', detail: 'Internal server error' },
  }
}

export function createErrorHandler(sentry: SentryService): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err)
      return
    }
    const { status, body } = toHttpError(err)
    if (status >= 500) {
      logger.error('Request failed', { path: req.path, status, error: errorMessage(err) })
      // InferenceError is already reported by the service
      if (!(err instanceof InferenceError) && err instanceof Error) {
        sentry.captureException(err, { path: req.path })
      }
    } else {
      logger.warn('Request rejected', { path: req.path, status, error: body.error })
    }
    res.status(status).json(body)
  }
}

export const notFoundHandler: RequestHandler = (_req, res) => {
  res.status(404).json({ error: 'Route not found' })
}
