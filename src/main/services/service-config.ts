import { existsSync } from 'fs'
import { resolve } from 'path'
import * as dotenv from 'dotenv'
import log from 'electron-log/node'
import { StartupError } from '@core/errors'
import {
  DEFAULT_HOST,
  DEFAULT_LABELS_KEY,
  DEFAULT_LABELS_PATH,
  DEFAULT_MODEL_PATH,
  DEFAULT_PORT,
} from '@shared/constants/defaults'
import {
  DEFAULT_MAX_TOP_N,
  DEFAULT_PIXEL_SCALE,
  DEFAULT_TOP_N,
  MAX_CONCURRENT_PREDICTIONS,
  MAX_QUEUED_PREDICTIONS,
  MAX_TOP_N_CEILING,
  MAX_UPLOAD_BYTES,
  MODEL_INPUT_HEIGHT,
  MODEL_INPUT_WIDTH,
  SCORE_TIMEOUT,
} from '@shared/constants/thresholds'
import type { ImageSize, LabelSource } from '@shared/types'

const logger = log.scope('service-config')

export interface ServiceConfig {
  port: number
  host: string
  modelPath: string
  labelSource: LabelSource
  imageSize: ImageSize
  pixelScale: number
  maxTopN: number
  defaultTopN: number
  maxConcurrentPredictions: number
  maxQueuedPredictions: number
  scoreTimeoutMs: number
  maxUploadBytes: number
  corsOrigins: string[]
  sentryDsn: string | undefined
}

type Env = Record<string, string | undefined>

/**
 * Load `.env` from the working directory into process.env, if present.
 * Variables already set in the environment win.
 */
export function loadEnvFile(cwd = process.cwd()): void {
  const envPath = resolve(cwd, '.env')
  if (existsSync(envPath)) {
    dotenv.config({ path: envPath })
    logger.info('Loaded environment file', { path: envPath })
  }
}

/**
 * Build the service configuration from environment variables over the built-in defaults.
 * Relative paths resolve against cwd. Throws StartupError on malformed values.
 */
export function loadServiceConfig(env: Env = process.env, cwd = process.cwd()): ServiceConfig {
  const maxTopN = readInt(env, 'MAX_TOP_N', DEFAULT_MAX_TOP_N, 1, MAX_TOP_N_CEILING)
  const defaultTopN = readInt(env, 'DEFAULT_TOP_N', DEFAULT_TOP_N, 1, maxTopN)

  const labelsDir = nonEmpty(env.LABELS_DIR)
  const labelSource: LabelSource = labelsDir
    ? { kind: 'directory', path: resolve(cwd, labelsDir) }
    : {
        kind: 'manifest',
        path: resolve(cwd, nonEmpty(env.LABELS_PATH) ?? DEFAULT_LABELS_PATH),
        key: nonEmpty(env.LABELS_KEY) ?? DEFAULT_LABELS_KEY,
      }

  const config: ServiceConfig = {
    port: readInt(env, 'PORT', DEFAULT_PORT, 0, 65_535),
    host: nonEmpty(env.HOST) ?? DEFAULT_HOST,
    modelPath: resolve(cwd, nonEmpty(env.MODEL_PATH) ?? DEFAULT_MODEL_PATH),
    labelSource,
    imageSize: {
      height: readInt(env, 'IMAGE_HEIGHT', MODEL_INPUT_HEIGHT, 1, 4096),
      width: readInt(env, 'IMAGE_WIDTH', MODEL_INPUT_WIDTH, 1, 4096),
    },
    pixelScale: readNumber(env, 'PIXEL_SCALE', DEFAULT_PIXEL_SCALE),
    maxTopN,
    defaultTopN,
    maxConcurrentPredictions: readInt(env, 'MAX_CONCURRENT_PREDICTIONS', MAX_CONCURRENT_PREDICTIONS, 1, 1024),
    maxQueuedPredictions: readInt(env, 'MAX_QUEUED_PREDICTIONS', MAX_QUEUED_PREDICTIONS, 0, 100_000),
    scoreTimeoutMs: readInt(env, 'SCORE_TIMEOUT_MS', SCORE_TIMEOUT, 1, 600_000),
    maxUploadBytes: readInt(env, 'MAX_UPLOAD_BYTES', MAX_UPLOAD_BYTES, 1, 1024 * 1024 * 1024),
    corsOrigins: (env.CORS_ORIGINS ?? '')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    sentryDsn: nonEmpty(env.SENTRY_DSN),
  }

  return config
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

function readInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = nonEmpty(env[name])
  if (raw === undefined) return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new StartupError(`${name} must be an integer between ${min} and ${max}, got "${raw}"`)
  }
  return value
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = nonEmpty(env[name])
  if (raw === undefined) return fallback
  // Accepts plain numbers and simple fractions such as "1/255"
  const fraction = /^([\d.]+)\s*\/\s*([\d.]+)$/.exec(raw)
  const value = fraction ? Number(fraction[1]) / Number(fraction[2]) : Number(raw)
  if (!Number.isFinite(value) || value <= 0) {
    throw new StartupError(`${name} must be a positive number, got "${raw}"`)
  }
  return value
}
