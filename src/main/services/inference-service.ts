import log from 'electron-log/node'
import { loadLabelCatalog, type LabelCatalog } from '@core/catalog'
import {
  ImageDecodeError,
  InferenceError,
  InvalidRequestError,
  ServiceError,
  StartupError,
  errorMessage,
} from '@core/errors'
import { createOnnxScorer, normalizeImage, selectTopK } from '@core/ml'
import type { NormalizeOptions, Scorer, ScorerFactory } from '@core/ml'
import { SUPPORTED_CONTENT_TYPES } from '@shared/constants/defaults'
import type {
  HealthStatus,
  ImagePayload,
  ImageTensor,
  LabelSource,
  PredictionResult,
  ServiceState,
} from '@shared/types'
import type { ServiceConfig } from './service-config'
import { noopSentryService, type SentryService } from './sentry-service'

// @DEV-GUIDE: Owns the process-wide inference state and the per-request pipeline.
//
// Lifecycle (one-way): uninitialized -> loading -> ready, or loading -> failed.
// start() loads the label catalog, then the scoring artifact, then checks the model's output
// length against the catalog. Concurrent start() calls share one load. A failed start is
// terminal: later start() calls rethrow the same StartupError and predict() never runs.
// Once ready, the catalog and scorer live in a frozen LoadedState that requests only read.
//
// predict() validates everything cheap first (n range, empty payload, declared content type)
// before it normalizes or scores anything. Decode failures become InvalidRequestError (the
// caller sent a bad image); scoring failures and timeouts become InferenceError.
//
// The scorer call is raced against scoreTimeoutMs. On expiry the caller gets InferenceError;
// the run itself keeps going (ONNX Runtime has no cancellation for a single run), so it is
// handed to options.holdUntil and the admission gate keeps its slot until the run settles.

const logger = log.scope('inference-service')

export type InferenceServiceConfig = Pick<
  ServiceConfig,
  'modelPath' | 'labelSource' | 'imageSize' | 'pixelScale' | 'maxTopN' | 'scoreTimeoutMs'
>

export interface InferenceServiceDeps {
  createScorer?: ScorerFactory
  loadCatalog?: (source: LabelSource) => Promise<LabelCatalog>
  normalize?: (bytes: Uint8Array, options: NormalizeOptions) => Promise<ImageTensor>
  sentry?: SentryService
}

export interface PredictOptions {
  /** Receives the scorer run, which can outlive predict() when it times out. */
  holdUntil?: (work: Promise<unknown>) => void
}

export interface InferenceService {
  start(): Promise<void>
  /** Cheap request checks; predict() runs them too. Throws InvalidRequestError. */
  validateRequest(payload: ImagePayload, requestedK: number): void
  predict(
    payload: ImagePayload,
    requestedK: number,
    options?: PredictOptions,
  ): Promise<PredictionResult>
  healthStatus(): HealthStatus
  state(): ServiceState
  catalogSize(): number | null
  stop(): Promise<void>
}

interface LoadedState {
  readonly catalog: LabelCatalog
  readonly scorer: Scorer
}

export function createInferenceService(
  config: InferenceServiceConfig,
  deps: InferenceServiceDeps = {},
): InferenceService {
  const createScorer = deps.createScorer ?? createOnnxScorer
  const loadCatalog = deps.loadCatalog ?? loadLabelCatalog
  const normalize = deps.normalize ?? normalizeImage
  const sentry = deps.sentry ?? noopSentryService

  let currentState: ServiceState = 'uninitialized'
  let loaded: LoadedState | null = null
  let startPromise: Promise<void> | null = null
  let startupError: StartupError | null = null
  let stopped = false

  async function load(): Promise<void> {
    const { labelSource, modelPath, imageSize } = config
    let scorer: Scorer | null = null

    try {
      logger.info('Loading class names', { source: labelSource.kind, path: labelSource.path })
      const catalog = await loadCatalog(labelSource)
      logger.info(`Loaded ${catalog.length} classes`)

      logger.info('Loading model', { path: modelPath })
      scorer = createScorer({
        modelPath,
        inputDims: [1, imageSize.height, imageSize.width, 3],
      })
      await scorer.load()

      const outputSize = scorer.outputSize()
      if (outputSize !== null && outputSize !== catalog.length) {
        throw new StartupError(
          `Model produces ${outputSize} scores but the catalog has ${catalog.length} classes`,
        )
      }

      loaded = Object.freeze({ catalog, scorer })
      currentState = 'ready'
      logger.info('Model loaded successfully', { classes: catalog.length })
    } catch (error) {
      const failure =
        error instanceof StartupError
          ? error
          : new StartupError(`Startup failed: ${errorMessage(error)}`, { cause: error })
      startupError = failure
      currentState = 'failed'
      logger.error('Startup failed', { error: failure.message })

      if (scorer) {
        await scorer.dispose().catch((disposeError: unknown) => {
          logger.warn('Failed to release scorer after startup failure', {
            error: errorMessage(disposeError),
          })
        })
      }
      throw failure
    }
  }

  function start(): Promise<void> {
    if (currentState === 'failed' && startupError) {
      return Promise.reject(startupError)
    }
    if (!startPromise) {
      currentState = 'loading'
      startPromise = load()
    }
    return startPromise
  }

  function validateRequest(payload: ImagePayload, requestedK: number): void {
    if (!Number.isInteger(requestedK) || requestedK < 1 || requestedK > config.maxTopN) {
      throw new InvalidRequestError(
        'n out of range',
        `n must be between 1 and ${config.maxTopN}`,
      )
    }
    if (payload.bytes.byteLength === 0) {
      throw new InvalidRequestError('empty payload', 'Empty file')
    }
    if (payload.contentType !== undefined && !isSupportedContentType(payload.contentType)) {
      throw new InvalidRequestError(
        'unsupported format',
        'Only JPG and PNG images are supported',
      )
    }
  }

  async function predict(
    payload: ImagePayload,
    requestedK: number,
    options: PredictOptions = {},
  ): Promise<PredictionResult> {
    validateRequest(payload, requestedK)

    if (stopped) {
      throw new InferenceError('Service is shutting down')
    }
    if (!loaded || !loaded.scorer.isReady()) {
      throw new InferenceError('service not ready')
    }
    const { catalog, scorer } = loaded
    const startedAt = Date.now()

    let tensor: ImageTensor
    try {
      tensor = await normalize(payload.bytes, {
        size: config.imageSize,
        pixelScale: config.pixelScale,
      })
    } catch (error) {
      if (error instanceof ImageDecodeError) {
        throw new InvalidRequestError('undecodable image', error.message, { cause: error })
      }
      throw reportInferenceFailure(error)
    }

    let result: PredictionResult
    try {
      const scoring = scorer.score(tensor)
      options.holdUntil?.(scoring)
      const scores = await withTimeout(scoring, config.scoreTimeoutMs)
      result = selectTopK(scores, catalog, Math.min(requestedK, catalog.length))
    } catch (error) {
      throw reportInferenceFailure(error)
    }

    logger.debug('Prediction complete', {
      n: requestedK,
      top: result[0]?.name,
      durationMs: Date.now() - startedAt,
    })
    return result
  }

  function reportInferenceFailure(error: unknown): InferenceError {
    const failure =
      error instanceof InferenceError
        ? error
        : new InferenceError(`Prediction error: ${errorMessage(error)}`, { cause: error })
    logger.error('Prediction failed', {
      error: failure.message,
      code: error instanceof ServiceError ? error.code : undefined,
    })
    sentry.captureException(failure, { context: 'predict' })
    return failure
  }

  function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new InferenceError(`Prediction error: scoring timed out after ${timeoutMs}ms`))
      }, timeoutMs)
      promise.then(
        (value) => {
          clearTimeout(timer)
          resolve(value)
        },
        (error: unknown) => {
          clearTimeout(timer)
          reject(error)
        },
      )
    })
  }

  async function stop(): Promise<void> {
    if (stopped) return
    stopped = true
    if (loaded) {
      await loaded.scorer.dispose()
      logger.info('Scorer released')
    }
  }

  return {
    start,
    validateRequest,
    predict,
    healthStatus: () => ({
      status: 'healthy',
      model: currentState === 'ready' && !stopped ? 'loaded' : 'not loaded',
      state: currentState,
    }),
    state: () => currentState,
    catalogSize: () => loaded?.catalog.length ?? null,
    stop,
  }
}

/** Matches image/jpeg and image/png, ignoring case and parameters. */
export function isSupportedContentType(contentType: string): boolean {
  const mediaType = contentType.split(';')[0].trim().toLowerCase()
  return SUPPORTED_CONTENT_TYPES.some((supported) => supported === mediaType)
}
