import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import express, { type Express } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import swaggerUi from 'swagger-ui-express'
import { APP_NAME, APP_VERSION } from '@shared/constants/defaults'
import type { ServiceConfig } from '../services/service-config'
import type { InferenceService } from '../services/inference-service'
import type { AdmissionGate } from '../services/admission-gate'
import type { SentryService } from '../services/sentry-service'
import { createPredictRoutes } from './predict-routes'
import { createErrorHandler, notFoundHandler } from './error-handler'

export const OPENAPI_SPEC_PATH = fileURLToPath(
  new URL('../../../resources/openapi.json', import.meta.url),
)

export interface HttpAppDeps {
  service: InferenceService
  gate: AdmissionGate
  sentry: SentryService
  config: Pick<ServiceConfig, 'maxUploadBytes' | 'defaultTopN' | 'corsOrigins'>
}

/**
 * Builds the express application. Does not listen; the entry point owns the socket.
 */
export function createHttpApp(deps: HttpAppDeps): Express {
  const app = express()

  app.set('trust proxy', 1)
  app.use(helmet())
  app.use(
    cors({
      origin: deps.config.corsOrigins.length > 0 ? deps.config.corsOrigins : false,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    }),
  )

  const apiSpec: unknown = JSON.parse(readFileSync(OPENAPI_SPEC_PATH, 'utf-8'))
  if (isRecord(apiSpec)) {
    app.get('/openapi.json', (_req, res) => {
      res.json(apiSpec)
    })
    app.use(
      '/docs',
      swaggerUi.serve,
      swaggerUi.setup(apiSpec, {
        customSiteTitle: `${APP_NAME} API Documentation`,
      }),
    )
  }

  app.get('/api', (_req, res) => {
    res.json({
      name: APP_NAME,
      version: APP_VERSION,
      documentation: { swagger: '/docs', openapi: '/openapi.json' },
      endpoints: { predict: '/predict', health: '/health' },
    })
  })

  app.use(createPredictRoutes(deps))

  app.use(notFoundHandler)
  app.use(createErrorHandler(deps.sentry))

  return app
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
