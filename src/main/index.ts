import type { Server } from 'http'
import { fileURLToPath } from 'url'
import log from 'electron-log/node'
import { errorMessage } from '@core/errors'
import { APP_NAME, APP_VERSION } from '@shared/constants/defaults'
import { configureLogging } from './services/logging'
import { loadEnvFile, loadServiceConfig } from './services/service-config'
import { createSentryService, type SentryService } from './services/sentry-service'
import { createInferenceService } from './services/inference-service'
import { createAdmissionGate } from './services/admission-gate'
import { createHttpApp } from './http/app'

// @DEV-GUIDE: Process entry point. Startup sequence: .env -> logging -> error handlers ->
// config -> Sentry -> inference service start (label catalog + model) -> HTTP listen.
//
// The inference service start is a hard barrier: the socket is only opened after the model
// and catalog are loaded. A StartupError (or bad config) logs, flushes Sentry and exits 1
// without ever serving. SIGINT/SIGTERM close the server, release the scorer and exit 0.

loadEnvFile()
configureLogging()

const logger = log.scope('main')

// Sentry reference for global error handlers (set once config is loaded)
let sentryRef: SentryService | null = null

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack })
  sentryRef?.captureException(error, { context: 'uncaughtException' })
})

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason))
  logger.error('Unhandled rejection', { message: error.message, stack: error.stack })
  sentryRef?.captureException(error, { context: 'unhandledRejection' })
})

export async function main(): Promise<void> {
  logger.info(`=== ${APP_NAME} v${APP_VERSION} starting ===`)
  logger.info(`Node: ${process.versions.node}`)
  logger.info(`Platform: ${process.platform} ${process.arch}`)

  const config = loadServiceConfig()
  const sentryService = createSentryService(config.sentryDsn)
  sentryRef = sentryService

  const service = createInferenceService(config, { sentry: sentryService })
  await service.start()
  sentryService.addBreadcrumb('Inference service ready', 'lifecycle')

  const gate = createAdmissionGate({
    maxConcurrent: config.maxConcurrentPredictions,
    maxQueued: config.maxQueuedPredictions,
  })
  const app = createHttpApp({ service, gate, sentry: sentryService, config })

  const server = await listen(app, config.port, config.host)
  logger.info(`Listening on http://${config.host}:${config.port}`, {
    maxConcurrent: config.maxConcurrentPredictions,
    maxTopN: config.maxTopN,
  })

  let shuttingDown = false
  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return
    shuttingDown = true
    logger.info(`Received ${signal}, shutting down`)
    await new Promise<void>((resolve) => server.close(() => resolve()))
    await service.stop()
    await sentryService.close()
    process.exit(0)
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) })
        process.exit(1)
      })
    })
  }
}

function listen(app: ReturnType<typeof createHttpApp>, port: number, host: string): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host)
    server.once('listening', () => resolve(server))
    server.once('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        logger.error(`Port ${port} is already in use`)
      }
      reject(err)
    })
  })
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch(async (error: unknown) => {
    logger.error('Fatal startup error', { error: errorMessage(error) })
    if (error instanceof Error) {
      sentryRef?.captureException(error, { context: 'startup' })
    }
    await sentryRef?.close()
    process.exit(1)
  })
}
