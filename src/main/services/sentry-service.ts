import * as Sentry from '@sentry/node'
import log from 'electron-log/node'
import { APP_VERSION } from '@shared/constants/defaults'

// @DEV-GUIDE: Sentry crash reporting wrapper with no-op fallback when DSN is unconfigured.
// Server-side faults (InferenceError, uncaught exceptions, unhandled rejections) are reported;
// caller mistakes (InvalidRequestError) never are.
//
// When no DSN is provided, createSentryService returns the noopService that silently ignores all
// calls, so callers always get a SentryService and never branch on configuration.

const logger = log.scope('sentry')

export interface SentryService {
  isEnabled(): boolean
  captureException(error: Error, context?: Record<string, unknown>): void
  addBreadcrumb(message: string, category?: string, data?: Record<string, unknown>): void
  close(timeoutMs?: number): Promise<void>
}

export const noopSentryService: SentryService = {
  isEnabled: () => false,
  captureException: () => {},
  addBreadcrumb: () => {},
  close: async () => {},
}

export function createSentryService(dsn: string | undefined): SentryService {
  if (!dsn) {
    logger.info('Sentry DSN not configured — crash reporting disabled')
    return noopSentryService
  }

  try {
    const environment = process.env.NODE_ENV === 'production' ? 'production' : 'development'
    const enabled = environment === 'production' || process.env.SENTRY_DEV_ENABLED === 'true'

    Sentry.init({
      dsn,
      environment,
      release: `image-classifier@${APP_VERSION}`,
      enabled,
    })

    logger.info('Sentry initialized for crash reporting', { enabled })

    return {
      isEnabled: () => enabled,
      captureException(error: Error, context?: Record<string, unknown>) {
        Sentry.captureException(error, { extra: context })
      },
      addBreadcrumb(message: string, category = 'app', data?: Record<string, unknown>) {
        Sentry.addBreadcrumb({ message, category, data, level: 'info' })
      },
      async close(timeoutMs = 2_000) {
        await Sentry.close(timeoutMs)
      },
    }
  } catch (err) {
    logger.warn('Failed to initialize Sentry', { error: String(err) })
    return noopSentryService
  }
}
