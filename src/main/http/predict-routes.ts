import { Router } from 'express'
import multer from 'multer'
import type { ServiceConfig } from '../services/service-config'
import type { InferenceService } from '../services/inference-service'
import type { AdmissionGate } from '../services/admission-gate'

// @DEV-GUIDE: Prediction and health endpoints.
// POST /predict takes multipart form data: an "image" file part and an optional "n" field
// (default defaultTopN). The upload is buffered in memory, capped at maxUploadBytes, one file.
// Request validation runs before admission so bad requests never wait for a slot; the
// prediction itself runs inside the admission gate, whose slot stays taken until the scorer
// run settles even when the request already timed out. Errors go to the shared error handler.
// GET /health reports readiness and never fails.

export interface PredictRoutesDeps {
  service: InferenceService
  gate: AdmissionGate
  config: Pick<ServiceConfig, 'maxUploadBytes' | 'defaultTopN'>
}

/**
 * Parses the "n" form field. Missing or blank means the default; anything that is not a plain
 * integer becomes NaN so the service rejects it as out of range.
 */
export function parseTopN(raw: unknown, fallback: number): number {
  if (raw === undefined || raw === null) return fallback
  if (typeof raw !== 'string') return Number.NaN
  const trimmed = raw.trim()
  if (trimmed === '') return fallback
  return /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN
}

export function createPredictRoutes({ service, gate, config }: PredictRoutesDeps): Router {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: config.maxUploadBytes,
      files: 1,
    },
  })

  const router = Router()

  router.post('/predict', upload.single('image'), async (req, res, next) => {
    try {
      const body: unknown = req.body
      const rawN =
        typeof body === 'object' && body !== null && 'n' in body ? body.n : undefined
      const n = parseTopN(rawN, config.defaultTopN)
      const payload = {
        bytes: req.file ? req.file.buffer : new Uint8Array(0),
        contentType: req.file?.mimetype,
      }

      service.validateRequest(payload, n)
      const topN = await gate.run((slot) =>
        service.predict(payload, n, { holdUntil: slot.holdUntil }),
      )
      res.json({ top_n: topN })
    } catch (error) {
      next(error)
    }
  })

  router.get('/health', (_req, res) => {
    res.status(200).json(service.healthStatus())
  })

  return router
}
