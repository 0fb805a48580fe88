import type { PredictionResult } from '@shared/types'
import { InferenceError } from '../errors'

// @DEV-GUIDE: Ranks a score vector against the label catalog. Output is the min(k, N) highest
// scores, descending, with the lower catalog index winning ties so repeated calls on the same
// input always agree. NaN scores rank after every real number. k <= 0 yields [] here; the
// service rejects such requests before they get this far.

/**
 * Select the k highest-scoring labels.
 * Throws InferenceError when the score vector and catalog lengths differ.
 */
export function selectTopK(
  scores: ArrayLike<number>,
  catalog: readonly string[],
  k: number,
): PredictionResult {
  if (scores.length !== catalog.length) {
    throw new InferenceError(
      `Score vector has ${scores.length} entries but the catalog has ${catalog.length}`,
    )
  }

  const count = Math.min(Math.max(Math.floor(k), 0), catalog.length)
  if (count === 0) return []

  const indices = Array.from({ length: catalog.length }, (_, i) => i)
  indices.sort((a, b) => compareScores(scores[a], scores[b]) || a - b)

  return indices.slice(0, count).map((index) => ({
    name: catalog[index],
    confidence: scores[index],
  }))
}

// Descending, NaN last
function compareScores(a: number, b: number): number {
  const aNaN = Number.isNaN(a)
  const bNaN = Number.isNaN(b)
  if (aNaN || bNaN) return Number(aNaN) - Number(bNaN)
  if (a === b) return 0
  return a > b ? -1 : 1
}
