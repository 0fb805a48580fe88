import type { ImageTensor } from '@shared/types'

export interface ScorerConfig {
  modelPath: string
  /** Expected input dims, [1, H, W, 3]. */
  inputDims: readonly [1, number, number, 3]
}

/**
 * Opaque scoring collaborator: maps a normalized tensor to one score per catalog entry,
 * in catalog order. Implementations throw ScorerShapeError on an input shape mismatch.
 */
export interface Scorer {
  load(): Promise<void>
  score(tensor: ImageTensor): Promise<Float32Array>
  /** Length of the score vector, once known from the loaded artifact. */
  outputSize(): number | null
  dispose(): Promise<void>
  isReady(): boolean
}

export type ScorerFactory = (config: ScorerConfig) => Scorer
