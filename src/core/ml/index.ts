export { createOnnxScorer } from './onnx-scorer'
export type { Scorer, ScorerConfig, ScorerFactory } from './scorer'
export { normalizeImage, decodeToRgb, bufferToFloat32, RESIZE_KERNEL } from './preprocessing'
export type { NormalizeOptions } from './preprocessing'
export { selectTopK } from './top-k'
