// Model input
export const MODEL_INPUT_HEIGHT = 128
export const MODEL_INPUT_WIDTH = 128
export const MODEL_INPUT_CHANNELS = 3
export const DEFAULT_PIXEL_SCALE = 1

// Top-N request bounds
export const DEFAULT_TOP_N = 3
export const DEFAULT_MAX_TOP_N = 10
export const MAX_TOP_N_CEILING = 20

// Inference
export const SCORE_TIMEOUT = 10_000
export const MAX_CONCURRENT_PREDICTIONS = 2
export const MAX_QUEUED_PREDICTIONS = 32

// Uploads
export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024
