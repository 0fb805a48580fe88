export interface Prediction {
  name: string
  confidence: number
}

export type PredictionResult = Prediction[]

export interface ImagePayload {
  bytes: Uint8Array
  /** Content type declared by the caller, if any. */
  contentType?: string
}

export type ServiceState = 'uninitialized' | 'loading' | 'ready' | 'failed'

export interface HealthStatus {
  status: 'healthy'
  model: 'loaded' | 'not loaded'
  state: ServiceState
}

export type LabelSource =
  | { kind: 'manifest'; path: string; key?: string }
  | { kind: 'directory'; path: string }

export interface ImageSize {
  height: number
  width: number
}

/** Batched HWC float tensor, dims are always [1, height, width, 3]. */
export interface ImageTensor {
  data: Float32Array
  dims: readonly [1, number, number, 3]
}
