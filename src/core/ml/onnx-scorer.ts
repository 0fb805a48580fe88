import * as ort from 'onnxruntime-web'
import { readFile } from 'fs/promises'
import type { ImageTensor } from '@shared/types'
import { ScorerShapeError, StartupError, errorMessage } from '../errors'
import type { Scorer, ScorerConfig } from './scorer'

// @DEV-GUIDE: ONNX Runtime implementation of the scoring collaborator.
// Model: an image classifier exported to ONNX (input: [1, H, W, 3] float32 NHWC,
// output: [1, N] per-class scores). Runs on the WebAssembly backend, single-threaded in Node.
// load() reads the artifact, creates the session and runs one warmup inference so the
// first request is not slow; the warmup output length is the catalog size the model expects.
// score() rejects tensors whose dims differ from the configured input dims.

export function createOnnxScorer(config: ScorerConfig): Scorer {
  let session: ort.InferenceSession | null = null
  let inputName = ''
  let outputName = ''
  let numClasses: number | null = null

  async function load(): Promise<void> {
    let modelBytes: Uint8Array
    try {
      modelBytes = await readFile(config.modelPath)
    } catch (error) {
      throw new StartupError(`Model file not found: ${config.modelPath}`, { cause: error })
    }

    ort.env.wasm.numThreads = 1
    try {
      session = await ort.InferenceSession.create(modelBytes, {
        executionProviders: ['wasm'],
        graphOptimizationLevel: 'all',
      })
    } catch (error) {
      throw new StartupError(`Failed to load model ${config.modelPath}: ${errorMessage(error)}`, {
        cause: error,
      })
    }

    inputName = session.inputNames[0]
    outputName = session.outputNames[0]

    // Warmup inference, which also tells us N
    const [, height, width] = config.inputDims
    try {
      const warmup = await run(new Float32Array(height * width * 3))
      numClasses = warmup.length
    } catch (error) {
      await dispose()
      throw new StartupError(`Model warmup failed for ${config.modelPath}: ${errorMessage(error)}`, {
        cause: error,
      })
    }
  }

  async function run(data: Float32Array): Promise<Float32Array> {
    if (!session) {
      throw new Error('Scorer not loaded')
    }
    const tensor = new ort.Tensor('float32', data, [...config.inputDims])
    const outputMap = await session.run({ [inputName]: tensor })
    const output = outputMap[outputName]
    if (!(output.data instanceof Float32Array)) {
      throw new Error(`Unexpected output type ${output.type} from ${outputName}`)
    }
    return output.data
  }

  async function score(tensor: ImageTensor): Promise<Float32Array> {
    if (!sameDims(tensor.dims, config.inputDims)) {
      throw new ScorerShapeError(config.inputDims, tensor.dims)
    }
    const [, height, width] = config.inputDims
    if (tensor.data.length !== height * width * 3) {
      throw new ScorerShapeError(config.inputDims, [tensor.data.length])
    }
    return run(tensor.data)
  }

  async function dispose(): Promise<void> {
    if (session) {
      await session.release()
      session = null
    }
    inputName = ''
    outputName = ''
    numClasses = null
  }

  return {
    load,
    score,
    outputSize: () => numClasses,
    dispose,
    isReady: () => session !== null,
  }
}

function sameDims(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index])
}
