import { readFile } from 'fs/promises'
import { resolve } from 'path'
import { fileURLToPath } from 'url'
import { parseArgs } from 'util'
import { errorMessage } from '@core/errors'
import { DEFAULT_TOP_N, MAX_TOP_N_CEILING } from '@shared/constants/thresholds'
import type { LabelSource, PredictionResult } from '@shared/types'
import { configureLogging } from '../main/services/logging'
import { loadEnvFile, loadServiceConfig } from '../main/services/service-config'
import {
  createInferenceService,
  type InferenceServiceConfig,
  type InferenceServiceDeps,
} from '../main/services/inference-service'

// @DEV-GUIDE: One-shot prediction for a local image file, using the same pipeline as the server.
//   predict --image photo.jpg [--model m.onnx] [--labels names.json | --labels-dir data/] [--top-k 3]
// Flags override the environment/.env configuration. Prints one "name: 12.34%" line per
// prediction; on any failure prints the message to stderr and returns exit code 1.

const USAGE =
  'Usage: predict --image <path> [--model <path>] [--labels <path>] [--labels-dir <dir>] [--top-k <n>]'

export interface CliIo {
  out: (line: string) => void
  err: (line: string) => void
}

const processIo: CliIo = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
}

export function formatPredictions(predictions: PredictionResult): string[] {
  return predictions.map(({ name, confidence }) => `${name}: ${(confidence * 100).toFixed(2)}%`)
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      image: { type: 'string' },
      model: { type: 'string' },
      labels: { type: 'string' },
      'labels-dir': { type: 'string' },
      'top-k': { type: 'string', default: String(DEFAULT_TOP_N) },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
  }).values
}

type CliValues = ReturnType<typeof parseCliArgs>

function resolveConfig(values: CliValues, cwd: string): InferenceServiceConfig {
  const base = loadServiceConfig(process.env, cwd)
  const labelsDir = values['labels-dir']
  const labels = values.labels

  let labelSource: LabelSource = base.labelSource
  if (labelsDir) {
    labelSource = { kind: 'directory', path: resolve(cwd, labelsDir) }
  } else if (labels) {
    labelSource = { kind: 'manifest', path: resolve(cwd, labels) }
  }

  return {
    ...base,
    maxTopN: MAX_TOP_N_CEILING,
    modelPath: values.model ? resolve(cwd, values.model) : base.modelPath,
    labelSource,
  }
}

export async function runPredictCli(
  argv: string[],
  io: CliIo = processIo,
  deps: InferenceServiceDeps = {},
  cwd = process.cwd(),
): Promise<number> {
  let values: CliValues
  try {
    values = parseCliArgs(argv)
  } catch (error) {
    io.err(errorMessage(error))
    io.err(USAGE)
    return 1
  }

  if (values.help) {
    io.out(USAGE)
    return 0
  }
  if (!values.image) {
    io.err('Missing required --image')
    io.err(USAGE)
    return 1
  }

  const imagePath = resolve(cwd, values.image)
  let bytes: Buffer
  try {
    bytes = await readFile(imagePath)
  } catch {
    io.err(`Image not found: ${imagePath}`)
    return 1
  }

  try {
    const service = createInferenceService(resolveConfig(values, cwd), deps)
    await service.start()
    try {
      const predictions = await service.predict({ bytes }, Number(values['top-k']))
      io.out('Top predictions:')
      for (const line of formatPredictions(predictions)) {
        io.out(line)
      }
    } finally {
      await service.stop()
    }
    return 0
  } catch (error) {
    io.err(errorMessage(error))
    return 1
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  loadEnvFile()
  configureLogging({ ...process.env, LOG_LEVEL: process.env.LOG_LEVEL ?? 'warn' })
  runPredictCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code
    })
    .catch((error: unknown) => {
      process.stderr.write(`${errorMessage(error)}\n`)
      process.exitCode = 1
    })
}
