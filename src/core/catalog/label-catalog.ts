import { readFile, readdir } from 'fs/promises'
import { DEFAULT_LABELS_KEY } from '@shared/constants/defaults'
import type { LabelSource } from '@shared/types'
import { StartupError, errorMessage } from '../errors'

// @DEV-GUIDE: The label catalog maps score-vector position i to class name i, fixed for the
// process lifetime. Two sources are accepted:
// - manifest: a JSON file holding either a bare string array or { "<key>": string[] }
//   (key defaults to "classes").
// - directory: the immediate subdirectory names of a dataset root, sorted by code unit.
//   Files are ignored; this is how the training pipeline enumerated its classes.
// Any failure is a StartupError. The returned array is frozen.

export type LabelCatalog = readonly string[]

export async function loadLabelCatalog(source: LabelSource): Promise<LabelCatalog> {
  const names =
    source.kind === 'manifest'
      ? await readManifest(source.path, source.key ?? DEFAULT_LABELS_KEY)
      : await readDirectoryLabels(source.path)

  validateNames(names, source.path)
  return Object.freeze([...names])
}

async function readManifest(path: string, key: string): Promise<string[]> {
  let raw: string
  try {
    raw = await readFile(path, 'utf-8')
  } catch (error) {
    throw new StartupError(`Names file not found: ${path}`, { cause: error })
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new StartupError(`Names file is not valid JSON: ${path} (${errorMessage(error)})`, {
      cause: error,
    })
  }

  const list = Array.isArray(parsed) ? parsed : pickKey(parsed, key)
  if (!Array.isArray(list)) {
    throw new StartupError(`Names file ${path} must contain an array or a "${key}" array`)
  }

  return list.map((entry, index) => {
    if (typeof entry !== 'string') {
      throw new StartupError(`Names file ${path}: entry ${index} is not a string`)
    }
    return entry
  })
}

function pickKey(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined
  return Object.entries(value).find(([k]) => k === key)?.[1]
}

async function readDirectoryLabels(path: string): Promise<string[]> {
  try {
    const entries = await readdir(path, { withFileTypes: true })
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort(compareCodeUnits)
  } catch (error) {
    throw new StartupError(`Data directory not found: ${path}`, { cause: error })
  }
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

function validateNames(names: string[], path: string): void {
  if (names.length === 0) {
    throw new StartupError(`Label source ${path} defines no classes`)
  }

  const seen = new Set<string>()
  for (const [index, name] of names.entries()) {
    if (name.trim().length === 0) {
      throw new StartupError(`Label source ${path}: class ${index} has an empty name`)
    }
    if (seen.has(name)) {
      throw new StartupError(`Label source ${path}: duplicate class name "${name}"`)
    }
    seen.add(name)
  }
}
