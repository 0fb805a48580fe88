import log from 'electron-log/node'
import { AdmissionRejectedError } from '@core/errors'

// @DEV-GUIDE: Bounds how many predictions run at once. The scoring collaborator is expensive and
// not meant for unbounded parallel calls, so every HTTP prediction goes through run().
// At most maxConcurrent tasks execute; later callers wait in FIFO order. Once maxQueued callers
// are already waiting, run() rejects straight away with AdmissionRejectedError (HTTP 503)
// instead of letting the queue grow without limit.
// A task can pin its slot to work that outlives it (slot.holdUntil), e.g. a scorer run whose
// caller already gave up on a timeout; the slot is only handed on once that work settles.

const logger = log.scope('admission-gate')

export interface AdmissionGateOptions {
  maxConcurrent: number
  maxQueued: number
}

export interface AdmissionSlot {
  holdUntil(work: Promise<unknown>): void
}

export interface AdmissionGate {
  run<T>(task: (slot: AdmissionSlot) => Promise<T>): Promise<T>
  stats(): { active: number; queued: number }
}

export function createAdmissionGate(options: AdmissionGateOptions): AdmissionGate {
  if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
    throw new RangeError(`maxConcurrent must be a positive integer, got ${options.maxConcurrent}`)
  }
  if (!Number.isInteger(options.maxQueued) || options.maxQueued < 0) {
    throw new RangeError(`maxQueued must be a non-negative integer, got ${options.maxQueued}`)
  }

  let active = 0
  const waiting: Array<() => void> = []

  function acquire(): Promise<void> {
    if (active < options.maxConcurrent) {
      active++
      return Promise.resolve()
    }
    if (waiting.length >= options.maxQueued) {
      logger.warn('Admission rejected', { active, queued: waiting.length })
      return Promise.reject(new AdmissionRejectedError())
    }
    // The slot is handed over by release(), so active is not incremented here
    return new Promise<void>((resolve) => waiting.push(resolve))
  }

  function release(): void {
    const next = waiting.shift()
    if (next) {
      next()
    } else {
      active--
    }
  }

  async function run<T>(task: (slot: AdmissionSlot) => Promise<T>): Promise<T> {
    await acquire()
    const held: Promise<unknown>[] = []
    try {
      return await task({ holdUntil: (work) => held.push(work) })
    } finally {
      if (held.length === 0) {
        release()
      } else {
        logger.debug('Slot held past its task', { held: held.length })
        void Promise.allSettled(held).then(release)
      }
    }
  }

  return {
    run,
    stats: () => ({ active, queued: waiting.length }),
  }
}
