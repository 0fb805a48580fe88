import { describe, it, expect } from 'vitest'
import { createAdmissionGate } from '../../../../src/main/services/admission-gate'
import { AdmissionRejectedError } from '@core/errors'

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

async function flush(): Promise<void> {
  for (let i = 0; i < 10; i++) await Promise.resolve()
}

describe('AdmissionGate', () => {
  it('runs tasks and returns their results', async () => {
    const gate = createAdmissionGate({ maxConcurrent: 2, maxQueued: 0 })

    await expect(gate.run(async () => 42)).resolves.toBe(42)
    expect(gate.stats()).toEqual({ active: 0, queued: 0 })
  })

  it('never runs more than maxConcurrent tasks at once', async () => {
    const gate = createAdmissionGate({ maxConcurrent: 2, maxQueued: 10 })
    let running = 0
    let peak = 0

    const tasks = Array.from({ length: 6 }, (_, i) =>
      gate.run(async () => {
        running++
        peak = Math.max(peak, running)
        await new Promise((resolve) => setTimeout(resolve, 5))
        running--
        return i
      }),
    )

    await expect(Promise.all(tasks)).resolves.toEqual([0, 1, 2, 3, 4, 5])
    expect(peak).toBe(2)
    expect(gate.stats()).toEqual({ active: 0, queued: 0 })
  })

  it('starts waiting tasks in arrival order', async () => {
    const gate = createAdmissionGate({ maxConcurrent: 1, maxQueued: 5 })
    const first = deferred<void>()
    const order: string[] = []

    const a = gate.run(async () => {
      order.push('a')
      await first.promise
    })
    const b = gate.run(async () => {
      order.push('b')
    })
    const c = gate.run(async () => {
      order.push('c')
    })
    await flush()

    expect(order).toEqual(['a'])
    expect(gate.stats()).toEqual({ active: 1, queued: 2 })

    first.resolve()
    await Promise.all([a, b, c])

    expect(order).toEqual(['a', 'b', 'c'])
  })

  it('rejects immediately once the queue is full', async () => {
    const gate = createAdmissionGate({ maxConcurrent: 1, maxQueued: 1 })
    const blocker = deferred<void>()

    const running = gate.run(() => blocker.promise)
    const queued = gate.run(async () => 'queued')
    await flush()

    await expect(gate.run(async () => 'rejected')).rejects.toBeInstanceOf(AdmissionRejectedError)

    blocker.resolve()
    await running
    await expect(queued).resolves.toBe('queued')
  })

  it('keeps the slot until held work settles, even after the task fails', async () => {
    const gate = createAdmissionGate({ maxConcurrent: 1, maxQueued: 5 })
    const lingering = deferred<void>()
    let secondStarted = false

    const first = gate.run(async (slot) => {
      slot.holdUntil(lingering.promise)
      throw new Error('timed out')
    })
    const second = gate.run(async () => {
      secondStarted = true
      return 'second'
    })

    await expect(first).rejects.toThrow('timed out')
    await flush()
    expect(secondStarted).toBe(false)
    expect(gate.stats()).toEqual({ active: 1, queued: 1 })

    lingering.resolve()
    await expect(second).resolves.toBe('second')
    expect(gate.stats()).toEqual({ active: 0, queued: 0 })
  })

  it('releases a held slot when the held work rejects', async () => {
    const gate = createAdmissionGate({ maxConcurrent: 1, maxQueued: 0 })
    const failing = Promise.reject(new Error('run failed'))
    failing.catch(() => {})

    await gate.run(async (slot) => {
      slot.holdUntil(failing)
    })
    await flush()

    await expect(gate.run(async () => 'next')).resolves.toBe('next')
  })

  it('releases the slot when a task throws', async () => {
    const gate = createAdmissionGate({ maxConcurrent: 1, maxQueued: 0 })

    await expect(gate.run(async () => Promise.reject(new Error('task failed')))).rejects.toThrow(
      'task failed',
    )
    await expect(gate.run(async () => 'next')).resolves.toBe('next')
  })

  it.each([
    [{ maxConcurrent: 0, maxQueued: 1 }, 'maxConcurrent must be a positive integer, got 0'],
    [{ maxConcurrent: 1.5, maxQueued: 1 }, 'maxConcurrent must be a positive integer, got 1.5'],
    [{ maxConcurrent: 1, maxQueued: -1 }, 'maxQueued must be a non-negative integer, got -1'],
  ])('rejects invalid options %o', (options, message) => {
    expect(() => createAdmissionGate(options)).toThrow(new RangeError(message))
  })
})
