import { describe, it, expect } from 'vitest'
import log from 'electron-log/node'
import { configureLogging } from '../../../../src/main/services/logging'

describe('configureLogging', () => {
  it('defaults the console to info and disables the file transport', () => {
    configureLogging({})

    expect(log.transports.console.level).toBe('info')
    expect(log.transports.file.level).toBe(false)
  })

  it('honours LOG_LEVEL regardless of case', () => {
    configureLogging({ LOG_LEVEL: ' DEBUG ' })

    expect(log.transports.console.level).toBe('debug')
  })

  it('falls back to info for an unknown level', () => {
    configureLogging({ LOG_LEVEL: 'loud' })

    expect(log.transports.console.level).toBe('info')
  })

  it('writes to LOG_FILE when set', () => {
    configureLogging({ LOG_FILE: '/var/log/classifier.log' })

    expect(log.transports.file.level).toBe('info')
    expect(log.transports.file.maxSize).toBe(10 * 1024 * 1024)
    expect(Reflect.apply(log.transports.file.resolvePathFn, undefined, [{}])).toBe(
      '/var/log/classifier.log',
    )
  })
})
