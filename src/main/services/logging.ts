import log from 'electron-log/node'

type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly'

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly']

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/**
 * Console level from LOG_LEVEL (default info). The file transport is off unless LOG_FILE
 * names a file, in which case it logs at info and rotates at 10MB.
 */
export function configureLogging(env: Record<string, string | undefined> = process.env): void {
  const level = env.LOG_LEVEL?.trim().toLowerCase()
  log.transports.console.level = level && isLogLevel(level) ? level : 'info'

  const logFile = env.LOG_FILE?.trim()
  if (logFile) {
    log.transports.file.resolvePathFn = () => logFile
    log.transports.file.level = 'info'
    log.transports.file.maxSize = 10 * 1024 * 1024 // 10MB
  } else {
    log.transports.file.level = false
  }
}
