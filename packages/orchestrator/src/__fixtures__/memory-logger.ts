import type { Logger, LogLevel } from '../logger.js'

export type LogEntry = { level: LogLevel; message: string }

/** Logger that keeps entries in memory for assertions. */
export function createMemoryLogger() {
  const entries: LogEntry[] = []

  const logger: Logger = {
    info: (message) => { entries.push({ level: 'INFO', message }) },
    warn: (message) => { entries.push({ level: 'WARN', message }) },
    error: (message) => { entries.push({ level: 'ERROR', message }) },
  }

  return {
    logger,
    entries,
    messages(level?: LogLevel): string[] {
      return entries.filter((e) => !level || e.level === level).map((e) => e.message)
    },
  }
}
