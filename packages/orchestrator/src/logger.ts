import { createWriteStream } from 'node:fs'
import { mkdir } from 'node:fs/promises'
import path from 'node:path'

export type LogLevel = 'INFO' | 'WARN' | 'ERROR'

export type Logger = {
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export type RunLogger = Logger & {
  readonly filePath: string
  /** Flush and close the log file. */
  close(): Promise<void>
}

export type RunLoggerOptions = {
  logsDir: string
  now?: () => Date
  /** Mirror lines to the console (default true). */
  echo?: boolean
}

const pad = (n: number) => String(n).padStart(2, '0')

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time}`
}

export function formatLogLine(level: LogLevel, message: string, date: Date): string {
  return `[${formatTimestamp(date)}] [${level}] ${message}`
}

export function logFileName(date: Date): string {
  return `audit_${formatTimestamp(date).replace(' ', '_').replaceAll(':', '-')}.log`
}

/**
 * One log file per run. Lines go through a single append stream, so
 * concurrent writers never interleave within a line.
 */
export async function createRunLogger(options: RunLoggerOptions): Promise<RunLogger> {
  const now = options.now ?? (() => new Date())
  const echo = options.echo ?? true

  await mkdir(options.logsDir, { recursive: true })
  const filePath = path.join(options.logsDir, logFileName(now()))
  const stream = createWriteStream(filePath, { flags: 'a' })

  stream.on('error', (err) => {
    console.error(`Log file ${filePath} is no longer writable: ${err.message}`)
  })

  function write(level: LogLevel, message: string): void {
    const line = formatLogLine(level, message, now())
    if (echo) {
      if (level === 'INFO') console.log(line)
      else console.error(line)
    }
    if (stream.writable) stream.write(`${line}\n`)
  }

  return {
    filePath,
    info: (message) => write('INFO', message),
    warn: (message) => write('WARN', message),
    error: (message) => write('ERROR', message),
    close(): Promise<void> {
      return new Promise((resolve) => {
        if (stream.writableFinished || stream.destroyed) {
          resolve()
          return
        }
        stream.end(() => resolve())
      })
    },
  }
}
