import { execFile } from 'node:child_process'
import { EXEC_MAX_BUFFER } from './constants.js'

export type ExecOptions = {
  timeoutMs: number
  cwd?: string
  env?: NodeJS.ProcessEnv
}

export type ExecResult = {
  /** Null when the process never started or was killed by a signal. */
  exitCode: number | null
  stdout: string
  stderr: string
  timedOut: boolean
  /** The executable could not be found on PATH. */
  notFound: boolean
}

export type ProcessRunner = (
  command: string,
  args: string[],
  options: ExecOptions,
) => Promise<ExecResult>

/**
 * Run an executable without a shell. Never rejects: spawn errors, non-zero
 * exits and timeouts are all reported through the result.
 */
export const runProcess: ProcessRunner = (command, args, options) => {
  return new Promise((resolve) => {
    execFile(command, args, {
      timeout: options.timeoutMs,
      maxBuffer: EXEC_MAX_BUFFER,
      cwd: options.cwd,
      env: options.env,
      encoding: 'utf8',
    }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ exitCode: 0, stdout, stderr, timedOut: false, notFound: false })
        return
      }

      const code: unknown = error.code
      const exited = typeof code === 'number'
      resolve({
        exitCode: exited ? code : null,
        stdout,
        stderr: exited ? stderr : stderr || error.message,
        timedOut: error.killed === true && code !== 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER',
        notFound: code === 'ENOENT',
      })
    })
  })
}

/** stdout followed by stderr, the way a terminal would interleave `2>&1` at the end. */
export function combinedOutput(result: ExecResult): string {
  if (!result.stderr) return result.stdout
  if (!result.stdout) return result.stderr
  return result.stdout.endsWith('\n')
    ? `${result.stdout}${result.stderr}`
    : `${result.stdout}\n${result.stderr}`
}
