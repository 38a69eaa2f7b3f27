/**
 * Scripted ProcessRunner for unit tests. Records every call and answers
 * from the supplied handler; nothing is spawned.
 */
import type { ExecOptions, ExecResult, ProcessRunner } from '../exec.js'

export type RecordedCall = {
  command: string
  args: string[]
  options: ExecOptions
}

export type FakeResponder = (call: RecordedCall) => Partial<ExecResult> | Promise<Partial<ExecResult>>

export function execResult(overrides: Partial<ExecResult> = {}): ExecResult {
  return {
    exitCode: 0,
    stdout: '',
    stderr: '',
    timedOut: false,
    notFound: false,
    ...overrides,
  }
}

export function createFakeRunner(respond: FakeResponder = () => ({})) {
  const calls: RecordedCall[] = []

  const runner: ProcessRunner = async (command, args, options) => {
    const call = { command, args, options }
    calls.push(call)
    return execResult(await respond(call))
  }

  return {
    runner,
    calls,
    callsTo(command: string): RecordedCall[] {
      return calls.filter((c) => c.command === command)
    },
  }
}

/** Every binary is missing. */
export const missingEverything: FakeResponder = () => ({ exitCode: null, notFound: true })
