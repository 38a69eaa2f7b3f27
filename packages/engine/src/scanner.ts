import { existsSync } from 'node:fs'
import type {
  RawScanOutcome,
  RepositoryRef,
  ScanError,
  ScannerKind,
} from '@secret-audit/shared/types'
import { combinedOutput, type ExecResult, type ProcessRunner } from './exec.js'
import { DEFAULT_PROBE_TIMEOUT_MS, TIMEOUT_MARKER } from './constants.js'

/**
 * Tool-specific markers the normalizer reads out of raw output.
 * A `*Count` pattern must capture the number in its first group.
 */
export type OutputProfile = {
  findingLine?: RegExp
  verifiedLine?: RegExp
  unverifiedLine?: RegExp
  verifiedCount?: RegExp
  unverifiedCount?: RegExp
  /** Overall finding count for tools that do not verify. */
  totalCount?: RegExp
  cleanMarker?: RegExp
}

export type ScannerDescriptor = {
  id: string
  kind: ScannerKind
  profile: OutputProfile
  /** Probed once on first call, then cached for the descriptor's lifetime. */
  isAvailable(): Promise<boolean>
}

export type ScanTarget = {
  repo: RepositoryRef
  workingCopy: string
}

export type Scanner = {
  descriptor: ScannerDescriptor
  invoke(target: ScanTarget): Promise<RawScanOutcome>
}

export function createDescriptor(
  id: string,
  kind: ScannerKind,
  profile: OutputProfile,
  probe: () => Promise<boolean>,
): ScannerDescriptor {
  let cached: Promise<boolean> | null = null

  return {
    id,
    kind,
    profile,
    isAvailable(): Promise<boolean> {
      if (!cached) {
        cached = probe().catch(() => false)
      }
      return cached
    },
  }
}

/** Probe for an executable by running it with harmless arguments. */
export function probeBinary(
  runner: ProcessRunner,
  command: string,
  args: string[],
  options: { requireSuccess?: boolean } = {},
): () => Promise<boolean> {
  return async () => {
    const result = await runner(command, args, { timeoutMs: DEFAULT_PROBE_TIMEOUT_MS })
    if (result.notFound || result.timedOut) return false
    return options.requireSuccess ? result.exitCode === 0 : true
  }
}

export function missingWorkingCopy(target: ScanTarget): RawScanOutcome | null {
  if (existsSync(target.workingCopy)) return null

  return {
    status: 'Failed',
    output: '',
    report: null,
    error: {
      code: 'WORKING_COPY_MISSING',
      message: `No working copy for ${target.repo.name} at ${target.workingCopy}`,
    },
  }
}

/**
 * Map a finished tool process onto an outcome. Exit codes listed in
 * `findingsExitCodes` mean "ran, found something" and count as Completed.
 */
export function toToolOutcome(
  scannerId: string,
  result: ExecResult,
  timeoutMs: number,
  findingsExitCodes: readonly number[] = [],
): RawScanOutcome {
  if (result.notFound) {
    return {
      status: 'Skipped',
      output: '',
      report: null,
      error: { code: 'DEPENDENCY_UNAVAILABLE', message: `${scannerId} executable not found` },
    }
  }

  const output = combinedOutput(result)

  if (result.timedOut) {
    return {
      status: 'Failed',
      output: `${output}${output && !output.endsWith('\n') ? '\n' : ''}${TIMEOUT_MARKER} after ${timeoutMs}ms\n`,
      report: null,
      error: { code: 'TIMEOUT', message: `${scannerId} timed out after ${timeoutMs}ms` },
    }
  }

  if (result.exitCode === 0 || (result.exitCode !== null && findingsExitCodes.includes(result.exitCode))) {
    return { status: 'Completed', output, report: null, error: null }
  }

  return {
    status: 'Failed',
    output,
    report: null,
    error: toInvocationError(scannerId, result),
  }
}

function toInvocationError(scannerId: string, result: ExecResult): ScanError {
  const detail = result.exitCode === null ? 'was killed' : `exited with code ${result.exitCode}`
  return { code: 'INVOCATION_FAILED', message: `${scannerId} ${detail}` }
}
