import { rm } from 'node:fs/promises'
import path from 'node:path'
import type { AuditPaths, RawScanOutcome } from '@secret-audit/shared/types'
import { DEFAULT_SCANNER_TIMEOUT_MS } from '../constants.js'
import type { ProcessRunner } from '../exec.js'
import { parseFindingsReport } from '../report-parser.js'
import {
  createDescriptor,
  missingWorkingCopy,
  probeBinary,
  toToolOutcome,
  type OutputProfile,
  type Scanner,
  type ScanTarget,
} from '../scanner.js'

export type BinaryDefinition = {
  id: string
  binary: string
  /** Arguments for the human-readable run. */
  args(workingCopy: string): string[]
  /** Arguments for a second run that writes a JSON report to `reportPath`. */
  reportArgs?(workingCopy: string, reportPath: string): string[]
  /** Exit codes that signal "findings present" rather than a failed run. */
  findingsExitCodes: readonly number[]
  profile: OutputProfile
}

export type BinaryScannerOptions = {
  runner: ProcessRunner
  paths: Pick<AuditPaths, 'resultsDir'>
  timeoutMs?: number
}

export const GITLEAKS: BinaryDefinition = {
  id: 'gitleaks',
  binary: 'gitleaks',
  args: (copy) => ['detect', '--source', copy, '--verbose', '--no-git'],
  reportArgs: (copy, reportPath) => [
    'detect', '--source', copy, '--no-git',
    '--report-path', reportPath,
    '--report-format', 'json',
  ],
  findingsExitCodes: [1],
  profile: {
    findingLine: /^\s*Finding:/,
    totalCount: /leaks found:\s*(\d+)/,
    cleanMarker: /no leaks found/i,
  },
}

export const GGSHIELD: BinaryDefinition = {
  id: 'ggshield',
  binary: 'ggshield',
  args: (copy) => ['secret', 'scan', 'path', copy, '--recursive', '--yes'],
  findingsExitCodes: [1],
  profile: {
    findingLine: />>> Incident \d+/,
    verifiedLine: /Validity:\s*Valid\b/,
    cleanMarker: /No secrets have been found/i,
  },
}

/**
 * A locally installed detection binary, scanning the working copy with
 * history disabled. Tools that support it run a second time to produce a
 * structured report beside the text artifact.
 */
export function createBinaryScanner(
  definition: BinaryDefinition,
  options: BinaryScannerOptions,
): Scanner {
  const timeoutMs = options.timeoutMs ?? DEFAULT_SCANNER_TIMEOUT_MS

  const descriptor = createDescriptor(
    definition.id,
    'binary',
    definition.profile,
    probeBinary(options.runner, definition.binary, ['version']),
  )

  async function writeReport(target: ScanTarget): Promise<RawScanOutcome['report']> {
    if (!definition.reportArgs) return null

    const reportPath = path.join(
      options.paths.resultsDir,
      `${definition.id}_${target.repo.name}.json`,
    )
    // A report left by an earlier run must never stand in for this one.
    await rm(reportPath, { force: true })

    const result = await options.runner(
      definition.binary,
      definition.reportArgs(target.workingCopy, reportPath),
      { timeoutMs },
    )
    const finished = result.exitCode === 0
      || (result.exitCode !== null && definition.findingsExitCodes.includes(result.exitCode))
    if (result.timedOut || !finished) return null

    try {
      return await parseFindingsReport(reportPath)
    } catch {
      // Malformed or missing report: the normalizer falls back to the text output.
      return null
    }
  }

  return {
    descriptor,

    async invoke(target) {
      const missing = missingWorkingCopy(target)
      if (missing) return missing

      const result = await options.runner(
        definition.binary,
        definition.args(target.workingCopy),
        { timeoutMs },
      )
      const outcome = toToolOutcome(definition.id, result, timeoutMs, definition.findingsExitCodes)
      if (outcome.status !== 'Completed') return outcome

      return { ...outcome, report: await writeReport(target) }
    },
  }
}
