import type { RawScanOutcome, RepositoryRef, ScanResult } from '@secret-audit/shared/types'
import { CLEAN_PREFIX, NOTICE_PREFIX } from './constants.js'
import type { OutputProfile, ScannerDescriptor } from './scanner.js'

const SECTION_HEADER = /^=== \d+\. .* ===$/

/**
 * Reduce a scanner's raw outcome to the common result record. Pure and
 * total: unrecognized or malformed output degrades to text heuristics.
 */
export function normalize(
  descriptor: ScannerDescriptor,
  repo: RepositoryRef,
  outcome: RawScanOutcome,
): ScanResult {
  const isPattern = descriptor.kind === 'pattern'

  const result: ScanResult = {
    scannerId: descriptor.id,
    repoName: repo.name,
    source: isPattern ? 'pattern' : 'tool',
    exitStatus: outcome.status,
    rawOutput: outcome.output,
    findingCount: isPattern
      ? countPatternSections(outcome)
      : countToolFindings(descriptor.profile, outcome),
    hasVerifiedSecret: !isPattern && hasVerified(descriptor.profile, outcome),
    hasUnverifiedMarker: !isPattern && hasUnverified(descriptor.profile, outcome),
    reportPath: outcome.report?.path ?? null,
    error: outcome.error,
  }

  return Object.freeze(result)
}

/** Number of check sections holding at least one real hit. */
export function countPatternSections(outcome: RawScanOutcome): number {
  if (outcome.status !== 'Completed') return 0

  let count = 0
  let inSection = false
  let sectionHasHit = false

  for (const line of outcome.output.split('\n')) {
    if (SECTION_HEADER.test(line)) {
      if (sectionHasHit) count++
      inSection = true
      sectionHasHit = false
      continue
    }
    if (!inSection || sectionHasHit) continue
    if (line.startsWith('=')) {
      inSection = false
      continue
    }
    if (line.trim() && !line.startsWith(CLEAN_PREFIX) && !line.startsWith(NOTICE_PREFIX)) {
      sectionHasHit = true
    }
  }

  return sectionHasHit ? count + 1 : count
}

export function countToolFindings(profile: OutputProfile, outcome: RawScanOutcome): number {
  if (outcome.status !== 'Completed') return 0
  if (outcome.report) return outcome.report.findings

  const lineHits = countLines(profile.findingLine, outcome.output)
  if (lineHits > 0) return lineHits

  const total = captureCount(profile.totalCount, outcome.output)
  if (total !== null) return total

  const verified = captureCount(profile.verifiedCount, outcome.output)
  const unverified = captureCount(profile.unverifiedCount, outcome.output)
  if (verified !== null || unverified !== null) return (verified ?? 0) + (unverified ?? 0)

  if (profile.cleanMarker?.test(outcome.output)) return 0
  return outcome.output.trim() ? 1 : 0
}

function hasVerified(profile: OutputProfile, outcome: RawScanOutcome): boolean {
  return countLines(profile.verifiedLine, outcome.output) > 0
    || (captureCount(profile.verifiedCount, outcome.output) ?? 0) > 0
    || (outcome.report?.verified ?? 0) > 0
}

function hasUnverified(profile: OutputProfile, outcome: RawScanOutcome): boolean {
  return countLines(profile.unverifiedLine, outcome.output) > 0
    || (captureCount(profile.unverifiedCount, outcome.output) ?? 0) > 0
}

function countLines(pattern: RegExp | undefined, output: string): number {
  if (!pattern) return 0
  return output.split('\n').filter((line) => pattern.test(line)).length
}

/** Largest value captured by `pattern` anywhere in the output, or null. */
function captureCount(pattern: RegExp | undefined, output: string): number | null {
  if (!pattern) return null

  const global = new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`)
  let best: number | null = null
  for (const match of output.matchAll(global)) {
    const value = Number.parseInt(match[1] ?? '', 10)
    if (Number.isNaN(value)) continue
    best = best === null ? value : Math.max(best, value)
  }
  return best
}
