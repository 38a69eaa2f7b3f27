import type { AuditVerdict, GateTrigger, GateTriggerReason, ScanResult } from '@secret-audit/shared/types'

/**
 * Why a single result gates the pipeline, or null when it is advisory.
 * Pattern-scanner hits never gate on their own.
 */
export function gateReason(result: ScanResult): GateTriggerReason | null {
  if (result.hasVerifiedSecret) return 'verified-secret'
  if (result.source === 'tool' && result.findingCount > 0 && result.hasUnverifiedMarker) {
    return 'unverified-tool-finding'
  }
  return null
}

/** Pure reduction of a run's results to the pass/fail verdict. */
export function evaluate(results: readonly ScanResult[]): AuditVerdict {
  const repositories = new Set<string>()
  const flaggedRepositories = new Set<string>()
  const triggers: GateTrigger[] = []

  for (const result of results) {
    repositories.add(result.repoName)

    const reason = gateReason(result)
    if (!reason) continue

    flaggedRepositories.add(result.repoName)
    triggers.push({ scannerId: result.scannerId, repoName: result.repoName, reason })
  }

  return {
    totalRepositories: repositories.size,
    flaggedRepositories,
    triggers,
    pass: flaggedRepositories.size === 0,
  }
}
