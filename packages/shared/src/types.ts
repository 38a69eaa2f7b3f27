export type ScanStatus = 'Completed' | 'Skipped' | 'Failed'

export type ScannerKind = 'container' | 'binary' | 'pattern'

export type ScannerSource = 'tool' | 'pattern'

export const SCAN_ERROR_CODES = [
  'DEPENDENCY_UNAVAILABLE',
  'INVOCATION_FAILED',
  'WORKING_COPY_MISSING',
  'ACQUISITION_FAILED',
  'CONFIG_ERROR',
  'PARSE_FAILED',
  'UNKNOWN_REPOSITORY',
  'DISK_FULL',
  'TIMEOUT',
  'UNKNOWN',
] as const

export type ScanErrorCode = (typeof SCAN_ERROR_CODES)[number]

export type ScanError = {
  code: ScanErrorCode
  message: string
}

export type RepositoryRef = {
  readonly url: string
  /** Final URL path segment without `.git`; unique within a run. */
  readonly name: string
}

export type AuditPaths = {
  baseDir: string
  reposDir: string
  resultsDir: string
  logsDir: string
  configFile: string
}

/** Summary of a structured side report written by a tool scanner. */
export type ReportSummary = {
  path: string
  findings: number
  verified: number
}

export type RawScanOutcome = {
  status: ScanStatus
  output: string
  report: ReportSummary | null
  error: ScanError | null
}

export type ScanResult = {
  readonly scannerId: string
  readonly repoName: string
  readonly source: ScannerSource
  readonly exitStatus: ScanStatus
  readonly rawOutput: string
  readonly findingCount: number
  readonly hasVerifiedSecret: boolean
  readonly hasUnverifiedMarker: boolean
  readonly reportPath: string | null
  readonly error: ScanError | null
}

export type GateTriggerReason = 'verified-secret' | 'unverified-tool-finding'

export type GateTrigger = {
  scannerId: string
  repoName: string
  reason: GateTriggerReason
}

export type AuditVerdict = {
  totalRepositories: number
  flaggedRepositories: ReadonlySet<string>
  triggers: GateTrigger[]
  pass: boolean
}
