import type { AuditPaths } from '@secret-audit/shared/types'
import { runProcess, type ProcessRunner } from '../exec.js'
import type { Scanner } from '../scanner.js'
import { createBinaryScanner, GGSHIELD, GITLEAKS } from './binary-scanner.js'
import { createTrufflehogScanner } from './container-scanner.js'
import { createPatternScanner } from './pattern-scanner.js'

export type DefaultScannerOptions = {
  paths: Pick<AuditPaths, 'resultsDir'>
  runner?: ProcessRunner
  timeoutMs?: number
  trufflehogImage?: string
}

/** The standard battery: container tool, local binaries, then in-process checks. */
export function createDefaultScanners(options: DefaultScannerOptions): Scanner[] {
  const runner = options.runner ?? runProcess
  const { timeoutMs } = options

  return [
    createTrufflehogScanner({ runner, timeoutMs, image: options.trufflehogImage }),
    createBinaryScanner(GITLEAKS, { runner, timeoutMs, paths: options.paths }),
    createBinaryScanner(GGSHIELD, { runner, timeoutMs, paths: options.paths }),
    createPatternScanner({ runner, timeoutMs }),
  ]
}
