import path from 'node:path'
import { CONTAINER_MOUNT_PATH, DEFAULT_SCANNER_TIMEOUT_MS, DEFAULT_TRUFFLEHOG_IMAGE } from '../constants.js'
import type { ProcessRunner } from '../exec.js'
import {
  createDescriptor,
  missingWorkingCopy,
  probeBinary,
  toToolOutcome,
  type OutputProfile,
  type Scanner,
} from '../scanner.js'

export type ContainerScannerOptions = {
  runner: ProcessRunner
  /** Container runtime CLI. */
  runtime?: string
  image?: string
  timeoutMs?: number
}

export const TRUFFLEHOG_PROFILE: OutputProfile = {
  findingLine: /Found (?:un)?verified result/,
  verifiedLine: /Found verified result/,
  unverifiedLine: /Found unverified result/,
  verifiedCount: /"verified_secrets":\s*(\d+)/,
  unverifiedCount: /"unverified_secrets":\s*(\d+)/,
}

/**
 * TruffleHog inside a throwaway container, scanning a read-only mount of
 * the working copy in filesystem mode (no history walk).
 */
export function createTrufflehogScanner(options: ContainerScannerOptions): Scanner {
  const runtime = options.runtime ?? 'docker'
  const image = options.image ?? DEFAULT_TRUFFLEHOG_IMAGE
  const timeoutMs = options.timeoutMs ?? DEFAULT_SCANNER_TIMEOUT_MS

  const descriptor = createDescriptor(
    'trufflehog',
    'container',
    TRUFFLEHOG_PROFILE,
    // `info` talks to the daemon, so a stopped runtime counts as unavailable.
    probeBinary(options.runner, runtime, ['info', '--format', '{{.ServerVersion}}'], {
      requireSuccess: true,
    }),
  )

  return {
    descriptor,

    async invoke(target) {
      const missing = missingWorkingCopy(target)
      if (missing) return missing

      const result = await options.runner(runtime, [
        'run', '--rm',
        '-v', `${path.resolve(target.workingCopy)}:${CONTAINER_MOUNT_PATH}:ro`,
        image,
        'filesystem', CONTAINER_MOUNT_PATH,
        '--no-update',
      ], { timeoutMs })

      return toToolOutcome(descriptor.id, result, timeoutMs)
    },
  }
}
