import { toScanError } from '@secret-audit/shared/errors'
import type { RawScanOutcome, RepositoryRef, ScannerKind, ScanResult } from '@secret-audit/shared/types'
import { normalize } from '@secret-audit/engine/normalizer'
import type { RepositorySource } from '@secret-audit/engine/repo-source'
import type { Scanner, ScannerDescriptor, ScanTarget } from '@secret-audit/engine/scanner'
import type { Logger } from '../logger.js'
import { createJobQueue } from './job-queue.js'
import type { ResultStore } from './result-store.js'

export type RepositoryState = 'Pending' | 'Acquiring' | 'Scanning' | 'Done'

export type AuditRunnerDeps = {
  source: RepositorySource
  scanners: readonly Scanner[]
  store: ResultStore
  logger: Logger
  /** Repositories processed in parallel; scanners within one repository stay sequential. */
  concurrency?: number
}

const KIND_RANK: Record<ScannerKind, number> = { container: 0, binary: 1, pattern: 2 }

/** Tool scanners first, in-process checks last; registration order within a kind. */
export function orderScanners(scanners: readonly Scanner[]): Scanner[] {
  return scanners
    .map((scanner, index) => ({ scanner, index }))
    .sort((a, b) =>
      KIND_RANK[a.scanner.descriptor.kind] - KIND_RANK[b.scanner.descriptor.kind] || a.index - b.index)
    .map(({ scanner }) => scanner)
}

function unavailable(descriptor: ScannerDescriptor): RawScanOutcome {
  return {
    status: 'Skipped',
    output: '',
    report: null,
    error: {
      code: 'DEPENDENCY_UNAVAILABLE',
      message: descriptor.kind === 'container'
        ? `container runtime for ${descriptor.id} is not available`
        : `${descriptor.id} is not installed`,
    },
  }
}

export function createAuditRunner(deps: AuditRunnerDeps) {
  const { source, store, logger } = deps
  const scanners = orderScanners(deps.scanners)
  const states = new Map<string, RepositoryState>()

  /** One (scanner, repository) cell. Never throws. */
  async function runCell(scanner: Scanner, target: ScanTarget): Promise<void> {
    const { descriptor } = scanner
    const label = `${descriptor.id}/${target.repo.name}`

    let outcome: RawScanOutcome
    try {
      if (await descriptor.isAvailable()) {
        logger.info(`Running ${descriptor.id} on ${target.repo.name}`)
        outcome = await scanner.invoke(target)
      } else {
        outcome = unavailable(descriptor)
      }
    } catch (err) {
      outcome = { status: 'Failed', output: '', report: null, error: toScanError(err, 'INVOCATION_FAILED') }
    }

    const result = normalize(descriptor, target.repo, outcome)
    logOutcome(label, result)

    try {
      await store.put(result)
    } catch (err) {
      logger.error(`${label}: could not store result: ${toScanError(err).message}`)
    }
  }

  function logOutcome(label: string, result: ScanResult): void {
    switch (result.exitStatus) {
      case 'Skipped':
        logger.info(`Skipping ${label}: ${result.error?.message ?? 'dependency unavailable'}`)
        break
      case 'Failed':
        logger.error(`${label}: ${result.error?.code ?? 'UNKNOWN'} ${result.error?.message ?? ''}`.trim())
        break
      case 'Completed':
        logger.info(`${label}: completed with ${result.findingCount} finding(s)`)
        break
    }
  }

  async function processRepository(repo: RepositoryRef): Promise<void> {
    logger.info(`Processing: ${repo.name}`)

    states.set(repo.name, 'Acquiring')
    let workingCopy: string
    try {
      workingCopy = await source.acquire(repo)
    } catch (err) {
      const error = toScanError(err, 'ACQUISITION_FAILED')
      logger.warn(`${repo.name}: ${error.code} ${error.message}; scanning existing local copy`)
      workingCopy = source.pathFor(repo)
    }

    states.set(repo.name, 'Scanning')
    for (const scanner of scanners) {
      await runCell(scanner, { repo, workingCopy })
    }

    states.set(repo.name, 'Done')
    logger.info(`✓ Finished processing ${repo.name}`)
  }

  return {
    async run(repos: readonly RepositoryRef[]): Promise<ScanResult[]> {
      const queue = createJobQueue<RepositoryRef>({ maxConcurrent: deps.concurrency ?? 1 })

      for (const repo of repos) states.set(repo.name, 'Pending')

      queue.setProcessor((repo) => {
        void processRepository(repo)
          .catch((err: unknown) => {
            logger.error(`${repo.name}: ${toScanError(err).message}`)
            states.set(repo.name, 'Done')
          })
          .finally(() => queue.onJobComplete())
      })

      for (const repo of repos) queue.enqueue(repo)
      await queue.drain()

      return store.getAll()
    },

    state(repoName: string): RepositoryState | undefined {
      return states.get(repoName)
    },
  }
}

export type AuditRunner = ReturnType<typeof createAuditRunner>
