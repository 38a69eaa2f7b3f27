import { mkdir } from 'node:fs/promises'
import { isScanError, toScanError } from '@secret-audit/shared/errors'
import type { AuditVerdict, RepositoryRef } from '@secret-audit/shared/types'
import type { ProcessRunner } from '@secret-audit/engine/exec'
import { createGitRepositorySource, type RepositorySource } from '@secret-audit/engine/repo-source'
import type { Scanner } from '@secret-audit/engine/scanner'
import { createDefaultScanners } from '@secret-audit/engine/scanners/index'
import { readRepositoryConfig, type AuditConfig } from './config.js'
import { EXIT_FAIL, EXIT_PASS } from './constants.js'
import { createRunLogger, type RunLogger } from './logger.js'
import { createAuditRunner } from './services/audit-runner.js'
import { evaluate } from './services/findings-gate.js'
import { createResultStore } from './services/result-store.js'
import { writeSummary } from './services/summary.js'

export type AuditDeps = {
  runner?: ProcessRunner
  scanners?: readonly Scanner[]
  source?: RepositorySource
  now?: () => Date
}

export type AuditOutcome = {
  exitCode: number
  /** Null when the run stopped before any repository was scanned. */
  verdict: AuditVerdict | null
  logFile: string
}

/**
 * One full audit: read the repository list, acquire and scan every
 * repository, gate the results and write the summary.
 */
export async function runAudit(config: AuditConfig, deps: AuditDeps = {}): Promise<AuditOutcome> {
  const { paths } = config
  const now = deps.now ?? (() => new Date())

  await Promise.all([
    mkdir(paths.reposDir, { recursive: true }),
    mkdir(paths.resultsDir, { recursive: true }),
    mkdir(paths.logsDir, { recursive: true }),
  ])

  const logger = await createRunLogger({ logsDir: paths.logsDir, now, echo: config.echo })

  try {
    logger.info('Starting security audit')
    logger.info(`Configuration: ${paths.configFile}`)

    let repos: RepositoryRef[]
    try {
      repos = await readRepositoryConfig(paths.configFile, logger)
    } catch (err) {
      if (!isScanError(err)) throw err
      logger.error(`${err.code}: ${err.message}`)
      return { exitCode: EXIT_FAIL, verdict: null, logFile: logger.filePath }
    }

    logger.info(`Found ${repos.length} repositories to scan`)

    const verdict = await scanAll(config, deps, repos, logger, now)
    return {
      exitCode: verdict.pass ? EXIT_PASS : EXIT_FAIL,
      verdict,
      logFile: logger.filePath,
    }
  } finally {
    await logger.close()
  }
}

async function scanAll(
  config: AuditConfig,
  deps: AuditDeps,
  repos: RepositoryRef[],
  logger: RunLogger,
  now: () => Date,
): Promise<AuditVerdict> {
  const { paths } = config

  const store = createResultStore({ paths, repositories: repos })
  const source = deps.source ?? createGitRepositorySource({ paths, runner: deps.runner })
  const scanners = deps.scanners ?? createDefaultScanners({
    paths,
    runner: deps.runner,
    timeoutMs: config.timeoutMs,
    trufflehogImage: config.trufflehogImage,
  })

  const runner = createAuditRunner({
    source,
    scanners,
    store,
    logger,
    concurrency: config.concurrency,
  })

  const results = await runner.run(repos)
  const verdict = evaluate(results)

  for (const trigger of verdict.triggers) {
    logger.warn(`⚠ Findings detected in ${trigger.scannerId}_${trigger.repoName} (${trigger.reason})`)
  }

  if (verdict.pass) {
    logger.info('✓ No secrets detected; pipeline passes')
  } else {
    logger.error(`⚠ ${verdict.flaggedRepositories.size} repositories contain potential secrets; failing pipeline`)
  }

  logger.info('Generating summary report')
  try {
    const summary = await writeSummary(paths.resultsDir, store.artifacts(), verdict, now())
    if (config.echo) process.stdout.write(summary.text)
  } catch (err) {
    logger.error(`Could not write summary: ${toScanError(err).message}`)
  }

  return verdict
}
