import { existsSync } from 'node:fs'
import { mkdir } from 'node:fs/promises'
import path from 'node:path'
import { isDiskFull } from '@secret-audit/shared/errors'
import type { AuditPaths, RepositoryRef, ScanError } from '@secret-audit/shared/types'
import { DEFAULT_GIT_TIMEOUT_MS } from './constants.js'
import { combinedOutput, runProcess, type ExecResult, type ProcessRunner } from './exec.js'

export type RepositorySourceOptions = {
  paths: Pick<AuditPaths, 'reposDir'>
  runner?: ProcessRunner
  timeoutMs?: number
}

export type RepositorySource = {
  /** Where the working copy lives, whether or not it exists yet. */
  pathFor(repo: RepositoryRef): string
  /** Clone when absent, pull when present. Throws a ScanError on failure. */
  acquire(repo: RepositoryRef): Promise<string>
}

export function createGitRepositorySource(options: RepositorySourceOptions): RepositorySource {
  const runner = options.runner ?? runProcess
  const timeoutMs = options.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS

  function pathFor(repo: RepositoryRef): string {
    return path.join(options.paths.reposDir, repo.name)
  }

  async function execGit(args: string[]): Promise<void> {
    const result = await runner('git', args, { timeoutMs, env: gitEnv() })
    if (result.exitCode !== 0) {
      throw toAcquisitionError(args[0] === 'clone' ? 'clone' : 'pull', result)
    }
  }

  return {
    pathFor,

    async acquire(repo) {
      const repoPath = pathFor(repo)

      if (existsSync(path.join(repoPath, '.git'))) {
        await execGit(['-C', repoPath, 'pull', '--quiet'])
      } else {
        await mkdir(options.paths.reposDir, { recursive: true })
        // Full history: the pattern scanner inspects deleted files.
        await execGit(['clone', '--quiet', '--', repo.url, repoPath])
      }

      return repoPath
    },
  }
}

function gitEnv(): NodeJS.ProcessEnv {
  return {
    // Allowlist only what git needs; avoid leaking secrets from the parent env.
    PATH: process.env.PATH,
    HOME: process.env.HOME,
    TMPDIR: process.env.TMPDIR,
    // Disable interactive prompts (e.g. for credentials)
    GIT_TERMINAL_PROMPT: '0',
    HTTP_PROXY: process.env.HTTP_PROXY,
    HTTPS_PROXY: process.env.HTTPS_PROXY,
    NO_PROXY: process.env.NO_PROXY,
    SSL_CERT_FILE: process.env.SSL_CERT_FILE,
    GIT_SSH_COMMAND: process.env.GIT_SSH_COMMAND,
    SSH_AUTH_SOCK: process.env.SSH_AUTH_SOCK,
  }
}

function toAcquisitionError(action: 'clone' | 'pull', result: ExecResult): ScanError {
  const output = combinedOutput(result).trim()

  if (result.timedOut) {
    return { code: 'TIMEOUT', message: `Git ${action} timed out: ${output}`.trim() }
  }

  if (isDiskFull(output)) {
    return { code: 'DISK_FULL', message: `Disk full during ${action}: ${output}` }
  }

  if (result.notFound) {
    return { code: 'ACQUISITION_FAILED', message: 'git is not installed' }
  }

  return {
    code: 'ACQUISITION_FAILED',
    message: `Git ${action} failed (exit ${result.exitCode ?? 'signal'}): ${output}`.trim(),
  }
}
