import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import type { AuditPaths, RepositoryRef, ScanError } from '@secret-audit/shared/types'
import { DEFAULT_SCANNER_TIMEOUT_MS, DEFAULT_TRUFFLEHOG_IMAGE } from '@secret-audit/engine/constants'
import { CONFIG_TEMPLATE, DEFAULT_CONCURRENCY } from './constants.js'
import type { Logger } from './logger.js'

export type AuditConfig = {
  paths: AuditPaths
  concurrency: number
  timeoutMs: number
  trufflehogImage: string
  /** Mirror log lines and the summary to the console. */
  echo: boolean
}

export type ConfigOverrides = {
  baseDir?: string
  configFile?: string
  concurrency?: string
  timeoutMs?: string
  trufflehogImage?: string
  quiet?: boolean
}

function configError(message: string): ScanError {
  return { code: 'CONFIG_ERROR', message }
}

export function resolvePaths(baseDir: string, configFile?: string): AuditPaths {
  const base = path.resolve(baseDir)
  return {
    baseDir: base,
    reposDir: path.join(base, 'repos'),
    resultsDir: path.join(base, 'results'),
    logsDir: path.join(base, 'logs'),
    configFile: configFile ? path.resolve(configFile) : path.join(base, 'config', 'repos.txt'),
  }
}

/** A positive integer, or `auto` for one worker per available CPU. */
export function parseConcurrency(value: string | undefined): number {
  if (value === undefined || value === '') return DEFAULT_CONCURRENCY
  if (value === 'auto') return os.availableParallelism()

  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw configError(`Invalid concurrency "${value}": expected a positive integer or "auto"`)
  }
  return parsed
}

function parseTimeout(value: string | undefined): number {
  if (value === undefined || value === '') return DEFAULT_SCANNER_TIMEOUT_MS

  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw configError(`Invalid timeout "${value}": expected milliseconds as a positive integer`)
  }
  return parsed
}

/** CLI overrides win over SECRET_AUDIT_* environment variables. */
export function loadAuditConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): AuditConfig {
  const baseDir = overrides.baseDir ?? env.SECRET_AUDIT_BASE_DIR ?? process.cwd()

  return {
    paths: resolvePaths(baseDir, overrides.configFile),
    concurrency: parseConcurrency(overrides.concurrency ?? env.SECRET_AUDIT_CONCURRENCY),
    timeoutMs: parseTimeout(overrides.timeoutMs ?? env.SECRET_AUDIT_TIMEOUT_MS),
    trufflehogImage: overrides.trufflehogImage
      ?? env.SECRET_AUDIT_TRUFFLEHOG_IMAGE
      ?? DEFAULT_TRUFFLEHOG_IMAGE,
    echo: !overrides.quiet,
  }
}

/**
 * `https://host/org/repo.git` → `repo`. Also handles scp-style
 * `git@host:org/repo.git` and trailing slashes.
 */
export function deriveRepoName(url: string): string {
  const trimmed = url.replace(/\/+$/, '')
  const lastSegment = trimmed.split(/[/:]/).pop() ?? ''
  const name = lastSegment.replace(/\.git$/, '')

  if (!name || name === '.' || name === '..') {
    throw configError(`Cannot derive a repository name from "${url}"`)
  }
  return name
}

/**
 * One URL per line; blank lines and `#` comments are ignored. Repeated URLs
 * collapse to their first occurrence; distinct URLs sharing a name are an error.
 */
export function parseRepositoryList(text: string): RepositoryRef[] {
  const byName = new Map<string, RepositoryRef>()

  for (const raw of text.split(/\r?\n/)) {
    const url = raw.trim()
    if (!url || url.startsWith('#')) continue

    const name = deriveRepoName(url)
    const existing = byName.get(name)
    if (existing) {
      if (existing.url === url) continue
      throw configError(`Repositories "${existing.url}" and "${url}" both resolve to the name "${name}"`)
    }
    byName.set(name, { url, name })
  }

  return [...byName.values()]
}

/**
 * Read the repository list. A missing file is created from a template so
 * it can be edited, and the run still fails: scanning nothing is never a pass.
 */
export async function readRepositoryConfig(configFile: string, logger: Logger): Promise<RepositoryRef[]> {
  if (!existsSync(configFile)) {
    logger.warn(`Config file not found. Creating sample config at ${configFile}`)
    await mkdir(path.dirname(configFile), { recursive: true })
    await writeFile(configFile, CONFIG_TEMPLATE, 'utf-8')
    logger.info(`Edit ${configFile} to add your repositories`)
  }

  const repos = parseRepositoryList(await readFile(configFile, 'utf-8'))
  if (repos.length === 0) {
    throw configError(`No repositories found in ${configFile}`)
  }
  return repos
}
