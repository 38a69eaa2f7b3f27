import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import path from 'node:path'
import fg from 'fast-glob'
import { toScanError } from '@secret-audit/shared/errors'
import type { RawScanOutcome } from '@secret-audit/shared/types'
import {
  CLEAN_PREFIX,
  DEFAULT_GIT_TIMEOUT_MS,
  NOTICE_PREFIX,
  PATTERN_MAX_FILE_BYTES,
  PATTERN_MAX_LINE_LENGTH,
} from '../constants.js'
import type { ProcessRunner } from '../exec.js'
import { createDescriptor, missingWorkingCopy, type Scanner, type ScanTarget } from '../scanner.js'

export const PATTERN_SCANNER_ID = 'manual_checks'

export type PatternScannerOptions = {
  runner: ProcessRunner
  timeoutMs?: number
  /** Reads one file as UTF-8 text (default `fs.readFile`). */
  readText?: (filePath: string) => Promise<string>
}

type FileCheck = {
  title: string
  clean: string
  matches(relPath: string): boolean
}

type ContentCheck = {
  title: string
  clean: string
  skip(relPath: string): boolean
  matches(line: string): boolean
}

type Section = {
  title: string
  lines: string[]
}

const RULE = '='.repeat(65)

const SENSITIVE_HISTORY_FILE = /\.(env|key|pem|p12|pfx|crt)$/

const inNodeModules = (relPath: string) => relPath.split('/').includes('node_modules')
const isMarkdown = (relPath: string) => relPath.toLowerCase().endsWith('.md')

export const FILE_CHECKS: readonly FileCheck[] = [
  {
    title: 'Environment Files',
    clean: 'No .env files found',
    matches: (relPath) => path.posix.basename(relPath).includes('.env'),
  },
  {
    title: 'Private Keys',
    clean: 'No private key files found',
    matches: (relPath) => ['.pem', '.key', '.p12'].includes(path.posix.extname(relPath).toLowerCase()),
  },
]

export const CONTENT_CHECKS: readonly ContentCheck[] = [
  {
    title: 'Password/Secret Patterns',
    clean: 'No suspicious patterns found',
    skip: (relPath) => inNodeModules(relPath) || isMarkdown(relPath),
    matches: (line) => /password|secret|api_key|apikey|token/i.test(line),
  },
  {
    title: 'Hardcoded IPs',
    clean: 'No hardcoded IPs found',
    skip: inNodeModules,
    matches: hasRoutableIpv4,
  },
  {
    title: 'AWS Credentials',
    clean: 'No AWS credentials found',
    skip: () => false,
    matches: (line) => /AKIA[0-9A-Z]{16}|aws_access_key_id|aws_secret_access_key/i.test(line),
  },
  {
    title: 'Database Connection Strings',
    clean: 'No database connections found',
    skip: isMarkdown,
    matches: (line) => /mysql:\/\/|postgres:\/\/|mongodb:\/\/|redis:\/\//i.test(line),
  },
]

/** True when the line holds a valid IPv4 literal other than loopback or 0.0.0.0. */
export function hasRoutableIpv4(line: string): boolean {
  for (const match of line.matchAll(/\b(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\b/g)) {
    const octets = match.slice(1, 5).map(Number)
    if (octets.some((o) => o > 255)) continue
    if (octets[0] === 127) continue
    if (octets.every((o) => o === 0)) continue
    return true
  }
  return false
}

/**
 * In-process checks that need nothing installed: sensitive file names,
 * keyword and shape sweeps over text files, and deleted sensitive files in
 * history. Every section ends with either hits or a single clean marker.
 */
export function createPatternScanner(options: PatternScannerOptions): Scanner {
  const timeoutMs = options.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS
  const readText = options.readText ?? ((filePath: string) => readFile(filePath, 'utf-8'))

  const descriptor = createDescriptor(PATTERN_SCANNER_ID, 'pattern', {}, async () => true)

  async function historySection(target: ScanTarget): Promise<Section> {
    const title = 'Git History - Deleted Sensitive Files'

    // Without its own .git, git would walk up into an enclosing repository.
    if (!existsSync(path.join(target.workingCopy, '.git'))) {
      return { title, lines: [`${NOTICE_PREFIX}History not inspected (not a git working copy)`] }
    }

    const result = await options.runner(
      'git',
      ['-C', target.workingCopy, 'log', '--diff-filter=D', '--summary', '--all'],
      { timeoutMs },
    )

    if (result.exitCode !== 0) {
      const reason = result.notFound ? 'git not installed' : 'not a readable git repository'
      return { title, lines: [`${NOTICE_PREFIX}History not inspected (${reason})`] }
    }

    const hits = result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => SENSITIVE_HISTORY_FILE.test(line))

    return { title, lines: orClean(hits, 'No sensitive files in history') }
  }

  return {
    descriptor,

    async invoke(target): Promise<RawScanOutcome> {
      const missing = missingWorkingCopy(target)
      if (missing) return missing

      const entries = await fg('**/*', {
        cwd: target.workingCopy,
        dot: true,
        onlyFiles: true,
        followSymbolicLinks: false,
        suppressErrors: true,
        ignore: ['**/.git/**'],
        stats: true,
      })
      const files = entries
        .map((entry) => ({ relPath: entry.path, size: entry.stats?.size ?? 0 }))
        .sort((a, b) => (a.relPath < b.relPath ? -1 : a.relPath > b.relPath ? 1 : 0))

      const sections: Section[] = FILE_CHECKS.map((check) => ({
        title: check.title,
        lines: orClean(files.map((f) => f.relPath).filter(check.matches), check.clean),
      }))

      const contentHits: string[][] = CONTENT_CHECKS.map(() => [])
      const unreadable: { relPath: string; reason: string }[] = []

      for (const file of files) {
        if (file.size > PATTERN_MAX_FILE_BYTES) continue

        let content: string
        try {
          content = await readText(path.join(target.workingCopy, file.relPath))
        } catch (err) {
          unreadable.push({ relPath: file.relPath, reason: toScanError(err).message })
          continue
        }
        if (content.includes('\0')) continue

        const lines = content.split('\n')
        CONTENT_CHECKS.forEach((check, i) => {
          if (check.skip(file.relPath)) return
          lines.forEach((raw, index) => {
            const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw
            if (check.matches(line)) {
              contentHits[i].push(`${file.relPath}:${index + 1}:${line.slice(0, PATTERN_MAX_LINE_LENGTH)}`)
            }
          })
        })
      }

      CONTENT_CHECKS.forEach((check, i) => {
        const notices = unreadable
          .filter((file) => !check.skip(file.relPath))
          .map((file) => `${NOTICE_PREFIX}Could not read ${file.relPath}: ${file.reason}`)
        sections.push({ title: check.title, lines: [...orClean(contentHits[i], check.clean), ...notices] })
      })
      sections.push(await historySection(target))

      return {
        status: 'Completed',
        output: renderChecks(target.repo.name, sections),
        report: null,
        error: null,
      }
    },
  }
}

function orClean(hits: string[], clean: string): string[] {
  return hits.length > 0 ? hits : [`${CLEAN_PREFIX}${clean}`]
}

function renderChecks(repoName: string, sections: Section[]): string {
  const out = [RULE, `Manual Security Checks for: ${repoName}`, RULE, '']

  sections.forEach((section, i) => {
    out.push(`=== ${i + 1}. ${section.title} ===`, ...section.lines, '')
  })

  out.push(RULE)
  return `${out.join('\n')}\n`
}
