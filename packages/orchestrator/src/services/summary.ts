import { readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { AuditVerdict } from '@secret-audit/shared/types'
import { formatTimestamp } from '../logger.js'
import {
  SUMMARY_FILENAME,
  SUMMARY_PREVIEW_LINES,
  SUMMARY_PREVIEW_THRESHOLD,
} from '../constants.js'

export type ArtifactInfo = {
  fileName: string
  lines: number
  bytes: number
  preview: string[]
}

export type SummaryInput = {
  artifacts: readonly ArtifactInfo[]
  verdict: AuditVerdict
  resultsDir: string
  generatedAt: Date
}

const RULE = '='.repeat(65)

export async function describeArtifact(filePath: string): Promise<ArtifactInfo> {
  const content = await readFile(filePath, 'utf-8')
  const lines = content === '' ? [] : content.replace(/\n$/, '').split('\n')

  return {
    fileName: path.basename(filePath),
    lines: lines.length,
    bytes: Buffer.byteLength(content),
    preview: lines.slice(0, SUMMARY_PREVIEW_LINES),
  }
}

export function renderSummary(input: SummaryInput): string {
  const { verdict } = input
  const out: string[] = [
    RULE,
    'SECURITY AUDIT SUMMARY REPORT',
    RULE,
    `Generated: ${formatTimestamp(input.generatedAt)}`,
    `Results Directory: ${input.resultsDir}`,
    RULE,
    '',
  ]

  for (const artifact of input.artifacts) {
    out.push(`📄 ${artifact.fileName} (${artifact.lines} lines, ${artifact.bytes} bytes)`)
    if (artifact.lines > SUMMARY_PREVIEW_THRESHOLD) {
      out.push('   Preview:', ...artifact.preview.map((line) => `   | ${line}`), '   ...')
    }
    out.push('')
  }

  out.push(RULE)
  out.push(`Repositories scanned: ${verdict.totalRepositories}`)
  if (verdict.pass) {
    out.push('Verdict: PASS (no verified or tool-confirmed secrets)')
  } else {
    out.push(`Verdict: FAIL (${verdict.flaggedRepositories.size} repositories flagged)`)
    for (const trigger of verdict.triggers) {
      out.push(`  ⚠ ${trigger.repoName}: ${trigger.reason} (${trigger.scannerId})`)
    }
  }

  out.push(
    RULE,
    'Next Steps:',
    `  1. Review each report in: ${input.resultsDir}`,
    '  2. Investigate any findings marked with ⚠',
    '  3. Rotate any exposed credentials immediately',
    '  4. Update .gitignore to prevent future leaks',
    RULE,
  )

  return `${out.join('\n')}\n`
}

/** Write `00_SUMMARY.txt` and return its path and text. */
export async function writeSummary(
  resultsDir: string,
  artifactPaths: readonly string[],
  verdict: AuditVerdict,
  generatedAt: Date = new Date(),
): Promise<{ path: string; text: string }> {
  const artifacts = await Promise.all(artifactPaths.map(describeArtifact))
  const text = renderSummary({ artifacts, verdict, resultsDir, generatedAt })
  const summaryPath = path.join(resultsDir, SUMMARY_FILENAME)

  await writeFile(summaryPath, text, 'utf-8')
  return { path: summaryPath, text }
}
