import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import os from 'node:os'
import type { AuditVerdict } from '@secret-audit/shared/types'
import { describeArtifact, renderSummary, writeSummary } from './summary.js'

const RULE = '='.repeat(65)
const GENERATED = new Date(2026, 9, 19, 9, 30, 0)

const PASSING: AuditVerdict = {
  totalRepositories: 1,
  flaggedRepositories: new Set(),
  triggers: [],
  pass: true,
}

describe('describeArtifact', () => {
  it('counts lines and bytes and keeps the first three lines', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'sa-summary-'))
    const filePath = path.join(dir, 'gitleaks_api.txt')
    await writeFile(filePath, 'a\nb\nc\nd\n')

    try {
      assert.deepEqual(await describeArtifact(filePath), {
        fileName: 'gitleaks_api.txt',
        lines: 4,
        bytes: 8,
        preview: ['a', 'b', 'c'],
      })
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })

  it('reports an empty file as zero lines', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'sa-summary-'))
    const filePath = path.join(dir, 'trufflehog_api.txt')
    await writeFile(filePath, '')

    try {
      const info = await describeArtifact(filePath)
      assert.equal(info.lines, 0)
      assert.deepEqual(info.preview, [])
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })
})

describe('renderSummary', () => {
  it('lists artifacts with a preview only for longer files', () => {
    const text = renderSummary({
      artifacts: [
        { fileName: 'gitleaks_api.txt', lines: 1, bytes: 19, preview: ['INF no leaks found'] },
        { fileName: 'manual_checks_api.txt', lines: 30, bytes: 900, preview: ['=====', 'Manual Security Checks for: api', '====='] },
      ],
      verdict: PASSING,
      resultsDir: '/srv/audit/results',
      generatedAt: GENERATED,
    })

    assert.equal(text, [
      RULE,
      'SECURITY AUDIT SUMMARY REPORT',
      RULE,
      'Generated: 2026-10-19 09:30:00',
      'Results Directory: /srv/audit/results',
      RULE,
      '',
      '📄 gitleaks_api.txt (1 lines, 19 bytes)',
      '',
      '📄 manual_checks_api.txt (30 lines, 900 bytes)',
      '   Preview:',
      '   | =====',
      '   | Manual Security Checks for: api',
      '   | =====',
      '   ...',
      '',
      RULE,
      'Repositories scanned: 1',
      'Verdict: PASS (no verified or tool-confirmed secrets)',
      RULE,
      'Next Steps:',
      '  1. Review each report in: /srv/audit/results',
      '  2. Investigate any findings marked with ⚠',
      '  3. Rotate any exposed credentials immediately',
      '  4. Update .gitignore to prevent future leaks',
      RULE,
      '',
    ].join('\n'))
  })

  it('lists each trigger when the verdict fails', () => {
    const text = renderSummary({
      artifacts: [],
      verdict: {
        totalRepositories: 2,
        flaggedRepositories: new Set(['web']),
        triggers: [{ scannerId: 'trufflehog', repoName: 'web', reason: 'verified-secret' }],
        pass: false,
      },
      resultsDir: '/srv/audit/results',
      generatedAt: GENERATED,
    })

    const lines = text.split('\n')
    assert.ok(lines.includes('Verdict: FAIL (1 repositories flagged)'))
    assert.ok(lines.includes('  ⚠ web: verified-secret (trufflehog)'))
  })
})

describe('writeSummary', () => {
  it('writes 00_SUMMARY.txt into the results directory', async () => {
    const resultsDir = await mkdtemp(path.join(os.tmpdir(), 'sa-summary-'))
    const artifact = path.join(resultsDir, 'manual_checks_api.txt')
    await writeFile(artifact, 'line\n')

    try {
      const summary = await writeSummary(resultsDir, [artifact], PASSING, GENERATED)

      assert.equal(summary.path, path.join(resultsDir, '00_SUMMARY.txt'))
      assert.equal(await readFile(summary.path, 'utf-8'), summary.text)
      assert.ok(summary.text.split('\n').includes('📄 manual_checks_api.txt (1 lines, 5 bytes)'))
    } finally {
      await rm(resultsDir, { recursive: true, force: true })
    }
  })
})
