import { describe, it, before, after } from 'node:test'
import assert from 'node:assert/strict'
import { existsSync } from 'node:fs'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import os from 'node:os'
import { createFakeRunner, type RecordedCall } from '../__fixtures__/fake-runner.js'
import { createBinaryScanner, GGSHIELD, GITLEAKS } from './binary-scanner.js'

const REPO = { url: 'https://git.example.test/team/web.git', name: 'web' }

function reportPathOf(call: RecordedCall): string | null {
  const i = call.args.indexOf('--report-path')
  return i === -1 ? null : call.args[i + 1]
}

describe('createBinaryScanner', () => {
  let resultsDir: string

  before(async () => {
    resultsDir = await mkdtemp(path.join(os.tmpdir(), 'sa-results-'))
  })

  after(async () => {
    await rm(resultsDir, { recursive: true, force: true })
  })

  it('probes the binary with `version`', async () => {
    const fake = createFakeRunner(() => ({ exitCode: null, notFound: true }))
    const scanner = createBinaryScanner(GITLEAKS, { runner: fake.runner, paths: { resultsDir } })

    assert.equal(await scanner.descriptor.isAvailable(), false)
    assert.deepEqual(fake.calls[0].args, ['version'])
  })

  it('runs gitleaks twice and parses the JSON report', async () => {
    const fake = createFakeRunner(async (call) => {
      const reportPath = reportPathOf(call)
      if (reportPath) {
        await writeFile(reportPath, JSON.stringify([{ RuleID: 'generic-api-key' }, { RuleID: 'aws-access-token' }]))
        return { exitCode: 1 }
      }
      return { exitCode: 1, stdout: 'Finding:     key = "placeholder"\nFinding:     AKIA...\n', stderr: 'WRN leaks found: 2' }
    })
    const scanner = createBinaryScanner(GITLEAKS, { runner: fake.runner, paths: { resultsDir } })
    const workingCopy = process.cwd()

    const outcome = await scanner.invoke({ repo: REPO, workingCopy })

    const expectedReport = path.join(resultsDir, 'gitleaks_web.json')
    assert.equal(fake.calls.length, 2)
    assert.deepEqual(fake.calls[0].args, ['detect', '--source', workingCopy, '--verbose', '--no-git'])
    assert.deepEqual(fake.calls[1].args, [
      'detect', '--source', workingCopy, '--no-git',
      '--report-path', expectedReport,
      '--report-format', 'json',
    ])
    assert.equal(outcome.status, 'Completed')
    assert.deepEqual(outcome.report, { path: expectedReport, findings: 2, verified: 0 })
  })

  it('degrades to no report when the report is malformed', async () => {
    const fake = createFakeRunner(async (call) => {
      const reportPath = reportPathOf(call)
      if (reportPath) await writeFile(reportPath, '{"not": "an array"}')
      return { exitCode: 0, stdout: 'INF no leaks found' }
    })
    const scanner = createBinaryScanner(GITLEAKS, { runner: fake.runner, paths: { resultsDir } })

    const outcome = await scanner.invoke({ repo: REPO, workingCopy: process.cwd() })

    assert.equal(outcome.status, 'Completed')
    assert.equal(outcome.report, null)
  })

  it('never reads a report left over from an earlier run', async () => {
    const stale = path.join(resultsDir, 'gitleaks_web.json')
    await writeFile(stale, JSON.stringify([{ RuleID: 'a' }, { RuleID: 'b' }, { RuleID: 'c' }]))
    const fake = createFakeRunner((call) =>
      reportPathOf(call)
        ? { exitCode: 126, stderr: 'permission denied' }
        : { exitCode: 0, stdout: 'INF no leaks found' })
    const scanner = createBinaryScanner(GITLEAKS, { runner: fake.runner, paths: { resultsDir } })

    const outcome = await scanner.invoke({ repo: REPO, workingCopy: process.cwd() })

    assert.equal(outcome.status, 'Completed')
    assert.equal(outcome.report, null)
    assert.equal(existsSync(stale), false)
  })

  it('does not request a report for tools without one', async () => {
    const fake = createFakeRunner(() => ({ stdout: 'No secrets have been found' }))
    const scanner = createBinaryScanner(GGSHIELD, { runner: fake.runner, paths: { resultsDir } })

    const outcome = await scanner.invoke({ repo: REPO, workingCopy: '.' })

    assert.equal(fake.calls.length, 1)
    assert.deepEqual(fake.calls[0].args, ['secret', 'scan', 'path', '.', '--recursive', '--yes'])
    assert.equal(outcome.report, null)
  })

  it('skips the report run when the text run failed', async () => {
    const fake = createFakeRunner(() => ({ exitCode: 2, stderr: 'unknown flag' }))
    const scanner = createBinaryScanner(GITLEAKS, { runner: fake.runner, paths: { resultsDir } })

    const outcome = await scanner.invoke({ repo: REPO, workingCopy: '.' })

    assert.equal(fake.calls.length, 1)
    assert.equal(outcome.status, 'Failed')
    assert.equal(outcome.error?.code, 'INVOCATION_FAILED')
    assert.equal(outcome.output, 'unknown flag')
  })
})
