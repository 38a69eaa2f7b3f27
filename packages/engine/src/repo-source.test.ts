import { describe, it, before, after } from 'node:test'
import assert from 'node:assert/strict'
import { mkdir, mkdtemp, rm } from 'node:fs/promises'
import path from 'node:path'
import os from 'node:os'
import type { ScanError } from '@secret-audit/shared/types'
import { createFakeRunner } from './__fixtures__/fake-runner.js'
import { createGitRepositorySource } from './repo-source.js'

const REPO = { url: 'https://git.example.test/team/payments.git', name: 'payments' }

describe('createGitRepositorySource', () => {
  let reposDir: string

  before(async () => {
    reposDir = await mkdtemp(path.join(os.tmpdir(), 'sa-repos-'))
  })

  after(async () => {
    await rm(reposDir, { recursive: true, force: true })
  })

  it('places working copies under reposDir by name', () => {
    const source = createGitRepositorySource({ paths: { reposDir } })
    assert.equal(source.pathFor(REPO), path.join(reposDir, 'payments'))
  })

  it('clones with full history when no working copy exists', async () => {
    const fake = createFakeRunner()
    const source = createGitRepositorySource({ paths: { reposDir }, runner: fake.runner })

    const repoPath = await source.acquire(REPO)

    assert.equal(repoPath, path.join(reposDir, 'payments'))
    assert.equal(fake.calls.length, 1)
    assert.deepEqual(fake.calls[0].args, ['clone', '--quiet', '--', REPO.url, repoPath])
    assert.equal(fake.calls[0].options.env?.GIT_TERMINAL_PROMPT, '0')
  })

  it('passes a dash-prefixed URL to git as an operand, not an option', async () => {
    const fake = createFakeRunner()
    const source = createGitRepositorySource({ paths: { reposDir }, runner: fake.runner })
    const repo = { url: '--upload-pack=touch', name: 'odd' }

    await source.acquire(repo)

    assert.deepEqual(fake.calls[0].args, ['clone', '--quiet', '--', '--upload-pack=touch', path.join(reposDir, 'odd')])
  })

  it('pulls when the working copy already has a .git directory', async () => {
    const repoPath = path.join(reposDir, 'payments')
    await mkdir(path.join(repoPath, '.git'), { recursive: true })

    const fake = createFakeRunner()
    const source = createGitRepositorySource({ paths: { reposDir }, runner: fake.runner })
    await source.acquire(REPO)

    assert.deepEqual(fake.calls[0].args, ['-C', repoPath, 'pull', '--quiet'])
    await rm(repoPath, { recursive: true, force: true })
  })

  it('throws ACQUISITION_FAILED when git exits non-zero', async () => {
    const fake = createFakeRunner(() => ({ exitCode: 128, stderr: 'fatal: repository not found' }))
    const source = createGitRepositorySource({ paths: { reposDir }, runner: fake.runner })

    await assert.rejects(source.acquire(REPO), (err: ScanError) => {
      assert.equal(err.code, 'ACQUISITION_FAILED')
      assert.equal(err.message, 'Git clone failed (exit 128): fatal: repository not found')
      return true
    })
  })

  it('throws TIMEOUT when git is killed by the timeout', async () => {
    const fake = createFakeRunner(() => ({ exitCode: null, timedOut: true }))
    const source = createGitRepositorySource({ paths: { reposDir }, runner: fake.runner, timeoutMs: 5 })

    await assert.rejects(source.acquire(REPO), (err: ScanError) => {
      assert.equal(err.code, 'TIMEOUT')
      return true
    })
  })

  it('throws DISK_FULL when git reports no space left', async () => {
    const fake = createFakeRunner(() => ({
      exitCode: 128,
      stderr: 'fatal: write error: No space left on device',
    }))
    const source = createGitRepositorySource({ paths: { reposDir }, runner: fake.runner })

    await assert.rejects(source.acquire(REPO), (err: ScanError) => {
      assert.equal(err.code, 'DISK_FULL')
      return true
    })
  })
})
