import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { isDiskFull, isScanError, toScanError } from './errors.js'

describe('isScanError', () => {
  it('accepts objects with string code and message', () => {
    assert.equal(isScanError({ code: 'TIMEOUT', message: 'too slow' }), true)
  })

  it('rejects null, primitives and Error instances', () => {
    assert.equal(isScanError(null), false)
    assert.equal(isScanError('TIMEOUT'), false)
    assert.equal(isScanError(new Error('boom')), false)
  })

  it('rejects Node system errors, whose codes are not ScanErrorCodes', () => {
    const err = Object.assign(new Error("EACCES: permission denied, open 'key.pem'"), { code: 'EACCES' })
    assert.equal(isScanError(err), false)
    assert.deepEqual(toScanError(err), { code: 'UNKNOWN', message: "EACCES: permission denied, open 'key.pem'" })
  })
})

describe('toScanError', () => {
  it('returns an existing ScanError unchanged', () => {
    const err = { code: 'CONFIG_ERROR' as const, message: 'no repos' }
    assert.equal(toScanError(err), err)
  })

  it('wraps an Error with the fallback code', () => {
    assert.deepEqual(toScanError(new Error('spawn failed'), 'INVOCATION_FAILED'), {
      code: 'INVOCATION_FAILED',
      message: 'spawn failed',
    })
  })

  it('stringifies other thrown values', () => {
    assert.deepEqual(toScanError(42), { code: 'UNKNOWN', message: '42' })
  })
})

describe('isDiskFull', () => {
  it('detects ENOSPC-style messages', () => {
    assert.equal(isDiskFull('fatal: No space left on device'), true)
    assert.equal(isDiskFull('Disk quota exceeded'), true)
    assert.equal(isDiskFull('permission denied'), false)
  })
})
