import { SCAN_ERROR_CODES, type ScanError, type ScanErrorCode } from './types.js'

/** Node system errors also carry `code`; only our own codes qualify. */
export function isScanError(err: unknown): err is ScanError {
  if (typeof err !== 'object' || err === null) return false
  if (!('code' in err) || !('message' in err) || typeof err.message !== 'string') return false
  const { code } = err
  return SCAN_ERROR_CODES.some((known) => known === code)
}

/** Coerce anything thrown into a ScanError, keeping ScanErrors as they are. */
export function toScanError(err: unknown, fallback: ScanErrorCode = 'UNKNOWN'): ScanError {
  if (isScanError(err)) return err

  return {
    code: fallback,
    message: err instanceof Error ? err.message : String(err),
  }
}

export function isDiskFull(message: string): boolean {
  const msg = message.toLowerCase()
  return msg.includes('no space left on device') || msg.includes('disk quota exceeded')
}
