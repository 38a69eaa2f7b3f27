import { createReadStream } from 'node:fs'
import { pipeline } from 'node:stream/promises'
import { Writable } from 'node:stream'
import makeParser from 'stream-json'
import StreamArray from 'stream-json/streamers/StreamArray.js'
import type { ReportSummary, ScanError } from '@secret-audit/shared/types'

/**
 * Stream-parse a JSON findings report whose top level is an array:
 *   [ { "RuleID": "...", "File": "...", ... }, ... ]
 *
 * Only counts are kept; individual records stay in the report file.
 */
export async function parseFindingsReport(filePath: string): Promise<ReportSummary> {
  let findings = 0
  let verified = 0

  const counter = new Writable({
    objectMode: true,
    write(chunk: { key: number; value: unknown }, _encoding, callback) {
      findings++
      if (isVerified(chunk.value)) verified++
      callback()
    },
  })

  try {
    await pipeline(
      createReadStream(filePath, { highWaterMark: 64 * 1024 }),
      makeParser(),
      StreamArray.streamArray(),
      counter,
    )
  } catch (err) {
    throw toParseError(err)
  }

  return { path: filePath, findings, verified }
}

// Records use PascalCase keys; `Verified` only appears for tools that check live credentials.
function isVerified(value: unknown): boolean {
  if (typeof value !== 'object' || value === null) return false
  return 'Verified' in value && value.Verified === true
}

function toParseError(err: unknown): ScanError {
  const message = err instanceof Error ? err.message : String(err)

  if (message.includes('ENOENT') || message.includes('no such file')) {
    return { code: 'PARSE_FAILED', message: `Report file not found: ${message}` }
  }

  return { code: 'PARSE_FAILED', message: `Failed to parse report: ${message}` }
}
