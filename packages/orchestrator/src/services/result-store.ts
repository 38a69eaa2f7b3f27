import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { AuditPaths, RepositoryRef, ScanError, ScanResult } from '@secret-audit/shared/types'

export type ResultStoreConfig = {
  paths: Pick<AuditPaths, 'resultsDir'>
  repositories: readonly RepositoryRef[]
}

export function artifactName(scannerId: string, repoName: string, ext = 'txt'): string {
  return `${scannerId}_${repoName}.${ext}`
}

/** Artifact body: the raw output, plus a trailer line when the cell carries an error. */
export function renderArtifact(result: ScanResult): string {
  if (!result.error) return result.rawOutput

  const body = result.rawOutput && !result.rawOutput.endsWith('\n')
    ? `${result.rawOutput}\n`
    : result.rawOutput
  return `${body}# ${result.exitStatus} [${result.error.code}]: ${result.error.message}\n`
}

/**
 * One result per (scanner, repository), kept in memory for the gate and
 * written to `<resultsDir>/<scannerId>_<repoName>.txt`. A repeated put
 * replaces the earlier result and keeps its position.
 */
export function createResultStore(config: ResultStoreConfig) {
  const knownRepos = new Set(config.repositories.map((r) => r.name))
  const results = new Map<string, ScanResult>()
  const written = new Set<string>()

  const keyOf = (result: Pick<ScanResult, 'scannerId' | 'repoName'>) =>
    `${result.scannerId}\u0000${result.repoName}`

  return {
    async put(result: ScanResult): Promise<string> {
      if (!knownRepos.has(result.repoName)) {
        const error: ScanError = {
          code: 'UNKNOWN_REPOSITORY',
          message: `Result for "${result.repoName}" does not belong to this run`,
        }
        throw error
      }

      // Recorded before the write: a failed artifact must not hide the result from the gate.
      const key = keyOf(result)
      results.set(key, result)
      written.delete(key)

      await mkdir(config.paths.resultsDir, { recursive: true })
      const artifactPath = path.join(
        config.paths.resultsDir,
        artifactName(result.scannerId, result.repoName),
      )
      await writeFile(artifactPath, renderArtifact(result), 'utf-8')
      written.add(key)
      return artifactPath
    },

    getAll(): ScanResult[] {
      return [...results.values()]
    },

    getByRepo(repoName: string): ScanResult[] {
      return [...results.values()].filter((r) => r.repoName === repoName)
    },

    /** Text artifacts and structured reports written this run, in insertion order. */
    artifacts(): string[] {
      const paths: string[] = []
      for (const [key, result] of results) {
        if (written.has(key)) {
          paths.push(path.join(config.paths.resultsDir, artifactName(result.scannerId, result.repoName)))
        }
        if (result.reportPath) paths.push(result.reportPath)
      }
      return paths
    },

    get size(): number {
      return results.size
    },
  }
}

export type ResultStore = ReturnType<typeof createResultStore>
