import { Command } from 'commander'
import { isScanError } from '@secret-audit/shared/errors'
import { runAudit } from './audit.js'
import { loadAuditConfig } from './config.js'
import { EXIT_FAIL } from './constants.js'

type CliOptions = {
  baseDir?: string
  config?: string
  concurrency?: string
  timeout?: string
  image?: string
  quiet?: boolean
}

const program = new Command()

program
  .name('secret-audit')
  .description('Clone or update Git repositories and scan them for leaked secrets')
  .version('1.0.0')
  .option('-b, --base-dir <path>', 'Directory holding repos/, results/, logs/ and config/')
  .option('-c, --config <path>', 'Repository list (default <base-dir>/config/repos.txt)')
  .option('-j, --concurrency <n>', 'Repositories scanned in parallel, or "auto"')
  .option('-t, --timeout <ms>', 'Per-scanner timeout in milliseconds')
  .option('--image <ref>', 'TruffleHog container image')
  .option('-q, --quiet', 'Write the log file only; nothing on the console')
  .action(async () => {
    const options = program.opts<CliOptions>()

    try {
      const config = loadAuditConfig({
        baseDir: options.baseDir,
        configFile: options.config,
        concurrency: options.concurrency,
        timeoutMs: options.timeout,
        trufflehogImage: options.image,
        quiet: options.quiet,
      })

      const outcome = await runAudit(config)
      process.exitCode = outcome.exitCode
    } catch (err) {
      if (!isScanError(err)) throw err
      console.error(`${err.code}: ${err.message}`)
      process.exitCode = EXIT_FAIL
    }
  })

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err))
  process.exitCode = EXIT_FAIL
})
