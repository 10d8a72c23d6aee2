#!/usr/bin/env node
/**
 * worksync command line
 *
 * worksync <destination> [-v] [-n] [--keep-commit] [-x <script>]... [-C <dir>]
 */

import cac from 'cac'
import { loadConfiguration, type ConfigurationOverrides } from '../node/core/config'
import { createSyncContext, SyncOperation } from '../node/operations'
import { createLogger } from '../shared/logger'

const VERSION = '0.1.0'

type CliFlags = Record<string, unknown>

function toStringList(value: unknown): string[] {
  if (value === undefined || value === null || value === false) return []
  const values = Array.isArray(value) ? value : [value]
  return values.map((item) => String(item))
}

/**
 * Maps parsed flags onto configuration overrides. Flags left unset fall
 * through to the environment.
 */
export function toOverrides(destination: string | undefined, flags: CliFlags): ConfigurationOverrides {
  const overrides: ConfigurationOverrides = {
    dryRun: flags.dryRun === true,
    extraScripts: toStringList(flags.exec)
  }
  if (destination) overrides.destination = destination
  if (typeof flags.cwd === 'string') overrides.cwd = flags.cwd
  if (flags.verbose === true) overrides.verbose = true
  if (flags.keepCommit === true) overrides.historyPolicy = 'keep-commit'
  return overrides
}

export function createCli(onRun: (overrides: ConfigurationOverrides) => Promise<void>) {
  const cli = cac('worksync')

  cli
    .command('[destination]', 'Reproduce the working tree state in another checkout')
    .option('-v, --verbose', 'Print debug output')
    .option('-n, --dry-run', 'Print the pushes and the script instead of running them')
    .option('--keep-commit', 'Leave the synthetic commit checked out on the replica')
    .option('-x, --exec <script>', 'Shell fragment to run on the replica after syncing')
    .option('-C, --cwd <dir>', 'Run as if started in <dir>')
    .example('worksync buildbox:src/project')
    .example('worksync ../mirror -n')
    .action(async (destination: string | undefined, flags: CliFlags) => {
      await onRun(toOverrides(destination, flags))
    })

  cli.help()
  cli.version(VERSION)
  return cli
}

export async function runCli(argv: string[]): Promise<number> {
  let verbose = false
  const cli = createCli(async (overrides) => {
    verbose = overrides.verbose ?? verbose
    const config = loadConfiguration(overrides)
    verbose = config.verbose
    await SyncOperation.run(createSyncContext(config))
  })

  try {
    cli.parse(argv, { run: false })
    await cli.runMatchedCommand()
    return 0
  } catch (error) {
    const log = createLogger({ verbose })
    log.error(error instanceof Error ? error.message : String(error))
    log.debug(error)
    return 1
  }
}

if (require.main === module) {
  runCli(process.argv).then(
    (code) => {
      process.exitCode = code
    },
    (error: unknown) => {
      createLogger().error(error)
      process.exitCode = 1
    }
  )
}
