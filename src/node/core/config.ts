import type { Configuration, HistoryPolicy } from '../../shared/types'
import dotenv from 'dotenv'
import path from 'path'
import { DEFAULT_SNAPSHOT_REF } from '../shared/constants'
import { ValidationError } from '../shared/errors'

export type ConfigurationOverrides = Partial<Configuration>

type Environment = Record<string, string | undefined>

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on'])

function readFlag(value: string | undefined): boolean {
  return value !== undefined && TRUE_VALUES.has(value.trim().toLowerCase())
}

/**
 * Loads `.env` from `cwd` into process.env. Variables already set win.
 */
export function loadEnvironment(cwd: string): Environment {
  dotenv.config({ path: path.join(cwd, '.env') })
  return process.env
}

/**
 * Merges explicit options over environment values and validates the result.
 */
export function loadConfiguration(
  overrides: ConfigurationOverrides = {},
  env: Environment = loadEnvironment(overrides.cwd ?? process.cwd())
): Configuration {
  const historyPolicy: HistoryPolicy = readFlag(env.WORKSYNC_KEEP_COMMIT) ? 'keep-commit' : 'restore'

  const config: Configuration = {
    cwd: path.resolve(overrides.cwd ?? process.cwd()),
    destination: overrides.destination ?? env.WORKSYNC_DESTINATION ?? '',
    dryRun: overrides.dryRun ?? false,
    verbose: overrides.verbose ?? readFlag(env.WORKSYNC_VERBOSE),
    historyPolicy: overrides.historyPolicy ?? historyPolicy,
    snapshotRef: overrides.snapshotRef ?? env.WORKSYNC_REF ?? DEFAULT_SNAPSHOT_REF,
    extraScripts: overrides.extraScripts ?? []
  }

  validateConfiguration(config)
  return config
}

export function validateConfiguration(config: Configuration): void {
  if (!config.destination.trim()) {
    throw new ValidationError(
      'No destination given (pass one or set WORKSYNC_DESTINATION)',
      'destination'
    )
  }

  const ref = config.snapshotRef
  if (!ref.startsWith('refs/') || /\s/.test(ref) || ref.endsWith('/')) {
    throw new ValidationError(`Invalid snapshot ref: '${ref}'`, 'snapshotRef')
  }
  if (ref.startsWith('refs/heads/') || ref.startsWith('refs/tags/')) {
    throw new ValidationError(
      `Snapshot ref must live outside refs/heads and refs/tags: '${ref}'`,
      'snapshotRef'
    )
  }
}
