import type { Logger } from '../../shared/logger'
import type { Configuration } from '../../shared/types'
import type { GitAdapter } from '../adapters/git'
import type { ShellExecutor } from '../adapters/shell'

/**
 * Collaborators and settings handed to every operation of a run.
 */
export type SyncContext = {
  config: Configuration
  git: GitAdapter
  shell: ShellExecutor
  log: Logger
  /** Sink for dry-run output. */
  print: (text: string) => void
}
