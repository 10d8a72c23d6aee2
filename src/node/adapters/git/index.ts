/**
 * Git Adapter Module
 *
 * Object-store primitives for the sync engine, backed by the git CLI.
 *
 * Usage:
 * ```typescript
 * import { getGitAdapter } from './adapters/git'
 *
 * const git = getGitAdapter()
 * const entries = await git.listTree(repoPath, 'HEAD')
 * ```
 */

export { createGitAdapter, getGitAdapter } from './factory'
export type { GitAdapterConfig, GitAdapterType } from './factory'

export type { GitAdapter } from './interface'

export type {
  BlobContent,
  CommitTreeOptions,
  PushOptions,
  RawStatusEntry,
  TreeEntry
} from './types'

// Adapter implementations (for testing)
export { SimpleGitAdapter } from './SimpleGitAdapter'

export {
  formatMktreeBatch,
  formatTreeLines,
  parseLines,
  parseLsTreeZ,
  parseNulList,
  parseStatusZ,
  quoteTreeName
} from './parsers'
