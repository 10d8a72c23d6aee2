/**
 * Git Adapter Types
 *
 * Shapes exchanged with the object-store backend. Parsed records only; no
 * caller ever sees raw command output.
 */

import type { TreeEntry } from '../../../shared/types'

export type { TreeEntry }

/**
 * One line of `git status --porcelain`.
 */
export type RawStatusEntry = {
  /** Index column (X). */
  index: string
  /** Working tree column (Y). */
  workingDir: string
  /** Path relative to the repository root. */
  path: string
}

/**
 * Options for writing a commit object directly from a tree.
 */
export type CommitTreeOptions = {
  treeId: string
  parentId: string
  message: string
  identity: {
    name: string
    email: string
    /** Any date git's ident parser accepts, e.g. `@0 +0000`. */
    date: string
  }
}

/**
 * Options for git push operations
 */
export type PushOptions = {
  /** Remote URL or local path of the receiving repository. */
  url: string
  /** Full refspec, e.g. `<sha>:refs/worksync/snapshot`. */
  refspec: string
  force?: boolean
}

/**
 * A blob to write from in-memory content (symlink targets).
 */
export type BlobContent = string | Buffer
