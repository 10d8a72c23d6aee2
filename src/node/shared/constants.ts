/**
 * Node-specific constants for the sync engine.
 */

/**
 * Private ref every synthetic commit is pushed to. Outside refs/heads and
 * refs/tags so branch and tag listings never show it.
 */
export const DEFAULT_SNAPSHOT_REF = 'refs/worksync/snapshot'

/**
 * Identity stamped on every synthetic commit. Author and committer are the
 * same and never change, so the commit id depends only on tree and parent.
 */
export const SNAPSHOT_IDENTITY = {
  name: 'worksync',
  email: 'worksync@localhost',
  // Epoch, the earliest date git accepts in an object header.
  date: '@0 +0000'
} as const

export const SNAPSHOT_MESSAGE = 'worksync snapshot'

export const TREE_MODE = '040000'

export const FILE_MODES = {
  regular: '100644',
  executable: '100755',
  symlink: '120000',
  gitlink: '160000'
} as const

/**
 * Id of the tree with no entries.
 */
export const EMPTY_TREE_ID = '4b825dc642cb6eb9a060e54bf8d69288fbee4904'

export const DEFAULT_SSH_COMMAND = 'ssh'
