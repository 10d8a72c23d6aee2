export type ObjectKind = 'blob' | 'tree' | 'commit'

/**
 * One repository in the sync: the root checkout or a nested submodule.
 */
export type Module = {
  /** Slash-separated path relative to the root module. The root is ''. */
  path: string
  /** HEAD of the module when it was discovered. */
  baselineCommitId: string
  /** Absolute location of the module's working tree on disk. */
  workingTreeRoot: string
  /** Path of the nearest containing module, null for the root. */
  parentPath: string | null
  /** Paths of modules whose nearest containing module is this one. */
  childPaths: string[]
}

/**
 * Read-only arena of modules keyed by path, plus the processing order.
 */
export type ModuleGraph = {
  modules: ReadonlyMap<string, Module>
  /** Every module appears after all modules nested inside it. */
  order: readonly string[]
}

/**
 * `modified` and `added` both mean "new content, present on disk".
 */
export type PathStatus = 'modified' | 'added' | 'deleted'

export type StatusEntry = {
  /** Path relative to the module root. */
  path: string
  status: PathStatus
}

/**
 * Working tree change with the on-disk mode captured at collection time.
 */
export type ChangedFile = {
  path: string
  status: Exclude<PathStatus, 'deleted'>
  mode: string
  isSymlink: boolean
}

export type ModuleStatus = {
  modulePath: string
  changed: ChangedFile[]
  deleted: string[]
}

export type TreeEntry = {
  mode: string
  kind: ObjectKind
  objectId: string
  /** Full path for recursive listings, basename inside a single tree. */
  path: string
}

/**
 * New blob content for a path, ready to be placed in a tree.
 */
export type UpdatedEntry = {
  path: string
  mode: string
  objectId: string
}

export type TreeBuildInput = {
  baseline: TreeEntry[]
  updated: UpdatedEntry[]
  deleted: Iterable<string>
  /** Submodule mount path (relative to this module) to the commit id to record. */
  submoduleCommits: ReadonlyMap<string, string>
}

export type SyntheticCommit = {
  modulePath: string
  /** Null when the module had nothing to snapshot and the baseline is reused. */
  treeId: string | null
  parentId: string
  commitId: string
}

export type RemoteApplyStep = {
  modulePath: string
  commitId: string
}

/**
 * What the replica is left pointing at after the apply script runs.
 * `restore` puts HEAD back where it was and leaves the synced content as
 * uncommitted changes. `keep-commit` leaves the synthetic commit as HEAD.
 */
export type HistoryPolicy = 'restore' | 'keep-commit'

export type Destination =
  | { kind: 'local'; path: string }
  | { kind: 'ssh'; host: string; path: string }

export type PushSpec = {
  modulePath: string
  /** Directory the push runs from. */
  workingTreeRoot: string
  url: string
  refspec: string
}

export type SyncResult = {
  commits: SyntheticCommit[]
  pushes: PushSpec[]
  script: string
  executed: boolean
}

/**
 * Everything a run needs, threaded explicitly through every component.
 */
export type Configuration = {
  /** Directory the run starts from; the root module is its git toplevel. */
  cwd: string
  /** Unparsed designator; resolved once the local root is known. */
  destination: string
  dryRun: boolean
  verbose: boolean
  historyPolicy: HistoryPolicy
  snapshotRef: string
  extraScripts: string[]
}
