/**
 * SnapshotOperation - Turns collected status into synthetic commits.
 *
 * Modules are processed children first. Each module's tree embeds the
 * synthetic commit ids already recorded for its children, so the result table
 * is only ever read for modules that are complete.
 */

import fs from 'fs'
import path from 'path'
import type {
  Module,
  ModuleGraph,
  ModuleStatus,
  SyntheticCommit,
  UpdatedEntry
} from '../../shared/types'
import { ModuleGraphBuilder, TreeBuilder } from '../domain'
import { SNAPSHOT_IDENTITY, SNAPSHOT_MESSAGE } from '../shared/constants'
import type { SyncContext } from './SyncContext'

export class SnapshotOperation {
  /**
   * Snapshots every module in graph order. Returns commits in that order.
   */
  static async snapshotAll(
    ctx: Pick<SyncContext, 'git' | 'log'>,
    graph: ModuleGraph,
    statuses: ReadonlyMap<string, ModuleStatus>
  ): Promise<SyntheticCommit[]> {
    const results = new Map<string, SyntheticCommit>()

    for (const modulePath of graph.order) {
      const module = graph.modules.get(modulePath)
      const status = statuses.get(modulePath)
      if (!module || !status) {
        throw new Error(`No module or status recorded for '${modulePath}'`)
      }

      results.set(modulePath, await SnapshotOperation.snapshotModule(ctx, module, status, results))
    }

    return graph.order.flatMap((modulePath) => {
      const commit = results.get(modulePath)
      return commit ? [commit] : []
    })
  }

  /**
   * Builds one module's synthetic commit. When neither the module nor any
   * child changed, the baseline commit is reused and nothing is written.
   */
  static async snapshotModule(
    ctx: Pick<SyncContext, 'git' | 'log'>,
    module: Module,
    status: ModuleStatus,
    children: ReadonlyMap<string, SyntheticCommit>
  ): Promise<SyntheticCommit> {
    const { git, log } = ctx
    const label = module.path || '.'

    const submoduleCommits = SnapshotOperation.changedSubmodules(module, children)
    if (status.changed.length === 0 && status.deleted.length === 0 && submoduleCommits.size === 0) {
      log.debug(`[SnapshotOperation] '${label}' is clean, reusing ${module.baselineCommitId}`)
      return {
        modulePath: module.path,
        treeId: null,
        parentId: module.baselineCommitId,
        commitId: module.baselineCommitId
      }
    }

    const dir = module.workingTreeRoot
    const [baseline, updated] = await Promise.all([
      git.listTree(dir, module.baselineCommitId),
      SnapshotOperation.hashChanges(ctx, module, status)
    ])

    const treeId = await TreeBuilder.build(
      { baseline, updated, deleted: status.deleted, submoduleCommits },
      (trees) => git.makeTrees(dir, trees)
    )

    const commitId = await git.commitTree(dir, {
      treeId,
      parentId: module.baselineCommitId,
      message: SNAPSHOT_MESSAGE,
      identity: SNAPSHOT_IDENTITY
    })

    log.debug(`[SnapshotOperation] '${label}': tree ${treeId}, commit ${commitId}`)
    return { modulePath: module.path, treeId, parentId: module.baselineCommitId, commitId }
  }

  /**
   * Mount path (relative to `module`) to commit id, for children whose
   * synthetic commit differs from their baseline. Clean children are left out
   * so their gitlink stays exactly as recorded in the baseline tree.
   */
  static changedSubmodules(
    module: Module,
    children: ReadonlyMap<string, SyntheticCommit>
  ): Map<string, string> {
    const changed = new Map<string, string>()
    for (const childPath of module.childPaths) {
      const child = children.get(childPath)
      if (!child) {
        throw new Error(`Submodule '${childPath}' was not snapshotted before '${module.path || '.'}'`)
      }
      if (child.commitId !== child.parentId) {
        changed.set(ModuleGraphBuilder.relativeTo(module.path, childPath), child.commitId)
      }
    }
    return changed
  }

  private static async hashChanges(
    ctx: Pick<SyncContext, 'git'>,
    module: Module,
    status: ModuleStatus
  ): Promise<UpdatedEntry[]> {
    const { git } = ctx
    const dir = module.workingTreeRoot
    const files = status.changed.filter((file) => !file.isSymlink)
    const links = status.changed.filter((file) => file.isSymlink)

    const fileIds = await git.hashFiles(
      dir,
      files.map((file) => file.path)
    )
    const linkIds = await Promise.all(
      links.map(async (link) =>
        git.hashContent(
          dir,
          await fs.promises.readlink(path.join(dir, link.path), { encoding: 'buffer' })
        )
      )
    )

    return [
      ...files.map((file, index) => ({ path: file.path, mode: file.mode, objectId: fileIds[index] })),
      ...links.map((link, index) => ({ path: link.path, mode: link.mode, objectId: linkIds[index] }))
    ]
  }
}
