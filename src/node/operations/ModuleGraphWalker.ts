/**
 * ModuleGraphWalker - Discovers the root module and every checked-out
 * submodule beneath it, and freezes them into a module graph.
 */

import type { ModuleGraph } from '../../shared/types'
import { ModuleGraphBuilder } from '../domain'
import { GitError, NotARepositoryError } from '../shared/errors'
import type { SyncContext } from './SyncContext'

export class ModuleGraphWalker {
  static async discover(ctx: Pick<SyncContext, 'git' | 'log'>, startDir: string): Promise<ModuleGraph> {
    const { git, log } = ctx

    let rootDir: string
    try {
      rootDir = await git.showToplevel(startDir)
    } catch (error) {
      throw new NotARepositoryError(`Not inside a git working copy: ${startDir}`, startDir, error)
    }

    const submodulePaths = await git.listSubmodulePaths(rootDir)
    const modulePaths = ['', ...submodulePaths]

    const discovered = await Promise.all(
      modulePaths.map(async (modulePath) => {
        const dir = modulePath ? `${rootDir}/${modulePath}` : rootDir
        try {
          return { path: modulePath, baselineCommitId: await git.resolveRef(dir, 'HEAD') }
        } catch (error) {
          throw new GitError(
            `Module '${modulePath || '.'}' has no HEAD commit`,
            'discover',
            error
          )
        }
      })
    )

    const graph = ModuleGraphBuilder.build(rootDir, discovered)
    log.debug(`[ModuleGraphWalker] ${graph.modules.size} module(s) under ${rootDir}`, graph.order)
    return graph
  }
}
