/**
 * StatusCollector - Lists a module's working tree changes against HEAD.
 *
 * Staged, unstaged and untracked content is reported; ignored files never
 * are. Each path is classified by whether it still exists on disk, and the
 * on-disk mode is captured for paths that do. Submodule mounts are left out:
 * their state reaches the parent through the child's synthetic commit.
 */

import fs from 'fs'
import path from 'path'
import type { ChangedFile, Module, ModuleStatus, StatusEntry } from '../../shared/types'
import type { RawStatusEntry } from '../adapters/git'
import { ModuleGraphBuilder } from '../domain'
import { FILE_MODES } from '../shared/constants'
import type { SyncContext } from './SyncContext'

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR'])

export class StatusCollector {
  static async collect(
    ctx: Pick<SyncContext, 'git' | 'log'>,
    module: Module
  ): Promise<ModuleStatus> {
    const { git, log } = ctx
    const raw = await git.status(module.workingTreeRoot)
    const mounts = new Set(
      module.childPaths.map((child) => ModuleGraphBuilder.relativeTo(module.path, child))
    )

    const changed: ChangedFile[] = []
    const deleted: string[] = []

    for (const entry of StatusCollector.filterEntries(raw, mounts, log.warn)) {
      const stat = await StatusCollector.lstat(path.join(module.workingTreeRoot, entry.path))
      const { status } = StatusCollector.classify(entry, stat !== null)

      if (!stat || status === 'deleted') {
        deleted.push(entry.path)
        continue
      }
      if (stat.isDirectory()) {
        // A tracked path now holding a directory: its files are reported separately.
        log.debug(`[StatusCollector] '${entry.path}' in '${module.path || '.'}' became a directory`)
        deleted.push(entry.path)
        continue
      }

      changed.push({
        path: entry.path,
        status,
        mode: StatusCollector.modeOf(stat),
        isSymlink: stat.isSymbolicLink()
      })
    }

    log.debug(
      `[StatusCollector] '${module.path || '.'}': ${changed.length} changed, ${deleted.length} deleted`
    )
    return { modulePath: module.path, changed, deleted }
  }

  /**
   * Drops submodule mounts and untracked nested repositories (`dir/`).
   */
  static filterEntries(
    raw: RawStatusEntry[],
    mounts: ReadonlySet<string>,
    warn: (message: string) => void = () => {}
  ): RawStatusEntry[] {
    return raw.filter((entry) => {
      if (mounts.has(entry.path)) return false
      if (entry.path.endsWith('/')) {
        warn(`[StatusCollector] Skipping untracked repository '${entry.path}'`)
        return false
      }
      return true
    })
  }

  /**
   * Status as seen from the porcelain codes alone.
   */
  static classify(entry: RawStatusEntry, existsOnDisk: boolean): StatusEntry {
    if (!existsOnDisk) return { path: entry.path, status: 'deleted' }
    const isNew = entry.index === 'A' || entry.index === '?'
    return { path: entry.path, status: isNew ? 'added' : 'modified' }
  }

  static modeOf(stat: fs.Stats): string {
    if (stat.isSymbolicLink()) return FILE_MODES.symlink
    // git only looks at the owner execute bit
    return stat.mode & 0o100 ? FILE_MODES.executable : FILE_MODES.regular
  }

  private static async lstat(filePath: string): Promise<fs.Stats | null> {
    try {
      return await fs.promises.lstat(filePath)
    } catch (error) {
      // ENOTDIR: a parent directory was replaced by a file
      if (error instanceof Error && 'code' in error && MISSING_CODES.has(String(error.code))) {
        return null
      }
      throw error
    }
  }
}
