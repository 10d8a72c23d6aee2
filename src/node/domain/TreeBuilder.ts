/**
 * TreeBuilder - Rebuilds a module's root tree from its baseline listing.
 *
 * Entry merging and directory partitioning are pure. Writing is delegated to
 * an injected writer that materializes one batch of directories at a time,
 * deepest first, so every directory's children are known before it is
 * written.
 */

import path from 'path'
import type { TreeBuildInput, TreeEntry } from '../../shared/types'
import { TREE_MODE } from '../shared/constants'

/**
 * Writes one tree per entry list and returns their ids in order.
 */
export type TreeWriter = (trees: TreeEntry[][]) => Promise<string[]>

export class TreeBuilder {
  private constructor() {}

  /**
   * Full-path blob and gitlink entries of the rebuilt tree.
   *
   * Deleted paths never survive, even when they also appear as updated.
   * Gitlinks take the submodule commit id when one is given for their path.
   * No entry survives at a path that another entry uses as a directory.
   */
  static mergeEntries(input: TreeBuildInput): TreeEntry[] {
    const deleted = new Set(input.deleted)
    const updated = new Map(input.updated.map((entry) => [entry.path, entry]))
    const merged: TreeEntry[] = []

    for (const entry of input.baseline) {
      if (deleted.has(entry.path) || updated.has(entry.path)) continue

      const submoduleCommit =
        entry.kind === 'commit' ? input.submoduleCommits.get(entry.path) : undefined
      merged.push(submoduleCommit ? { ...entry, objectId: submoduleCommit } : entry)
    }

    for (const entry of updated.values()) {
      if (deleted.has(entry.path)) continue
      merged.push({ mode: entry.mode, kind: 'blob', objectId: entry.objectId, path: entry.path })
    }

    // A path that is also a directory of another entry was replaced by that directory.
    const directories = new Set<string>()
    for (const entry of merged) {
      for (let dir = TreeBuilder.dirname(entry.path); dir !== ''; dir = TreeBuilder.dirname(dir)) {
        directories.add(dir)
      }
    }
    return merged.filter((entry) => !directories.has(entry.path))
  }

  /**
   * Groups entries by containing directory, keyed by directory path with ''
   * for the root. Every ancestor directory gets a key, even with no direct
   * entries. Entries inside a group carry their basename as `path`.
   */
  static partition(entries: TreeEntry[]): Map<string, TreeEntry[]> {
    const directories = new Map<string, TreeEntry[]>([['', []]])

    for (const entry of entries) {
      const dir = TreeBuilder.dirname(entry.path)
      TreeBuilder.register(directories, dir).push({
        ...entry,
        path: path.posix.basename(entry.path)
      })
    }

    return directories
  }

  /**
   * Builds all directories bottom-up and returns the root tree id.
   * Directories left without entries are never written nor referenced.
   */
  static async build(input: TreeBuildInput, writeTrees: TreeWriter): Promise<string> {
    const directories = TreeBuilder.partition(TreeBuilder.mergeEntries(input))

    const byDepth = new Map<number, string[]>()
    for (const dir of directories.keys()) {
      if (dir === '') continue
      const depth = dir.split('/').length
      byDepth.set(depth, [...(byDepth.get(depth) ?? []), dir])
    }

    const depths = [...byDepth.keys()].sort((a, b) => b - a)
    for (const depth of depths) {
      const level = (byDepth.get(depth) ?? [])
        .filter((dir) => (directories.get(dir) ?? []).length > 0)
        .sort()
      if (level.length === 0) continue

      const ids = await writeTrees(level.map((dir) => directories.get(dir) ?? []))

      level.forEach((dir, index) => {
        const objectId = ids[index]
        if (!objectId) {
          throw new Error(`Tree writer returned no id for '${dir}'`)
        }
        directories.get(TreeBuilder.dirname(dir))?.push({
          mode: TREE_MODE,
          kind: 'tree',
          objectId,
          path: path.posix.basename(dir)
        })
      })
    }

    const [rootId] = await writeTrees([directories.get('') ?? []])
    if (!rootId) {
      throw new Error('Tree writer returned no id for the root tree')
    }
    return rootId
  }

  private static dirname(entryPath: string): string {
    const dir = path.posix.dirname(entryPath)
    return dir === '.' ? '' : dir
  }

  private static register(directories: Map<string, TreeEntry[]>, dir: string): TreeEntry[] {
    const existing = directories.get(dir)
    if (existing) return existing

    const created: TreeEntry[] = []
    directories.set(dir, created)
    if (dir !== '') {
      TreeBuilder.register(directories, TreeBuilder.dirname(dir))
    }
    return created
  }
}
