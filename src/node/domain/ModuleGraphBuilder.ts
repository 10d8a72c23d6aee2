/**
 * ModuleGraphBuilder - Pure construction of the module arena.
 *
 * Takes the flat list of discovered modules and links each one to its nearest
 * containing module. The processing order is computed once, here: deeper
 * paths first, so every module comes after all modules nested inside it.
 */

import path from 'path'
import type { Module, ModuleGraph } from '../../shared/types'
import { ModuleGraphError } from '../shared/errors'

export type DiscoveredModule = {
  path: string
  baselineCommitId: string
}

export class ModuleGraphBuilder {
  private constructor() {}

  static build(rootDir: string, discovered: DiscoveredModule[]): ModuleGraph {
    const paths = new Set<string>()
    for (const entry of discovered) {
      const normalized = ModuleGraphBuilder.normalize(entry.path)
      if (paths.has(normalized)) {
        throw new ModuleGraphError(
          `Module path registered more than once: '${normalized}'`,
          normalized
        )
      }
      paths.add(normalized)
    }
    if (!paths.has('')) {
      throw new ModuleGraphError('Root module missing from discovered modules', '')
    }

    const modules = new Map<string, Module>()
    for (const entry of discovered) {
      const modulePath = ModuleGraphBuilder.normalize(entry.path)
      modules.set(modulePath, {
        path: modulePath,
        baselineCommitId: entry.baselineCommitId,
        workingTreeRoot: modulePath ? path.join(rootDir, ...modulePath.split('/')) : rootDir,
        parentPath: modulePath ? ModuleGraphBuilder.findParent(modulePath, paths) : null,
        childPaths: []
      })
    }

    for (const module of modules.values()) {
      if (module.parentPath === null) continue
      modules.get(module.parentPath)?.childPaths.push(module.path)
    }
    for (const module of modules.values()) {
      module.childPaths.sort()
    }

    return { modules, order: ModuleGraphBuilder.childrenFirst([...paths]) }
  }

  /**
   * Deeper paths first; ties broken by path so the order is stable.
   */
  static childrenFirst(paths: string[]): string[] {
    return [...paths].sort((a, b) => {
      const depthDiff = ModuleGraphBuilder.depth(b) - ModuleGraphBuilder.depth(a)
      if (depthDiff !== 0) return depthDiff
      return a < b ? -1 : a > b ? 1 : 0
    })
  }

  static depth(modulePath: string): number {
    return modulePath ? modulePath.split('/').length : 0
  }

  /**
   * Path of `childPath` as seen from inside `parentPath`.
   */
  static relativeTo(parentPath: string, childPath: string): string {
    return parentPath ? childPath.slice(parentPath.length + 1) : childPath
  }

  private static findParent(modulePath: string, paths: Set<string>): string {
    let candidate = path.posix.dirname(modulePath)
    while (candidate !== '.' && candidate !== '/') {
      if (paths.has(candidate)) return candidate
      candidate = path.posix.dirname(candidate)
    }
    return ''
  }

  private static normalize(modulePath: string): string {
    const trimmed = modulePath.replace(/^\.\/+/, '').replace(/\/+$/, '')
    return trimmed === '.' ? '' : trimmed
  }
}
