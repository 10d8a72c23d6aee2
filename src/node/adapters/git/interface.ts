/**
 * Git Adapter Interface
 *
 * The object-store primitives the sync engine consumes. The engine never
 * builds git objects itself; it hashes blobs, lists trees, writes trees and
 * commits, and pushes through this interface.
 *
 * Every method resolves to one of three shapes chosen by the call site: a
 * single value, a list of parsed records, or nothing.
 */

import type {
  BlobContent,
  CommitTreeOptions,
  PushOptions,
  RawStatusEntry,
  TreeEntry
} from './types'

/**
 * Main Git adapter interface
 *
 * All methods are async and throw GitError on failure
 */
export interface GitAdapter {
  /**
   * Get the adapter name for logging/debugging
   */
  readonly name: string

  // ============================================================================
  // Repository Inspection
  // ============================================================================

  /**
   * Absolute path of the top of the working tree containing `dir`.
   */
  showToplevel(dir: string): Promise<string>

  /**
   * Resolve a ref to a commit SHA
   *
   * @param dir - Repository directory path
   * @param ref - Git ref to resolve (HEAD, branch name, tag, etc.)
   * @returns Commit SHA (40-character hex string)
   */
  resolveRef(dir: string, ref: string): Promise<string>

  /**
   * Paths of all initialized submodules, recursively, relative to `dir`.
   * Nested submodules are included with their full path.
   */
  listSubmodulePaths(dir: string): Promise<string[]>

  /**
   * Staged, unstaged and untracked entries, one per path. Ignored files are
   * never reported and untracked directories are expanded to their files.
   */
  status(dir: string): Promise<RawStatusEntry[]>

  /**
   * Full recursive listing of a commit's tree (blobs and gitlinks, no trees).
   */
  listTree(dir: string, commitId: string): Promise<TreeEntry[]>

  // ============================================================================
  // Object Writing
  // ============================================================================

  /**
   * Hash working tree files into blobs, applying the same filters `git add`
   * would. Returns ids in input order.
   */
  hashFiles(dir: string, paths: string[]): Promise<string[]>

  /**
   * Write a blob from raw content, with no filters applied.
   */
  hashContent(dir: string, content: BlobContent): Promise<string>

  /**
   * Write several trees in one call. Each inner list holds one directory's
   * entries, with `path` as the entry name. Returns ids in input order.
   */
  makeTrees(dir: string, trees: TreeEntry[][]): Promise<string[]>

  /**
   * Write a commit object for a tree.
   */
  commitTree(dir: string, options: CommitTreeOptions): Promise<string>

  // ============================================================================
  // Network Operations
  // ============================================================================

  /**
   * Push an object to a ref in another repository
   */
  push(dir: string, options: PushOptions): Promise<void>
}
