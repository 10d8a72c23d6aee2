/**
 * Simple-Git Adapter
 *
 * Git adapter implementation using simple-git library.
 * This uses the native Git CLI under the hood. Plumbing commands that read
 * from stdin (hash-object, mktree, commit-tree) go through a direct spawn,
 * since simple-git has no way to feed a child's stdin.
 */

import { spawn } from 'child_process'
import path from 'path'
import simpleGit, { type SimpleGit } from 'simple-git'
import { GitError } from '../../shared/errors'
import type { GitAdapter } from './interface'
import {
  formatMktreeBatch,
  formatTreeLines,
  parseLines,
  parseLsTreeZ,
  parseNulList,
  parseStatusZ
} from './parsers'
import type {
  BlobContent,
  CommitTreeOptions,
  PushOptions,
  RawStatusEntry,
  TreeEntry
} from './types'

type RunOptions = {
  input?: BlobContent
  env?: Record<string, string>
}

export class SimpleGitAdapter implements GitAdapter {
  readonly name = 'simple-git'

  private createGit(dir: string): SimpleGit {
    return simpleGit(dir)
  }

  // ============================================================================
  // Repository Inspection
  // ============================================================================

  async showToplevel(dir: string): Promise<string> {
    try {
      const git = this.createGit(dir)
      const result = await git.revparse(['--show-toplevel'])
      return path.resolve(result.trim())
    } catch (error) {
      throw this.createError('showToplevel', error)
    }
  }

  async resolveRef(dir: string, ref: string): Promise<string> {
    try {
      const git = this.createGit(dir)
      const result = await git.revparse(['--verify', `${ref}^{commit}`])
      return result.trim()
    } catch (error) {
      throw this.createError('resolveRef', error)
    }
  }

  async listSubmodulePaths(dir: string): Promise<string[]> {
    try {
      const git = this.createGit(dir)
      // foreach only visits checked-out submodules; $displaypath is relative to `dir`
      const output = await git.raw([
        'submodule',
        'foreach',
        '--recursive',
        '--quiet',
        `printf '%s\\0' "$displaypath"`
      ])
      return parseNulList(output)
    } catch (error) {
      throw this.createError('listSubmodulePaths', error)
    }
  }

  async status(dir: string): Promise<RawStatusEntry[]> {
    try {
      const git = this.createGit(dir)
      const output = await git.raw([
        'status',
        '--porcelain',
        '-z',
        '--untracked-files=all',
        '--no-renames'
      ])
      return parseStatusZ(output)
    } catch (error) {
      throw this.createError('status', error)
    }
  }

  async listTree(dir: string, commitId: string): Promise<TreeEntry[]> {
    try {
      const git = this.createGit(dir)
      const output = await git.raw(['ls-tree', '-r', '-z', '--full-tree', commitId])
      return parseLsTreeZ(output)
    } catch (error) {
      throw this.createError('listTree', error)
    }
  }

  // ============================================================================
  // Object Writing
  // ============================================================================

  async hashFiles(dir: string, paths: string[]): Promise<string[]> {
    if (paths.length === 0) {
      return []
    }

    try {
      // --stdin-paths reads one path per line and unquotes a leading '"';
      // such paths are passed on the command line instead.
      const batched = paths.filter((p) => !SimpleGitAdapter.needsArgvPath(p))
      const batchIds = await this.hashPathsFromStdin(dir, batched)

      const byPath = new Map(batched.map((p, index) => [p, batchIds[index]]))
      const ids: string[] = []
      for (const p of paths) {
        const batchId = byPath.get(p)
        if (batchId) {
          ids.push(batchId)
          continue
        }
        const { stdout } = await this.runGitWithInput(dir, ['hash-object', '-w', '--', p])
        ids.push(stdout.trim())
      }
      return ids
    } catch (error) {
      throw this.createError('hashFiles', error)
    }
  }

  async hashContent(dir: string, content: BlobContent): Promise<string> {
    try {
      const { stdout } = await this.runGitWithInput(dir, ['hash-object', '-w', '--stdin'], {
        input: content
      })
      return stdout.trim()
    } catch (error) {
      throw this.createError('hashContent', error)
    }
  }

  async makeTrees(dir: string, trees: TreeEntry[][]): Promise<string[]> {
    if (trees.length === 0) {
      return []
    }

    try {
      // Batch mode cannot express an empty tree, so those go one by one.
      if (trees.some((entries) => entries.length === 0)) {
        const ids: string[] = []
        for (const entries of trees) {
          const { stdout } = await this.runGitWithInput(dir, ['mktree'], {
            input: formatTreeLines(entries)
              .map((line) => line + '\n')
              .join('')
          })
          ids.push(stdout.trim())
        }
        return ids
      }

      const { stdout } = await this.runGitWithInput(dir, ['mktree', '--batch'], {
        input: formatMktreeBatch(trees)
      })
      const ids = parseLines(stdout)
      if (ids.length !== trees.length) {
        throw new Error(`expected ${trees.length} tree ids, got ${ids.length}`)
      }
      return ids
    } catch (error) {
      throw this.createError('makeTrees', error)
    }
  }

  async commitTree(dir: string, options: CommitTreeOptions): Promise<string> {
    const { name, email, date } = options.identity

    try {
      const { stdout } = await this.runGitWithInput(
        dir,
        ['commit-tree', options.treeId, '-p', options.parentId],
        {
          input: options.message + '\n',
          env: {
            GIT_AUTHOR_NAME: name,
            GIT_AUTHOR_EMAIL: email,
            GIT_AUTHOR_DATE: date,
            GIT_COMMITTER_NAME: name,
            GIT_COMMITTER_EMAIL: email,
            GIT_COMMITTER_DATE: date
          }
        }
      )
      return stdout.trim()
    } catch (error) {
      throw this.createError('commitTree', error)
    }
  }

  // ============================================================================
  // Network Operations
  // ============================================================================

  async push(dir: string, options: PushOptions): Promise<void> {
    try {
      const git = this.createGit(dir)
      const args: string[] = [options.url, options.refspec]

      if (options.force) {
        args.push('--force')
      }

      await git.push(args)
    } catch (error) {
      throw this.createError('push', error)
    }
  }

  // ============================================================================
  // Private Helper Methods
  // ============================================================================

  private static needsArgvPath(filePath: string): boolean {
    return filePath.includes('\n') || filePath.startsWith('"')
  }

  private async hashPathsFromStdin(dir: string, paths: string[]): Promise<string[]> {
    if (paths.length === 0) {
      return []
    }

    const { stdout } = await this.runGitWithInput(dir, ['hash-object', '-w', '--stdin-paths'], {
      input: paths.map((p) => p + '\n').join('')
    })
    const ids = parseLines(stdout)
    if (ids.length !== paths.length) {
      throw new Error(`expected ${paths.length} object ids, got ${ids.length}`)
    }
    return ids
  }

  private async runGitWithInput(
    dir: string,
    args: string[],
    options: RunOptions = {}
  ): Promise<{ stdout: string; stderr: string }> {
    return new Promise((resolve, reject) => {
      const child = spawn('git', args, {
        cwd: dir,
        env: { ...process.env, ...options.env }
      })
      let stdout = ''
      let stderr = ''

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString()
      })
      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString()
      })

      child.on('error', reject)
      child.on('close', (code) => {
        if (code === 0) {
          resolve({ stdout, stderr })
        } else {
          const message = stderr.trim() || stdout.trim() || `git ${args.join(' ')} failed`
          reject(new Error(`${message} (exit code ${code})`))
        }
      })

      child.stdin.end(options.input ?? '')
    })
  }

  private createError(operation: string, originalError: unknown): GitError {
    const message = originalError instanceof Error ? originalError.message : String(originalError)
    return new GitError(`[SimpleGitAdapter] ${operation} failed: ${message}`, operation, originalError)
  }
}
