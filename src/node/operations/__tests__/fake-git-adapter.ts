/**
 * In-memory stand-in for the git object store.
 *
 * Object ids are sha1 digests of a readable serialization, so they are
 * deterministic and distinct, and written trees can be read back.
 */

import { createHash } from 'crypto'
import fs from 'fs'
import path from 'path'
import { vi } from 'vitest'
import type { Logger } from '../../../shared/logger'
import type { GitAdapter } from '../../adapters/git'
import type {
  BlobContent,
  CommitTreeOptions,
  PushOptions,
  RawStatusEntry,
  TreeEntry
} from '../../adapters/git'
import { formatTreeLines } from '../../adapters/git'

export type FakeRepoSetup = {
  toplevel: string
  /** Submodule paths relative to the toplevel. */
  submodules?: string[]
  /** HEAD per absolute module directory. */
  heads: Record<string, string>
  /** Porcelain entries per absolute module directory. */
  status?: Record<string, RawStatusEntry[]>
  /** Recursive listing per commit id. */
  listings?: Record<string, TreeEntry[]>
}

function digest(text: string): string {
  return createHash('sha1').update(text).digest('hex')
}

export class FakeGitAdapter implements GitAdapter {
  readonly name = 'fake'
  readonly trees = new Map<string, TreeEntry[]>()
  readonly pushes: Array<{ dir: string } & PushOptions> = []
  readonly writes: string[] = []
  failPushesTo: string | null = null

  constructor(private readonly setup: FakeRepoSetup) {}

  async showToplevel(): Promise<string> {
    return this.setup.toplevel
  }

  async resolveRef(dir: string): Promise<string> {
    const head = this.setup.heads[dir]
    if (!head) throw new Error(`no HEAD for ${dir}`)
    return head
  }

  async listSubmodulePaths(): Promise<string[]> {
    return this.setup.submodules ?? []
  }

  async status(dir: string): Promise<RawStatusEntry[]> {
    return this.setup.status?.[dir] ?? []
  }

  async listTree(_dir: string, commitId: string): Promise<TreeEntry[]> {
    return this.setup.listings?.[commitId] ?? []
  }

  async hashFiles(dir: string, paths: string[]): Promise<string[]> {
    this.writes.push(`hashFiles ${paths.join(',')}`)
    return Promise.all(
      paths.map(async (p) => digest(`blob:${await fs.promises.readFile(path.join(dir, p), 'utf-8')}`))
    )
  }

  async hashContent(_dir: string, content: BlobContent): Promise<string> {
    this.writes.push('hashContent')
    return digest(`blob:${content.toString()}`)
  }

  async makeTrees(_dir: string, trees: TreeEntry[][]): Promise<string[]> {
    this.writes.push(`makeTrees ${trees.length}`)
    return trees.map((entries) => {
      const id = digest(`tree:${formatTreeLines(entries).join('\n')}`)
      this.trees.set(id, entries)
      return id
    })
  }

  async commitTree(_dir: string, options: CommitTreeOptions): Promise<string> {
    this.writes.push('commitTree')
    const { name, email, date } = options.identity
    return digest(
      `commit:${options.treeId}:${options.parentId}:${name}:${email}:${date}:${options.message}`
    )
  }

  async push(dir: string, options: PushOptions): Promise<void> {
    if (this.failPushesTo && options.url.includes(this.failPushesTo)) {
      throw new Error(`remote rejected ${options.url}`)
    }
    this.pushes.push({ dir, ...options })
  }

  /**
   * Entries of a written tree, by name.
   */
  entriesOf(treeId: string): Map<string, TreeEntry> {
    const entries = this.trees.get(treeId)
    if (!entries) throw new Error(`unknown tree ${treeId}`)
    return new Map(entries.map((entry) => [entry.path, entry]))
  }
}

export function createSilentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}
