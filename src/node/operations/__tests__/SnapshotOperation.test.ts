import fs from 'fs'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { Module, ModuleGraph, ModuleStatus } from '../../../shared/types'
import { cleanupTestRepo, createTempDir, writeFiles } from '../../adapters/git/__tests__/test-utils'
import { ModuleGraphBuilder } from '../../domain'
import { SnapshotOperation } from '../SnapshotOperation'
import { createSilentLogger, FakeGitAdapter } from './fake-git-adapter'

const OUTER_HEAD = 'a'.repeat(40)
const INNER_HEAD = 'b'.repeat(40)

describe('SnapshotOperation', () => {
  let rootDir: string
  let graph: ModuleGraph
  let git: FakeGitAdapter

  beforeEach(async () => {
    rootDir = await createTempDir()
    graph = ModuleGraphBuilder.build(rootDir, [
      { path: '', baselineCommitId: OUTER_HEAD },
      { path: 'lib', baselineCommitId: INNER_HEAD }
    ])
    git = new FakeGitAdapter({
      toplevel: rootDir,
      heads: {},
      listings: {
        [OUTER_HEAD]: [
          { mode: '100644', kind: 'blob', objectId: 'r'.repeat(40), path: 'README.md' },
          { mode: '100644', kind: 'blob', objectId: 'm'.repeat(40), path: 'src/main.ts' },
          { mode: '160000', kind: 'commit', objectId: INNER_HEAD, path: 'lib' }
        ],
        [INNER_HEAD]: [{ mode: '100644', kind: 'blob', objectId: 'i'.repeat(40), path: 'index.ts' }]
      }
    })
  })

  afterEach(async () => {
    await cleanupTestRepo(rootDir)
  })

  const ctx = () => ({ git, log: createSilentLogger() })

  function statuses(overrides: Partial<Record<string, Partial<ModuleStatus>>> = {}) {
    return new Map(
      ['', 'lib'].map((modulePath): [string, ModuleStatus] => [
        modulePath,
        { modulePath, changed: [], deleted: [], ...overrides[modulePath] }
      ])
    )
  }

  function moduleAt(modulePath: string): Module {
    const module = graph.modules.get(modulePath)
    if (!module) throw new Error(`missing module ${modulePath}`)
    return module
  }

  it('reuses every baseline and writes nothing when all modules are clean', async () => {
    const commits = await SnapshotOperation.snapshotAll(ctx(), graph, statuses())

    expect(commits).toEqual([
      { modulePath: 'lib', treeId: null, parentId: INNER_HEAD, commitId: INNER_HEAD },
      { modulePath: '', treeId: null, parentId: OUTER_HEAD, commitId: OUTER_HEAD }
    ])
    expect(git.writes).toEqual([])
  })

  it('records a dirty child in a clean parent', async () => {
    await writeFiles(rootDir, { 'lib/index.ts': 'export const answer = 42\n' })

    const [inner, outer] = await SnapshotOperation.snapshotAll(
      ctx(),
      graph,
      statuses({
        lib: {
          changed: [{ path: 'index.ts', status: 'modified', mode: '100644', isSymlink: false }]
        }
      })
    )

    expect(inner.commitId).not.toBe(INNER_HEAD)
    expect(inner.parentId).toBe(INNER_HEAD)
    expect(outer.parentId).toBe(OUTER_HEAD)
    expect(outer.treeId).not.toBeNull()

    const rootEntries = git.entriesOf(outer.treeId ?? '')
    expect(rootEntries.get('lib')).toEqual({
      mode: '160000',
      kind: 'commit',
      objectId: inner.commitId,
      path: 'lib'
    })
    expect(rootEntries.get('README.md')?.objectId).toBe('r'.repeat(40))
  })

  it('keeps the baseline gitlink for a clean child of a dirty parent', async () => {
    await writeFiles(rootDir, { 'notes.txt': 'todo\n' })

    const [inner, outer] = await SnapshotOperation.snapshotAll(
      ctx(),
      graph,
      statuses({
        '': { changed: [{ path: 'notes.txt', status: 'added', mode: '100644', isSymlink: false }] }
      })
    )

    expect(inner.commitId).toBe(INNER_HEAD)
    const rootEntries = git.entriesOf(outer.treeId ?? '')
    expect(rootEntries.get('lib')?.objectId).toBe(INNER_HEAD)
    expect([...rootEntries.keys()].sort()).toEqual(['README.md', 'lib', 'notes.txt', 'src'])
  })

  it('drops deleted paths and the directories they empty', async () => {
    const commits = await SnapshotOperation.snapshotAll(
      ctx(),
      graph,
      statuses({ '': { deleted: ['src/main.ts'] } })
    )

    const outer = commits[1]
    const rootEntries = git.entriesOf(outer.treeId ?? '')
    expect([...rootEntries.keys()].sort()).toEqual(['README.md', 'lib'])
  })

  it('hashes symlinks from their target', async () => {
    await fs.promises.symlink('README.md', path.join(rootDir, 'link'))

    const outer = await SnapshotOperation.snapshotModule(
      ctx(),
      moduleAt(''),
      {
        modulePath: '',
        changed: [{ path: 'link', status: 'added', mode: '120000', isSymlink: true }],
        deleted: []
      },
      new Map([['lib', { modulePath: 'lib', treeId: null, parentId: INNER_HEAD, commitId: INNER_HEAD }]])
    )

    expect(git.writes).toContain('hashContent')
    expect(git.entriesOf(outer.treeId ?? '').get('link')?.mode).toBe('120000')
  })

  it('produces the same commits for the same working tree', async () => {
    await writeFiles(rootDir, { 'lib/index.ts': 'changed\n', 'notes.txt': 'n\n' })
    const input = statuses({
      '': { changed: [{ path: 'notes.txt', status: 'added', mode: '100755', isSymlink: false }] },
      lib: { changed: [{ path: 'index.ts', status: 'modified', mode: '100644', isSymlink: false }] }
    })

    const first = await SnapshotOperation.snapshotAll(ctx(), graph, input)
    const second = await SnapshotOperation.snapshotAll(ctx(), graph, input)

    expect(second).toEqual(first)
  })

  it('refuses to snapshot a parent before its children', async () => {
    await expect(
      SnapshotOperation.snapshotModule(
        ctx(),
        moduleAt(''),
        { modulePath: '', changed: [], deleted: [] },
        new Map()
      )
    ).rejects.toThrow("Submodule 'lib' was not snapshotted before '.'")
  })
})
