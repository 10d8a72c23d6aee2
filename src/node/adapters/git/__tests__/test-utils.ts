/**
 * Test utilities for Git-backed tests
 *
 * Uses native Git CLI for test setup so fixtures never depend on the code
 * under test.
 */

import { execFileSync } from 'child_process'
import fs from 'fs'
import os from 'os'
import path from 'path'

export function git(repoPath: string, args: string[]): string {
  return execFileSync('git', args, { cwd: repoPath, encoding: 'utf-8' }).trim()
}

export async function createTempDir(prefix = 'worksync-test-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix))
}

/**
 * Create a temporary test repository using native Git CLI
 */
export async function createTestRepo(): Promise<string> {
  const repoPath = await createTempDir()
  initRepo(repoPath)
  return repoPath
}

export function initRepo(repoPath: string): void {
  git(repoPath, ['init', '-q', '-b', 'main'])
  git(repoPath, ['config', 'user.name', 'Test User'])
  git(repoPath, ['config', 'user.email', 'test@example.com'])
}

/**
 * Clean up a test directory
 */
export async function cleanupTestRepo(repoPath: string): Promise<void> {
  await fs.promises.rm(repoPath, { recursive: true, force: true })
}

export async function writeFiles(repoPath: string, files: Record<string, string>): Promise<void> {
  for (const [filepath, content] of Object.entries(files)) {
    const fullPath = path.join(repoPath, filepath)
    await fs.promises.mkdir(path.dirname(fullPath), { recursive: true })
    await fs.promises.writeFile(fullPath, content)
  }
}

/**
 * Create a commit in a test repository using native Git CLI
 */
export async function createCommit(
  repoPath: string,
  files: Record<string, string>,
  message: string
): Promise<string> {
  await writeFiles(repoPath, files)
  git(repoPath, ['add', '-A'])
  git(repoPath, ['commit', '-q', '-m', message])
  return getHeadSha(repoPath)
}

/**
 * Get current HEAD SHA using Git CLI
 */
export function getHeadSha(repoPath: string): string {
  return git(repoPath, ['rev-parse', 'HEAD'])
}

/**
 * Add `childPath` as a submodule of `parentPath` at `mountPath` and commit.
 */
export function addSubmodule(parentPath: string, childPath: string, mountPath: string): void {
  git(parentPath, [
    '-c',
    'protocol.file.allow=always',
    'submodule',
    'add',
    '-q',
    childPath,
    mountPath
  ])
  git(parentPath, ['commit', '-q', '-m', `add ${mountPath}`])
}

/**
 * Clone with submodules checked out.
 */
export function cloneRecursive(sourcePath: string, targetPath: string): void {
  execFileSync(
    'git',
    ['-c', 'protocol.file.allow=always', 'clone', '-q', '--recurse-submodules', sourcePath, targetPath],
    { encoding: 'utf-8' }
  )
}
