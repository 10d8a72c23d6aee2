/**
 * Parsers and formatters for git plumbing text.
 *
 * Pure functions, kept apart from the adapter so they can be tested without a
 * repository.
 */

import type { ObjectKind } from '../../../shared/types'
import type { RawStatusEntry, TreeEntry } from './types'

const OBJECT_KINDS: readonly ObjectKind[] = ['blob', 'tree', 'commit']

function isObjectKind(value: string): value is ObjectKind {
  return (OBJECT_KINDS as readonly string[]).includes(value)
}

function splitNul(output: string): string[] {
  return output.split('\0').filter((record) => record.length > 0)
}

/**
 * Split NUL-terminated records, keeping every byte of each record.
 */
export function parseNulList(output: string): string[] {
  return splitNul(output)
}

/**
 * Parse `git status --porcelain -z --no-renames` output.
 */
export function parseStatusZ(output: string): RawStatusEntry[] {
  return splitNul(output).map((record) => {
    if (record.length < 4 || record[2] !== ' ') {
      throw new Error(`Unexpected status record: ${JSON.stringify(record)}`)
    }
    return {
      index: record[0] ?? ' ',
      workingDir: record[1] ?? ' ',
      path: record.slice(3)
    }
  })
}

/**
 * Parse `git ls-tree -z` output: `<mode> SP <type> SP <object> TAB <path>`.
 */
export function parseLsTreeZ(output: string): TreeEntry[] {
  return splitNul(output).map((record) => {
    const match = /^(\d+) (\w+) ([0-9a-f]+)\t(.+)$/s.exec(record)
    const mode = match?.[1]
    const kind = match?.[2]
    const objectId = match?.[3]
    const path = match?.[4]
    if (!mode || !kind || !objectId || !path || !isObjectKind(kind)) {
      throw new Error(`Unexpected ls-tree record: ${JSON.stringify(record)}`)
    }
    return { mode, kind, objectId, path }
  })
}

/**
 * Split newline-separated output into non-empty trimmed lines.
 */
export function parseLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
}

// eslint-disable-next-line no-control-regex
const NEEDS_QUOTING = /[\x00-\x1f"\\\x7f]/

const C_ESCAPES: Record<string, string> = {
  '\x07': '\\a',
  '\b': '\\b',
  '\t': '\\t',
  '\n': '\\n',
  '\v': '\\v',
  '\f': '\\f',
  '\r': '\\r',
  '"': '\\"',
  '\\': '\\\\'
}

/**
 * Quote a tree entry name the way git quotes paths in plumbing output, so
 * that `git mktree` reads it back unchanged. Plain names pass through.
 */
export function quoteTreeName(name: string): string {
  if (!NEEDS_QUOTING.test(name)) return name

  let quoted = '"'
  for (const char of name) {
    const escape = C_ESCAPES[char]
    if (escape) {
      quoted += escape
    } else if (NEEDS_QUOTING.test(char)) {
      quoted += '\\' + char.charCodeAt(0).toString(8).padStart(3, '0')
    } else {
      quoted += char
    }
  }
  return quoted + '"'
}

/**
 * Format one directory's entries as `git mktree` input lines, sorted by name
 * so identical entry sets always produce identical input.
 */
export function formatTreeLines(entries: TreeEntry[]): string[] {
  return [...entries]
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
    .map((entry) => `${entry.mode} ${entry.kind} ${entry.objectId}\t${quoteTreeName(entry.path)}`)
}

/**
 * Input for `git mktree --batch`: trees separated by a blank line.
 */
export function formatMktreeBatch(trees: TreeEntry[][]): string {
  return trees.map((entries) => formatTreeLines(entries).join('\n') + '\n').join('\n')
}
