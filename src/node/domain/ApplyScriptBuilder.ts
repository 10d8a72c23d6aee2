/**
 * ApplyScriptBuilder - Composes the shell program run on the replica.
 *
 * One block per module, in the order given (children first). Each block
 * moves HEAD to the synthetic commit without touching files, forces the
 * working tree to match it, then removes untracked leftovers. Under the
 * `restore` policy the block also puts HEAD back where it was, so the synced
 * content shows up as uncommitted changes.
 *
 * The output depends only on the inputs; dry runs print exactly what a real
 * run sends.
 */

import type { Destination, HistoryPolicy, RemoteApplyStep } from '../../shared/types'
import { DestinationResolver } from './DestinationResolver'

export type ApplyScriptParams = {
  destination: Destination
  steps: RemoteApplyStep[]
  policy: HistoryPolicy
  /** Fragments appended verbatim after all module blocks. */
  extraScripts?: string[]
}

/**
 * Single-quote a word for POSIX sh.
 */
export function shellQuote(word: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(word)) return word
  return `'${word.replace(/'/g, `'\\''`)}'`
}

export class ApplyScriptBuilder {
  private constructor() {}

  static build({ destination, steps, policy, extraScripts = [] }: ApplyScriptParams): string {
    const lines: string[] = ['set -e']

    steps.forEach((step, index) => {
      lines.push('', ...ApplyScriptBuilder.moduleBlock(destination, step, policy, index))
    })

    for (const fragment of extraScripts) {
      lines.push('', fragment.replace(/\n+$/, ''))
    }

    return lines.join('\n') + '\n'
  }

  static moduleBlock(
    destination: Destination,
    step: RemoteApplyStep,
    policy: HistoryPolicy,
    index: number
  ): string[] {
    const location = DestinationResolver.modulePath(destination, step.modulePath)
    const origVar = `worksync_orig_${index}`
    const block = [
      `# ${step.modulePath || '.'}`,
      `cd -- ${shellQuote(location)}`
    ]

    if (policy === 'restore') {
      block.push(`${origVar}=$(git rev-parse HEAD)`)
    }

    block.push(
      `git reset -q --soft ${step.commitId}`,
      'git reset -q --hard',
      'git clean -q -ffd'
    )

    if (policy === 'restore') {
      block.push(`git reset -q "$${origVar}"`)
    }

    return block
  }
}
