/**
 * TransportOperation - Pushes synthetic commits into the replica.
 *
 * One force-push per module into the matching module location of the
 * replica, all to the same private ref. Pushes are independent and run
 * concurrently; the run only proceeds once every one has succeeded.
 */

import type { Destination, ModuleGraph, PushSpec, SyntheticCommit } from '../../shared/types'
import { DestinationResolver, shellQuote } from '../domain'
import { TransportError } from '../shared/errors'
import type { SyncContext } from './SyncContext'

export class TransportOperation {
  static planPushes(
    graph: ModuleGraph,
    commits: SyntheticCommit[],
    destination: Destination,
    snapshotRef: string
  ): PushSpec[] {
    return commits.map((commit) => {
      const module = graph.modules.get(commit.modulePath)
      if (!module) {
        throw new Error(`Unknown module '${commit.modulePath}'`)
      }
      return {
        modulePath: commit.modulePath,
        workingTreeRoot: module.workingTreeRoot,
        url: DestinationResolver.pushUrl(destination, commit.modulePath),
        refspec: `${commit.commitId}:${snapshotRef}`
      }
    })
  }

  /**
   * The equivalent command line, for dry-run output.
   */
  static describePush(spec: PushSpec): string {
    return [
      'git',
      '-C',
      shellQuote(spec.workingTreeRoot),
      'push',
      shellQuote(spec.url),
      shellQuote(spec.refspec),
      '--force'
    ].join(' ')
  }

  static async pushAll(ctx: Pick<SyncContext, 'git' | 'log'>, specs: PushSpec[]): Promise<void> {
    const { git, log } = ctx

    // Settle every push before failing so no git process outlives the run.
    const results = await Promise.allSettled(
      specs.map(async (spec) => {
        log.debug(`[TransportOperation] ${TransportOperation.describePush(spec)}`)
        try {
          await git.push(spec.workingTreeRoot, { url: spec.url, refspec: spec.refspec, force: true })
        } catch (error) {
          throw new TransportError(
            `Failed to push '${spec.modulePath || '.'}' to ${spec.url}`,
            spec.modulePath,
            spec.url,
            error
          )
        }
      })
    )

    const failure = results.find(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    )
    if (failure) {
      throw failure.reason
    }
  }
}
