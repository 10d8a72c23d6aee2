/**
 * SyncOperation - Drives one synchronization run end to end.
 *
 * discover → collect → snapshot (children first) → push → compose → execute.
 * Everything up to composing the script is the same in a dry run; only the
 * pushes and the script execution are replaced by printing them.
 */

import { createLogger } from '../../shared/logger'
import type {
  Configuration,
  Destination,
  ModuleStatus,
  PushSpec,
  SyncResult
} from '../../shared/types'
import { getGitAdapter } from '../adapters/git'
import { shellCommandFor, SpawnShellExecutor } from '../adapters/shell'
import { ApplyScriptBuilder, DestinationResolver } from '../domain'
import { ModuleGraphWalker } from './ModuleGraphWalker'
import { SnapshotOperation } from './SnapshotOperation'
import { StatusCollector } from './StatusCollector'
import type { SyncContext } from './SyncContext'
import { TransportOperation } from './TransportOperation'

export function createSyncContext(config: Configuration): SyncContext {
  const log = createLogger({ verbose: config.verbose })
  return {
    config,
    git: getGitAdapter({ log }),
    shell: new SpawnShellExecutor(),
    log,
    print: (text) => {
      process.stdout.write(text)
    }
  }
}

export class SyncOperation {
  static async run(ctx: SyncContext): Promise<SyncResult> {
    const { config, log } = ctx

    const graph = await ModuleGraphWalker.discover(ctx, config.cwd)
    const root = graph.modules.get('')
    if (!root) {
      throw new Error('Module graph has no root module')
    }
    const destination = DestinationResolver.parse(
      config.destination,
      root.workingTreeRoot,
      config.cwd
    )

    const statuses = new Map<string, ModuleStatus>()
    const collected = await Promise.all(
      [...graph.modules.values()].map((module) => StatusCollector.collect(ctx, module))
    )
    for (const status of collected) {
      statuses.set(status.modulePath, status)
    }

    const commits = await SnapshotOperation.snapshotAll(ctx, graph, statuses)
    const pushes = TransportOperation.planPushes(graph, commits, destination, config.snapshotRef)
    const script = ApplyScriptBuilder.build({
      destination,
      steps: commits.map(({ modulePath, commitId }) => ({ modulePath, commitId })),
      policy: config.historyPolicy,
      extraScripts: config.extraScripts
    })

    if (config.dryRun) {
      ctx.print(SyncOperation.describeDryRun(destination, pushes, script))
      return { commits, pushes, script, executed: false }
    }

    await TransportOperation.pushAll(ctx, pushes)
    log.debug(`[SyncOperation] Apply script:\n${script}`)
    await ctx.shell.run(destination, script)

    log.info(
      `[SyncOperation] Synced ${commits.length} module(s) to ${DestinationResolver.describe(destination)}`
    )
    return { commits, pushes, script, executed: true }
  }

  static describeDryRun(
    destination: Destination,
    pushes: PushSpec[],
    script: string
  ): string {
    const { command, args } = shellCommandFor(destination)
    return [
      '# pushes',
      ...pushes.map((spec) => TransportOperation.describePush(spec)),
      `# script for: ${[command, ...args].join(' ')}`,
      script
    ].join('\n')
  }
}
