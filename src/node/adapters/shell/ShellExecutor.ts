/**
 * Shell Executor
 *
 * Runs a composed script once, either in a local `sh` or in `sh` on the
 * other end of an ssh connection. The script travels on stdin; output is
 * passed through to the user and only the exit status is interpreted.
 */

import { spawn } from 'child_process'
import type { Destination } from '../../../shared/types'
import { DEFAULT_SSH_COMMAND } from '../../shared/constants'
import { RemoteApplyError } from '../../shared/errors'

export interface ShellExecutor {
  run(destination: Destination, script: string): Promise<void>
}

/**
 * Command line that runs a script read from stdin at the destination.
 */
export function shellCommandFor(destination: Destination): { command: string; args: string[] } {
  if (destination.kind === 'ssh') {
    return { command: DEFAULT_SSH_COMMAND, args: [destination.host, 'sh -s'] }
  }
  return { command: 'sh', args: ['-s'] }
}

export class SpawnShellExecutor implements ShellExecutor {
  async run(destination: Destination, script: string): Promise<void> {
    const { command, args } = shellCommandFor(destination)

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: ['pipe', 'inherit', 'inherit'] })

      child.on('error', reject)
      child.on('close', (code) => {
        if (code === 0) {
          resolve()
        } else {
          reject(
            new RemoteApplyError(
              `[ShellExecutor] ${[command, ...args].join(' ')} exited with code ${code}`,
              code
            )
          )
        }
      })

      child.stdin?.end(script)
    })
  }
}
