/**
 * DestinationResolver - Pure parsing of the replica designator.
 *
 * Accepted forms:
 * - `path` (no colon before the first slash): a local replica
 * - `[user@]host:path`: a replica reached over ssh
 * - `[user@]host:`: same absolute path as the local root module
 */

import path from 'path'
import type { Destination } from '../../shared/types'
import { ValidationError } from '../shared/errors'

export class DestinationResolver {
  private constructor() {}

  /**
   * Parses a designator. Relative local paths resolve against `cwd`.
   */
  static parse(designator: string, localRoot: string, cwd: string): Destination {
    const trimmed = designator.trim()
    if (!trimmed) {
      throw new ValidationError('Destination is required', 'destination')
    }

    const colon = trimmed.indexOf(':')
    const slash = trimmed.indexOf('/')
    const isRemote = colon > 0 && (slash === -1 || colon < slash)

    if (!isRemote) {
      return { kind: 'local', path: path.resolve(cwd, trimmed) }
    }

    const host = trimmed.slice(0, colon)
    const remotePath = trimmed.slice(colon + 1) || localRoot
    return { kind: 'ssh', host, path: DestinationResolver.stripHome(remotePath) }
  }

  /**
   * ssh sessions start in the home directory, so `~/x` is just `x`.
   */
  static stripHome(remotePath: string): string {
    if (remotePath === '~') return '.'
    return remotePath.startsWith('~/') ? remotePath.slice(2) || '.' : remotePath
  }

  /**
   * Location of a module inside the replica, as a path on the replica host.
   */
  static modulePath(destination: Destination, modulePath: string): string {
    return modulePath ? path.posix.join(destination.path, modulePath) : destination.path
  }

  /**
   * Push URL for a module inside the replica.
   */
  static pushUrl(destination: Destination, modulePath: string): string {
    const location = DestinationResolver.modulePath(destination, modulePath)
    return destination.kind === 'ssh' ? `${destination.host}:${location}` : location
  }

  static describe(destination: Destination): string {
    return destination.kind === 'ssh' ? `${destination.host}:${destination.path}` : destination.path
  }
}
