/**
 * Git Adapter Factory
 *
 * Provides a centralized way to create and access Git adapter instances.
 */

import type { Logger } from '../../../shared/logger'
import type { GitAdapter } from './interface'
import { SimpleGitAdapter } from './SimpleGitAdapter'

/**
 * Supported Git adapter types
 */
export type GitAdapterType = 'simple-git'

/**
 * Configuration for adapter creation
 */
export interface GitAdapterConfig {
  /**
   * Which adapter to use
   */
  type?: GitAdapterType

  /**
   * Logger that reports adapter creation at debug level
   */
  log?: Logger
}

/**
 * Singleton adapter instance
 * Cached to avoid recreating adapters on every operation
 */
let cachedAdapter: GitAdapter | null = null

/**
 * Create a Git adapter instance
 */
export function createGitAdapter(config: GitAdapterConfig = {}): GitAdapter {
  config.log?.debug(`[GitAdapter] Creating adapter: ${config.type ?? 'simple-git'}`)
  return new SimpleGitAdapter()
}

/**
 * Get the singleton Git adapter instance
 *
 * @param config - Optional configuration (only used on first call)
 * @returns Cached Git adapter instance
 */
export function getGitAdapter(config: GitAdapterConfig = {}): GitAdapter {
  if (cachedAdapter) {
    return cachedAdapter
  }

  cachedAdapter = createGitAdapter(config)
  return cachedAdapter
}
