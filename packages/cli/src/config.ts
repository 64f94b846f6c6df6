/**
 * CLI Configuration
 *
 * Global options shared by every command.
 */

import type { Command } from 'commander'

/**
 * Options registered on the root program
 */
export type GlobalOptions = {
  server?: string
  username?: string
  password?: string
  /** SQLite cache file */
  cache?: string
  cacheTtl?: number
  debug?: boolean
}

/**
 * SQLite file from --cache, then AMEE_CACHE_DB. Undefined means an
 * in-memory cache for the life of the command.
 */
export function resolveCacheDbPath(option?: string): string | undefined {
  return option || process.env.AMEE_CACHE_DB || undefined
}

/**
 * Read the options registered on the root program from any subcommand
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  let root = command
  while (root.parent) {
    root = root.parent
  }
  return root.opts<GlobalOptions>()
}
