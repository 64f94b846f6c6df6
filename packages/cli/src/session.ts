/**
 * Client session for one command run
 */

import { mkdirSync } from 'fs'
import { dirname } from 'path'
import type { Command } from 'commander'
import {
  AmeeClient,
  MemoryResponseCache,
  SqliteResponseCache,
  createLogger,
  type ResponseCache,
} from '@amee-client/core'
import { getGlobalOptions, resolveCacheDbPath, type GlobalOptions } from './config.js'
import { reportCommandError } from './utils/sanitize.js'

export interface CliSession {
  client: AmeeClient
  close: () => void
}

function openSqliteCache(dbPath: string): SqliteResponseCache {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true })
  }
  return new SqliteResponseCache({ dbPath })
}

/**
 * Build a client from global options. Credentials missing here fall back to
 * AMEE_USERNAME and AMEE_PASSWORD inside the client.
 */
export function openSession(options: GlobalOptions): CliSession {
  if (options.debug) {
    process.env.DEBUG = 'amee'
  }

  const dbPath = resolveCacheDbPath(options.cache)
  const sqlite = dbPath ? openSqliteCache(dbPath) : undefined
  const cache: ResponseCache = sqlite ?? new MemoryResponseCache()

  try {
    const client = new AmeeClient({
      server: options.server,
      username: options.username,
      password: options.password,
      cacheTtl: options.cacheTtl,
      cache,
      logger: createLogger('cli'),
    })
    return { client, close: () => sqlite?.close() }
  } catch (error) {
    sqlite?.close()
    throw error
  }
}

/**
 * Run a command body against a fresh session, reporting any failure and
 * closing the cache afterwards
 */
export async function runWithSession(
  command: Command,
  run: (client: AmeeClient) => Promise<void>
): Promise<void> {
  const options = getGlobalOptions(command)
  let session: CliSession | undefined

  try {
    session = openSession(options)
    await run(session.client)
  } catch (error) {
    reportCommandError(error, [options.password, process.env.AMEE_PASSWORD])
  } finally {
    session?.close()
  }
}
