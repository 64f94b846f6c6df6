/**
 * @amee-client/cli
 *
 * Command-line interface for the AMEE carbon accounting API.
 */

import { Command } from 'commander'
import { VERSION } from '@amee-client/core'
import {
  createCo2Command,
  createDrillCommand,
  createProfileCommand,
  createRequestCommand,
} from './commands/index.js'
import { parsePositiveInt } from './utils/options.js'

export function createProgram(): Command {
  return new Command()
    .name('amee')
    .description('Command line client for the AMEE carbon accounting API')
    .version(VERSION)
    .option('-s, --server <url>', 'AMEE server base URL (default: AMEE_SERVER or the stage server)')
    .option('-u, --username <name>', 'AMEE username (default: AMEE_USERNAME)')
    .option('-p, --password <password>', 'AMEE password (default: AMEE_PASSWORD)')
    .option('--cache <file>', 'Persist responses in a SQLite file (default: AMEE_CACHE_DB, else memory)')
    .option('--cache-ttl <ms>', 'Cache TTL in milliseconds', parsePositiveInt)
    .option('--debug', 'Log authentication and cache activity')
    .addCommand(createProfileCommand())
    .addCommand(createDrillCommand())
    .addCommand(createCo2Command())
    .addCommand(createRequestCommand())
}
