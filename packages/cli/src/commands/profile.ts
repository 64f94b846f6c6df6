/**
 * Profile Commands
 *
 * Usage:
 *   amee profile create
 *   amee profile list
 *   amee profile delete <uid>
 */

import { Command } from 'commander'
import chalk from 'chalk'
import Table from 'cli-table3'
import type { Profile } from '@amee-client/core'
import { runWithSession } from '../session.js'

/**
 * Display profiles in a table
 */
export function displayProfilesTable(profiles: Profile[]): void {
  if (profiles.length === 0) {
    console.log(chalk.yellow('\nNo profiles.\n'))
    console.log(chalk.dim('Create one with: amee profile create\n'))
    return
  }

  const table = new Table({
    head: [chalk.bold('#'), chalk.bold('UID')],
    colWidths: [6, 30],
  })

  profiles.forEach((profile, index) => {
    table.push([String(index + 1), profile.uid ?? chalk.dim('deleted')])
  })

  console.log(table.toString())
  console.log(chalk.dim(`\n${profiles.length} profile(s)\n`))
}

function createProfileCreateCommand(): Command {
  return new Command('create')
    .description('Create a new profile')
    .action(async (_opts: unknown, command: Command) => {
      await runWithSession(command, async (client) => {
        const profile = await client.createProfile()
        console.log(profile.uid)
      })
    })
}

function createProfileListCommand(): Command {
  return new Command('list')
    .alias('ls')
    .description('List the profiles of the account')
    .action(async (_opts: unknown, command: Command) => {
      await runWithSession(command, async (client) => {
        displayProfilesTable(await client.listProfiles())
      })
    })
}

function createProfileDeleteCommand(): Command {
  return new Command('delete')
    .alias('rm')
    .description('Delete a profile')
    .argument('<uid>', 'Profile UID')
    .action(async (uid: string, _opts: unknown, command: Command) => {
      await runWithSession(command, async (client) => {
        await client.deleteProfile(uid)
        console.log(chalk.green(`Deleted profile ${uid}`))
      })
    })
}

/**
 * Create profile command group
 */
export function createProfileCommand(): Command {
  return new Command('profile')
    .description('Manage AMEE profiles')
    .addCommand(createProfileCreateCommand())
    .addCommand(createProfileListCommand())
    .addCommand(createProfileDeleteCommand())
}
