/**
 * CO2 Command - one-off carbon calculation
 *
 * Creates a scratch profile, adds one item to it, prints the item's CO2 in
 * kg per year and deletes the profile again.
 *
 * Usage:
 *   amee co2 /business/energy/electricity -c country="United Kingdom" -v energyPerTime=1000
 */

import { Command } from 'commander'
import chalk from 'chalk'
import ora from 'ora'
import { CO2_UNIT, type Profile } from '@amee-client/core'
import { runWithSession } from '../session.js'
import { coerceValues, collectPair } from '../utils/options.js'
import { sanitizeError } from '../utils/sanitize.js'

interface Co2Options {
  choice: Record<string, string>
  value: Record<string, string>
  keepProfile?: boolean
}

/**
 * Delete the scratch profile without masking the error that ended the run
 */
async function deleteScratchProfile(profile: Profile): Promise<void> {
  const uid = profile.uid
  try {
    await profile.delete()
  } catch (error) {
    console.error(chalk.yellow(`Failed to delete profile ${uid}: ${sanitizeError(error)}`))
  }
}

export function createCo2Command(): Command {
  return new Command('co2')
    .description('Calculate the CO2 of one activity')
    .argument('<path>', 'Data category, e.g. /business/energy/electricity')
    .option('-c, --choice <key=value>', 'Drill choice selecting the data item (repeatable)', collectPair, {})
    .option('-v, --value <key=value>', 'Item value, e.g. energyPerTime=1000 (repeatable)', collectPair, {})
    .option('--keep-profile', 'Keep the scratch profile instead of deleting it')
    .action(async (path: string, opts: Co2Options, command: Command) => {
      await runWithSession(command, async (client) => {
        const spinner = ora('Creating profile...').start()
        const profile = await client.createProfile()

        try {
          spinner.text = `Creating ${path} item...`
          const item = await profile.createItem(path, opts.choice, coerceValues(opts.value))

          spinner.text = 'Fetching CO2...'
          const co2 = await item.co2()
          spinner.succeed(`${path}: ${co2} ${CO2_UNIT}`)
          console.log(co2)
        } catch (error) {
          spinner.fail('CO2 calculation failed')
          throw error
        } finally {
          if (opts.keepProfile) {
            console.error(chalk.dim(`Kept profile ${profile.uid}`))
          } else {
            await deleteScratchProfile(profile)
          }
        }
      })
    })
}
