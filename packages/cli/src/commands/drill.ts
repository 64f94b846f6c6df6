/**
 * Drill Command - walk a data category down to a data item
 *
 * Usage:
 *   amee drill /business/energy/electricity
 *   amee drill /business/energy/electricity -c country="United Kingdom"
 */

import { Command } from 'commander'
import chalk from 'chalk'
import type { DrillResult } from '@amee-client/core'
import { runWithSession } from '../session.js'
import { collectPair } from '../utils/options.js'

/**
 * Print a drill outcome: the data item UID, or the next choice to make
 */
export function displayDrillResult(path: string, result: DrillResult): void {
  if (result.complete) {
    console.log(result.uid)
    return
  }

  console.log(chalk.bold(`Choose ${result.name}:`))
  for (const choice of result.choices) {
    console.log(`  ${choice}`)
  }
  console.log(chalk.dim(`\nNext: amee drill ${path} -c ${result.name}=<value>`))
}

export function createDrillCommand(): Command {
  return new Command('drill')
    .description('Drill down a data category to find a data item UID')
    .argument('<path>', 'Data category, e.g. /business/energy/electricity')
    .option('-c, --choice <key=value>', 'Choice made so far (repeatable)', collectPair, {})
    .action(async (path: string, opts: { choice: Record<string, string> }, command: Command) => {
      await runWithSession(command, async (client) => {
        displayDrillResult(path, await client.drill(path, opts.choice))
      })
    })
}
