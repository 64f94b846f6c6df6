/**
 * Error output sanitization utilities
 *
 * Keeps home directory paths and credentials out of CLI error output.
 */

import chalk from 'chalk'
import { homedir } from 'os'
import { isAmeeError } from '@amee-client/core'

/**
 * Sanitize an error message for display
 *
 * Replaces the home directory (and the usual per-user path shapes on other
 * systems) with ~, and masks every given secret.
 *
 * @param error - The error to sanitize (Error object or string)
 * @param secrets - Values to mask, such as the password in use
 */
export function sanitizeError(error: unknown, secrets: Array<string | undefined> = []): string {
  const message = error instanceof Error ? error.message : String(error)
  const home = homedir()

  // Escape special regex characters in the home path
  const escapedHome = home.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')

  let sanitized = message.replace(new RegExp(escapedHome, 'g'), '~')

  sanitized = sanitized.replace(/\/Users\/[^/]+\//g, '~/')
  sanitized = sanitized.replace(/\/home\/[^/]+\//g, '~/')
  sanitized = sanitized.replace(/C:\\Users\\[^\\]+\\/gi, '~\\')

  for (const secret of secrets) {
    if (secret) {
      sanitized = sanitized.split(secret).join('***')
    }
  }

  return sanitized
}

/**
 * Print a failed command's error to stderr and mark the process failed
 *
 * @param error - The error to report
 * @param secrets - Values to mask in the output
 */
export function reportCommandError(error: unknown, secrets: Array<string | undefined> = []): void {
  const label = isAmeeError(error) ? `${error.name}:` : 'Error:'
  console.error(chalk.red(label), sanitizeError(error, secrets))
  process.exitCode = 1
}
