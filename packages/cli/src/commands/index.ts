/**
 * CLI Commands
 *
 * Export all CLI commands for registration.
 */

export { createProfileCommand, displayProfilesTable } from './profile.js'

export { createDrillCommand, displayDrillResult } from './drill.js'

export { createCo2Command } from './co2.js'

export { createRequestCommand, toDescriptor } from './request.js'
