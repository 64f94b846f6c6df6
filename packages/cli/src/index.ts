#!/usr/bin/env node
/**
 * amee - AMEE carbon accounting from the command line
 */

import { createProgram } from './program.js'
import { reportCommandError } from './utils/sanitize.js'

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    reportCommandError(error)
  })
