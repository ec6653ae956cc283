#!/usr/bin/env node
/**
 * site-health CLI
 *
 *   site-health run      - query the site and write the report
 *   site-health checks   - list the check catalogue
 *   site-health init     - write a starter config
 */

import { createProgram } from './program.js'
import { printError } from '../shared/error.js'

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    printError(err)
    process.exitCode = 1
  })
