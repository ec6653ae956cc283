import { Command } from 'commander'
import { registerRunCommand } from './commands/run.js'
import { registerChecksCommand } from './commands/checks.js'
import { registerInitCommand } from './commands/init.js'

export const VERSION = '0.1.0'

export function createProgram(): Command {
  const program = new Command()

  program
    .name('site-health')
    .description('Threshold-driven health report for a systems-management site')
    .version(VERSION)

  registerRunCommand(program)
  registerChecksCommand(program)
  registerInitCommand(program)

  return program
}
