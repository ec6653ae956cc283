import { Command } from 'commander'
import chalk from 'chalk'
import { buildDefaultRegistry } from '../../healthcheck/checks/index.js'
import type { CheckRegistry } from '../../healthcheck/registry.js'
import { header } from '../output.js'

export function printCatalogue(registry: CheckRegistry): void {
  for (const section of registry.sections()) {
    header(section.name)
    for (const check of section.checks) {
      const call = check.manual ? chalk.cyan('manual') : chalk.gray(check.remoteCall)
      console.log(`  ${check.name} ${chalk.dim('←')} ${call}`)
    }
  }
  console.log()
  console.log(chalk.gray(`${registry.size} checks`))
}

export function registerChecksCommand(program: Command) {
  program
    .command('checks')
    .description('List the checks in report order with the remote call each makes')
    .action(() => {
      printCatalogue(buildDefaultRegistry())
    })
}
