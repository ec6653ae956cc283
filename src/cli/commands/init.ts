import { Command } from 'commander'
import { initProject } from '../../config/initProject.js'

export function registerInitCommand(program: Command) {
  program
    .command('init')
    .description('Write a starter .site-health.yaml into the current directory')
    .option('-f, --force', 'Overwrite an existing config')
    .action(async (options: { force?: boolean }) => {
      await initProject({ force: options.force })
    })
}
