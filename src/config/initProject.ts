import { writeFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import chalk from 'chalk'
import { CONFIG_FILENAME } from './loadConfig.js'

interface InitOptions {
  cwd?: string
  force?: boolean
}

export const DEFAULT_CONFIG = `# site-health configuration

site:
  code: PS1                       # three-character site code
  # providerMachine: cm01.example.local

output:
  path: site-health-report.html   # overwritten on every run
  format: html                    # html | json
  title: Site Health Report

# Values above (or below, for free space and active clients) these are warnings
thresholds:
  cpuPercent: 80
  memoryPercent: 85
  diskFreePercent: 15
  evaluationSeconds: 300
  activeClientPercent: 90
  componentErrorCount: 0
  backupAgeHours: 26
  pendingContentCount: 0

queryTimeoutMs: 30000

connection:
  type: powershell                # powershell | snapshot
  pwshPath: pwsh
  # modulePath: C:/Program Files (x86)/Microsoft Configuration Manager/AdminConsole/bin/ConfigurationManager.psd1
  # snapshotPath: ./snapshot.json

# Optional per-status overrides: label, color, background
# style:
#   warning:
#     label: Attention
#     background: "#fff3cd"
`

/**
 * Write a starter config into the working directory
 *
 * @returns false when a config already exists and force is not set
 */
export async function initProject(options: InitOptions = {}): Promise<boolean> {
  const configPath = join(options.cwd ?? process.cwd(), CONFIG_FILENAME)

  if (existsSync(configPath) && !options.force) {
    console.log(chalk.yellow(`${CONFIG_FILENAME} already exists, use --force to overwrite`))
    return false
  }

  await writeFile(configPath, DEFAULT_CONFIG)
  console.log(chalk.green(`✓ Created ${CONFIG_FILENAME}`))
  console.log('')
  console.log(chalk.bold('Next:'))
  console.log(chalk.gray(`  1. Set site.code in ${CONFIG_FILENAME}`))
  console.log(chalk.gray('  2. Run `site-health checks` to see what will be queried'))
  console.log(chalk.gray('  3. Run `site-health run`'))
  return true
}
