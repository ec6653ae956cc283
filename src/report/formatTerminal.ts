/**
 * Console rendering of a finished report
 */

import chalk from 'chalk'
import { formatTimestamp } from '../shared/formatTime.js'
import type { HealthStatus } from '../types/healthStatus.js'
import type { CheckResult, HealthReport } from '../healthcheck/types.js'

const STATUS_ICON: Record<HealthStatus, string> = {
  healthy: chalk.green('✓'),
  warning: chalk.yellow('⚠'),
  critical: chalk.red('✗'),
  manual: chalk.cyan('☐'),
  unknown: chalk.gray('?'),
}

export function formatResultLine(result: CheckResult): string {
  const icon = STATUS_ICON[result.status] ?? '?'
  const line = `${icon} ${result.name} ${chalk.gray(`- ${result.note}`)}`
  return result.error ? `${line}\n    ${chalk.red(result.error)}` : line
}

export function formatReportForTerminal(report: HealthReport): string {
  const lines: string[] = []

  lines.push(chalk.bold(`Site ${report.target.siteCode} (${report.target.providerMachine})`))
  lines.push(chalk.gray(`Generated ${formatTimestamp(report.generatedAt)}`))
  lines.push('')

  for (const section of report.sections) {
    lines.push(chalk.bold(section.name))
    for (const result of section.results) {
      lines.push(`  ${formatResultLine(result)}`)
    }
    lines.push('')
  }

  const { summary } = report
  lines.push(
    [
      chalk.green(`${summary.healthy} healthy`),
      chalk.yellow(`${summary.warning} warning`),
      chalk.red(`${summary.critical} critical`),
      chalk.cyan(`${summary.manual} manual`),
      chalk.gray(`${summary.unknown} unknown`),
    ].join(chalk.gray(' | '))
  )

  return lines.join('\n')
}
