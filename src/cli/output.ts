/**
 * User-facing terminal output: short, no timestamps.
 *
 * Diagnostics go through shared/logger.ts instead.
 */

import chalk from 'chalk'

export function success(message: string): void {
  console.log(chalk.green('✓'), message)
}

export function error(message: string): void {
  console.error(chalk.red('✗'), message)
}

export function warn(message: string): void {
  console.warn(chalk.yellow('!'), message)
}

export function header(title: string): void {
  console.log()
  console.log(chalk.bold(title))
  console.log(chalk.dim('─'.repeat(Math.min(title.length + 4, 40))))
}

/** Progress prefix, e.g. [3/16] */
export function stepPrefix(current: number, total: number): string {
  return chalk.cyan(`[${current}/${total}]`)
}
