/**
 * Application error type with category, code and a fix suggestion
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

export type ErrorCategory =
  | 'CONFIG'
  | 'CONNECTION'
  | 'QUERY'
  | 'TIMEOUT'
  | 'PERMISSION'
  | 'RENDER'
  | 'CHECK'
  | 'RESOURCE'
  | 'UNKNOWN'

export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID'
  | 'CONNECTION_FAILED'
  | 'CONNECTION_MODULE_MISSING'
  | 'CONNECTION_SITE_NOT_FOUND'
  | 'QUERY_FAILED'
  | 'QUERY_UNEXPECTED_SHAPE'
  | 'QUERY_TIMEOUT'
  | 'QUERY_CANCELLED'
  | 'CHECK_INVALID'
  | 'RENDER_UNMAPPED_STATUS'
  | 'ERR_PERMISSION'
  | 'ERR_FILE_NOT_FOUND'
  | 'ERR_UNKNOWN'

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /**
   * Terminal rendering of the error
   */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(chalk.red('✗') + ' ' + chalk.bold('Error') + ` [${colorFn(categoryLabels[this.category])}]`)
    lines.push('')
    lines.push(chalk.dim(`  code: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  Suggested fix:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ Factories ============

  static configNotFound(path: string): AppError {
    return new AppError(
      'CONFIG_NOT_FOUND',
      `Config not found: ${path}`,
      'CONFIG',
      undefined,
      'Create one with: site-health init'
    )
  }

  static configInvalid(reason: string): AppError {
    return new AppError(
      'CONFIG_INVALID',
      `Invalid config: ${reason}`,
      'CONFIG',
      undefined,
      'Compare the file with the template written by site-health init'
    )
  }

  static connectionFailed(reason: string, cause?: unknown): AppError {
    return new AppError(
      'CONNECTION_FAILED',
      `Management connection failed: ${reason}`,
      'CONNECTION',
      cause,
      'Check that pwsh is installed and the provider machine is reachable'
    )
  }

  static moduleMissing(reason: string, cause?: unknown): AppError {
    return new AppError(
      'CONNECTION_MODULE_MISSING',
      `ConfigurationManager module could not be loaded: ${reason}`,
      'CONNECTION',
      cause,
      'Run from a machine with the admin console installed, or set connection.modulePath'
    )
  }

  static siteNotFound(siteCode: string): AppError {
    return new AppError(
      'CONNECTION_SITE_NOT_FOUND',
      `Site drive ${siteCode}: not found`,
      'CONNECTION',
      undefined,
      'Verify site.code and that the account has access to the site'
    )
  }

  static queryFailed(remoteCall: string, reason: string, cause?: unknown): AppError {
    return new AppError('QUERY_FAILED', `${remoteCall}: ${reason}`, 'QUERY', cause)
  }

  static unexpectedShape(remoteCall: string, reason: string): AppError {
    return new AppError(
      'QUERY_UNEXPECTED_SHAPE',
      `${remoteCall} returned an unexpected shape: ${reason}`,
      'QUERY'
    )
  }

  static timeout(label: string, timeoutMs: number): AppError {
    return new AppError(
      'QUERY_TIMEOUT',
      `${label} timed out after ${timeoutMs}ms`,
      'TIMEOUT',
      undefined,
      'Raise queryTimeoutMs in the config'
    )
  }

  static cancelled(remoteCall: string, cause?: unknown): AppError {
    return new AppError('QUERY_CANCELLED', `${remoteCall}: cancelled`, 'QUERY', cause)
  }

  static checkInvalid(reason: string): AppError {
    return new AppError('CHECK_INVALID', `Invalid check definition: ${reason}`, 'CHECK')
  }

  static unmappedStatus(status: string, check: string): AppError {
    return new AppError(
      'RENDER_UNMAPPED_STATUS',
      `No style mapping for status "${status}" (check: ${check})`,
      'RENDER'
    )
  }

  /**
   * Wrap any thrown value, classifying common Node error messages
   */
  static fromError(error: unknown): AppError {
    if (error instanceof AppError) return error
    const message = getErrorMessage(error)

    for (const pattern of errorPatterns) {
      if (pattern.pattern.test(message)) {
        return new AppError(pattern.code, message, pattern.category, error, pattern.suggestion)
      }
    }

    return new AppError('ERR_UNKNOWN', message, 'UNKNOWN', error)
  }
}

// ============ Pattern matching ============

interface ErrorPattern {
  pattern: RegExp
  category: ErrorCategory
  code: ErrorCode
  suggestion: string
}

const errorPatterns: ErrorPattern[] = [
  {
    pattern: /timeout|timed out|ETIMEDOUT/i,
    category: 'TIMEOUT',
    code: 'QUERY_TIMEOUT',
    suggestion: 'Raise queryTimeoutMs in the config',
  },
  {
    pattern: /EACCES|permission denied|EPERM|access is denied/i,
    category: 'PERMISSION',
    code: 'ERR_PERMISSION',
    suggestion: 'Check that the account has rights on the site and the output directory',
  },
  {
    pattern: /ENOENT|no such file|file not found/i,
    category: 'RESOURCE',
    code: 'ERR_FILE_NOT_FOUND',
    suggestion: 'Check the path and the working directory',
  },
]

// ============ Formatting ============

const categoryLabels: Record<ErrorCategory, string> = {
  CONFIG: 'config',
  CONNECTION: 'connection',
  QUERY: 'query',
  TIMEOUT: 'timeout',
  PERMISSION: 'permission',
  RENDER: 'render',
  CHECK: 'check',
  RESOURCE: 'resource',
  UNKNOWN: 'unknown',
}

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  CONFIG: chalk.yellow,
  CONNECTION: chalk.red,
  QUERY: chalk.red,
  TIMEOUT: chalk.magenta,
  PERMISSION: chalk.red,
  RENDER: chalk.magenta,
  CHECK: chalk.yellow,
  RESOURCE: chalk.yellow,
  UNKNOWN: chalk.gray,
}

export function printError(error: unknown): void {
  console.error(AppError.fromError(error).format())
}
