import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import type { RemoteCall } from './types.js'

/**
 * Validate a remote call's decoded output against its schema
 */
export function parseCallOutput<T>(call: RemoteCall<T>, value: unknown): T {
  const result = call.schema.safeParse(value)
  if (!result.success) {
    const reason = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw AppError.unexpectedShape(call.name, reason)
  }
  return result.data
}

/**
 * Decode JSON text printed by a remote call. Empty output means the pipeline
 * produced no objects.
 */
export function decodeJsonOutput(callName: string, stdout: string): unknown {
  const text = stdout.trim()
  if (text === '') return null
  try {
    return JSON.parse(text)
  } catch (error) {
    throw AppError.unexpectedShape(callName, `output is not JSON (${getErrorMessage(error)})`)
  }
}
