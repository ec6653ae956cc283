/**
 * @entry Shared infrastructure
 *
 * - Result<T,E>: ok/err/fromPromise/fromThrowable
 * - AppError: error codes, categories, printError
 * - Logger: createLogger/setLogLevel/logError
 */

export { type Result, ok, err, fromPromise, fromThrowable } from './result.js'

export { type ErrorCode, type ErrorCategory, AppError, printError } from './error.js'

export { type LogLevel, type Logger, type ErrorContext, setLogLevel, createLogger, logError } from './logger.js'

export { getErrorMessage } from './assertError.js'

export { truncateText } from './truncateText.js'

export { formatTimestamp } from './formatTime.js'

export { withTimeout } from './withTimeout.js'
