/**
 * Library entry: build a registry, run it against a connection, render.
 */

export * from './types/index.js'
export * from './healthcheck/index.js'
export * from './report/index.js'
export * from './config/index.js'
export * from './connection/index.js'
export { AppError, type ErrorCode, type ErrorCategory, setLogLevel, type LogLevel } from './shared/index.js'
