/**
 * Core package: logging, environment configuration and byte helpers
 */

export * from './env'
export * from './logger'
export * from './utils'
