/**
 * symcode core package
 *
 * Logging, environment loading and byte formatting shared by the packages
 */

export * from './env'
export * from './logger'
export * from './utils'
