/**
 * Utility exports for the core package
 */

export * from './bytes'
