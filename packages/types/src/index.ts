/**
 * Shared type definitions for the symcode packages
 */

export * from './ecc'
export * from './errors'
export * from './safe'
