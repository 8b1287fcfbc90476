/**
 * Algorithm Exports
 */

export * from './factor-cache'
export * from './generator'
export * from './reed-solomon'
