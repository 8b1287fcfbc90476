/**
 * Factor table cache
 *
 * Tables depend on nothing but the ecc length, so an entry never goes stale.
 * Two callers racing on the same miss both build the same table and the second
 * write is a no-op in effect.
 */

import { logger } from '@symcode/core'
import type {
  FactorTable,
  FactorTableProvider,
  InvalidArgumentError,
  Safe,
} from '@symcode/types'
import { ECC_ERRORS, safeError, safeResult } from '@symcode/types'
import { KNOWN_FACTOR_TABLES } from '../data/known-tables'
import { eccSizeSchema, parseArgument } from '../validation/schemas'
import { buildFactorTable } from './generator'

export interface FactorTableCacheOptions {
  /** Start with the tables for the common symbol sizes (default true) */
  seedKnownTables?: boolean
}

export class FactorTableCache implements FactorTableProvider {
  private readonly tables = new Map<number, FactorTable>()

  constructor(options: FactorTableCacheOptions = {}) {
    if (options.seedKnownTables ?? true) {
      for (const [eccSize, factors] of KNOWN_FACTOR_TABLES) {
        this.tables.set(eccSize, factors)
      }
    }
  }

  get size(): number {
    return this.tables.size
  }

  has(eccSize: number): boolean {
    return this.tables.has(eccSize)
  }

  /**
   * Return the table for `eccSize`, building and storing it on first use
   */
  get(eccSize: number): Safe<FactorTable, InvalidArgumentError> {
    const [sizeError, size] = parseArgument(
      eccSizeSchema,
      eccSize,
      ECC_ERRORS.ECC_SIZE_NOT_POSITIVE,
      'eccSize',
    )
    if (sizeError) {
      return safeError(sizeError)
    }

    const cached = this.tables.get(size)
    if (cached) {
      return safeResult(cached)
    }

    const [buildError, factors] = buildFactorTable(size)
    if (buildError) {
      return safeError(buildError)
    }

    logger.debug('Factor table built', { eccSize: size })
    this.tables.set(size, factors)
    return safeResult(factors)
  }

  clear(): void {
    this.tables.clear()
  }
}

/** Shared cache behind the rsFactorTable helper */
export const defaultFactorTableCache = new FactorTableCache()

/**
 * Factor table for `eccSize` from the shared cache
 */
export function rsFactorTable(
  eccSize: number,
): Safe<FactorTable, InvalidArgumentError> {
  return defaultFactorTableCache.get(eccSize)
}
