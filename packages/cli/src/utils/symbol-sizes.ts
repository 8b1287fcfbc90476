/**
 * Data Matrix ECC 200 symbols whose data fits in one Reed-Solomon block
 */

import { z } from 'zod'
import type { SymbolSize } from '../types'
import rawSymbolSizes from '../data/symbol-sizes.json'

const symbolSizesFileSchema = z.object({
  symbols: z.array(
    z.object({
      name: z.string().regex(/^\d+x\d+$/),
      rows: z.number().int().positive(),
      columns: z.number().int().positive(),
      dataSize: z.number().int().positive(),
      eccSize: z.number().int().positive(),
    }),
  ),
})

export const SYMBOL_SIZES: readonly SymbolSize[] = symbolSizesFileSchema.parse(
  rawSymbolSizes,
).symbols

export function findSymbolSize(name: string): SymbolSize | undefined {
  const normalized = name.trim().toLowerCase()
  return SYMBOL_SIZES.find((symbol) => symbol.name === normalized)
}

/**
 * Smallest square symbol whose data capacity holds `length` codewords
 */
export function smallestSquareSymbol(length: number): SymbolSize | undefined {
  return SYMBOL_SIZES.filter((symbol) => symbol.rows === symbol.columns).find(
    (symbol) => symbol.dataSize >= length,
  )
}
