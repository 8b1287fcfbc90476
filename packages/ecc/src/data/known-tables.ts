/**
 * Factor tables for the ecc lengths of the common square symbols, loaded
 * from factor-tables.json
 */

import type { FactorTable } from '@symcode/types'
import { z } from 'zod'
import { FIELD_POLYNOMIAL } from '../config'
import { fieldElementSchema } from '../validation/schemas'
import rawFactorTables from './factor-tables.json'

const factorTablesFileSchema = z.object({
  fieldPolynomial: z.literal(FIELD_POLYNOMIAL),
  tables: z.array(
    z
      .object({
        eccSize: z.number().int().positive(),
        factors: z.array(fieldElementSchema),
      })
      .refine((entry) => entry.factors.length === entry.eccSize, {
        message: 'factors length must equal eccSize',
      }),
  ),
})

export const KNOWN_FACTOR_TABLES: ReadonlyMap<number, FactorTable> = new Map(
  factorTablesFileSchema
    .parse(rawFactorTables)
    .tables.map((entry): [number, FactorTable] => [
      entry.eccSize,
      Object.freeze([...entry.factors]),
    ]),
)
