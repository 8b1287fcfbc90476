import type { ByteFormat } from '@symcode/core'

export interface GlobalOptions {
  format?: ByteFormat
  json?: boolean
}

export interface RsOptions extends GlobalOptions {
  text?: string
  file?: string
  symbol?: string
  dataSize?: number
  eccSize?: number
}

export interface BchOptions extends GlobalOptions {
  valueWidth: number
  poly: number
  polyWidth: number
  all?: boolean
}

/**
 * Square or rectangular Data Matrix symbol with a single Reed-Solomon block
 */
export interface SymbolSize {
  name: string
  rows: number
  columns: number
  dataSize: number
  eccSize: number
}
