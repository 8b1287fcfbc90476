import { describe, expect, it } from 'vitest'
import { formatBytes, parseHexBytes, toDecimalList } from '../../src/utils/bytes'

describe('Byte formatting', () => {
  it('should join decimals with commas', () => {
    expect(toDecimalList([114, 25, 5])).toBe('114,25,5')
    expect(toDecimalList([])).toBe('')
  })

  it('should render hex with a 0x prefix', () => {
    expect(formatBytes(Uint8Array.from([0, 15, 255]), 'hex')).toBe('0x000fff')
    expect(formatBytes([138, 234], 'decimal')).toBe('138,234')
  })

  it('should parse hex with or without a prefix', () => {
    expect(Array.from(parseHexBytes('0x0aff') ?? [])).toEqual([10, 255])
    expect(Array.from(parseHexBytes('8ea4ba') ?? [])).toEqual([142, 164, 186])
  })

  it('should reject malformed hex', () => {
    expect(parseHexBytes('0xabc')).toBeUndefined()
    expect(parseHexBytes('0xzz')).toBeUndefined()
  })
})
