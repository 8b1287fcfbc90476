import { InvalidArgumentError } from 'commander'

/**
 * Commander option parser for non-negative integers
 */
export function parseInteger(value: string): number {
  const trimmed = value.trim()
  const parsed = trimmed.startsWith('0x')
    ? Number.parseInt(trimmed.slice(2), 16)
    : Number(trimmed)
  if (!/^(0x[0-9a-fA-F]+|\d+)$/.test(trimmed) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not a non-negative integer.')
  }
  return parsed
}
