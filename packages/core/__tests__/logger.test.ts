import { afterEach, describe, expect, it, vi } from 'vitest'
import { LoggerProvider, resolveLevel } from '../src/logger'

describe('LoggerProvider', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should change level', () => {
    const provider = new LoggerProvider()
    provider.setLevel('warn')
    expect(provider.level).toBe('warn')
  })

  it('should fall back to info for an unknown level', () => {
    const provider = new LoggerProvider('verbose')
    expect(provider.level).toBe('info')
  })

  it('should accept pino level names only', () => {
    expect(resolveLevel('debug')).toBe('debug')
    expect(resolveLevel('silent')).toBe('silent')
    expect(resolveLevel('toString')).toBe('info')
    expect(resolveLevel('')).toBe('info')
  })

  it('should use the console before init', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const provider = new LoggerProvider()
    provider.setLevel('warn')

    provider.warn('table rebuilt', 7)

    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn.mock.calls[0]?.[0]).toMatch(/\] \[WARN\] table rebuilt$/)
    expect(warn.mock.calls[0]?.[1]).toBe(7)
  })

  it('should drop messages below the level', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {})
    const provider = new LoggerProvider()
    provider.setLevel('error')

    provider.info('hidden')

    expect(info).not.toHaveBeenCalled()
  })

  it('should report init', () => {
    const provider = new LoggerProvider()
    expect(provider.hasBeenInitializedValue).toBe(false)
    provider.init()
    expect(provider.hasBeenInitializedValue).toBe(true)
  })
})
