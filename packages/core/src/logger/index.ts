import pino from 'pino'

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const DEFAULT_LEVEL = 'info'

/**
 * Level named by PINO_LEVEL or LOG_LEVEL, or info when neither names a pino
 * level. pino throws on an unknown default level, and the singleton below is
 * built at import time.
 */
export function resolveLevel(
  candidate: string | undefined = process.env['PINO_LEVEL'] ||
    process.env['LOG_LEVEL'],
): string {
  if (
    candidate &&
    (candidate === 'silent' || Object.hasOwn(pino.levels.values, candidate))
  ) {
    return candidate
  }
  return DEFAULT_LEVEL
}

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * @description Call `init()` at the top of an entry point. Until then messages
 * at or above the configured level go to the console.
 */
export class LoggerProvider {
  // stdout carries command output, so every record goes to stderr
  private pino: pino.Logger
  private hasBeenInitialized = false

  constructor(level?: string) {
    this.pino = pino(
      { level: resolveLevel(level) },
      pino.destination({ fd: 2, sync: true }),
    )
  }

  get hasBeenInitializedValue() {
    return this.hasBeenInitialized
  }

  get level() {
    return this.pino.level
  }

  /**
   * Change the threshold of an already-created logger
   */
  setLevel(level: string) {
    this.pino.level = level
  }

  init() {
    this.hasBeenInitialized = true
    this.pino.debug('LoggerProvider initialized')
  }

  info(message: string, ...args: unknown[]) {
    this._safeLog('info', message, args)
  }

  debug(message: string, ...args: unknown[]) {
    this._safeLog('debug', message, args)
  }

  warn(message: string, ...args: unknown[]) {
    this._safeLog('warn', message, args)
  }

  error(message: string, error?: unknown, ..._args: unknown[]) {
    this._safeLog('error', message, [error, ..._args])
  }

  private isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level)
  }

  private _safeLog(level: LogLevel, message: string, args: unknown[]) {
    if (!this.isLevelEnabled(level)) {
      return
    }

    if (!this.hasBeenInitialized) {
      const timestamp = new Date().toISOString()
      const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`

      if (level === 'error') {
        console.error(logMessage, ...args)
      } else if (level === 'warn') {
        console.warn(logMessage, ...args)
      } else if (level === 'debug') {
        console.debug(logMessage, ...args)
      } else {
        console.log(logMessage, ...args)
      }
      return
    }

    if (level === 'error') {
      this.pino.error({ err: args[0], args: args.slice(1) }, message)
    } else {
      this.pino[level]({ args }, message)
    }
  }
}

export const logger = new LoggerProvider()
