import pino from 'pino'

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

function isLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some((known) => known === level)
}

function initialLevel(): LogLevel {
  const fromEnv = process.env['LOG_LEVEL']
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info'
}

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * It is a singleton class.
 * @description Call `init()` at the top of an entry point; until then only
 * warnings and errors are written.
 */
export class LoggerProvider {
  private pino = pino(
    {
      level: initialLevel(),
    },
    pino.multistream(
      [
        { level: 'error', stream: process.stderr },
        { level: 'fatal', stream: process.stderr },
        { level: 'trace', stream: process.stdout },
      ],
      { dedupe: true },
    ),
  )
  private hasBeenInitialized = false

  get hasBeenInitializedValue() {
    return this.hasBeenInitialized
  }

  get level(): string {
    return this.pino.level
  }

  init() {
    this.hasBeenInitialized = true
    this.pino.debug('LoggerProvider initialized')
  }

  setLevel(level: LogLevel) {
    this.pino.level = level
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level)
  }

  info(message: string, ...args: unknown[]) {
    this._safeLog('info', message, args)
  }

  debug(message: string, ...args: unknown[]) {
    this._safeLog('debug', message, args)
  }

  trace(message: string, ...args: unknown[]) {
    this._safeLog('trace', message, args)
  }

  warn(message: string, ...args: unknown[]) {
    this._safeLog('warn', message, args)
  }

  error(message: string, error?: unknown, ..._args: unknown[]) {
    this._safeLog('error', message, [error, ..._args])
  }

  private _safeLog(level: LogLevel, message: string, args: unknown[]) {
    if (!this.hasBeenInitialized && level !== 'warn' && level !== 'error') {
      return
    }

    if (level === 'error') {
      const [err, ...rest] = args
      this.pino.error({ err, args: rest }, message)
    } else if (args.length === 0) {
      this.pino[level](message)
    } else {
      this.pino[level]({ args }, message)
    }
  }
}

export const logger = new LoggerProvider()
