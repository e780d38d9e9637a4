import pino from 'pino'

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER
}

function currentLevel(): LogLevel {
  const level = process.env['LOG_LEVEL'] ?? 'info'
  return isLogLevel(level) ? level : 'info'
}

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * It is a singleton class.
 * @description Before using the logger, it must be initialized with `init()` at the top of the entry point file.
 */
export class LoggerProvider {
  private pino = pino(
    {
      level: currentLevel(),
    },
    pino.multistream([
      { level: 'error', stream: process.stderr },
      { level: 'fatal', stream: process.stderr },
      { level: 'trace', stream: process.stdout },
    ]),
  )
  private hasBeenInitialized = false

  get level(): LogLevel {
    return currentLevel()
  }

  init() {
    this.pino.level = currentLevel()
    this.pino.info('LoggerProvider initialized')
    this.hasBeenInitialized = true
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level]
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

  /**
   * Routes to pino once initialized, to the console before that
   */
  private _safeLog(
    level: 'info' | 'debug' | 'warn' | 'error',
    message: string,
    args: unknown[],
  ) {
    if (!this.hasBeenInitialized) {
      if (!this.isLevelEnabled(level)) return

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
