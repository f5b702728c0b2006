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

/**
 * Errors and fatals to `stderr`, every other level to `stdout`, each line once
 */
export function createLogStreams(
  stderr: pino.DestinationStream = process.stderr,
  stdout: pino.DestinationStream = process.stdout,
) {
  return pino.multistream(
    [
      { level: 'error', stream: stderr },
      { level: 'fatal', stream: stderr },
      { level: 'trace', stream: stdout },
    ],
    { dedupe: true },
  )
}

function configuredLevel(): LogLevel {
  const level = process.env['LOG_LEVEL'] ?? 'info'
  return isLogLevel(level) ? level : 'info'
}

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * It is a singleton class.
 * @description Call `init()` at the top of the entry point of a program embedding the engine,
 * until then messages go to the console.
 */
export class LoggerProvider {
  private pino = pino(
    {
      level: configuredLevel(),
    },
    createLogStreams(),
  )
  private hasBeenInitialized = false

  get hasBeenInitializedValue() {
    return this.hasBeenInitialized
  }

  get level(): LogLevel {
    return configuredLevel()
  }

  init() {
    this.pino.level = configuredLevel()
    this.pino.info('LoggerProvider initialized')
    this.hasBeenInitialized = true
  }

  trace(message: string, ...args: unknown[]) {
    this._safeLog('trace', message, args)
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

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level]
  }

  /**
   * Falls back to the console while the logger is uninitialized
   */
  private _safeLog(level: LogLevel, message: string, args: unknown[]) {
    if (!this.hasBeenInitialized) {
      if (!this.isLevelEnabled(level)) return

      const timestamp = new Date().toISOString()
      const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`

      if (level === 'error') {
        console.error(logMessage, ...args)
      } else if (level === 'warn') {
        console.warn(logMessage, ...args)
      } else if (level === 'debug' || level === 'trace') {
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
