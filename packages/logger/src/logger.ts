import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Process cannot continue
 * - error (50): A batch or task failed for good
 * - warn (40): A task attempt failed and will be retried
 * - info (30): General informational messages (default)
 * - debug (20): Per-task details, fire-and-forget outcomes, batch metrics
 * - trace (10): Per-attempt request/response details
 */

const LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

const isLevel = (value: string): value is pino.LevelWithSilent =>
  LEVELS.some(level => level === value)

const resolveLevel = (value: string | undefined): pino.LevelWithSilent => {
  const candidate = value?.trim().toLowerCase() ?? ''
  return isLevel(candidate) ? candidate : 'info'
}

// Pretty output only for humans; piped output stays newline-delimited JSON
const usePretty = process.env.LOG_PRETTY === 'true' || (process.env.LOG_PRETTY !== 'false' && process.stdout.isTTY === true)

const baseLogger = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  ...(usePretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
            messageFormat: '{if context}[{context}] {end}{msg}',
            customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
          }
        }
      }
    : {})
})

type LogFn = (message: string, data?: unknown) => void

type Logger = {
  fatal: LogFn
  error: LogFn
  warn: LogFn
  info: LogFn
  debug: LogFn
  trace: LogFn
  child: (bindings: pino.Bindings) => Logger
}

type Level = Exclude<keyof Logger, 'child'>

const toMergeObject = (data: unknown): Record<string, unknown> => {
  if (data instanceof Error) {
    return { err: data }
  }
  if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
    return { ...data }
  }
  return { data }
}

/**
 * Adapts pino's `(mergeObject, message)` signature to `(message, data?)`
 */
const createLoggerWrapper = (logger: pino.Logger): Logger => {
  const wrap = (level: Level): LogFn => {
    return (message, data) => {
      if (data === undefined) {
        logger[level](message)
        return
      }
      logger[level](toMergeObject(data), message)
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: (bindings: pino.Bindings) => createLoggerWrapper(logger.child(bindings))
  }
}

/**
 * Create a child logger with a specific context
 *
 * Set log level via environment variable:
 * ```bash
 * LOG_LEVEL=debug npm run fetch -- run --tasks=./tasks.json
 * ```
 *
 * @example
 * ```typescript
 * const executorLog = createLogger('fetch-executor');
 * executorLog.warn('Attempt failed, retrying', { url, retriesLeft: 2 });
 * ```
 */
export function createLogger(context: string): Logger {
  return createLoggerWrapper(baseLogger.child({ context }))
}

export type { Logger, LogFn }
