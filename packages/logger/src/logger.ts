import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Crawl could not start
 * - error (50): Error messages
 * - warn (40): Warning messages
 * - info (30): General informational messages (default)
 * - debug (20): Debug messages
 * - trace (10): Very detailed trace messages
 *
 * Everything is written to stderr: a crawl worker's stdout is reserved for
 * the `[SCRAPE]` / `[SUCCESS]` / `[DONE]` event lines.
 */

const LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

const isLevel = (value: string | undefined): value is pino.LevelWithSilent =>
  LEVELS.some(level => level === value)

const requestedLevel = process.env.LOG_LEVEL
const logLevel: pino.LevelWithSilent = isLevel(requestedLevel) ? requestedLevel : 'info'
const STDERR = 2

const createBaseLogger = (level: pino.LevelWithSilent): pino.Logger => {
  if (level === 'silent' || process.env.LOG_PRETTY === 'false') {
    return pino({ level }, pino.destination(STDERR))
  }

  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        destination: STDERR,
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname',
        messageFormat: '{if context}[{context}] {end}{msg}',
        customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray',
        customLevels: 'fatal:60,error:50,warn:40,info:30,debug:20,trace:10'
      }
    }
  })
}

const baseLogger = createBaseLogger(logLevel)

type LogFn = (msgOrObj: unknown, ...args: unknown[]) => void

type Logger = {
  fatal: LogFn
  error: LogFn
  warn: LogFn
  info: LogFn
  debug: LogFn
  trace: LogFn
  child: (bindings: pino.Bindings) => Logger
}

const formatArg = (arg: unknown): string => {
  if (arg instanceof Error) {
    return arg.message
  }

  return typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
}

/**
 * Wrapper to make logger more flexible with arguments
 */
const createLoggerWrapper = (logger: pino.Logger): Logger => {
  const wrap = (level: pino.Level): LogFn => {
    return (msgOrObj, ...args) => {
      if (!logger.isLevelEnabled(level)) {
        return
      }

      const message = [msgOrObj, ...args].map(formatArg).join(' ')
      logger[level](message)
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: bindings => createLoggerWrapper(logger.child(bindings))
  }
}

/**
 * Logger instance for the application
 *
 * Usage:
 * ```typescript
 * import { log } from '@workspace/logger';
 *
 * log.info('Starting crawl...');
 * log.debug('Frontier state:', { queued: 12 });
 * log.error('Fetch failed:', error);
 * ```
 *
 * Set log level via environment variable:
 * ```bash
 * LOG_LEVEL=debug npm run crawl -- site --url=https://example.com
 * LOG_PRETTY=false npm run crawl -- single --url=https://example.com/docs
 * ```
 */
export const log = createLoggerWrapper(baseLogger)

/**
 * Create a child logger with a specific context
 *
 * @example
 * ```typescript
 * const sitemapLog = createLogger('Sitemap');
 * sitemapLog.info('Probing candidates...');
 * ```
 */
export function createLogger(context: string): Logger {
  return createLoggerWrapper(baseLogger.child({ context }))
}

export function setLogLevel(level: pino.LevelWithSilent): void {
  baseLogger.level = level
}

export type { Logger, LogFn }
