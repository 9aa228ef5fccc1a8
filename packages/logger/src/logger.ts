import { pino } from 'pino'

/**
 * Log levels:
 * - fatal (60): Application crash
 * - error (50): Error messages
 * - warn (40): Warning messages
 * - info (30): General informational messages (default)
 * - debug (20): Debug messages
 * - trace (10): Very detailed trace messages
 */

const prettyOptions = {
  translateTime: 'SYS:HH:MM:ss',
  ignore: 'pid,hostname',
  messageFormat: '{msg}',
  customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray',
  customLevels: 'fatal:60,error:50,warn:40,info:30,debug:20,trace:10'
}

export function isLogLevel(value: string): value is pino.LevelWithSilent {
  return value === 'silent' || Object.hasOwn(pino.levels.values, value)
}

const envLevel = process.env.LOG_LEVEL
const initialLevel: pino.LevelWithSilent = envLevel && isLogLevel(envLevel) ? envLevel : 'info'

type LoggerHandle = {
  logger: pino.Logger
  stream: ReturnType<typeof pino.transport>
}

// Targets accept everything; the root level decides what gets through.
function createBaseLogger(level: pino.LevelWithSilent, logFile?: string): LoggerHandle {
  const targets: pino.TransportTargetOptions[] = [
    {
      target: 'pino-pretty',
      level: 'trace',
      options: { ...prettyOptions, colorize: true, destination: 1 }
    }
  ]

  if (logFile) {
    targets.push({
      target: 'pino-pretty',
      level: 'trace',
      options: { ...prettyOptions, colorize: false, destination: logFile, mkdir: true, append: true }
    })
  }

  const stream = pino.transport({ targets })
  return { logger: pino({ level }, stream), stream }
}

let base = createBaseLogger(initialLevel)

type LoggerSource = () => pino.Logger

type LogMethod = (msgOrObj: unknown, ...args: unknown[]) => void

export type Logger = {
  fatal: LogMethod
  error: LogMethod
  warn: LogMethod
  info: LogMethod
  debug: LogMethod
  trace: LogMethod
  child: (bindings: pino.Bindings) => Logger
}

/**
 * Wrapper to make logger more flexible with arguments
 */
const createLoggerWrapper = (source: LoggerSource): Logger => {
  const wrap = (level: pino.Level): LogMethod => {
    return (msgOrObj, ...args) => {
      const logger = source()

      if (args.length === 0) {
        // Single argument - just log it
        logger[level](String(msgOrObj))
      } else if (args.length === 1) {
        // Two arguments: message and data
        const [data] = args
        const rendered =
          data instanceof Error ? data.message : typeof data === 'object' ? JSON.stringify(data, null, 2) : String(data)
        logger[level](`${String(msgOrObj)} ${rendered}`)
      } else {
        // Multiple arguments - concat them
        const message = [msgOrObj, ...args]
          .map(arg => (typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)))
          .join(' ')
        logger[level](message)
      }
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: (bindings: pino.Bindings) => createLoggerWrapper(childSource(source, bindings))
  }
}

// Children are rebuilt when the base logger is replaced by attachLogFile.
function childSource(source: LoggerSource, bindings: pino.Bindings): LoggerSource {
  let cached: { parent: pino.Logger; child: pino.Logger } | undefined

  return () => {
    const parent = source()
    if (!cached || cached.parent !== parent) {
      cached = { parent, child: parent.child(bindings) }
    }
    return cached.child
  }
}

/**
 * Logger instance for the application
 *
 * Usage:
 * ```typescript
 * import { log } from '@ldes-harvester/logger';
 *
 * log.info('Starting harvest...');
 * log.debug('Detailed info:', { data: 'value' });
 * log.warn('Warning message');
 * log.error('Error occurred:', error);
 * ```
 *
 * Set log level via environment variable:
 * ```bash
 * LOG_LEVEL=debug npm run harvest -- https://example.org/ldes
 * ```
 */
export const log = createLoggerWrapper(() => base.logger)

/**
 * Create a child logger with a specific context
 *
 * @example
 * ```typescript
 * const engineLog = createLogger('CrawlEngine');
 * engineLog.info('Starting traversal...');
 * ```
 */
export function createLogger(context: string): Logger {
  return createLoggerWrapper(childSource(() => base.logger, { context }))
}

/**
 * Set the log level dynamically
 *
 * @example
 * ```typescript
 * setLogLevel('debug');
 * ```
 */
export function setLogLevel(level: pino.LevelWithSilent) {
  base.logger.level = level
}

/**
 * Mirror all output into a plain-text log file, in addition to the console.
 * Loggers created earlier pick up the new destination on their next call.
 */
export function attachLogFile(path: string) {
  const previous = base
  base = createBaseLogger(toLevel(previous.logger.level), path)
  previous.logger.flush()
  previous.stream.end()
}

function toLevel(value: string): pino.LevelWithSilent {
  return isLogLevel(value) ? value : 'info'
}
