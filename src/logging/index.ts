/**
 * Structured logging API.
 *
 * Thin layer over a pino root logger. Messages carry flat structured fields
 * (component, operation, type_key, ...) next to the message text. In the
 * development environment output goes through the pino-pretty transport;
 * everywhere else it is newline-delimited JSON on stdout.
 *
 * The root logger is built lazily from `loadConfig()` and can be replaced
 * with `configureLogging()`.
 */

import { type DestinationStream, type Logger, type LoggerOptions, pino } from 'pino';
import { type LogLevel, loadConfig } from '../config/index.js';

/**
 * Structured logging fields.
 *
 * Common fields:
 * - component: subsystem identifier (e.g. "type-mapper", "mapper-registry")
 * - operation: operation being performed (e.g. "resolve", "register")
 * - type_key / type_name: target type of a resolution
 * - mapper_name: mapper involved
 * - error_message: error message for failure logs
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

/**
 * Options for rebuilding the root logger.
 */
export interface LoggingOptions {
  /** Minimum level (default: from configuration) */
  level?: LogLevel;
  /** Use the pino-pretty transport; ignored when a destination is given */
  pretty?: boolean;
  /** Write to this stream instead of stdout */
  destination?: DestinationStream;
}

/**
 * Logger with preset fields, as returned by `createLogger`.
 */
export interface MapperLogger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

let rootLogger: Logger | null = null;

function buildLogger(options: LoggingOptions): Logger {
  const config = loadConfig();
  const loggerOptions: LoggerOptions = {
    name: 'taxon-mapper',
    level: options.level ?? config.logLevel,
  };

  if (options.destination) {
    return pino(loggerOptions, options.destination);
  }

  if (options.pretty ?? config.prettyLogs) {
    loggerOptions.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(loggerOptions);
}

/**
 * Replace the root logger.
 *
 * Meant for process startup and tests. The previous logger is flushed
 * before it is dropped; a pino-pretty transport worker it started stays
 * open until the process exits.
 *
 * @example
 * ```typescript
 * const lines: string[] = [];
 * configureLogging({ level: 'debug', destination: { write: (line) => lines.push(line) } });
 * ```
 */
export function configureLogging(options: LoggingOptions = {}): Logger {
  rootLogger?.flush();
  rootLogger = buildLogger(options);
  return rootLogger;
}

/**
 * Get the root pino logger, building it on first use.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = buildLogger({});
  }
  return rootLogger;
}

/**
 * Drop undefined values so they do not show up as keys.
 */
function toPinoFields(fields?: LogFields): Record<string, string | number | boolean | null> {
  const result: Record<string, string | number | boolean | null> = {};
  if (!fields) {
    return result;
  }

  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Log an ERROR level message with structured fields.
 */
export function logError(message: string, fields?: LogFields): void {
  getRootLogger().error(toPinoFields(fields), message);
}

/**
 * Log a WARN level message with structured fields.
 *
 * @example
 * logWarn('Overlapping mappers', {
 *   component: 'type-mapper',
 *   type_name: 'Campaign',
 * });
 */
export function logWarn(message: string, fields?: LogFields): void {
  getRootLogger().warn(toPinoFields(fields), message);
}

/**
 * Log an INFO level message with structured fields.
 */
export function logInfo(message: string, fields?: LogFields): void {
  getRootLogger().info(toPinoFields(fields), message);
}

/**
 * Log a DEBUG level message with structured fields.
 */
export function logDebug(message: string, fields?: LogFields): void {
  getRootLogger().debug(toPinoFields(fields), message);
}

/**
 * Log a TRACE level message with structured fields.
 */
export function logTrace(message: string, fields?: LogFields): void {
  getRootLogger().trace(toPinoFields(fields), message);
}

/**
 * Create a logger with preset fields.
 *
 * Each call goes through the current root logger, so loggers created at
 * module load follow a later `configureLogging()`.
 *
 * @param defaultFields - Fields to include in every log message
 *
 * @example
 * const log = createLogger({ component: 'type-mapper' });
 * log.debug('Mapper resolved', { type_name: 'Campaign' });
 * // Logs: { component: 'type-mapper', type_name: 'Campaign' }
 */
export function createLogger(defaultFields: LogFields): MapperLogger {
  const mergeFields = (fields?: LogFields): LogFields => ({
    ...defaultFields,
    ...fields,
  });

  return {
    error: (message, fields) => logError(message, mergeFields(fields)),
    warn: (message, fields) => logWarn(message, mergeFields(fields)),
    info: (message, fields) => logInfo(message, mergeFields(fields)),
    debug: (message, fields) => logDebug(message, mergeFields(fields)),
    trace: (message, fields) => logTrace(message, mergeFields(fields)),
  };
}
