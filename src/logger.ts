/**
 * Logger abstraction.
 *
 * Structured, level-based logging with context. Pipeline steps, the
 * orchestrator and the audit service all log through child loggers so
 * every line carries its component and environment.
 * Consumers can replace the default implementation by calling setLogHandler().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/** Default log handler writes structured JSON to stderr/stdout. */
const defaultLogHandler: LogHandler = (entry: LogEntry) => {
  const output = {
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  };
  switch (entry.level) {
    case LogLevel.Error:
      console.error(JSON.stringify(output));
      break;
    case LogLevel.Warn:
      console.warn(JSON.stringify(output));
      break;
    default:
      console.log(JSON.stringify(output));
  }
};

let currentHandler: LogHandler = defaultLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

/** Replace the default log handler (e.g., for testing or external log systems). */
export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

/** Restore the built-in JSON console handler. */
export function resetLogHandler(): void {
  currentHandler = defaultLogHandler;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

/** Map a LOG_LEVEL string onto a LogLevel, falling back to info. */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case 'debug':
      return LogLevel.Debug;
    case 'warn':
    case 'warning':
      return LogLevel.Warn;
    case 'error':
      return LogLevel.Error;
    default:
      return LogLevel.Info;
  }
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentMinLevel];
}

function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  currentHandler({
    level,
    message,
    context,
    timestamp: new Date().toISOString(),
  });
}

/** Create a child logger with persistent context fields. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/** Root logger instance. */
export const logger = createLogger({ component: 'deploy-pilot' });
