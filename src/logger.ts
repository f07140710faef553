/**
 * Logger abstraction.
 *
 * Structured, level-based logging with context. Engine code logs through
 * child loggers carrying runId/workflowId/nodeId; embedders replace the
 * sink with setLogHandler().
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

/** Writes one JSON line per entry; warnings and errors go to stderr. */
const defaultLogHandler: LogHandler = (entry: LogEntry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
  if (entry.level === LogLevel.Error) console.error(line);
  else if (entry.level === LogLevel.Warn) console.warn(line);
  else console.log(line);
};

let currentHandler: LogHandler = defaultLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

/** Replace the log sink (e.g., for testing or an external log system). */
export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

/** Restore the JSON console sink. */
export function resetLogHandler(): void {
  currentHandler = defaultLogHandler;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentMinLevel;
}

/** Map a level name ("WARN", "debug") to a LogLevel; undefined if unknown. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentMinLevel]) return;
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
export const logger = createLogger({ component: 'flowgraph' });
