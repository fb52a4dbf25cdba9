/**
 * Structured logging.
 *
 * An entry is a level, a message and a flat context object. Loggers made
 * with child() stamp their context onto every entry they write. All loggers
 * share one process-wide handler and minimum level.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

/** Levels from most to least verbose. */
const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error];

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

/** One JSON line per entry; warn and error go to stderr. */
function writeJsonLine(entry: LogEntry): void {
  const line = JSON.stringify({ ts: entry.timestamp, level: entry.level, msg: entry.message, ...entry.context });
  const stream = entry.level === LogLevel.Warn || entry.level === LogLevel.Error ? process.stderr : process.stdout;
  stream.write(`${line}\n`);
}

const settings: { handler: LogHandler; minLevel: LogLevel } = {
  handler: writeJsonLine,
  minLevel: LogLevel.Info,
};

/** Parse a level name in any case, returning undefined for anything unrecognised. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return LEVEL_ORDER.find((level) => level === normalized);
}

/**
 * Set the minimum level. Accepts a LogLevel or a level name such as
 * "WARN"; an unknown name throws a RangeError and leaves the level as is.
 */
export function setLogLevel(level: LogLevel | string): void {
  const parsed = parseLogLevel(level);
  if (parsed === undefined) {
    throw new RangeError(`Unknown log level "${level}"; expected one of ${LEVEL_ORDER.join(', ')}`);
  }
  settings.minLevel = parsed;
}

export function getLogLevel(): LogLevel {
  return settings.minLevel;
}

/** Route entries to `handler`, or back to the JSON line writer when called without one. */
export function setLogHandler(handler?: LogHandler): void {
  settings.handler = handler ?? writeJsonLine;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(settings.minLevel);
}

export class Logger {
  constructor(private readonly context: LogContext = {}) {}

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.Debug, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.Info, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.Warn, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write(LogLevel.Error, message, context);
  }

  /** A logger whose entries also carry `context`; call-site fields win on conflict. */
  child(context: LogContext): Logger {
    return new Logger({ ...this.context, ...context });
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!isEnabled(level)) return;
    settings.handler({
      level,
      message,
      context: { ...this.context, ...context },
      timestamp: new Date().toISOString(),
    });
  }
}

export function createLogger(context: LogContext = {}): Logger {
  return new Logger(context);
}

/** Root logger. */
export const logger = createLogger({ component: 'graph-runner' });
