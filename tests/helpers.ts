import { LogEntry, LogLevel, setLogHandler, setLogLevel } from '../src/logger';

/** Collect every log entry at debug level and above until restore() is called. */
export function captureLogs(): { entries: LogEntry[]; restore: () => void } {
  const entries: LogEntry[] = [];
  setLogLevel(LogLevel.Debug);
  setLogHandler((entry) => entries.push(entry));
  return {
    entries,
    restore: () => {
      setLogLevel(LogLevel.Info);
      setLogHandler(() => undefined);
    },
  };
}

/** Deterministic ids: graph-1, run-2, ... */
export function sequentialIds(): (kind: 'graph' | 'run') => string {
  let counter = 0;
  return (kind) => {
    counter += 1;
    return `${kind}-${counter}`;
  };
}
