export type LogLevel = 'info' | 'warn' | 'error';

export type RunLogEntry = {
  createdAt: string;
  level: LogLevel;
  message: string;
};

export interface RunLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(scope = 'etl'): RunLogger {
  const prefix = `[${scope}]`;
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`),
  };
}

/**
 * Appends every message to `entries` before forwarding it, so a run keeps its own log
 * alongside the process output.
 */
export function createRecordingLogger(entries: RunLogEntry[], next?: RunLogger): RunLogger {
  const record = (level: LogLevel, message: string) => {
    entries.push({ createdAt: new Date().toISOString(), level, message });
    next?.[level](message);
  };
  return {
    info: (message) => record('info', message),
    warn: (message) => record('warn', message),
    error: (message) => record('error', message),
  };
}

export const silentLogger: RunLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
