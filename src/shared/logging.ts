export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  scope: string;
  message: string;
  level?: LogLevel;
  data?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = 'info';

export const setLogLevel = (level: LogLevel): void => {
  threshold = level;
};

export const getLogLevel = (): LogLevel => threshold;

export const formatLogLine = ({ scope, message, level = 'info', data }: LogEntry, timestamp: string): string => {
  const payload = data ? ` ${JSON.stringify(data)}` : '';
  return `[${timestamp}] [${level.toUpperCase()}] [${scope}] ${message}${payload}`;
};

// stdout is reserved for converted text (--stdout)
export const log = (entry: LogEntry): void => {
  const level = entry.level ?? 'info';
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  // eslint-disable-next-line no-console
  console.error(formatLogLine(entry, new Date().toISOString()));
};
