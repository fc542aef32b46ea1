export enum LogLevel {
  TRACE = 'TRACE',
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const severity: Record<LogLevel, number> = {
  [LogLevel.TRACE]: 10,
  [LogLevel.DEBUG]: 20,
  [LogLevel.INFO]: 30,
  [LogLevel.WARN]: 40,
  [LogLevel.ERROR]: 50,
};

/**
 * Whether a record at `level` passes the `threshold`
 */
export const isLevelEnabled = (level: LogLevel, threshold: LogLevel): boolean =>
  severity[level] >= severity[threshold];

/**
 * Case-insensitive lookup; `warning` is accepted for WARN
 */
export const parseLogLevel = (value: string): LogLevel | undefined => {
  const normalized = value.trim().toUpperCase();
  if (normalized === 'WARNING') {
    return LogLevel.WARN;
  }
  return Object.values(LogLevel).find((level) => level === normalized);
};
