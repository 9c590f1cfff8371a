type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogThreshold = LogLevel | 'silent';

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown> | undefined;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVEL_ENV = 'STOMP_SOCKET_LOG_LEVEL';

function isLogThreshold(value: string): value is LogThreshold {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

// Read on every call so the level can be changed at runtime.
function currentThreshold(): LogThreshold {
  const configured = process.env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return configured && isLogThreshold(configured) ? configured : 'info';
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentThreshold()];
}

export function formatLog(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}: ${entry.message}`;
  if (entry.data) {
    return `${base} ${JSON.stringify(entry.data)}`;
  }
  return base;
}

function createLogEntry(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>
): LogEntry {
  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };
}

export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('debug')) console.debug(formatLog(createLogEntry('debug', message, data)));
  },

  info(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('info')) console.info(formatLog(createLogEntry('info', message, data)));
  },

  warn(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('warn')) console.warn(formatLog(createLogEntry('warn', message, data)));
  },

  error(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('error')) console.error(formatLog(createLogEntry('error', message, data)));
  },
};
