// ============================================================================
// tracesift — Structured JSON Logger
// One JSON object per line on stdout; threshold from LOG_LEVEL
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function threshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured === 'silent') return Number.POSITIVE_INFINITY;
  if (configured === 'debug' || configured === 'info' || configured === 'warn' || configured === 'error') {
    return LEVEL_ORDER[configured];
  }
  // debug only outputs in development unless LOG_LEVEL says otherwise
  return process.env.NODE_ENV === 'development' ? LEVEL_ORDER.debug : LEVEL_ORDER.info;
}

function writeLog(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < threshold()) {
    return;
  }

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...context,
  };

  process.stdout.write(JSON.stringify(entry) + '\n');
}

export const logger = {
  debug(message: string, context?: Record<string, unknown>): void {
    writeLog('debug', message, context);
  },

  info(message: string, context?: Record<string, unknown>): void {
    writeLog('info', message, context);
  },

  warn(message: string, context?: Record<string, unknown>): void {
    writeLog('warn', message, context);
  },

  error(message: string, context?: Record<string, unknown>): void {
    writeLog('error', message, context);
  },
};
