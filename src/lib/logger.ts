type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value === 'debug' || value === 'info' || value === 'warn' || value === 'error';

const minimumLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL;
  return isLogLevel(level) ? level : 'info';
};

const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];

const formatMessage = (level: LogLevel, message: string, meta?: Record<string, unknown>): string => {
  const timestamp = new Date().toISOString();
  const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${suffix}`;
};

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>): void => {
    if (enabled('debug')) {
      console.debug(formatMessage('debug', message, meta));
    }
  },
  info: (message: string, meta?: Record<string, unknown>): void => {
    if (enabled('info')) {
      console.info(formatMessage('info', message, meta));
    }
  },
  warn: (message: string, meta?: Record<string, unknown>): void => {
    if (enabled('warn')) {
      console.warn(formatMessage('warn', message, meta));
    }
  },
  error: (message: string, error?: Error): void => {
    console.error(formatMessage('error', message));
    if (error) {
      console.error(error.stack || error.message);
    }
  },
};
