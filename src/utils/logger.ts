// Console logger, threshold set by LOG_LEVEL (silent | error | warn | info | debug)
const LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

type LogLevel = (typeof LEVELS)[number];

const getTimestamp = (): string => {
  return new Date().toISOString();
};

const isLogLevel = (value: string): value is LogLevel =>
  LEVELS.some(level => level === value);

const enabled = (level: Exclude<LogLevel, 'silent'>): boolean => {
  const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
  const threshold: LogLevel = isLogLevel(configured) ? configured : 'info';
  return LEVELS.indexOf(level) <= LEVELS.indexOf(threshold);
};

export const logger = {
  info: (message: string, ...args: unknown[]) => {
    if (enabled('info')) {
      console.log(`${getTimestamp()} [INFO]: ${message}`, ...args);
    }
  },

  error: (message: string, ...args: unknown[]) => {
    if (enabled('error')) {
      console.error(`${getTimestamp()} [ERROR]: ${message}`, ...args);
    }
  },

  warn: (message: string, ...args: unknown[]) => {
    if (enabled('warn')) {
      console.warn(`${getTimestamp()} [WARN]: ${message}`, ...args);
    }
  },

  debug: (message: string, ...args: unknown[]) => {
    if (enabled('debug')) {
      console.log(`${getTimestamp()} [DEBUG]: ${message}`, ...args);
    }
  },
};

export default logger;
