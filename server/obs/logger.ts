import type { AppConfig } from '../../shared/config';

type LogLevel = AppConfig['observability']['logLevel'];

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
}

const emit = (level: LogLevel, scope: string | undefined, message: string, meta?: Record<string, unknown>) => {
  const base = {
    level,
    message,
    ts: new Date().toISOString(),
    ...(scope ? { scope } : {}),
    ...meta,
  };
  const payload = JSON.stringify(base);
  /* eslint-disable no-console */
  if (level === 'error') {
    console.error(payload);
  } else if (level === 'warn') {
    console.warn(payload);
  } else {
    console.log(payload);
  }
  /* eslint-enable no-console */
};

export const createLogger = (config: Pick<AppConfig, 'observability'>, scope?: string): Logger => {
  const threshold = levelWeights[config.observability.logLevel];
  const shouldLog = (level: LogLevel) => levelWeights[level] >= threshold;
  return {
    debug: (message, meta) => {
      if (shouldLog('debug')) emit('debug', scope, message, meta);
    },
    info: (message, meta) => {
      if (shouldLog('info')) emit('info', scope, message, meta);
    },
    warn: (message, meta) => {
      if (shouldLog('warn')) emit('warn', scope, message, meta);
    },
    error: (message, meta) => emit('error', scope, message, meta),
  };
};

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
