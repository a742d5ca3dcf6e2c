import type { LOG_LEVELS } from './constants';

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: number = LEVEL_RANK.info;
let enabled = true;

export function configureLogging(options: { enabled: boolean; level: LogLevel }): void {
  enabled = options.enabled;
  threshold = LEVEL_RANK[options.level];
}

function emit(level: LogLevel, scope: string, message: string, args: unknown[]): void {
  if (!enabled || LEVEL_RANK[level] < threshold) return;
  const line = `${new Date().toISOString()} [${scope}] ${message}`;
  // stdout stays free for machine-readable output
  if (level === 'error') {
    console.error(line, ...args);
  } else {
    console.warn(line, ...args);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, ...args) => emit('debug', scope, message, args),
    info: (message, ...args) => emit('info', scope, message, args),
    warn: (message, ...args) => emit('warn', scope, message, args),
    error: (message, ...args) => emit('error', scope, message, args),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
