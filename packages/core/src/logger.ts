import type { Logger, LogLevel } from './types.js';

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Pick the effective log level: explicit config, then VARLOOM_LOG_LEVEL, then 'info'
 */
export function resolveLogLevel(
  level?: LogLevel,
  env: Readonly<Record<string, string | undefined>> = process.env
): LogLevel {
  if (level) return level;

  const fromEnv = env.VARLOOM_LOG_LEVEL?.toLowerCase();
  const match = LEVELS.find((candidate) => candidate === fromEnv);

  return match ?? 'info';
}

/**
 * Create default console logger
 */
export function createDefaultLogger(level: LogLevel): Logger {
  const currentLevel = LEVELS.indexOf(level);

  return {
    error: (msg: string, meta?: unknown) => {
      if (currentLevel >= 0) console.error(`[VARLOOM ERROR] ${msg}`, meta || '');
    },
    warn: (msg: string, meta?: unknown) => {
      if (currentLevel >= 1) console.warn(`[VARLOOM WARN] ${msg}`, meta || '');
    },
    info: (msg: string, meta?: unknown) => {
      if (currentLevel >= 2) console.log(`[VARLOOM INFO] ${msg}`, meta || '');
    },
    debug: (msg: string, meta?: unknown) => {
      if (currentLevel >= 3) console.log(`[VARLOOM DEBUG] ${msg}`, meta || '');
    },
  };
}
