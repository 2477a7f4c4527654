/**
 * core/logger.ts
 *
 * Singleton pino logger. Every module does:
 *     const log = scopedLogger('display/inventory');
 *
 * Child loggers are scoped with a `module` field so the listener's
 * output can be filtered per-module.
 */

import pino from 'pino';
import { AppConfig } from './types';

let instance: pino.Logger | null = null;

export function initLogger(config: Pick<AppConfig, 'logLevel'>): pino.Logger {
  instance = pino({
    level: config.logLevel
  });
  return instance;
}

export function getLogger(): pino.Logger {
  if (!instance) {
    // Fallback for early imports before initLogger is called
    instance = pino({ level: process.env.SCREENSWITCH_LOG_LEVEL ?? 'info' });
  }
  return instance;
}

type Level = 'trace' | 'debug' | 'info' | 'warn' | 'error';
type LogMethod = (objOrMsg: unknown, msg?: string) => void;

export type ScopedLogger = Record<Level, LogMethod>;

/**
 * Returns a logger scoped to a specific module.
 * Usage:  const log = scopedLogger('session/coordinator');
 *
 * Modules create their logger at import time, before initLogger() runs,
 * so the pino child is bound lazily and rebuilt if the root is replaced.
 */
export function scopedLogger(moduleName: string): ScopedLogger {
  let owner: pino.Logger | null = null;
  let child: pino.Logger | null = null;

  const current = (): pino.Logger => {
    const root = getLogger();
    if (owner !== root || !child) {
      owner = root;
      child = root.child({ module: moduleName });
    }
    return child;
  };

  const method = (level: Level): LogMethod => (objOrMsg, msg) => {
    const logger = current();
    if (typeof objOrMsg === 'string') {
      logger[level](objOrMsg);
    } else {
      logger[level](objOrMsg, msg);
    }
  };

  return {
    trace: method('trace'),
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error')
  };
}
