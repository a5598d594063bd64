/**
 * Levelled console logging
 */

import type { LogLevel } from './types.js';

const LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export class Logger {
  readonly scope: string;
  readonly level: LogLevel;

  constructor(scope: string, level: LogLevel = 'info') {
    this.scope = scope;
    this.level = level;
  }

  /**
   * Derive a logger for a sub-component at the same level
   */
  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, this.level);
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LEVELS[level] <= LEVELS[this.level];
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, meta?: unknown): void {
    if (!this.isEnabled(level)) return;

    const prefix = `[${this.scope}:${level.toUpperCase()}]`;
    const line = meta === undefined ? message : `${message} ${formatMeta(meta)}`;
    switch (level) {
      case 'error':
        console.error(prefix, line);
        break;
      case 'warn':
        console.warn(prefix, line);
        break;
      case 'info':
        console.info(prefix, line);
        break;
      case 'debug':
        console.debug(prefix, line);
        break;
    }
  }
}

function formatMeta(meta: unknown): string {
  if (meta instanceof Error) {
    return `${meta.name}: ${meta.message}`;
  }
  return JSON.stringify(meta, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
}

/** Logger that discards everything */
export const silentLogger = new Logger('echo-probe', 'silent');
