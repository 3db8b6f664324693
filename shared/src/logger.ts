/**
 * Logging utilities for seedsweep
 */

import { LOG_LEVELS, type LogLevel } from './types.js';
import { validateEnum } from './validation.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

export class Logger {
  private name: string;
  private level: LogLevel;
  private useColors: boolean;
  private bindings: Record<string, unknown>;

  constructor(name: string, level: LogLevel = 'info', useColors = true, bindings: Record<string, unknown> = {}) {
    this.name = name;
    this.level = level;
    this.useColors = useColors && process.stdout.isTTY === true;
    this.bindings = bindings;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private colorize(text: string, color: keyof typeof COLORS): string {
    if (!this.useColors) return text;
    return `${COLORS[color]}${text}${COLORS.reset}`;
  }

  private formatLine(label: string, color: keyof typeof COLORS, message: string, meta?: Record<string, unknown>): string {
    const timestamp = this.colorize(new Date().toISOString(), 'gray');
    const name = this.colorize(`[${this.name}]`, 'cyan');
    const fields = { ...this.bindings, ...meta };

    let output = `${timestamp} ${this.colorize(label, color)} ${name} ${message}`;

    if (Object.keys(fields).length > 0) {
      output += ` ${this.colorize(JSON.stringify(fields), 'gray')}`;
    }

    return output;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.log(this.formatLine('DEBUG', 'gray', message, meta));
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.log(this.formatLine('INFO ', 'blue', message, meta));
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatLine('WARN ', 'yellow', message, meta));
    }
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.formatLine('ERROR', 'red', message, meta));
    }
  }

  /**
   * Derive a logger tagged `parent:name`. Fields in `bindings` are attached
   * to every line the child writes.
   */
  child(name: string, bindings: Record<string, unknown> = {}): Logger {
    return new Logger(`${this.name}:${name}`, this.level, this.useColors, { ...this.bindings, ...bindings });
  }
}

export function createLogger(name: string, level?: LogLevel): Logger {
  return new Logger(name, level ?? validateEnum(process.env.LOG_LEVEL, LOG_LEVELS, 'info'));
}
