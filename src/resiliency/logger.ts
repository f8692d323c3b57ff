/**
 * Structured Logger
 *
 * Named loggers writing one line per entry:
 *   2026-01-01T00:00:00.000Z [INFO] [engine] Bridge started {"ports":[...]}
 *
 * Entries below the configured level are dropped. warn/error/fatal go to
 * stderr, everything else to stdout. An optional file receives a copy.
 */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  context?: Record<string, unknown>;
}

export interface LoggerConfig {
  level: LogLevel;
  file?: string;
  /** Suppress console output (file output still happens) */
  quiet?: boolean;
  /** Receives every emitted entry. Used by tests and status collectors. */
  sink?: (entry: LogEntry) => void;
}

let globalConfig: LoggerConfig = {
  level: 'info',
};

/** Every logger created through createLogger, by component name. */
export const loggers = new Map<string, Logger>();

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function formatEntry(entry: LogEntry): string {
  const context = entry.context && Object.keys(entry.context).length > 0
    ? ` ${JSON.stringify(entry.context)}`
    : '';
  return `${entry.timestamp} [${entry.level.toUpperCase()}] [${entry.component}] ${entry.message}${context}`;
}

export class Logger {
  readonly component: string;
  private overrides: Partial<LoggerConfig>;

  constructor(component: string, overrides: Partial<LoggerConfig> = {}) {
    this.component = component;
    this.overrides = overrides;
  }

  private get config(): LoggerConfig {
    return { ...globalConfig, ...this.overrides };
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  fatal(message: string, context?: Record<string, unknown>): void {
    this.log('fatal', message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const config = this.config;
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[config.level]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      context,
    };

    config.sink?.(entry);

    const line = formatEntry(entry);

    if (!config.quiet) {
      if (LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.warn) {
        console.error(line);
      } else {
        console.log(line);
      }
    }

    if (config.file) {
      try {
        fs.mkdirSync(path.dirname(config.file), { recursive: true });
        fs.appendFileSync(config.file, line + '\n');
      } catch (err) {
        // File write failures are reported, never thrown
        console.error(`[logger] Failed to write ${config.file}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }
}

/**
 * Get (or create) the logger for a component.
 */
export function createLogger(component: string, overrides: Partial<LoggerConfig> = {}): Logger {
  if (Object.keys(overrides).length === 0) {
    const existing = loggers.get(component);
    if (existing) return existing;
  }
  const logger = new Logger(component, overrides);
  loggers.set(component, logger);
  return logger;
}

/**
 * Update the configuration shared by all loggers.
 */
export function configure(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}
